/**
 * Structural Indexer - first pass over a padded input
 *
 * Records the byte offset of every structural character and of the first
 * byte of every scalar, validates strings (termination, control characters,
 * UTF-8) and checks that containers are balanced and within depth. Grammar
 * between tokens is left to the on-demand cursor.
 */

import {
  CHAR_OPEN_BRACE,
  CHAR_CLOSE_BRACE,
  CHAR_OPEN_BRACKET,
  CHAR_CLOSE_BRACKET,
  CHAR_COLON,
  CHAR_COMMA,
  CHAR_QUOTE,
  CHAR_BACKSLASH,
  isWhitespace,
  isStructural
} from './constants.js';
import { ErrorCode, ScanResult, success, failure } from './error-codes.js';

/**
 * Length of the well-formed UTF-8 sequence starting at `index`, or 0 when
 * the bytes there are not valid UTF-8. Only bytes before `length` count.
 */
export function utf8SequenceLength(bytes: Uint8Array, index: number, length: number): number {
  const lead = bytes[index];
  if (lead < 0x80) {
    return 1;
  }

  let continuation: number;
  if (lead >= 0xc2 && lead <= 0xdf) {
    continuation = 1;
  } else if (lead >= 0xe0 && lead <= 0xef) {
    continuation = 2;
  } else if (lead >= 0xf0 && lead <= 0xf4) {
    continuation = 3;
  } else {
    return 0;
  }

  if (index + continuation >= length) {
    return 0;
  }

  // Overlong forms, UTF-16 surrogates and code points past U+10FFFF
  const second = bytes[index + 1];
  if (lead === 0xe0 && second < 0xa0) return 0;
  if (lead === 0xed && second > 0x9f) return 0;
  if (lead === 0xf0 && second < 0x90) return 0;
  if (lead === 0xf4 && second > 0x8f) return 0;

  for (let k = 1; k <= continuation; k++) {
    if ((bytes[index + k] & 0xc0) !== 0x80) {
      return 0;
    }
  }

  return continuation + 1;
}

function scanString(bytes: Uint8Array, start: number, length: number): ScanResult<number> {
  let i = start + 1;
  let unescaped = false;

  while (i < length) {
    const byte = bytes[i];

    if (byte === CHAR_QUOTE) {
      return unescaped ? failure(ErrorCode.UnescapedChars) : success(i + 1);
    }

    if (byte === CHAR_BACKSLASH) {
      // The escaped byte is validated later; a multi-byte lead is left for the UTF-8 check
      i += i + 1 < length && bytes[i + 1] < 0x80 ? 2 : 1;
      continue;
    }

    if (byte < 0x20) {
      unescaped = true;
      i++;
      continue;
    }

    if (byte >= 0x80) {
      const sequence = utf8SequenceLength(bytes, i, length);
      if (sequence === 0) {
        return failure(ErrorCode.Utf8Error);
      }
      i += sequence;
      continue;
    }

    i++;
  }

  return failure(ErrorCode.UnclosedString);
}

function scanScalar(bytes: Uint8Array, start: number, length: number): ScanResult<number> {
  let i = start;

  while (i < length) {
    const byte = bytes[i];
    if (isWhitespace(byte) || isStructural(byte) || byte === CHAR_QUOTE) {
      break;
    }

    if (byte >= 0x80) {
      const sequence = utf8SequenceLength(bytes, i, length);
      if (sequence === 0) {
        return failure(ErrorCode.Utf8Error);
      }
      i += sequence;
      continue;
    }

    i++;
  }

  return success(i);
}

/**
 * Index the structural tokens of `bytes[0, length)` into `indexes`.
 *
 * `indexes` must hold at least `length + 1` entries and `openers` at least
 * `maxDepth`. On success returns the token count; `indexes[count]` is set
 * to `length` as an end sentinel.
 */
export function indexStructurals(
  bytes: Uint8Array,
  length: number,
  indexes: Uint32Array,
  openers: Uint8Array,
  maxDepth: number
): ScanResult<number> {
  let count = 0;
  let depth = 0;
  let i = 0;

  while (i < length) {
    const byte = bytes[i];

    if (isWhitespace(byte)) {
      i++;
      continue;
    }

    if (count > 0 && depth === 0) {
      const root = bytes[indexes[0]];
      const rootIsContainer = root === CHAR_OPEN_BRACE || root === CHAR_OPEN_BRACKET;
      return failure(rootIsContainer ? ErrorCode.TrailingContent : ErrorCode.TapeError);
    }

    indexes[count++] = i;

    switch (byte) {
      case CHAR_OPEN_BRACE:
      case CHAR_OPEN_BRACKET:
        if (depth >= maxDepth) {
          return failure(ErrorCode.DepthError);
        }
        openers[depth++] = byte;
        i++;
        break;

      case CHAR_CLOSE_BRACE:
      case CHAR_CLOSE_BRACKET: {
        if (depth === 0) {
          return failure(ErrorCode.TapeError);
        }
        const opener = openers[--depth];
        if ((byte === CHAR_CLOSE_BRACE) !== (opener === CHAR_OPEN_BRACE)) {
          return failure(ErrorCode.TapeError);
        }
        i++;
        break;
      }

      case CHAR_COLON:
      case CHAR_COMMA:
        i++;
        break;

      case CHAR_QUOTE: {
        const end = scanString(bytes, i, length);
        if (!end.ok) {
          return end;
        }
        i = end.value;
        break;
      }

      default: {
        const end = scanScalar(bytes, i, length);
        if (!end.ok) {
          return end;
        }
        i = end.value;
      }
    }
  }

  if (count === 0) {
    return failure(ErrorCode.Empty);
  }

  if (depth > 0) {
    return failure(ErrorCode.IncompleteArrayOrObject);
  }

  indexes[count] = length;
  return success(count);
}
