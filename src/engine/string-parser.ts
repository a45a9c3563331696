/**
 * String Parser - decodes one quoted JSON string token into an owned string
 */

import { TextDecoder } from 'util';
import { CHAR_QUOTE, CHAR_BACKSLASH } from './constants.js';
import { ErrorCode, ScanResult, success, failure } from './error-codes.js';

const decoder = new TextDecoder('utf-8');

const SIMPLE_ESCAPES: Record<number, string> = {
  0x22: '"',
  0x5c: '\\',
  0x2f: '/',
  0x62: '\b',
  0x66: '\f',
  0x6e: '\n',
  0x72: '\r',
  0x74: '\t'
};

function hexValue(byte: number): number {
  if (byte >= 0x30 && byte <= 0x39) return byte - 0x30;
  if (byte >= 0x41 && byte <= 0x46) return byte - 0x37;
  if (byte >= 0x61 && byte <= 0x66) return byte - 0x57;
  return -1;
}

/**
 * Read the four hex digits of a `\uXXXX` escape whose backslash sits at
 * `at`. Returns -1 when they are missing or malformed.
 */
function readCodeUnit(bytes: Uint8Array, at: number, length: number): number {
  if (at + 5 >= length || bytes[at + 1] !== 0x75) {
    return -1;
  }

  let unit = 0;
  for (let k = 2; k < 6; k++) {
    const digit = hexValue(bytes[at + k]);
    if (digit < 0) {
      return -1;
    }
    unit = (unit << 4) | digit;
  }
  return unit;
}

function decodeRun(bytes: Uint8Array, start: number, end: number): string {
  return start === end ? '' : decoder.decode(bytes.subarray(start, end));
}

/**
 * Decode the string whose opening quote is at `start`.
 *
 * The structural indexer has already checked termination, raw control
 * characters and UTF-8, so only escapes are validated here.
 */
export function parseString(bytes: Uint8Array, start: number, length: number): ScanResult<string> {
  let out = '';
  let runStart = start + 1;
  let i = runStart;

  while (i < length) {
    const byte = bytes[i];

    if (byte === CHAR_QUOTE) {
      return success(out + decodeRun(bytes, runStart, i));
    }

    if (byte !== CHAR_BACKSLASH) {
      i++;
      continue;
    }

    out += decodeRun(bytes, runStart, i);

    if (i + 1 >= length) {
      return failure(ErrorCode.StringError);
    }

    const simple = SIMPLE_ESCAPES[bytes[i + 1]];
    if (simple !== undefined) {
      out += simple;
      i += 2;
    } else {
      const unit = readCodeUnit(bytes, i, length);
      if (unit < 0 || (unit >= 0xdc00 && unit <= 0xdfff)) {
        return failure(ErrorCode.StringError);
      }

      if (unit >= 0xd800 && unit <= 0xdbff) {
        // A high surrogate must be followed by an escaped low surrogate
        const low = bytes[i + 6] === CHAR_BACKSLASH ? readCodeUnit(bytes, i + 6, length) : -1;
        if (low < 0xdc00 || low > 0xdfff) {
          return failure(ErrorCode.StringError);
        }
        out += String.fromCharCode(unit, low);
        i += 12;
      } else {
        out += String.fromCharCode(unit);
        i += 6;
      }
    }

    runStart = i;
  }

  return failure(ErrorCode.UnclosedString);
}
