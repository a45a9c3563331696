/**
 * Scan Value - on-demand handles into the token stream
 *
 * A ScanValue names one value by its token index and depth. Reading it is
 * only legal while the iterator sits exactly there; cursors over arrays and
 * objects skip whatever part of the previous element was left unread.
 */

import {
  CHAR_OPEN_BRACE,
  CHAR_CLOSE_BRACE,
  CHAR_OPEN_BRACKET,
  CHAR_CLOSE_BRACKET,
  CHAR_COLON,
  CHAR_COMMA,
  CHAR_QUOTE,
  CHAR_MINUS,
  isScalarTerminator
} from './constants.js';
import { ErrorCode, ScanFailure, ScanResult, success, failure } from './error-codes.js';
import { JsonIterator } from './json-iterator.js';
import { parseNumber, ScannedNumber } from './number-parser.js';
import { parseString } from './string-parser.js';

export enum JsonType {
  Object = 'object',
  Array = 'array',
  String = 'string',
  Number = 'number',
  Boolean = 'boolean',
  Null = 'null'
}

const TRUE_ATOM = [0x74, 0x72, 0x75, 0x65];
const FALSE_ATOM = [0x66, 0x61, 0x6c, 0x73, 0x65];
const NULL_ATOM = [0x6e, 0x75, 0x6c, 0x6c];

function matchesAtom(bytes: Uint8Array, offset: number, length: number, atom: number[]): boolean {
  if (offset + atom.length > length) {
    return false;
  }
  for (let k = 0; k < atom.length; k++) {
    if (bytes[offset + k] !== atom[k]) {
      return false;
    }
  }
  const end = offset + atom.length;
  return end === length || isScalarTerminator(bytes[end]);
}

/** True when a token starting with `byte` can begin a value */
function startsValue(byte: number): boolean {
  return byte >= 0 && byte !== CHAR_COMMA && byte !== CHAR_COLON &&
    byte !== CHAR_CLOSE_BRACE && byte !== CHAR_CLOSE_BRACKET;
}

function isNumberStart(byte: number): boolean {
  return byte === CHAR_MINUS || (byte >= 0x30 && byte <= 0x39);
}

/**
 * Move the iterator past whatever remains of an element handed out earlier
 */
function settle(iter: JsonIterator, pending: ScanValue, depth: number): void {
  if (iter.index === pending.index && iter.depth === pending.depth) {
    iter.skipValue();
  } else if (iter.depth > depth) {
    iter.skipChild(depth);
  }
}

export class ScanValue {
  constructor(
    readonly iter: JsonIterator,
    readonly index: number,
    readonly depth: number
  ) {}

  type(): ScanResult<JsonType> {
    if (!this.iter.isAlive()) {
      return failure(ErrorCode.StaleDocument);
    }

    const byte = this.iter.byteAt(this.index);
    switch (byte) {
      case CHAR_OPEN_BRACE:
        return success(JsonType.Object);
      case CHAR_OPEN_BRACKET:
        return success(JsonType.Array);
      case CHAR_QUOTE:
        return success(JsonType.String);
      case 0x74:
      case 0x66:
        return success(JsonType.Boolean);
      case 0x6e:
        return success(JsonType.Null);
      default:
        return isNumberStart(byte) ? success(JsonType.Number) : failure(ErrorCode.TapeError);
    }
  }

  getObject(): ScanResult<ObjectCursor> {
    const blocked = this.checkPosition();
    if (blocked) return blocked;
    if (this.iter.peek() !== CHAR_OPEN_BRACE) {
      return failure(ErrorCode.IncorrectType);
    }
    this.iter.advance();
    return success(new ObjectCursor(this.iter, this.depth + 1, this.iter.index));
  }

  getArray(): ScanResult<ArrayCursor> {
    const blocked = this.checkPosition();
    if (blocked) return blocked;
    if (this.iter.peek() !== CHAR_OPEN_BRACKET) {
      return failure(ErrorCode.IncorrectType);
    }
    this.iter.advance();
    return success(new ArrayCursor(this.iter, this.depth + 1));
  }

  getString(): ScanResult<string> {
    const blocked = this.checkPosition();
    if (blocked) return blocked;
    if (this.iter.peek() !== CHAR_QUOTE) {
      return failure(ErrorCode.IncorrectType);
    }
    const stream = this.iter.stream;
    const result = parseString(stream.bytes, this.iter.offset(), stream.length);
    if (result.ok) {
      this.iter.advance();
    }
    return result;
  }

  getNumber(): ScanResult<ScannedNumber> {
    const blocked = this.checkPosition();
    if (blocked) return blocked;
    if (!isNumberStart(this.iter.peek())) {
      return failure(ErrorCode.IncorrectType);
    }
    const stream = this.iter.stream;
    const result = parseNumber(stream.bytes, this.iter.offset(), stream.length);
    if (result.ok) {
      this.iter.advance();
    }
    return result;
  }

  getBoolean(): ScanResult<boolean> {
    const blocked = this.checkPosition();
    if (blocked) return blocked;

    const byte = this.iter.peek();
    let atom: number[];
    let code: ErrorCode;
    if (byte === 0x74) {
      atom = TRUE_ATOM;
      code = ErrorCode.TAtomError;
    } else if (byte === 0x66) {
      atom = FALSE_ATOM;
      code = ErrorCode.FAtomError;
    } else {
      return failure(ErrorCode.IncorrectType);
    }

    const stream = this.iter.stream;
    if (!matchesAtom(stream.bytes, this.iter.offset(), stream.length, atom)) {
      return failure(code);
    }
    this.iter.advance();
    return success(byte === 0x74);
  }

  getNull(): ScanResult<null> {
    const blocked = this.checkPosition();
    if (blocked) return blocked;
    if (this.iter.peek() !== 0x6e) {
      return failure(ErrorCode.IncorrectType);
    }

    const stream = this.iter.stream;
    if (!matchesAtom(stream.bytes, this.iter.offset(), stream.length, NULL_ATOM)) {
      return failure(ErrorCode.NAtomError);
    }
    this.iter.advance();
    return success(null);
  }

  /** Move the iterator back onto this value */
  seek(): void {
    this.iter.seek(this.index, this.depth);
  }

  /** Step over this value without reading it */
  skip(): ScanResult<void> {
    const blocked = this.checkPosition();
    if (blocked) return blocked;
    this.iter.skipValue();
    return success(undefined);
  }

  // Private methods

  private checkPosition(): ScanFailure | null {
    if (!this.iter.isAlive()) {
      return failure(ErrorCode.StaleDocument);
    }
    if (this.iter.index !== this.index || this.iter.depth !== this.depth) {
      return failure(ErrorCode.OutOfOrderIteration);
    }
    return null;
  }
}

export class ArrayCursor {
  private pending: ScanValue | null = null;
  private finished = false;

  constructor(private readonly iter: JsonIterator, readonly depth: number) {}

  /**
   * Next element, or null after the closing bracket
   */
  next(): ScanResult<ScanValue | null> {
    const iter = this.iter;
    if (!iter.isAlive()) {
      return failure(ErrorCode.StaleDocument);
    }
    if (this.finished) {
      return success(null);
    }

    if (this.pending) {
      settle(iter, this.pending, this.depth);
      this.pending = null;

      const byte = iter.peek();
      if (byte === CHAR_CLOSE_BRACKET) {
        return this.finish();
      }
      if (byte !== CHAR_COMMA) {
        return failure(ErrorCode.TapeError);
      }
      iter.advance();
    } else if (iter.peek() === CHAR_CLOSE_BRACKET) {
      return this.finish();
    }

    if (!startsValue(iter.peek())) {
      return failure(ErrorCode.TapeError);
    }

    this.pending = new ScanValue(iter, iter.index, this.depth);
    return success(this.pending);
  }

  /**
   * Element at `index`, counting from the cursor's current position
   */
  at(index: number): ScanResult<ScanValue> {
    for (let i = 0; ; i++) {
      const element = this.next();
      if (!element.ok) {
        return element;
      }
      if (element.value === null) {
        return failure(ErrorCode.IndexOutOfBounds);
      }
      if (i === index) {
        return success(element.value);
      }
    }
  }

  private finish(): ScanResult<null> {
    this.iter.advance();
    this.finished = true;
    return success(null);
  }
}

export interface ScanField {
  key: string;
  value: ScanValue;
}

export class ObjectCursor {
  private pending: ScanValue | null = null;
  private ended = false;

  constructor(
    private readonly iter: JsonIterator,
    readonly depth: number,
    private readonly firstIndex: number
  ) {}

  /**
   * Next field in document order, or null after the closing brace
   */
  nextField(): ScanResult<ScanField | null> {
    const ready = this.toNextKey();
    if (!ready.ok) {
      return ready;
    }
    return ready.value ? this.readField() : success(null);
  }

  /**
   * Search forward from the current field only
   */
  findField(key: string): ScanResult<ScanValue> {
    for (;;) {
      const field = this.nextField();
      if (!field.ok) {
        return field;
      }
      if (field.value === null) {
        return failure(ErrorCode.NoSuchField);
      }
      if (field.value.key === key) {
        return success(field.value.value);
      }
    }
  }

  /**
   * Search forward, then wrap around to the first field and stop where
   * the search began
   */
  findFieldUnordered(key: string): ScanResult<ScanValue> {
    const first = this.toNextKey();
    if (!first.ok) {
      return first;
    }

    let stopIndex = -1;
    if (first.value) {
      stopIndex = this.iter.index;
      let more = true;
      while (more) {
        const field = this.readField();
        if (!field.ok) {
          return field;
        }
        if (field.value.key === key) {
          return success(field.value.value);
        }
        const next = this.toNextKey();
        if (!next.ok) {
          return next;
        }
        more = next.value;
      }
    }

    this.restart();
    for (;;) {
      const next = this.toNextKey();
      if (!next.ok) {
        return next;
      }
      if (!next.value || (stopIndex >= 0 && this.iter.index >= stopIndex)) {
        return failure(ErrorCode.NoSuchField);
      }
      const field = this.readField();
      if (!field.ok) {
        return field;
      }
      if (field.value.key === key) {
        return success(field.value.value);
      }
    }
  }

  /** Seek back to the first field */
  restart(): void {
    this.iter.seek(this.firstIndex, this.depth);
    this.pending = null;
    this.ended = false;
  }

  // Private methods

  /**
   * Position the iterator on the next key; false when the object is done
   */
  private toNextKey(): ScanResult<boolean> {
    const iter = this.iter;
    if (!iter.isAlive()) {
      return failure(ErrorCode.StaleDocument);
    }
    if (this.ended) {
      return success(false);
    }

    if (this.pending) {
      settle(iter, this.pending, this.depth);
      this.pending = null;

      const byte = iter.peek();
      if (byte === CHAR_CLOSE_BRACE) {
        return this.end();
      }
      if (byte !== CHAR_COMMA) {
        return failure(ErrorCode.TapeError);
      }
      iter.advance();
      return iter.peek() === CHAR_QUOTE ? success(true) : failure(ErrorCode.TapeError);
    }

    const byte = iter.peek();
    if (byte === CHAR_QUOTE) {
      return success(true);
    }
    if (byte === CHAR_CLOSE_BRACE) {
      return this.end();
    }
    return failure(ErrorCode.TapeError);
  }

  private readField(): ScanResult<ScanField> {
    const iter = this.iter;
    const key = parseString(iter.stream.bytes, iter.offset(), iter.stream.length);
    if (!key.ok) {
      return key;
    }
    iter.advance();

    if (iter.peek() !== CHAR_COLON) {
      return failure(ErrorCode.TapeError);
    }
    iter.advance();

    if (!startsValue(iter.peek())) {
      return failure(ErrorCode.TapeError);
    }

    this.pending = new ScanValue(iter, iter.index, this.depth);
    return success({ key: key.value, value: this.pending });
  }

  private end(): ScanResult<boolean> {
    this.iter.advance();
    this.ended = true;
    return success(false);
  }
}
