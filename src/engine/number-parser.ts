/**
 * Number Parser - validates a JSON number token and tags it by magnitude
 */

import { CHAR_MINUS, MAX_BIGINT_DIGITS, isScalarTerminator } from './constants.js';
import { ErrorCode, ScanResult, success, failure } from './error-codes.js';

/**
 * Number as reported by the scanner. Integers that fit 53 bits are plain
 * numbers whatever their tag; wider 64-bit integers are bigints; integers
 * past 64 bits keep their raw decimal text.
 */
export type ScannedNumber =
  | { tag: 'int64'; value: number | bigint }
  | { tag: 'uint64'; value: bigint }
  | { tag: 'double'; value: number }
  | { tag: 'bigint'; text: string };

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const UINT64_MAX = 2n ** 64n - 1n;

/** Integers this short always fit a double exactly */
const SAFE_DIGITS = 15;

function isDigit(byte: number): boolean {
  return byte >= 0x30 && byte <= 0x39;
}

function asciiText(bytes: Uint8Array, start: number, end: number): string {
  let text = '';
  for (let i = start; i < end; i++) {
    text += String.fromCharCode(bytes[i]);
  }
  return text;
}

function skipDigits(bytes: Uint8Array, i: number, length: number): number {
  while (i < length && isDigit(bytes[i])) {
    i++;
  }
  return i;
}

/**
 * Parse the number token starting at `start`
 */
export function parseNumber(bytes: Uint8Array, start: number, length: number): ScanResult<ScannedNumber> {
  let i = start;
  const negative = bytes[i] === CHAR_MINUS;
  if (negative) {
    i++;
  }

  const intStart = i;
  if (i >= length || !isDigit(bytes[i])) {
    return failure(ErrorCode.NumberError);
  }

  if (bytes[i] === 0x30) {
    i++;
    if (i < length && isDigit(bytes[i])) {
      return failure(ErrorCode.NumberError);
    }
  } else {
    i = skipDigits(bytes, i, length);
  }
  const intDigits = i - intStart;

  let isFloat = false;

  if (i < length && bytes[i] === 0x2e) {
    const fracStart = ++i;
    i = skipDigits(bytes, i, length);
    if (i === fracStart) {
      return failure(ErrorCode.NumberError);
    }
    isFloat = true;
  }

  if (i < length && (bytes[i] === 0x65 || bytes[i] === 0x45)) {
    i++;
    if (i < length && (bytes[i] === 0x2b || bytes[i] === CHAR_MINUS)) {
      i++;
    }
    const expStart = i;
    i = skipDigits(bytes, i, length);
    if (i === expStart) {
      return failure(ErrorCode.NumberError);
    }
    isFloat = true;
  }

  if (i < length && !isScalarTerminator(bytes[i])) {
    return failure(ErrorCode.NumberError);
  }

  const text = asciiText(bytes, start, i);

  // -0 has no integer representation
  if (isFloat || (negative && intDigits === 1 && bytes[intStart] === 0x30)) {
    const value = Number(text);
    if (!Number.isFinite(value)) {
      return failure(ErrorCode.NumberOutOfRange);
    }
    return success({ tag: 'double', value });
  }

  if (intDigits <= SAFE_DIGITS) {
    return success({ tag: 'int64', value: Number(text) });
  }

  if (intDigits > MAX_BIGINT_DIGITS) {
    return failure(ErrorCode.BigIntError);
  }

  if (intDigits > 20) {
    return success({ tag: 'bigint', text });
  }

  const big = BigInt(text);
  if (big >= INT64_MIN && big <= INT64_MAX) {
    return success({ tag: 'int64', value: Number.isSafeInteger(Number(big)) ? Number(big) : big });
  }
  if (big > INT64_MAX && big <= UINT64_MAX) {
    return success({ tag: 'uint64', value: big });
  }
  return success({ tag: 'bigint', text });
}
