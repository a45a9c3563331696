/**
 * Scanner constants shared by the buffer layer and the engine.
 */

/**
 * Bytes every input must carry beyond its logical length so the scanner
 * may read ahead without bounds checks.
 */
export const PADDING = 64;

/** Deepest container nesting accepted by default */
export const DEFAULT_MAX_DEPTH = 1024;

/** Largest document a parser will grow its scratch space for by default */
export const DEFAULT_MAX_CAPACITY = 0xffffffff;

/** Assumed size of a mapped memory page */
export const DEFAULT_PAGE_SIZE = 4096;

/** Integers with more digits than this are rejected with BIGINT_ERROR */
export const MAX_BIGINT_DIGITS = 1024;

// Byte values the scanner dispatches on
export const CHAR_OPEN_BRACE = 0x7b;
export const CHAR_CLOSE_BRACE = 0x7d;
export const CHAR_OPEN_BRACKET = 0x5b;
export const CHAR_CLOSE_BRACKET = 0x5d;
export const CHAR_COLON = 0x3a;
export const CHAR_COMMA = 0x2c;
export const CHAR_QUOTE = 0x22;
export const CHAR_BACKSLASH = 0x5c;
export const CHAR_MINUS = 0x2d;

/**
 * True for the four JSON whitespace bytes
 */
export function isWhitespace(byte: number): boolean {
  return byte === 0x20 || byte === 0x0a || byte === 0x0d || byte === 0x09;
}

/**
 * True for the six structural bytes `{ } [ ] : ,`
 */
export function isStructural(byte: number): boolean {
  return byte === CHAR_OPEN_BRACE || byte === CHAR_CLOSE_BRACE ||
    byte === CHAR_OPEN_BRACKET || byte === CHAR_CLOSE_BRACKET ||
    byte === CHAR_COLON || byte === CHAR_COMMA;
}

/**
 * True for bytes that may legally follow a number or literal
 */
export function isScalarTerminator(byte: number): boolean {
  return isWhitespace(byte) || byte === CHAR_COMMA ||
    byte === CHAR_CLOSE_BRACE || byte === CHAR_CLOSE_BRACKET || byte === CHAR_COLON;
}
