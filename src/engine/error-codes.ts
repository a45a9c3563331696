/**
 * Engine result codes
 *
 * The scanner never throws: every operation returns a ScanResult carrying
 * either a value or one of these codes. Translation into categorized
 * exceptions happens in core/error-taxonomy.
 */

export enum ErrorCode {
  Capacity = 'CAPACITY',
  MemAlloc = 'MEMALLOC',
  TapeError = 'TAPE_ERROR',
  DepthError = 'DEPTH_ERROR',
  StringError = 'STRING_ERROR',
  TAtomError = 'T_ATOM_ERROR',
  FAtomError = 'F_ATOM_ERROR',
  NAtomError = 'N_ATOM_ERROR',
  NumberError = 'NUMBER_ERROR',
  BigIntError = 'BIGINT_ERROR',
  Utf8Error = 'UTF8_ERROR',
  Uninitialized = 'UNINITIALIZED',
  Empty = 'EMPTY',
  UnescapedChars = 'UNESCAPED_CHARS',
  UnclosedString = 'UNCLOSED_STRING',
  UnsupportedArchitecture = 'UNSUPPORTED_ARCHITECTURE',
  IncorrectType = 'INCORRECT_TYPE',
  NumberOutOfRange = 'NUMBER_OUT_OF_RANGE',
  IndexOutOfBounds = 'INDEX_OUT_OF_BOUNDS',
  NoSuchField = 'NO_SUCH_FIELD',
  IoError = 'IO_ERROR',
  InvalidJsonPointer = 'INVALID_JSON_POINTER',
  InvalidUriFragment = 'INVALID_URI_FRAGMENT',
  UnexpectedError = 'UNEXPECTED_ERROR',
  ParserInUse = 'PARSER_IN_USE',
  OutOfOrderIteration = 'OUT_OF_ORDER_ITERATION',
  InsufficientPadding = 'INSUFFICIENT_PADDING',
  IncompleteArrayOrObject = 'INCOMPLETE_ARRAY_OR_OBJECT',
  ScalarDocumentAsValue = 'SCALAR_DOCUMENT_AS_VALUE',
  OutOfBounds = 'OUT_OF_BOUNDS',
  TrailingContent = 'TRAILING_CONTENT',
  OutOfCapacity = 'OUT_OF_CAPACITY',

  // Raised by the buffer and document layers rather than the scanner
  OversizeInput = 'OVERSIZE_INPUT',
  FrozenBuffer = 'FROZEN_BUFFER',
  StaleDocument = 'STALE_DOCUMENT',
  DocumentDead = 'DOCUMENT_DEAD'
}

const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.Capacity]: 'This parser can\'t support a document that big',
  [ErrorCode.MemAlloc]: 'Error allocating memory, we\'re most likely out of memory',
  [ErrorCode.TapeError]: 'The JSON document has an improper structure: missing or superfluous commas, braces, missing keys, etc.',
  [ErrorCode.DepthError]: 'The JSON document was too deep (too many nested objects and arrays)',
  [ErrorCode.StringError]: 'Problem while parsing a string',
  [ErrorCode.TAtomError]: 'Problem while parsing an atom starting with the letter \'t\'',
  [ErrorCode.FAtomError]: 'Problem while parsing an atom starting with the letter \'f\'',
  [ErrorCode.NAtomError]: 'Problem while parsing an atom starting with the letter \'n\'',
  [ErrorCode.NumberError]: 'Problem while parsing a number',
  [ErrorCode.BigIntError]: 'Integer has too many digits to be represented',
  [ErrorCode.Utf8Error]: 'The input is not valid UTF-8',
  [ErrorCode.Uninitialized]: 'Uninitialized',
  [ErrorCode.Empty]: 'Empty: no JSON found',
  [ErrorCode.UnescapedChars]: 'Within strings, some characters must be escaped, we found unescaped characters',
  [ErrorCode.UnclosedString]: 'A string is opened, but never closed.',
  [ErrorCode.UnsupportedArchitecture]: 'No usable scanner implementation is available on this platform',
  [ErrorCode.IncorrectType]: 'The JSON element does not have the requested type.',
  [ErrorCode.NumberOutOfRange]: 'The JSON number is too large or too small to fit within the requested type.',
  [ErrorCode.IndexOutOfBounds]: 'Attempted to access an element of a JSON array that is beyond its length.',
  [ErrorCode.NoSuchField]: 'The JSON field referenced does not exist in this object.',
  [ErrorCode.IoError]: 'Error reading the file.',
  [ErrorCode.InvalidJsonPointer]: 'Invalid JSON pointer syntax.',
  [ErrorCode.InvalidUriFragment]: 'Invalid URI fragment syntax.',
  [ErrorCode.UnexpectedError]: 'Unexpected error, consider reporting this problem as you may have found a bug',
  [ErrorCode.ParserInUse]: 'Cannot parse a new document while a document is still in use.',
  [ErrorCode.OutOfOrderIteration]: 'Objects and arrays can only be iterated when they are first encountered.',
  [ErrorCode.InsufficientPadding]: 'The input buffer does not have enough padding bytes after its end.',
  [ErrorCode.IncompleteArrayOrObject]: 'The document ends early.',
  [ErrorCode.ScalarDocumentAsValue]: 'A scalar document cannot be used as a nested value.',
  [ErrorCode.OutOfBounds]: 'Attempted to access location outside of document.',
  [ErrorCode.TrailingContent]: 'Unexpected trailing content in the JSON input.',
  [ErrorCode.OutOfCapacity]: 'The document is larger than this parser\'s maximum capacity.',
  [ErrorCode.OversizeInput]: 'JSON input too large for padding',
  [ErrorCode.FrozenBuffer]: 'Cannot modify a frozen buffer',
  [ErrorCode.StaleDocument]: 'The document cursor is no longer valid; its parser was reused',
  [ErrorCode.DocumentDead]: 'The document could not be restored; call reiterate() to re-arm it'
};

/**
 * Message text associated with an engine code
 */
export function errorMessage(code: ErrorCode): string {
  return ERROR_MESSAGES[code];
}

export interface ScanSuccess<T> {
  ok: true;
  value: T;
}

export interface ScanFailure {
  ok: false;
  code: ErrorCode;
}

export type ScanResult<T> = ScanSuccess<T> | ScanFailure;

export function success<T>(value: T): ScanSuccess<T> {
  return { ok: true, value };
}

export function failure(code: ErrorCode): ScanFailure {
  return { ok: false, code };
}
