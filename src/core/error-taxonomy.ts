/**
 * Error Taxonomy - maps engine codes onto error categories
 */

import { ErrorCode, ScanResult, errorMessage } from '../engine/error-codes.js';
import { ErrorKind, JsonError } from '../types/index.js';

const CATEGORIES: Record<ErrorCode, ErrorKind> = {
  [ErrorCode.UnclosedString]: ErrorKind.Syntax,
  [ErrorCode.StringError]: ErrorKind.Syntax,
  [ErrorCode.UnescapedChars]: ErrorKind.Syntax,
  [ErrorCode.Utf8Error]: ErrorKind.Syntax,
  [ErrorCode.TapeError]: ErrorKind.Syntax,
  [ErrorCode.TAtomError]: ErrorKind.Syntax,
  [ErrorCode.FAtomError]: ErrorKind.Syntax,
  [ErrorCode.NAtomError]: ErrorKind.Syntax,
  [ErrorCode.TrailingContent]: ErrorKind.Syntax,
  [ErrorCode.IncompleteArrayOrObject]: ErrorKind.Syntax,

  [ErrorCode.DepthError]: ErrorKind.ResourceLimits,
  [ErrorCode.Capacity]: ErrorKind.ResourceLimits,
  [ErrorCode.OutOfCapacity]: ErrorKind.ResourceLimits,
  [ErrorCode.InsufficientPadding]: ErrorKind.ResourceLimits,
  [ErrorCode.OversizeInput]: ErrorKind.ResourceLimits,
  [ErrorCode.MemAlloc]: ErrorKind.OutOfMemory,

  [ErrorCode.NumberError]: ErrorKind.NumberFormat,
  [ErrorCode.BigIntError]: ErrorKind.NumberFormat,
  [ErrorCode.NumberOutOfRange]: ErrorKind.NumberFormat,

  [ErrorCode.NoSuchField]: ErrorKind.NavigationMiss,
  [ErrorCode.IndexOutOfBounds]: ErrorKind.NavigationMiss,
  [ErrorCode.OutOfBounds]: ErrorKind.NavigationMiss,
  [ErrorCode.IncorrectType]: ErrorKind.NavigationMiss,

  [ErrorCode.Uninitialized]: ErrorKind.StructuralMisuse,
  [ErrorCode.ParserInUse]: ErrorKind.StructuralMisuse,
  [ErrorCode.ScalarDocumentAsValue]: ErrorKind.StructuralMisuse,
  [ErrorCode.OutOfOrderIteration]: ErrorKind.StructuralMisuse,
  [ErrorCode.FrozenBuffer]: ErrorKind.StructuralMisuse,
  [ErrorCode.StaleDocument]: ErrorKind.StructuralMisuse,
  [ErrorCode.DocumentDead]: ErrorKind.StructuralMisuse,

  [ErrorCode.InvalidJsonPointer]: ErrorKind.PathSyntax,
  [ErrorCode.InvalidUriFragment]: ErrorKind.PathSyntax,

  [ErrorCode.IoError]: ErrorKind.IO,
  [ErrorCode.UnsupportedArchitecture]: ErrorKind.UnsupportedArchitecture,
  [ErrorCode.UnexpectedError]: ErrorKind.Unexpected,
  [ErrorCode.Empty]: ErrorKind.Empty
};

export function classifyError(code: ErrorCode): ErrorKind {
  return CATEGORIES[code];
}

/**
 * Misses are the only codes lookup APIs turn into an absent result
 */
export function isNavigationMiss(code: ErrorCode): boolean {
  return CATEGORIES[code] === ErrorKind.NavigationMiss;
}

/**
 * Build the categorized error for `code`
 */
export function engineError(
  code: ErrorCode,
  context?: Record<string, unknown>,
  originalError?: Error
): JsonError {
  return new JsonError(code, classifyError(code), errorMessage(code), context, originalError);
}

export function raiseEngineError(code: ErrorCode, context?: Record<string, unknown>): never {
  throw engineError(code, context);
}

/**
 * Value of a successful result, or throw its categorized error
 */
export function unwrap<T>(result: ScanResult<T>, context?: Record<string, unknown>): T {
  if (!result.ok) {
    raiseEngineError(result.code, context);
  }
  return result.value;
}

/**
 * Pass JsonErrors through; wrap anything else as UNEXPECTED_ERROR
 */
export function toJsonError(error: unknown, context?: Record<string, unknown>): JsonError {
  if (error instanceof JsonError) {
    return error;
  }
  const cause = error instanceof Error ? error : new Error(String(error));
  return engineError(ErrorCode.UnexpectedError, context, cause);
}
