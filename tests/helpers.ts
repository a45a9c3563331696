/**
 * Shared test helpers
 */

import { PADDING } from '../src/engine/constants.js';
import { JsonError, JsonObject, JsonValue } from '../src/types/index.js';

/**
 * Run `fn` and return the JsonError it throws
 */
export function captureError(fn: () => unknown): JsonError {
  try {
    fn();
  } catch (error) {
    if (error instanceof JsonError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a JsonError to be thrown');
}

/**
 * Narrow a parsed value to an object
 */
export function asObject(value: JsonValue | undefined): JsonObject {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`Expected an object, got ${String(value)}`);
  }
  return value;
}

/**
 * Copy `text` into a zero padded engine input
 */
export function paddedInput(text: string): { bytes: Uint8Array; length: number; capacity: number } {
  const raw = Buffer.from(text, 'utf8');
  const bytes = new Uint8Array(raw.length + PADDING);
  bytes.set(raw);
  return { bytes, length: raw.length, capacity: bytes.length };
}
