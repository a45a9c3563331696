/**
 * Value Materializer - converts scanned values into plain JavaScript values
 *
 * Used by eager parsing for the whole document and by lazy documents for
 * each value they hand out. The first engine error aborts the conversion.
 */

import { ErrorCode, ScanResult, success, failure } from '../engine/error-codes.js';
import { ScannedNumber } from '../engine/number-parser.js';
import { JsonType, ScanValue } from '../engine/scan-value.js';
import { JsonObject, JsonValue, KeyConverter } from '../types/index.js';
import { unwrap } from './error-taxonomy.js';

/**
 * Keep keys as strings
 */
export function stringKeys(key: string): string {
  return key;
}

/**
 * Intern keys as registered symbols
 */
export function symbolKeys(key: string): symbol {
  return Symbol.for(key);
}

/**
 * Host value for a scanned number
 */
export function numberValue(scanned: ScannedNumber): number | bigint {
  switch (scanned.tag) {
    case 'int64':
    case 'uint64':
    case 'double':
      return scanned.value;
    case 'bigint':
      return BigInt(scanned.text);
  }
}

/**
 * Set a field so that `__proto__` lands as an own property
 */
export function setField(target: JsonObject, key: string | symbol, value: JsonValue): void {
  if (key === '__proto__') {
    Object.defineProperty(target, key, {
      value,
      writable: true,
      enumerable: true,
      configurable: true
    });
  } else {
    target[key] = value;
  }
}

export interface MaterializerOptions {
  /**
   * @default stringKeys
   */
  keyConverter?: KeyConverter;
}

export class ValueMaterializer {
  readonly keyConverter: KeyConverter;

  constructor(options: MaterializerOptions = {}) {
    this.keyConverter = options.keyConverter ?? stringKeys;
  }

  /**
   * Convert `value` and everything below it, throwing on the first error
   */
  materialize(value: ScanValue): JsonValue {
    return unwrap(this.convert(value));
  }

  convert(value: ScanValue): ScanResult<JsonValue> {
    const type = value.type();
    if (!type.ok) {
      return type;
    }

    switch (type.value) {
      case JsonType.Object:
        return this.convertObject(value);
      case JsonType.Array:
        return this.convertArray(value);
      case JsonType.String:
        return value.getString();
      case JsonType.Number: {
        const scanned = value.getNumber();
        return scanned.ok ? success(numberValue(scanned.value)) : scanned;
      }
      case JsonType.Boolean:
        return value.getBoolean();
      case JsonType.Null:
        return value.getNull();
      default:
        return failure(ErrorCode.UnexpectedError);
    }
  }

  // Private methods

  private convertObject(value: ScanValue): ScanResult<JsonValue> {
    const opened = value.getObject();
    if (!opened.ok) {
      return opened;
    }

    const cursor = opened.value;
    const result: JsonObject = {};
    for (;;) {
      const field = cursor.nextField();
      if (!field.ok) {
        return field;
      }
      if (field.value === null) {
        return success(result);
      }

      const converted = this.convert(field.value.value);
      if (!converted.ok) {
        return converted;
      }
      setField(result, this.keyConverter(field.value.key), converted.value);
    }
  }

  private convertArray(value: ScanValue): ScanResult<JsonValue> {
    const opened = value.getArray();
    if (!opened.ok) {
      return opened;
    }

    const cursor = opened.value;
    const result: JsonValue[] = [];
    for (;;) {
      const element = cursor.next();
      if (!element.ok) {
        return element;
      }
      if (element.value === null) {
        return success(result);
      }

      const converted = this.convert(element.value);
      if (!converted.ok) {
        return converted;
      }
      result.push(converted.value);
    }
  }
}
