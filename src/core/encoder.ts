/**
 * Encoder - serializes values to JSON text
 *
 * Output is assembled in full, then checked once for lone surrogates,
 * which have no UTF-8 encoding.
 */

import { DEFAULT_MAX_DEPTH } from '../engine/constants.js';
import { ErrorCode } from '../engine/error-codes.js';
import { raiseEngineError } from './error-taxonomy.js';

const ESCAPES: Record<string, string> = {
  '"': '\\"',
  '\\': '\\\\',
  '\b': '\\b',
  '\f': '\\f',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t'
};

const NEEDS_ESCAPE = /["\\\u0000-\u001f]/g;

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

function escapeChar(char: string): string {
  return ESCAPES[char] ?? `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`;
}

/**
 * Quote and escape `text` as a JSON string
 */
export function quoteString(text: string): string {
  return `"${text.replace(NEEDS_ESCAPE, escapeChar)}"`;
}

function symbolName(symbol: symbol): string {
  return Symbol.keyFor(symbol) ?? symbol.description ?? '';
}

function hasToJSON(value: object): value is { toJSON(): unknown } {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

export interface EncoderOptions {
  /**
   * Deepest nesting written before failing with DEPTH_ERROR
   * @default 1024
   */
  maxDepth?: number;
}

export class Encoder {
  private readonly maxDepth: number;

  constructor(options: EncoderOptions = {}) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  encode(value: unknown): string {
    const out: string[] = [];
    this.write(value, out, 0);

    const text = out.join('');
    if (LONE_SURROGATE.test(text)) {
      raiseEngineError(ErrorCode.Utf8Error);
    }
    return text;
  }

  // Private methods

  private write(value: unknown, out: string[], depth: number): void {
    switch (typeof value) {
      case 'undefined':
        out.push('null');
        return;
      case 'boolean':
        out.push(value ? 'true' : 'false');
        return;
      case 'number':
        if (!Number.isFinite(value)) {
          out.push('null');
        } else {
          out.push(Object.is(value, -0) ? '-0' : String(value));
        }
        return;
      case 'bigint':
        out.push(value.toString());
        return;
      case 'string':
        out.push(quoteString(value));
        return;
      case 'symbol':
        out.push(quoteString(symbolName(value)));
        return;
      case 'function':
        out.push(quoteString(String(value)));
        return;
    }

    if (typeof value !== 'object' || value === null) {
      out.push('null');
      return;
    }

    if (depth >= this.maxDepth) {
      raiseEngineError(ErrorCode.DepthError, { depth });
    }

    if (hasToJSON(value)) {
      this.write(value.toJSON(), out, depth + 1);
    } else if (Array.isArray(value)) {
      this.writeArray(value, out, depth + 1);
    } else if (value instanceof Map) {
      this.writeFields(Array.from(value.entries()), out, depth + 1);
    } else {
      const fields: [unknown, unknown][] = Object.keys(value).map(key => [key, Reflect.get(value, key)]);
      for (const symbol of Object.getOwnPropertySymbols(value)) {
        if (Object.prototype.propertyIsEnumerable.call(value, symbol)) {
          fields.push([symbol, Reflect.get(value, symbol)]);
        }
      }
      this.writeFields(fields, out, depth + 1);
    }
  }

  private writeArray(values: unknown[], out: string[], depth: number): void {
    out.push('[');
    for (let i = 0; i < values.length; i++) {
      if (i > 0) {
        out.push(',');
      }
      this.write(values[i], out, depth);
    }
    out.push(']');
  }

  private writeFields(fields: [unknown, unknown][], out: string[], depth: number): void {
    out.push('{');
    fields.forEach(([key, value], i) => {
      if (i > 0) {
        out.push(',');
      }
      out.push(quoteString(typeof key === 'symbol' ? symbolName(key) : String(key)));
      out.push(':');
      this.write(value, out, depth);
    });
    out.push('}');
  }
}

/**
 * Serialize `value` to JSON text
 */
export function dump(value: unknown): string {
  return new Encoder().encode(value);
}
