/**
 * Public API Integration Tests
 */

import { describe, test, expect, beforeAll, afterAll, afterEach, jest } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  ByteBuffer,
  DEFAULT_CONFIG,
  DocumentState,
  ErrorCode,
  ErrorKind,
  Parser,
  VERSION,
  configure,
  dump,
  getConfig,
  load,
  loadLazy,
  parse,
  parseLazy,
  resetConfig
} from '../../src/index.js';
import type { JsonObject, JsonValue } from '../../src/index.js';
import { asObject, captureError } from '../helpers.js';

const TEXT_PIECES = ['a', 'Z', ' ', '/', '"', '\\', '\n', '\t', '\u0001', '\u007f', 'é', '😀'];

/**
 * Deterministic generator of nested values built from null, booleans,
 * integers, floats and strings
 */
function valueGenerator(seed: number): (depth: number) => JsonValue {
  let state = seed;
  const next = (): number => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 2 ** 32;
  };
  const pick = <T>(items: T[]): T => items[Math.floor(next() * items.length)];
  const text = (): string => Array.from({ length: Math.floor(next() * 6) }, () => pick(TEXT_PIECES)).join('');

  const scalar = (): JsonValue => {
    switch (Math.floor(next() * 5)) {
      case 0:
        return null;
      case 1:
        return next() < 0.5;
      case 2:
        return Math.floor((next() - 0.5) * 2 ** 40);
      case 3:
        return (next() - 0.5) * 10 ** Math.floor(next() * 40 - 20);
      default:
        return text();
    }
  };

  const build = (depth: number): JsonValue => {
    const roll = next();
    if (depth === 0 || roll < 0.3) {
      return scalar();
    }
    const size = Math.floor(next() * 5);
    if (roll < 0.65) {
      return Array.from({ length: size }, () => build(depth - 1));
    }
    const object: JsonObject = {};
    for (let i = 0; i < size; i++) {
      object[`k${i}${text()}`] = build(depth - 1);
    }
    return object;
  };

  return build;
}

describe('ondemand-json', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'ondemand-json-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  afterEach(() => {
    resetConfig();
    jest.restoreAllMocks();
  });

  test('should expose the library version', () => {
    expect(VERSION).toBe('0.1.0');
  });

  describe('parse', () => {
    test('should parse documents of every shape', () => {
      expect(parse('{"a":[1,2]}')).toEqual({ a: [1, 2] });
      expect(parse(' 7 ')).toBe(7);
      expect(parse('"s"')).toBe('s');
      expect(parse('[]')).toEqual([]);
    });

    test('should parse bytes and byte buffers', () => {
      const buffer = ByteBuffer.from('{"k":true}');

      expect(parse(new Uint8Array([0x5b, 0x31, 0x5d]))).toEqual([1]);
      expect(parse(buffer)).toEqual({ k: true });
      expect(buffer.isFrozen()).toBe(true);
    });

    test('should not see later writes to the source bytes', () => {
      const slab = new Uint8Array(64);
      slab.set(Buffer.from('{"a":"xy","b":1}'));
      const doc = parseLazy(slab.subarray(0, 16));

      slab[6] = 0x51;
      slab[8] = 0x20;

      expect(doc.get('a')).toBe('xy');
      expect(doc.get('b')).toBe(1);
    });

    test('should not see later writes to bytes copied into a buffer', () => {
      const raw = new Uint8Array(Buffer.from('{"a":"xy"}'));
      const doc = parseLazy(ByteBuffer.from(raw));

      raw[6] = 0x51;

      expect(doc.get('a')).toBe('xy');
    });

    test('should symbolize keys on request', () => {
      const value = asObject(parse('{"k":1}', { symbolizeKeys: true }));

      expect(value[Symbol.for('k')]).toBe(1);
    });

    test.each([
      ['', ErrorCode.Empty, ErrorKind.Empty],
      ['[1]x', ErrorCode.TrailingContent, ErrorKind.Syntax],
      ['{"a":1} {"b":2}', ErrorCode.TrailingContent, ErrorKind.Syntax],
      ['"\\q"', ErrorCode.StringError, ErrorKind.Syntax],
      ['[1e400]', ErrorCode.NumberOutOfRange, ErrorKind.NumberFormat],
      ['{"a" 1}', ErrorCode.TapeError, ErrorKind.Syntax],
      ['{"a":}', ErrorCode.TapeError, ErrorKind.Syntax],
      ['[nul]', ErrorCode.NAtomError, ErrorKind.Syntax]
    ])('should reject %j', (text, code, kind) => {
      const error = captureError(() => parse(text));

      expect(error.code).toBe(code);
      expect(error.kind).toBe(kind);
    });

    test('should round-trip through dump', () => {
      const text = '{"a":[1,2.5,"x\\n",true,null],"b":18446744073709551616}';

      expect(dump(parse(text))).toBe(text);
    });

    test('should round-trip integers just past the signed 64-bit range', () => {
      expect(parse('9223372036854775808')).toBe(9223372036854775808n);
      expect(dump(parse('9223372036854775808'))).toBe('9223372036854775808');
      expect(dump(parse('-9223372036854775808'))).toBe('-9223372036854775808');
    });

    test('should keep the sign of negative zero', () => {
      expect(Object.is(parse('-0.0'), -0)).toBe(true);
      expect(dump(parse('-0.0'))).toBe('-0');
      expect(dump(parse('[-0]'))).toBe('[-0]');
    });

    test('should restore generated nested values from their dump', () => {
      const build = valueGenerator(7);

      for (let i = 0; i < 200; i++) {
        const value = build(5);
        expect(parse(dump(value))).toEqual(value);
      }
    });
  });

  describe('load', () => {
    test('should parse files eagerly and lazily', () => {
      const path = join(dir, 'doc.json');
      writeFileSync(path, '{"k":[1,2],"n":null}');

      expect(load(path)).toEqual({ k: [1, 2], n: null });
      expect(loadLazy(path).get('k')).toEqual([1, 2]);
    });

    test('should report missing files', () => {
      const error = captureError(() => load(join(dir, 'missing.json')));

      expect(error.code).toBe(ErrorCode.IoError);
      expect(error.kind).toBe(ErrorKind.IO);
    });
  });

  describe('Parser', () => {
    test('should reuse scratch memory across documents', () => {
      const parser = new Parser();

      expect(parser.parse('[1]')).toEqual([1]);
      expect(parser.capacity).toBe(3);
      expect(parser.parse('{"a":2}')).toEqual({ a: 2 });
      expect(parser.capacity).toBe(7);
      expect(parser.maxDepth).toBe(1024);
    });

    test('should enforce its limits', () => {
      expect(captureError(() => new Parser({ maxCapacity: 4 }).parse('[1,2,3]')).code).toBe(ErrorCode.OutOfCapacity);
      expect(captureError(() => new Parser({ maxDepth: 2 }).parse('[[[1]]]')).code).toBe(ErrorCode.DepthError);
      expect(new Parser({ maxCapacity: 4 }).maxCapacity).toBe(4);
    });

    test('should share one parser between lazy documents', () => {
      const parser = new Parser();
      const first = parseLazy('{"a":1}', parser);
      const second = parseLazy('{"b":2}', parser);

      expect(first.state).toBe(DocumentState.Stale);
      expect(first.get('a')).toBe(1);
      expect(second.get('b')).toBe(2);
      expect(first.isAlive()).toBe(false);
    });

    test('should give each lazy document its own parser by default', () => {
      const first = parseLazy('[1]');
      const second = parseLazy('[2]');

      expect(first.isAlive()).toBe(true);
      expect(second.isAlive()).toBe(true);
      expect(first.engine).not.toBe(second.engine);
    });
  });

  describe('Configuration', () => {
    test('should start from the defaults', () => {
      expect(getConfig()).toEqual({ zeroCopy: true, debug: false, pageSize: 4096 });
      expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(true);
    });

    test('should apply to parsers built afterwards', () => {
      const before = new Parser();
      expect(configure({ zeroCopy: false })).toEqual({ zeroCopy: false, debug: false, pageSize: 4096 });

      expect(new Parser().buffers.zeroCopy).toBe(false);
      expect(before.buffers.zeroCopy).toBe(true);
      expect(new Parser({ zeroCopy: true }).buffers.zeroCopy).toBe(true);
    });

    test('should reject page sizes that cannot hold the padding', () => {
      expect(() => configure({ pageSize: 64 })).toThrow(RangeError);
      expect(getConfig().pageSize).toBe(4096);
    });

    test('should log allocations in debug mode', () => {
      const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
      configure({ debug: true });

      new Parser().allocate(2048);

      expect(log).toHaveBeenCalledWith('[ondemand-json Parser] Allocated 2.0 KB, max depth 1024');
    });

    test('should return copies of the configuration', () => {
      const config = getConfig();
      config.debug = true;

      expect(getConfig().debug).toBe(false);
    });
  });
});
