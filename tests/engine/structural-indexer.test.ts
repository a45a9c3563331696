/**
 * Structural Indexer Tests
 */

import { describe, test, expect } from '@jest/globals';
import { indexStructurals, utf8SequenceLength } from '../../src/engine/structural-indexer.js';
import { ErrorCode } from '../../src/engine/error-codes.js';

function index(input: string | Uint8Array, maxDepth = 1024) {
  const bytes = typeof input === 'string' ? Buffer.from(input, 'utf8') : input;
  const indexes = new Uint32Array(bytes.length + 1);
  const openers = new Uint8Array(maxDepth);
  const result = indexStructurals(bytes, bytes.length, indexes, openers, maxDepth);
  return { result, indexes };
}

describe('indexStructurals', () => {
  describe('Token Positions', () => {
    test('should record structurals and scalar starts', () => {
      const { result, indexes } = index('{"a": [1, true]}');

      expect(result).toEqual({ ok: true, value: 9 });
      expect(Array.from(indexes.subarray(0, 10))).toEqual([0, 1, 4, 6, 7, 8, 10, 14, 15, 16]);
    });

    test('should index a scalar root', () => {
      const { result, indexes } = index('  42 ');

      expect(result).toEqual({ ok: true, value: 1 });
      expect(indexes[0]).toBe(2);
      expect(indexes[1]).toBe(5);
    });

    test('should skip escaped quotes inside strings', () => {
      const { result } = index('["a\\"b", 1]');

      expect(result).toEqual({ ok: true, value: 5 });
    });
  });

  describe('Errors', () => {
    test.each([
      ['', ErrorCode.Empty],
      [' \n\t ', ErrorCode.Empty],
      ['"abc', ErrorCode.UnclosedString],
      ['"a\u0001b"', ErrorCode.UnescapedChars],
      ['"a\u0001b', ErrorCode.UnclosedString],
      ['[[1]', ErrorCode.IncompleteArrayOrObject],
      ['{"a":1}trailing', ErrorCode.TrailingContent],
      ['[1]]', ErrorCode.TrailingContent],
      ['true garbage', ErrorCode.TapeError],
      ['[1}', ErrorCode.TapeError],
      ['}', ErrorCode.TapeError]
    ])('should reject %j with %s', (input, code) => {
      expect(index(input).result).toEqual({ ok: false, code });
    });

    test('should reject invalid UTF-8 inside strings', () => {
      const { result } = index(new Uint8Array([0x22, 0xc0, 0xaf, 0x22]));

      expect(result).toEqual({ ok: false, code: ErrorCode.Utf8Error });
    });

    test('should reject invalid UTF-8 outside strings', () => {
      const { result } = index(new Uint8Array([0x5b, 0x31, 0xff, 0x5d]));

      expect(result).toEqual({ ok: false, code: ErrorCode.Utf8Error });
    });

    test('should enforce the depth limit', () => {
      expect(index('[[]]', 2).result).toEqual({ ok: true, value: 4 });
      expect(index('[[[]]]', 2).result).toEqual({ ok: false, code: ErrorCode.DepthError });
    });
  });
});

describe('utf8SequenceLength', () => {
  test('should measure well-formed sequences', () => {
    const bytes = Buffer.from('aé€😀', 'utf8');

    expect(utf8SequenceLength(bytes, 0, bytes.length)).toBe(1);
    expect(utf8SequenceLength(bytes, 1, bytes.length)).toBe(2);
    expect(utf8SequenceLength(bytes, 3, bytes.length)).toBe(3);
    expect(utf8SequenceLength(bytes, 6, bytes.length)).toBe(4);
  });

  test('should reject overlong forms, surrogates and truncation', () => {
    expect(utf8SequenceLength(new Uint8Array([0xe0, 0x80, 0x80]), 0, 3)).toBe(0);
    expect(utf8SequenceLength(new Uint8Array([0xed, 0xa0, 0x80]), 0, 3)).toBe(0);
    expect(utf8SequenceLength(new Uint8Array([0xf4, 0x90, 0x80, 0x80]), 0, 4)).toBe(0);
    expect(utf8SequenceLength(new Uint8Array([0xe2, 0x82, 0xac]), 0, 2)).toBe(0);
  });
});
