/**
 * Document Cursor Tests
 */

import { describe, test, expect } from '@jest/globals';
import { ScanParser } from '../../src/engine/scan-parser.js';
import { DocumentCursor } from '../../src/engine/document-cursor.js';
import { ErrorCode, ScanResult } from '../../src/engine/error-codes.js';
import { ArrayCursor, JsonType, ScanValue } from '../../src/engine/scan-value.js';
import { paddedInput } from '../helpers.js';

function cursorFor(text: string): DocumentCursor {
  const result = new ScanParser().iterate(paddedInput(text));
  if (!result.ok) {
    throw new Error(`iterate failed: ${result.code}`);
  }
  return result.value;
}

function ok<T>(result: ScanResult<T>): T {
  if (!result.ok) {
    throw new Error(`unexpected ${result.code}`);
  }
  return result.value;
}

function element(list: ArrayCursor): ScanValue {
  const value = ok(list.next());
  if (value === null) {
    throw new Error('array ended early');
  }
  return value;
}

const DOCUMENT = '{"a": 1, "b": [true, null], "c": "x"}';

describe('DocumentCursor', () => {
  describe('Root Access', () => {
    test('should report the root type', () => {
      expect(cursorFor(DOCUMENT).rootType()).toEqual({ ok: true, value: JsonType.Object });
      expect(cursorFor('"s"').rootType()).toEqual({ ok: true, value: JsonType.String });
      expect(cursorFor(' -1 ').rootType()).toEqual({ ok: true, value: JsonType.Number });
    });

    test('should read a scalar root and finish', () => {
      const cursor = cursorFor('42');

      expect(ok(cursor.root().getNumber())).toEqual({ tag: 'int64', value: 42 });
      expect(cursor.finish()).toEqual({ ok: true, value: undefined });
    });

    test('should report unread tokens on finish', () => {
      const cursor = cursorFor('[1]');
      ok(cursor.startArray());

      expect(cursor.finish()).toEqual({ ok: false, code: ErrorCode.TrailingContent });
    });

    test('should refuse to start the root twice', () => {
      const cursor = cursorFor(DOCUMENT);
      ok(cursor.startObject());

      expect(cursor.isUnstarted()).toBe(false);
      expect(cursor.startObject()).toEqual({ ok: false, code: ErrorCode.OutOfOrderIteration });
      expect(cursor.startArray()).toEqual({ ok: false, code: ErrorCode.IncorrectType });
    });

    test('should reuse the open root object', () => {
      const cursor = cursorFor(DOCUMENT);
      const first = ok(cursor.resumeObject());

      expect(ok(cursor.resumeObject())).toBe(first);
    });

    test('should not resume an object over an array root', () => {
      const cursor = cursorFor('[1]');
      ok(cursor.startArray());

      expect(cursor.resumeObject()).toEqual({ ok: false, code: ErrorCode.IncorrectType });
    });

    test('should start over after rewind', () => {
      const cursor = cursorFor('[1]');
      ok(cursor.startArray());
      cursor.rewind();

      expect(cursor.isUnstarted()).toBe(true);
      expect(cursor.startArray().ok).toBe(true);
    });
  });

  describe('Objects', () => {
    test('should walk fields and nested arrays in order', () => {
      const cursor = cursorFor(DOCUMENT);
      const object = ok(cursor.resumeObject());

      const list = ok(ok(object.findField('b')).getArray());
      expect(ok(element(list).getBoolean())).toBe(true);
      expect(ok(element(list).getNull())).toBeNull();
      expect(ok(list.next())).toBeNull();

      expect(ok(ok(object.findField('c')).getString())).toBe('x');
      expect(ok(object.nextField())).toBeNull();
      expect(cursor.finish()).toEqual({ ok: true, value: undefined });
    });

    test('should skip unread values', () => {
      const object = ok(cursorFor(DOCUMENT).resumeObject());

      expect(ok(ok(object.findField('c')).getString())).toBe('x');
    });

    test('should not look behind the current field in order', () => {
      const object = ok(cursorFor(DOCUMENT).resumeObject());
      ok(object.findField('c'));

      expect(object.findField('a')).toEqual({ ok: false, code: ErrorCode.NoSuchField });
    });

    test('should wrap around for unordered lookups', () => {
      const object = ok(cursorFor(DOCUMENT).resumeObject());
      ok(object.findField('b'));

      expect(ok(ok(object.findFieldUnordered('a')).getNumber())).toEqual({ tag: 'int64', value: 1 });
    });

    test('should miss unordered lookups after one full lap', () => {
      const object = ok(cursorFor(DOCUMENT).resumeObject());
      ok(object.findField('b'));

      expect(object.findFieldUnordered('zz')).toEqual({ ok: false, code: ErrorCode.NoSuchField });
    });

    test('should refuse to read a value the cursor has moved past', () => {
      const object = ok(cursorFor(DOCUMENT).resumeObject());
      const a = ok(object.findField('a'));
      ok(object.findField('c'));

      expect(a.getNumber()).toEqual({ ok: false, code: ErrorCode.OutOfOrderIteration });
    });

    test('should reject a field without a colon', () => {
      const object = ok(cursorFor('{"a" 1}').resumeObject());

      expect(object.nextField()).toEqual({ ok: false, code: ErrorCode.TapeError });
    });
  });

  describe('Arrays', () => {
    test('should fetch elements by position', () => {
      const list = ok(cursorFor('[10, 20, 30]').startArray());

      expect(ok(ok(list.at(1)).getNumber())).toEqual({ tag: 'int64', value: 20 });
    });

    test('should report positions past the end', () => {
      const list = ok(cursorFor('[10, 20, 30]').startArray());

      expect(list.at(5)).toEqual({ ok: false, code: ErrorCode.IndexOutOfBounds });
    });

    test('should reject missing separators', () => {
      const list = ok(cursorFor('[1 2]').startArray());
      ok(list.next());

      expect(list.next()).toEqual({ ok: false, code: ErrorCode.TapeError });
    });

    test('should reject a value of the wrong type', () => {
      const list = ok(cursorFor('["a"]').startArray());
      expect(element(list).getNumber()).toEqual({ ok: false, code: ErrorCode.IncorrectType });
    });

    test('should reject malformed atoms', () => {
      const list = ok(cursorFor('[truex, nul, fals]').startArray());

      expect(element(list).getBoolean()).toEqual({ ok: false, code: ErrorCode.TAtomError });
    });
  });
});
