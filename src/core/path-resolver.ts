/**
 * Path Resolver - JSON Pointer, JSONPath and wildcard queries
 *
 * Every query starts from a rewound document. Wildcard queries run in two
 * passes: the first collects a handle for each match in document order,
 * the second seeks back to each handle and materializes it.
 */

import { DocumentCursor } from '../engine/document-cursor.js';
import { ErrorCode, ScanResult, success, failure } from '../engine/error-codes.js';
import { ArrayCursor, JsonType, ObjectCursor, ScanValue } from '../engine/scan-value.js';
import { JsonValue, ValueVisitor } from '../types/index.js';
import { isNavigationMiss, raiseEngineError } from './error-taxonomy.js';
import { ValueMaterializer } from './value-materializer.js';

/**
 * One step of a query. Pointer tokens address object keys and array
 * indices alike; JSONPath fields and indices only match their own kind.
 */
export type PathSegment =
  | { type: 'token'; token: string }
  | { type: 'field'; name: string }
  | { type: 'index'; index: number }
  | { type: 'wildcard' };

type ConcreteSegment = Exclude<PathSegment, { type: 'wildcard' }>;

type Target = DocumentCursor | ScanValue;

const ARRAY_INDEX = /^(0|[1-9][0-9]*)$/;

/**
 * Split an RFC 6901 pointer, or a `#` URI fragment holding one, into
 * unescaped tokens
 */
export function parsePointer(pointer: string): string[] {
  let text = pointer;
  if (text.startsWith('#')) {
    try {
      text = decodeURIComponent(text.slice(1));
    } catch (error) {
      if (error instanceof URIError) {
        raiseEngineError(ErrorCode.InvalidUriFragment, { pointer });
      }
      throw error;
    }
  }

  if (text === '') {
    return [];
  }
  if (!text.startsWith('/')) {
    raiseEngineError(ErrorCode.InvalidJsonPointer, { pointer });
  }

  return text.slice(1).split('/').map(token => {
    if (/~(?![01])/.test(token)) {
      raiseEngineError(ErrorCode.InvalidJsonPointer, { pointer, token });
    }
    return token.replace(/~1/g, '/').replace(/~0/g, '~');
  });
}

/**
 * Parse the JSONPath subset `$`, `.name`, `['name']`, `["name"]`, `[n]`,
 * `.*` and `[*]`. A leading `$` is optional; without it the path may start
 * with a bare name.
 */
export function parsePath(path: string): PathSegment[] {
  const segments: PathSegment[] = [];
  const invalid = (): never => raiseEngineError(ErrorCode.InvalidJsonPointer, { path });

  let i = path.startsWith('$') ? 1 : 0;
  const start = i;

  const readName = (): string => {
    let end = i;
    while (end < path.length && path[end] !== '.' && path[end] !== '[') {
      end++;
    }
    if (end === i) {
      invalid();
    }
    const name = path.slice(i, end);
    i = end;
    return name;
  };

  while (i < path.length) {
    const char = path[i];

    if (char === '.') {
      i++;
      if (path[i] === '*') {
        segments.push({ type: 'wildcard' });
        i++;
      } else {
        segments.push({ type: 'field', name: readName() });
      }
    } else if (char === '[') {
      const close = path.indexOf(']', i);
      if (close < 0) {
        invalid();
      }
      const inner = path.slice(i + 1, close);
      const quote = inner[0];

      if (inner === '*') {
        segments.push({ type: 'wildcard' });
      } else if ((quote === '\'' || quote === '"') && inner.length >= 2 && inner.endsWith(quote)) {
        segments.push({ type: 'field', name: inner.slice(1, -1) });
      } else if (ARRAY_INDEX.test(inner)) {
        segments.push({ type: 'index', index: Number(inner) });
      } else {
        invalid();
      }
      i = close + 1;
    } else if (i === start && start === 0) {
      segments.push({ type: 'field', name: readName() });
    } else {
      invalid();
    }
  }

  return segments;
}

function typeOf(target: Target): ScanResult<JsonType> {
  return target instanceof DocumentCursor ? target.rootType() : target.type();
}

function openObject(target: Target): ScanResult<ObjectCursor> {
  return target instanceof DocumentCursor ? target.resumeObject() : target.getObject();
}

function openArray(target: Target): ScanResult<ArrayCursor> {
  return target instanceof DocumentCursor ? target.startArray() : target.getArray();
}

function pointerIndex(token: string): ScanResult<number> {
  if (token === '-') {
    return failure(ErrorCode.IndexOutOfBounds);
  }
  if (ARRAY_INDEX.test(token)) {
    return success(Number(token));
  }
  // Empty tokens and leading zeros are malformed; other text just names no element
  return /^[0-9]*$/.test(token) ? failure(ErrorCode.InvalidJsonPointer) : failure(ErrorCode.IncorrectType);
}

/**
 * Move from `target` to its child named by `segment`
 */
function step(target: Target, segment: ConcreteSegment): ScanResult<ScanValue> {
  const type = typeOf(target);
  if (!type.ok) {
    return type;
  }

  if (type.value === JsonType.Object) {
    if (segment.type === 'index') {
      return failure(ErrorCode.IncorrectType);
    }
    const object = openObject(target);
    if (!object.ok) {
      return object;
    }
    return object.value.findField(segment.type === 'token' ? segment.token : segment.name);
  }

  if (type.value === JsonType.Array) {
    let index: ScanResult<number>;
    if (segment.type === 'field') {
      return failure(ErrorCode.IncorrectType);
    } else if (segment.type === 'token') {
      index = pointerIndex(segment.token);
    } else {
      index = success(segment.index);
    }
    if (!index.ok) {
      return index;
    }

    const array = openArray(target);
    if (!array.ok) {
      return array;
    }
    return array.value.at(index.value);
  }

  return failure(ErrorCode.IncorrectType);
}

export class PathResolver {
  constructor(private readonly materializer: ValueMaterializer) {}

  atPointer(cursor: DocumentCursor, pointer: string): JsonValue | undefined {
    const tokens = parsePointer(pointer);
    return this.resolveOne(cursor, tokens.map((token): ConcreteSegment => ({ type: 'token', token })));
  }

  atPath(cursor: DocumentCursor, path: string): JsonValue | undefined {
    const segments = parsePath(path);
    const concrete: ConcreteSegment[] = [];
    for (const segment of segments) {
      if (segment.type === 'wildcard') {
        raiseEngineError(ErrorCode.InvalidJsonPointer, { path });
      }
      concrete.push(segment);
    }
    return this.resolveOne(cursor, concrete);
  }

  /**
   * Every match of `path` in document order. With a visitor each value is
   * passed on as soon as it is materialized and nothing is collected.
   */
  atPathWithWildcard(cursor: DocumentCursor, path: string, visitor?: ValueVisitor): JsonValue[] {
    const segments = parsePath(path);
    cursor.rewind();

    const matches: ScanValue[] = [];
    const collected = this.collect(cursor, segments, 0, matches);
    if (!collected.ok && !isNavigationMiss(collected.code)) {
      raiseEngineError(collected.code, { path });
    }

    const values: JsonValue[] = [];
    for (const match of matches) {
      match.seek();
      const value = this.materializer.materialize(match);
      if (visitor) {
        visitor(value);
      } else {
        values.push(value);
      }
    }
    return values;
  }

  // Private methods

  private resolveOne(
    cursor: DocumentCursor,
    segments: ConcreteSegment[]
  ): JsonValue | undefined {
    cursor.rewind();
    if (segments.length === 0) {
      const whole = this.materializer.materialize(cursor.root());
      cursor.rewind();
      return whole;
    }

    let found: ScanResult<ScanValue> = success(cursor.root());
    let target: Target = cursor;
    for (const segment of segments) {
      found = step(target, segment);
      if (!found.ok) {
        break;
      }
      target = found.value;
    }

    if (!found.ok) {
      if (isNavigationMiss(found.code)) {
        return undefined;
      }
      raiseEngineError(found.code);
    }
    return this.materializer.materialize(found.value);
  }

  /**
   * Depth-first walk pushing a handle for every match; misses below a
   * wildcard only drop that branch
   */
  private collect(target: Target, segments: PathSegment[], depth: number, out: ScanValue[]): ScanResult<void> {
    if (depth === segments.length) {
      out.push(target instanceof DocumentCursor ? target.root() : target);
      return success(undefined);
    }

    const segment = segments[depth];
    if (segment.type !== 'wildcard') {
      const child = step(target, segment);
      if (!child.ok) {
        return child;
      }
      return this.collect(child.value, segments, depth + 1, out);
    }

    const type = typeOf(target);
    if (!type.ok) {
      return type;
    }

    if (type.value === JsonType.Object) {
      const object = openObject(target);
      if (!object.ok) {
        return object;
      }
      for (;;) {
        const field = object.value.nextField();
        if (!field.ok) {
          return field;
        }
        if (field.value === null) {
          return success(undefined);
        }
        const below = this.collect(field.value.value, segments, depth + 1, out);
        if (!below.ok && !isNavigationMiss(below.code)) {
          return below;
        }
      }
    }

    if (type.value === JsonType.Array) {
      const array = openArray(target);
      if (!array.ok) {
        return array;
      }
      for (;;) {
        const element = array.value.next();
        if (!element.ok) {
          return element;
        }
        if (element.value === null) {
          return success(undefined);
        }
        const below = this.collect(element.value, segments, depth + 1, out);
        if (!below.ok && !isNavigationMiss(below.code)) {
          return below;
        }
      }
    }

    return success(undefined);
  }
}
