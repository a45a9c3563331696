/**
 * Lazy Document - on-demand access to one parsed input
 *
 * Binds a padded view to the parser that indexed it. Values are only
 * materialized when read. When the parser is reused elsewhere the document
 * goes stale and the next read indexes the view again; if that fails the
 * document is dead until `reiterate()` succeeds.
 */

import { BufferView } from '../buffer/buffer-view.js';
import { DocumentCursor } from '../engine/document-cursor.js';
import { ErrorCode, ScanResult, failure } from '../engine/error-codes.js';
import { ScanParser } from '../engine/scan-parser.js';
import { JsonType, ScanValue } from '../engine/scan-value.js';
import {
  DocumentState,
  FieldVisitor,
  JsonObject,
  JsonValue,
  MissHandler,
  ValueVisitor
} from '../types/index.js';
import { previewBytes } from '../utils/index.js';
import { DocumentStateMachine } from './document-state.js';
import { engineError, isNavigationMiss, raiseEngineError, unwrap } from './error-taxonomy.js';
import { PathResolver } from './path-resolver.js';
import { setField, ValueMaterializer } from './value-materializer.js';

export interface LazyDocumentOptions {
  /**
   * Materializer used for every value handed out
   * @default new ValueMaterializer()
   */
  materializer?: ValueMaterializer;

  /**
   * Log lifecycle transitions and rehydration attempts
   * @default false
   */
  debug?: boolean;
}

export class LazyDocument {
  /** Lifecycle events; subscribe with `lifecycle.on('transition', ...)` */
  readonly lifecycle: DocumentStateMachine;

  private cursor: DocumentCursor;
  private enumerating = false;
  private readonly materializer: ValueMaterializer;
  private readonly resolver: PathResolver;
  private readonly debug: boolean;

  constructor(
    readonly view: BufferView,
    readonly engine: ScanParser,
    options: LazyDocumentOptions = {}
  ) {
    this.materializer = options.materializer ?? new ValueMaterializer();
    this.resolver = new PathResolver(this.materializer);
    this.debug = options.debug ?? false;
    this.lifecycle = new DocumentStateMachine(this.debug);
    this.cursor = unwrap(engine.iterate(view), this.errorContext('iterate'));
  }

  /**
   * Current lifecycle state. A document whose parser has moved on reports
   * `Stale`; the transition itself is recorded by the next read.
   */
  get state(): DocumentState {
    const current = this.lifecycle.state;
    if ((current === DocumentState.Fresh || current === DocumentState.Active) && !this.cursor.isAlive()) {
      return DocumentState.Stale;
    }
    return current;
  }

  isAlive(): boolean {
    return this.lifecycle.state !== DocumentState.Dead && this.cursor.isAlive();
  }

  /**
   * Value at an object key or array index, or undefined on a miss
   */
  get(keyOrIndex: string | number): JsonValue | undefined {
    return this.run('get', cursor => this.read(this.locate(cursor, keyOrIndex)));
  }

  /**
   * Like `get`, but a miss resolves to `defaultValue`, then to
   * `onMiss(keyOrIndex)`, and throws when neither is supplied
   */
  fetch(keyOrIndex: string | number): JsonValue;
  fetch(keyOrIndex: string | number, defaultValue: JsonValue): JsonValue;
  fetch(keyOrIndex: string | number, defaultValue: JsonValue | undefined, onMiss: MissHandler): JsonValue;
  fetch(keyOrIndex: string | number, defaultValue?: JsonValue, onMiss?: MissHandler): JsonValue {
    const found = this.get(keyOrIndex);
    if (found !== undefined) {
      return found;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    if (onMiss) {
      return onMiss(keyOrIndex);
    }
    return raiseEngineError(
      typeof keyOrIndex === 'number' ? ErrorCode.IndexOutOfBounds : ErrorCode.NoSuchField,
      { keyOrIndex }
    );
  }

  /**
   * Search forward from the current field only
   */
  findField(key: string): JsonValue | undefined {
    return this.run('findField', cursor => {
      const object = cursor.resumeObject();
      return this.read(object.ok ? object.value.findField(key) : object);
    });
  }

  /**
   * Search forward, then wrap around to the first field
   */
  findFieldUnordered(key: string): JsonValue | undefined {
    return this.run('findFieldUnordered', cursor => this.read(this.locate(cursor, key)));
  }

  /**
   * Element of a root array; the array must not have been started
   */
  at(index: number): JsonValue | undefined {
    return this.run('at', cursor => this.read(this.elementAt(cursor, index)));
  }

  atPointer(pointer: string): JsonValue | undefined {
    return this.run('atPointer', cursor => this.resolver.atPointer(cursor, pointer));
  }

  atPath(path: string): JsonValue | undefined {
    return this.run('atPath', cursor => this.resolver.atPath(cursor, path));
  }

  /**
   * Every match of a path with `*` segments, collected or streamed to
   * `visitor`
   */
  atPathWithWildcard(path: string): JsonValue[];
  atPathWithWildcard(path: string, visitor: ValueVisitor): this;
  atPathWithWildcard(path: string, visitor?: ValueVisitor): JsonValue[] | this {
    if (!visitor) {
      return this.run('atPathWithWildcard', cursor => this.resolver.atPathWithWildcard(cursor, path));
    }
    this.run('atPathWithWildcard', cursor => this.enumerate(() => {
      this.resolver.atPathWithWildcard(cursor, path, visitor);
    }));
    return this;
  }

  /**
   * Elements of a root array in one forward pass
   */
  arrayEach(): JsonValue[];
  arrayEach(visitor: ValueVisitor): this;
  arrayEach(visitor?: ValueVisitor): JsonValue[] | this {
    const values = this.run('arrayEach', cursor => {
      const array = unwrap(cursor.startArray(), this.errorContext('arrayEach'));
      const collected: JsonValue[] = [];
      this.enumerate(() => {
        for (;;) {
          const element = unwrap(array.next());
          if (element === null) {
            return;
          }
          const value = this.materializer.materialize(element);
          if (visitor) {
            visitor(value);
          } else {
            collected.push(value);
          }
        }
      });
      return collected;
    });
    return visitor ? this : values;
  }

  /**
   * Fields of a root object in one forward pass
   */
  objectEach(): JsonObject;
  objectEach(visitor: FieldVisitor): this;
  objectEach(visitor?: FieldVisitor): JsonObject | this {
    const result = this.run('objectEach', cursor => {
      const object = unwrap(cursor.startObject(), this.errorContext('objectEach'));
      const collected: JsonObject = {};
      this.enumerate(() => {
        for (;;) {
          const field = unwrap(object.nextField());
          if (field === null) {
            return;
          }
          const key = this.materializer.keyConverter(field.key);
          const value = this.materializer.materialize(field.value);
          if (visitor) {
            visitor(key, value);
          } else {
            setField(collected, key, value);
          }
        }
      });
      return collected;
    });
    return visitor ? this : result;
  }

  /** Type of the root value */
  type(): JsonType {
    return this.run('type', cursor => unwrap(cursor.rootType()));
  }

  /**
   * The whole document; the cursor is left at the start
   */
  materialize(): JsonValue {
    return this.run('materialize', cursor => {
      cursor.rewind();
      const value = this.materializer.materialize(cursor.root());
      unwrap(cursor.finish());
      cursor.rewind();
      this.lifecycle.markFresh('materialize');
      return value;
    });
  }

  /**
   * Back to the start of the token stream without indexing again
   */
  rewind(): this {
    if (this.enumerating) {
      raiseEngineError(ErrorCode.OutOfOrderIteration, this.errorContext('rewind'));
    }
    if (this.lifecycle.state === DocumentState.Dead) {
      throw engineError(ErrorCode.DocumentDead, this.errorContext('rewind'), this.lifecycle.cause);
    }
    if (!this.cursor.isAlive()) {
      this.lifecycle.markStale();
      raiseEngineError(ErrorCode.StaleDocument, this.errorContext('rewind'));
    }

    this.cursor.rewind();
    this.lifecycle.markFresh('rewind');
    return this;
  }

  /**
   * Index the view again whatever the current state
   */
  reiterate(): this {
    if (this.enumerating) {
      raiseEngineError(ErrorCode.OutOfOrderIteration, this.errorContext('reiterate'));
    }

    const result = this.engine.iterate(this.view);
    if (!result.ok) {
      const error = engineError(result.code, this.errorContext('reiterate'));
      this.lifecycle.markDead(error);
      throw error;
    }

    this.cursor = result.value;
    this.lifecycle.markFresh('reiterate');
    return this;
  }

  // Private methods

  /**
   * Check liveness, rehydrate if needed, then run `body` with the parser held
   */
  private run<T>(operation: string, body: (cursor: DocumentCursor) => T): T {
    if (this.enumerating) {
      raiseEngineError(ErrorCode.OutOfOrderIteration, this.errorContext(operation));
    }

    const cursor = this.live(operation);
    this.lifecycle.markActive();
    return this.engine.exclusive(() => body(cursor));
  }

  private live(operation: string): DocumentCursor {
    if (this.lifecycle.state === DocumentState.Dead) {
      throw engineError(ErrorCode.DocumentDead, this.errorContext(operation), this.lifecycle.cause);
    }
    if (this.cursor.isAlive()) {
      return this.cursor;
    }

    this.lifecycle.markStale();
    if (this.debug) {
      console.log(`[ondemand-json Document] Rehydrating before ${operation}`);
    }

    const result = this.engine.iterate(this.view);
    if (!result.ok) {
      const error = engineError(result.code, this.errorContext(operation));
      this.lifecycle.markDead(error);
      throw error;
    }

    this.cursor = result.value;
    this.lifecycle.markFresh('rehydrated');
    return this.cursor;
  }

  private enumerate(body: () => void): void {
    this.enumerating = true;
    try {
      body();
    } finally {
      this.enumerating = false;
    }
  }

  private locate(cursor: DocumentCursor, keyOrIndex: string | number): ScanResult<ScanValue> {
    if (typeof keyOrIndex === 'number') {
      return this.elementAt(cursor, keyOrIndex);
    }
    const object = cursor.resumeObject();
    return object.ok ? object.value.findFieldUnordered(keyOrIndex) : object;
  }

  private elementAt(cursor: DocumentCursor, index: number): ScanResult<ScanValue> {
    if (!Number.isInteger(index) || index < 0) {
      return failure(ErrorCode.IndexOutOfBounds);
    }
    const array = cursor.startArray();
    return array.ok ? array.value.at(index) : array;
  }

  /**
   * Materialize a found value; misses become undefined
   */
  private read(found: ScanResult<ScanValue>): JsonValue | undefined {
    if (!found.ok) {
      if (isNavigationMiss(found.code)) {
        return undefined;
      }
      raiseEngineError(found.code);
    }
    return this.materializer.materialize(found.value);
  }

  private errorContext(operation: string): Record<string, unknown> {
    return {
      operation,
      input: previewBytes(this.view.bytes, this.view.length)
    };
  }
}
