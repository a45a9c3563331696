/**
 * Scan Parser - reusable engine resource
 *
 * Owns the scratch memory for the structural index and the depth stack.
 * Every iterate or allocate bumps the generation, which invalidates all
 * cursors handed out before.
 */

import { DEFAULT_MAX_CAPACITY, DEFAULT_MAX_DEPTH, PADDING } from './constants.js';
import { DocumentCursor } from './document-cursor.js';
import { ErrorCode, ScanResult, success, failure } from './error-codes.js';
import { JsonIterator, TokenStream } from './json-iterator.js';
import { indexStructurals } from './structural-indexer.js';

/**
 * Padded bytes handed to the engine
 */
export interface PaddedInput {
  readonly bytes: Uint8Array;
  readonly length: number;
  readonly capacity: number;
}

export interface ScanParserOptions {
  /**
   * Largest document the parser will grow to
   * @default 0xFFFFFFFF
   */
  maxCapacity?: number;

  /**
   * Deepest nesting accepted
   * @default 1024
   */
  maxDepth?: number;
}

export class ScanParser {
  private _capacity = 0;
  private _maxCapacity: number;
  private _maxDepth: number;
  private _generation = 0;
  private holds = 0;
  private indexes = new Uint32Array(1);
  private openers = new Uint8Array(0);

  constructor(options: ScanParserOptions = {}) {
    this._maxCapacity = options.maxCapacity ?? DEFAULT_MAX_CAPACITY;
    this._maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  get capacity(): number {
    return this._capacity;
  }

  get maxCapacity(): number {
    return this._maxCapacity;
  }

  get maxDepth(): number {
    return this._maxDepth;
  }

  get generation(): number {
    return this._generation;
  }

  /** True while a visitor holds the parser */
  get inUse(): boolean {
    return this.holds > 0;
  }

  /**
   * Size the scratch memory for documents up to `capacity` bytes
   */
  allocate(capacity: number, maxDepth: number = this._maxDepth): ScanResult<void> {
    if (this.holds > 0) {
      return failure(ErrorCode.ParserInUse);
    }
    if (capacity > this._maxCapacity) {
      return failure(ErrorCode.Capacity);
    }

    try {
      this.indexes = new Uint32Array(capacity + 1);
      this.openers = new Uint8Array(maxDepth);
    } catch (error) {
      if (error instanceof RangeError) {
        return failure(ErrorCode.MemAlloc);
      }
      throw error;
    }

    this._capacity = capacity;
    this._maxDepth = maxDepth;
    this._generation++;
    return success(undefined);
  }

  setMaxCapacity(maxCapacity: number): void {
    this._maxCapacity = maxCapacity;
  }

  /**
   * Index `input` and return a cursor at its root
   */
  iterate(input: PaddedInput): ScanResult<DocumentCursor> {
    if (this.holds > 0) {
      return failure(ErrorCode.ParserInUse);
    }
    if (input.capacity - input.length < PADDING || input.bytes.length < input.capacity) {
      return failure(ErrorCode.InsufficientPadding);
    }
    if (input.length > this._capacity) {
      if (input.length > this._maxCapacity) {
        return failure(ErrorCode.OutOfCapacity);
      }
      const grown = this.allocate(input.length);
      if (!grown.ok) {
        return grown;
      }
    }

    this._generation++;
    const indexed = indexStructurals(input.bytes, input.length, this.indexes, this.openers, this._maxDepth);
    if (!indexed.ok) {
      return indexed;
    }

    const stream: TokenStream = {
      bytes: input.bytes,
      length: input.length,
      indexes: this.indexes,
      count: indexed.value
    };
    return success(new DocumentCursor(new JsonIterator(stream, this, this._generation)));
  }

  /**
   * Run `body` with the parser marked in use
   */
  exclusive<T>(body: () => T): T {
    this.holds++;
    try {
      return body();
    } finally {
      this.holds--;
    }
  }
}
