/**
 * Parser - reusable parsing resource
 *
 * Wraps one scan engine and one buffer manager. Documents created by a
 * parser share its scratch memory, so only the most recent one is live;
 * older ones rehydrate on their next read.
 */

import { BufferManager } from '../buffer/buffer-manager.js';
import { BufferView } from '../buffer/buffer-view.js';
import { ByteBuffer } from '../buffer/byte-buffer.js';
import { ScanParser } from '../engine/scan-parser.js';
import { JsonValue, ParseOptions, ParserOptions } from '../types/index.js';
import { formatBytes } from '../utils/index.js';
import { getConfig } from './config.js';
import { unwrap } from './error-taxonomy.js';
import { LazyDocument } from './lazy-document.js';
import { stringKeys, symbolKeys, ValueMaterializer } from './value-materializer.js';

export type ParserInput = string | Uint8Array | ByteBuffer;

export class Parser {
  readonly engine: ScanParser;
  readonly buffers: BufferManager;
  private readonly debug: boolean;

  constructor(options: ParserOptions = {}) {
    const config = getConfig();
    this.debug = options.debug ?? config.debug;
    this.engine = new ScanParser({
      maxCapacity: options.maxCapacity,
      maxDepth: options.maxDepth
    });
    this.buffers = new BufferManager({
      zeroCopy: options.zeroCopy ?? config.zeroCopy,
      pageSize: options.pageSize ?? config.pageSize,
      debug: this.debug
    });
  }

  get capacity(): number {
    return this.engine.capacity;
  }

  get maxCapacity(): number {
    return this.engine.maxCapacity;
  }

  get maxDepth(): number {
    return this.engine.maxDepth;
  }

  /**
   * Size scratch memory up front. Documents created earlier go stale.
   */
  allocate(capacity: number, maxDepth?: number): this {
    unwrap(this.engine.allocate(capacity, maxDepth), { capacity, maxDepth });
    if (this.debug) {
      console.log(`[ondemand-json Parser] Allocated ${formatBytes(capacity)}, max depth ${this.engine.maxDepth}`);
    }
    return this;
  }

  setMaxCapacity(maxCapacity: number): this {
    this.engine.setMaxCapacity(maxCapacity);
    return this;
  }

  /**
   * Lazy document over `input`
   */
  iterate(input: ParserInput, options: ParseOptions = {}): LazyDocument {
    return this.iterateView(this.buffers.view(input), options);
  }

  iterateView(view: BufferView, options: ParseOptions = {}): LazyDocument {
    return new LazyDocument(view, this.engine, {
      materializer: materializerFor(options),
      debug: this.debug
    });
  }

  /**
   * Eagerly parse `input` into a value tree
   */
  parse(input: ParserInput, options: ParseOptions = {}): JsonValue {
    return this.parseView(this.buffers.view(input), options);
  }

  parseView(view: BufferView, options: ParseOptions = {}): JsonValue {
    const cursor = unwrap(this.engine.iterate(view));
    const materializer = materializerFor(options);
    return this.engine.exclusive(() => {
      const value = materializer.materialize(cursor.root());
      unwrap(cursor.finish());
      return value;
    });
  }
}

function materializerFor(options: ParseOptions): ValueMaterializer {
  return new ValueMaterializer({
    keyConverter: options.symbolizeKeys ? symbolKeys : stringKeys
  });
}
