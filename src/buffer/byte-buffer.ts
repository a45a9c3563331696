/**
 * Byte Buffer - growable byte string that can be frozen
 *
 * Once frozen the contents and logical length are fixed; the buffer manager
 * freezes every buffer it lends to the scanner.
 */

import { TextDecoder } from 'util';
import { ErrorCode } from '../engine/error-codes.js';
import { raiseEngineError } from '../core/error-taxonomy.js';

const decoder = new TextDecoder('utf-8');

export class ByteBuffer {
  private storage: Uint8Array;
  private _length: number;
  private frozen = false;

  private constructor(storage: Uint8Array, length: number) {
    this.storage = storage;
    this._length = length;
  }

  /**
   * Copy `input` into a new buffer
   */
  static from(input: string | Uint8Array): ByteBuffer {
    const source = typeof input === 'string' ? Buffer.from(input, 'utf8') : input;
    const storage = new Uint8Array(source.length);
    storage.set(source);
    return new ByteBuffer(storage, storage.length);
  }

  static withCapacity(capacity: number): ByteBuffer {
    return new ByteBuffer(new Uint8Array(capacity), 0);
  }

  get length(): number {
    return this._length;
  }

  get capacity(): number {
    return this.storage.length;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  append(input: string | Uint8Array): this {
    this.assertMutable('append');
    const bytes = typeof input === 'string' ? Buffer.from(input, 'utf8') : input;
    const needed = this._length + bytes.length;
    if (needed > this.storage.length) {
      this.grow(Math.max(needed, this.storage.length * 2));
    }
    this.storage.set(bytes, this._length);
    this._length = needed;
    return this;
  }

  setByte(index: number, byte: number): void {
    this.assertMutable('setByte');
    if (index < 0 || index >= this._length) {
      throw new RangeError(`Index ${index} outside buffer of length ${this._length}`);
    }
    this.storage[index] = byte;
  }

  /**
   * Grow storage to at least `capacity` bytes, keeping contents and length
   */
  reserve(capacity: number): void {
    this.assertMutable('reserve');
    if (capacity > this.storage.length) {
      this.grow(capacity);
    }
  }

  truncate(length: number): void {
    this.assertMutable('truncate');
    if (length < this._length) {
      this._length = Math.max(0, length);
    }
  }

  /** Logical contents */
  bytes(): Uint8Array {
    return this.storage.subarray(0, this._length);
  }

  /** Whole storage including unused capacity */
  storageView(): Uint8Array {
    return this.storage;
  }

  toString(): string {
    return decoder.decode(this.bytes());
  }

  // Private methods

  private grow(capacity: number): void {
    const storage = new Uint8Array(capacity);
    storage.set(this.storage.subarray(0, this._length));
    this.storage = storage;
  }

  private assertMutable(operation: string): void {
    if (this.frozen) {
      raiseEngineError(ErrorCode.FrozenBuffer, { operation });
    }
  }
}
