/**
 * Buffer View - padded window handed to the scanner
 *
 * A view keeps its source alive for as long as the view exists, so a
 * borrowed buffer cannot be dropped while a document still scans it.
 */

import { PaddedInput } from '../engine/scan-parser.js';
import { ByteBuffer } from './byte-buffer.js';
import { PaddedString } from './padded-string.js';

export type ViewSource = ByteBuffer | PaddedString;

export class BufferView implements PaddedInput {
  constructor(
    readonly bytes: Uint8Array,
    readonly length: number,
    readonly capacity: number,
    readonly source: ViewSource
  ) {}

  static ofPadded(padded: PaddedString): BufferView {
    return new BufferView(padded.bytes, padded.length, padded.capacity, padded);
  }

  /**
   * Borrow a frozen buffer's memory. The first `capacity` bytes from the
   * start of its storage must lie within the backing store.
   */
  static borrow(buffer: ByteBuffer, capacity: number): BufferView {
    const storage = buffer.storageView();
    const bytes = new Uint8Array(storage.buffer, storage.byteOffset, capacity);
    return new BufferView(bytes, buffer.length, capacity, buffer);
  }

  get padding(): number {
    return this.capacity - this.length;
  }

  /** True when the view scans caller-owned memory */
  get borrowed(): boolean {
    return this.source instanceof ByteBuffer;
  }
}
