/**
 * Buffer Manager - decides between borrowing and copying input bytes
 */

import { DEFAULT_PAGE_SIZE, PADDING } from '../engine/constants.js';
import { BufferManagerConfig } from '../types/index.js';
import { formatBytes } from '../utils/index.js';
import { BufferView } from './buffer-view.js';
import { ByteBuffer } from './byte-buffer.js';
import { PaddedString, paddedLength } from './padded-string.js';

/**
 * Whether `region[0, length)` needs a padded copy before scanning.
 *
 * No copy is needed when the padding after the last byte stays inside the
 * same page and that page lies within the backing store, or when the
 * region's own capacity already covers the padding. Debug mode always
 * copies.
 */
export function needsAllocation(
  region: Uint8Array,
  length: number,
  capacity: number,
  pageSize: number,
  debug: boolean
): boolean {
  if (debug) {
    return true;
  }

  const end = region.byteOffset + length - 1;
  const offset = end % pageSize;
  const pageEnd = end - offset + pageSize;
  if (offset + PADDING < pageSize && pageEnd <= region.buffer.byteLength) {
    return false;
  }

  return capacity < length + PADDING;
}

export class BufferManager {
  private config: Required<BufferManagerConfig>;

  constructor(config: BufferManagerConfig = {}) {
    this.config = {
      zeroCopy: true,
      pageSize: DEFAULT_PAGE_SIZE,
      debug: false,
      ...config
    };
  }

  get zeroCopy(): boolean {
    return this.config.zeroCopy;
  }

  /**
   * Padded view over `input`, borrowing its memory where that is safe
   */
  view(input: string | Uint8Array | ByteBuffer): BufferView {
    if (typeof input === 'string') {
      return BufferView.ofPadded(PaddedString.fromString(input));
    }

    if (!(input instanceof ByteBuffer)) {
      this.log('Copying foreign bytes', input.length);
      return BufferView.ofPadded(PaddedString.copyOf(input));
    }

    const length = input.length;
    const required = paddedLength(length);

    if (this.config.zeroCopy) {
      const region = input.storageView();
      if (!needsAllocation(region, length, input.capacity, this.config.pageSize, this.config.debug)) {
        input.freeze();
        this.log('Borrowing buffer in place', length);
        return BufferView.borrow(input, required);
      }
    }

    if (input.isFrozen()) {
      this.log('Copying frozen buffer', length);
      return BufferView.ofPadded(PaddedString.copyOf(input.bytes()));
    }

    input.reserve(required);
    input.freeze();
    this.log('Grew buffer for padding', length);
    return BufferView.borrow(input, required);
  }

  // Private methods

  private log(message: string, length: number): void {
    if (this.config.debug) {
      console.log(`[ondemand-json Buffer] ${message} (${formatBytes(length)})`);
    }
  }
}
