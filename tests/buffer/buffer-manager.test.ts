/**
 * Buffer Manager Tests
 */

import { describe, test, expect, afterEach, jest } from '@jest/globals';
import { BufferManager, needsAllocation } from '../../src/buffer/buffer-manager.js';
import { ByteBuffer } from '../../src/buffer/byte-buffer.js';
import { ErrorCode } from '../../src/types/index.js';
import { captureError } from '../helpers.js';

describe('needsAllocation', () => {
  test('should borrow when the padding stays inside the page', () => {
    expect(needsAllocation(new Uint8Array(4096), 100, 100, 4096, false)).toBe(false);
  });

  test('should copy when the padding crosses the page end', () => {
    expect(needsAllocation(new Uint8Array(4096), 4092, 4096, 4096, false)).toBe(true);
  });

  test('should borrow a region near the start of a larger slab', () => {
    const region = new Uint8Array(new ArrayBuffer(8192), 4000, 10);

    expect(needsAllocation(region, 10, 10, 4096, false)).toBe(false);
  });

  test('should copy a region ending just before a page boundary', () => {
    const region = new Uint8Array(new ArrayBuffer(8192), 4090, 5);

    expect(needsAllocation(region, 5, 5, 4096, false)).toBe(true);
  });

  test('should borrow when capacity already covers the padding', () => {
    expect(needsAllocation(new Uint8Array(200), 100, 200, 4096, false)).toBe(false);
    expect(needsAllocation(new Uint8Array(200), 100, 163, 4096, false)).toBe(true);
  });

  test('should always copy in debug mode', () => {
    expect(needsAllocation(new Uint8Array(4096), 1, 4096, 4096, true)).toBe(true);
  });
});

describe('BufferManager', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('should default to zero-copy', () => {
    expect(new BufferManager().zeroCopy).toBe(true);
    expect(new BufferManager({ zeroCopy: false }).zeroCopy).toBe(false);
  });

  test('should pad strings into a private copy', () => {
    const view = new BufferManager().view('[1]');

    expect(view.length).toBe(3);
    expect(view.capacity).toBe(67);
    expect(view.padding).toBe(64);
    expect(view.borrowed).toBe(false);
  });

  test('should copy plain byte arrays', () => {
    const raw = new Uint8Array([0x5b, 0x5d]);
    const view = new BufferManager().view(raw);
    raw[0] = 0x7b;

    expect(view.borrowed).toBe(false);
    expect(view.bytes[0]).toBe(0x5b);
  });

  test('should borrow a buffer with page room in place', () => {
    const buffer = ByteBuffer.withCapacity(4096).append('[1,2]');
    const storage = buffer.storageView();

    const view = new BufferManager().view(buffer);

    expect(view.borrowed).toBe(true);
    expect(view.bytes.buffer).toBe(storage.buffer);
    expect(view.length).toBe(5);
    expect(view.capacity).toBe(69);
    expect(buffer.isFrozen()).toBe(true);
    expect(buffer.capacity).toBe(4096);
  });

  test('should grow and borrow a buffer without room', () => {
    const buffer = ByteBuffer.from('[1]');

    const view = new BufferManager().view(buffer);

    expect(view.borrowed).toBe(true);
    expect(buffer.capacity).toBe(67);
    expect(buffer.isFrozen()).toBe(true);
    expect(view.bytes.buffer).toBe(buffer.storageView().buffer);
  });

  test('should grow and borrow even without zero-copy', () => {
    const buffer = ByteBuffer.withCapacity(4096).append('[1]');

    const view = new BufferManager({ zeroCopy: false }).view(buffer);

    expect(view.borrowed).toBe(true);
    expect(buffer.capacity).toBe(4096);
    expect(buffer.isFrozen()).toBe(true);
  });

  test('should copy a frozen buffer it cannot borrow', () => {
    const buffer = ByteBuffer.from('[1]').freeze();

    const view = new BufferManager().view(buffer);

    expect(view.borrowed).toBe(false);
    expect(view.capacity).toBe(67);
    expect(buffer.capacity).toBe(3);
  });

  test('should log its decision in debug mode', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    new BufferManager({ debug: true }).view(ByteBuffer.from('[1,2]'));

    expect(log).toHaveBeenCalledWith('[ondemand-json Buffer] Grew buffer for padding (5.0 B)');
  });

  test('should stay quiet outside debug mode', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    new BufferManager().view(ByteBuffer.from('[1,2]'));

    expect(log).not.toHaveBeenCalled();
  });

  test('should refuse to mutate a lent buffer', () => {
    const buffer = ByteBuffer.from('[1]');
    new BufferManager().view(buffer);

    expect(captureError(() => buffer.append(' ')).code).toBe(ErrorCode.FrozenBuffer);
  });
});
