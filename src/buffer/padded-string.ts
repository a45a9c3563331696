/**
 * Padded String - private immutable copy of input bytes with zeroed padding
 */

import { constants } from 'buffer';
import { closeSync, fstatSync, openSync, readSync } from 'fs';
import { PADDING } from '../engine/constants.js';
import { ErrorCode } from '../engine/error-codes.js';
import { engineError, raiseEngineError } from '../core/error-taxonomy.js';
import { JsonError } from '../types/index.js';

/**
 * `length + PADDING`, or OVERSIZE_INPUT when no buffer can hold that many bytes
 */
export function paddedLength(length: number): number {
  const required = length + PADDING;
  if (required > constants.MAX_LENGTH || required > Number.MAX_SAFE_INTEGER) {
    raiseEngineError(ErrorCode.OversizeInput, { length });
  }
  return required;
}

export class PaddedString {
  private constructor(
    readonly bytes: Uint8Array,
    readonly length: number
  ) {}

  get capacity(): number {
    return this.bytes.length;
  }

  static copyOf(source: Uint8Array): PaddedString {
    const bytes = Buffer.alloc(paddedLength(source.length));
    bytes.set(source);
    return new PaddedString(bytes, source.length);
  }

  static fromString(text: string): PaddedString {
    const length = Buffer.byteLength(text, 'utf8');
    const bytes = Buffer.alloc(paddedLength(length));
    bytes.write(text, 0, 'utf8');
    return new PaddedString(bytes, length);
  }

  /**
   * Read a whole file into a padded copy
   */
  static load(path: string): PaddedString {
    let fd: number;
    try {
      fd = openSync(path, 'r');
    } catch (error) {
      throw ioError(path, error);
    }

    try {
      const size = fstatSync(fd).size;
      const bytes = Buffer.alloc(paddedLength(size));
      let offset = 0;
      while (offset < size) {
        const read = readSync(fd, bytes, offset, size - offset, offset);
        if (read === 0) {
          break;
        }
        offset += read;
      }
      return new PaddedString(bytes, offset);
    } catch (error) {
      throw error instanceof JsonError ? error : ioError(path, error);
    } finally {
      closeSync(fd);
    }
  }

  toString(): string {
    return Buffer.from(this.bytes.buffer, this.bytes.byteOffset, this.length).toString('utf8');
  }
}

function ioError(path: string, error: unknown): JsonError {
  return engineError(ErrorCode.IoError, { path }, error instanceof Error ? error : undefined);
}
