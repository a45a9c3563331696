/**
 * JSON Iterator - forward-only position over an indexed token stream
 */

import {
  CHAR_OPEN_BRACE,
  CHAR_CLOSE_BRACE,
  CHAR_OPEN_BRACKET,
  CHAR_CLOSE_BRACKET
} from './constants.js';

/**
 * Output of the structural indexer for one document
 */
export interface TokenStream {
  readonly bytes: Uint8Array;
  readonly length: number;
  readonly indexes: Uint32Array;
  readonly count: number;
}

/**
 * Anything that invalidates iterators by bumping a counter
 */
export interface GenerationSource {
  readonly generation: number;
}

export class JsonIterator {
  index = 0;
  depth = 0;

  constructor(
    readonly stream: TokenStream,
    private readonly owner: GenerationSource,
    readonly generation: number
  ) {}

  /**
   * False once the owning parser has iterated or reallocated since this
   * iterator was created
   */
  isAlive(): boolean {
    return this.owner.generation === this.generation;
  }

  atEnd(): boolean {
    return this.index >= this.stream.count;
  }

  /** First byte of the current token, or -1 at the end */
  peek(): number {
    return this.atEnd() ? -1 : this.stream.bytes[this.stream.indexes[this.index]];
  }

  /** Byte offset of the current token; the input length at the end */
  offset(): number {
    return this.stream.indexes[this.index];
  }

  /** First byte of the token at `index` */
  byteAt(index: number): number {
    return index < this.stream.count ? this.stream.bytes[this.stream.indexes[index]] : -1;
  }

  advance(): void {
    const byte = this.peek();
    if (byte === CHAR_OPEN_BRACE || byte === CHAR_OPEN_BRACKET) {
      this.depth++;
    } else if (byte === CHAR_CLOSE_BRACE || byte === CHAR_CLOSE_BRACKET) {
      this.depth--;
    }
    this.index++;
  }

  /** Step over the whole value at the current token */
  skipValue(): void {
    const target = this.depth;
    this.advance();
    this.skipChild(target);
  }

  /** Advance until back at `depth`, closing any containers opened below it */
  skipChild(depth: number): void {
    while (this.depth > depth && !this.atEnd()) {
      this.advance();
    }
  }

  seek(index: number, depth: number): void {
    this.index = index;
    this.depth = depth;
  }

  rewind(): void {
    this.seek(0, 0);
  }
}
