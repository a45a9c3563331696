/**
 * Document Cursor - root-level access to one iterated document
 *
 * Keeps the root object or array cursor between calls so keyed lookups can
 * continue where the previous one stopped.
 */

import { ErrorCode, ScanResult, success, failure } from './error-codes.js';
import { JsonIterator } from './json-iterator.js';
import { ArrayCursor, JsonType, ObjectCursor, ScanValue } from './scan-value.js';

export class DocumentCursor {
  private rootObject: ObjectCursor | null = null;
  private rootArray: ArrayCursor | null = null;

  constructor(readonly iter: JsonIterator) {}

  isAlive(): boolean {
    return this.iter.isAlive();
  }

  /** True while nothing has been read since creation or the last rewind */
  isUnstarted(): boolean {
    return this.iter.index === 0 && this.rootObject === null && this.rootArray === null;
  }

  rewind(): void {
    this.iter.rewind();
    this.rootObject = null;
    this.rootArray = null;
  }

  root(): ScanValue {
    return new ScanValue(this.iter, 0, 0);
  }

  rootType(): ScanResult<JsonType> {
    return this.root().type();
  }

  /**
   * Root object cursor, reusing the one already open
   */
  resumeObject(): ScanResult<ObjectCursor> {
    if (this.rootObject) {
      return success(this.rootObject);
    }
    if (this.rootArray) {
      return failure(ErrorCode.IncorrectType);
    }
    if (this.iter.index !== 0) {
      return this.misuse(JsonType.Object);
    }

    const opened = this.root().getObject();
    if (opened.ok) {
      this.rootObject = opened.value;
    }
    return opened;
  }

  /**
   * Open the root object for a single pass; the root must be unstarted
   */
  startObject(): ScanResult<ObjectCursor> {
    if (!this.isUnstarted()) {
      return this.misuse(JsonType.Object);
    }
    const opened = this.root().getObject();
    if (opened.ok) {
      this.rootObject = opened.value;
    }
    return opened;
  }

  /**
   * Open the root array; the root must be unstarted
   */
  startArray(): ScanResult<ArrayCursor> {
    if (!this.isUnstarted()) {
      return this.misuse(JsonType.Array);
    }
    const opened = this.root().getArray();
    if (opened.ok) {
      this.rootArray = opened.value;
    }
    return opened;
  }

  /** Fails unless every token has been consumed */
  finish(): ScanResult<void> {
    return this.iter.atEnd() ? success(undefined) : failure(ErrorCode.TrailingContent);
  }

  // Private methods

  private misuse(expected: JsonType): ScanResult<never> {
    const actual = this.rootType();
    if (!actual.ok) {
      return actual;
    }
    return failure(actual.value === expected ? ErrorCode.OutOfOrderIteration : ErrorCode.IncorrectType);
  }
}
