/**
 * Process-wide configuration
 *
 * Read once when a parser or buffer manager is built; later changes only
 * affect objects built afterwards.
 */

import { DEFAULT_PAGE_SIZE, PADDING } from '../engine/constants.js';
import { JsonConfig } from '../types/index.js';

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: Readonly<JsonConfig> = Object.freeze({
  zeroCopy: true,
  debug: false,
  pageSize: DEFAULT_PAGE_SIZE
});

let current: JsonConfig = { ...DEFAULT_CONFIG };

/**
 * Update the process-wide configuration and return the result
 */
export function configure(options: Partial<JsonConfig>): JsonConfig {
  const pageSize = options.pageSize ?? current.pageSize;
  if (!Number.isInteger(pageSize) || pageSize <= PADDING) {
    throw new RangeError(`pageSize must be an integer greater than ${PADDING}, got ${pageSize}`);
  }

  current = {
    zeroCopy: options.zeroCopy ?? current.zeroCopy,
    debug: options.debug ?? current.debug,
    pageSize
  };
  return getConfig();
}

export function getConfig(): JsonConfig {
  return { ...current };
}

export function resetConfig(): void {
  current = { ...DEFAULT_CONFIG };
}
