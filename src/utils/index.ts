/**
 * ondemand-json Utilities
 *
 * Formatting helpers for log lines and error contexts.
 */

import { TextDecoder } from 'util';

const decoder = new TextDecoder('utf-8');

/**
 * Format bytes into human-readable string
 */
export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let size = bytes;
  let unitIndex = 0;

  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  return `${size.toFixed(1)} ${units[unitIndex]}`;
}

/**
 * Leading text of `bytes[0, length)` for error contexts, cut to `max`
 * bytes with a trailing ellipsis
 */
export function previewBytes(bytes: Uint8Array, length: number, max = 32): string {
  const end = Math.min(length, max);
  const text = decoder.decode(bytes.subarray(0, end));
  return length > max ? `${text}...` : text;
}
