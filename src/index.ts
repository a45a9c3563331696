/**
 * ondemand-json
 *
 * Eager and lazy on-demand JSON parsing over a padded structural scanner,
 * with JSON Pointer and JSONPath queries and a UTF-8 checked encoder.
 *
 * @example
 * ```typescript
 * import { parse, parseLazy, dump } from 'ondemand-json';
 *
 * const config = parse('{"retries":3}');
 *
 * const doc = parseLazy('{"users":[{"name":"ada"},{"name":"lin"}]}');
 * doc.atPointer('/users/1/name');         // 'lin'
 * doc.atPathWithWildcard('$.users[*].name'); // ['ada', 'lin']
 *
 * dump({ ok: true, ids: [1n, 2n] });      // '{"ok":true,"ids":[1,2]}'
 * ```
 *
 * @version 0.1.0
 * @license MIT OR Apache-2.0
 */

import { BufferView } from './buffer/buffer-view.js';
import { PaddedString } from './buffer/padded-string.js';
import { LazyDocument } from './core/lazy-document.js';
import { Parser, ParserInput } from './core/parser.js';
import { JsonValue, ParseOptions } from './types/index.js';

// Core classes
export { Parser } from './core/parser.js';
export type { ParserInput } from './core/parser.js';
export { LazyDocument } from './core/lazy-document.js';
export { DocumentStateMachine } from './core/document-state.js';
export { ValueMaterializer, stringKeys, symbolKeys } from './core/value-materializer.js';
export { PathResolver, parsePointer, parsePath } from './core/path-resolver.js';
export type { PathSegment } from './core/path-resolver.js';
export { Encoder, dump, quoteString } from './core/encoder.js';
export { classifyError, isNavigationMiss, raiseEngineError, toJsonError } from './core/error-taxonomy.js';
export { configure, getConfig, resetConfig, DEFAULT_CONFIG } from './core/config.js';

// Buffers
export { ByteBuffer } from './buffer/byte-buffer.js';
export { PaddedString } from './buffer/padded-string.js';
export { BufferView } from './buffer/buffer-view.js';
export { BufferManager, needsAllocation } from './buffer/buffer-manager.js';

// Engine surface
export { errorMessage } from './engine/error-codes.js';
export { JsonType } from './engine/scan-value.js';
export { PADDING, DEFAULT_MAX_DEPTH, DEFAULT_MAX_CAPACITY, MAX_BIGINT_DIGITS } from './engine/constants.js';

// Type definitions
export * from './types/index.js';

/**
 * Library version
 */
export const VERSION = '0.1.0';

/**
 * Eagerly parse JSON text or bytes
 */
export function parse(input: ParserInput, options: ParseOptions = {}): JsonValue {
  return new Parser().parse(input, options);
}

/**
 * Eagerly parse a JSON file
 */
export function load(path: string, options: ParseOptions = {}): JsonValue {
  return new Parser().parseView(BufferView.ofPadded(PaddedString.load(path)), options);
}

/**
 * Lazy document over JSON text or bytes. Without a parser a new one is
 * created for the document.
 */
export function parseLazy(input: ParserInput, parser: Parser = new Parser()): LazyDocument {
  return parser.iterate(input);
}

/**
 * Lazy document over a JSON file
 */
export function loadLazy(path: string, parser: Parser = new Parser()): LazyDocument {
  return parser.iterateView(BufferView.ofPadded(PaddedString.load(path)));
}
