/**
 * ondemand-json TypeScript Types
 *
 * Value model, error taxonomy, configuration and document lifecycle types
 * shared by the buffer layer, the document layer and the public API.
 */

import { ErrorCode } from '../engine/error-codes.js';

export { ErrorCode };

// Value Model

/**
 * Any value produced by parsing or accepted by the encoder's JSON subset
 */
export type JsonValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | JsonValue[]
  | JsonObject;

/**
 * Parsed object; keys are strings, or registered symbols when keys are
 * symbolized
 */
export interface JsonObject {
  [key: string]: JsonValue;
  [key: symbol]: JsonValue;
}

/**
 * Key conversion strategy applied to every object key during
 * materialization
 */
export type KeyConverter = (key: string) => string | symbol;

/**
 * Receives each element of an enumerated array or wildcard match
 */
export type ValueVisitor = (value: JsonValue) => void;

/**
 * Receives each field of an enumerated object
 */
export type FieldVisitor = (key: string | symbol, value: JsonValue) => void;

/**
 * Called with the key or index that missed during `fetch`
 */
export type MissHandler = (keyOrIndex: string | number) => JsonValue;

// Error Types

/**
 * Error categories
 */
export enum ErrorKind {
  Syntax = 'SYNTAX',
  ResourceLimits = 'RESOURCE_LIMITS',
  OutOfMemory = 'OUT_OF_MEMORY',
  NumberFormat = 'NUMBER_FORMAT',
  NavigationMiss = 'NAVIGATION_MISS',
  StructuralMisuse = 'STRUCTURAL_MISUSE',
  PathSyntax = 'PATH_SYNTAX',
  IO = 'IO',
  UnsupportedArchitecture = 'UNSUPPORTED_ARCHITECTURE',
  Unexpected = 'UNEXPECTED',
  Empty = 'EMPTY'
}

/**
 * Error raised for every engine code that reaches the caller
 */
export class JsonError extends Error {
  constructor(
    public code: ErrorCode,
    public kind: ErrorKind,
    message: string,
    public context?: Record<string, unknown>,
    public originalError?: Error
  ) {
    super(message);
    this.name = 'JsonError';
  }
}

// Configuration Types

/**
 * Process-wide defaults read when a parser or buffer manager is built
 */
export interface JsonConfig {
  /**
   * Scan caller-owned bytes in place when padding allows
   * @default true
   */
  zeroCopy: boolean;

  /**
   * Enable debug logging; also forces every buffer onto the copy path
   * @default false
   */
  debug: boolean;

  /**
   * Page size used for the zero-copy over-read check
   * @default 4096
   */
  pageSize: number;
}

/**
 * Buffer manager configuration
 */
export interface BufferManagerConfig {
  /**
   * @default true
   */
  zeroCopy?: boolean;

  /**
   * @default 4096
   */
  pageSize?: number;

  /**
   * @default false
   */
  debug?: boolean;
}

/**
 * Parser construction options
 */
export interface ParserOptions extends BufferManagerConfig {
  /**
   * Largest document the parser will accept, in bytes
   * @default 0xFFFFFFFF
   */
  maxCapacity?: number;

  /**
   * Deepest container nesting accepted
   * @default 1024
   */
  maxDepth?: number;
}

/**
 * Options for eager parsing
 */
export interface ParseOptions {
  /**
   * Return object keys as `Symbol.for(key)`
   * @default false
   */
  symbolizeKeys?: boolean;
}

// Document Lifecycle Types

/**
 * Lazy document states
 */
export enum DocumentState {
  Fresh = 'fresh',
  Active = 'active',
  Stale = 'stale',
  Dead = 'dead'
}

/**
 * Payload of the `transition` event
 */
export interface StateTransition {
  from: DocumentState;
  to: DocumentState;
  reason: string;
  error?: JsonError;
}
