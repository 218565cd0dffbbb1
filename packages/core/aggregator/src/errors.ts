/**
 * Error types for aggregation operations
 */

import type { SourceId } from './types.js';

/**
 * Failure reported by a single source adapter. Transient and permanent
 * only differ for the adapter's own retry decision.
 */
export type SourceError =
  | { type: 'transient'; message: string; cause?: unknown }
  | { type: 'permanent'; message: string; cause?: unknown }
  | { type: 'not_found'; message: string; id?: string }
  | { type: 'access_denied'; message: string; id?: string };

export type AggregatorError =
  | { type: 'unauthenticated'; message: string }
  | { type: 'malformed_input'; field: string; message: string }
  | { type: 'permission_denied'; source: SourceId; scope: string; message: string }
  | { type: 'unsupported_source'; source: SourceId; message: string }
  | { type: 'not_found'; id: string; message: string }
  | { type: 'access_denied'; id: string; message: string }
  | { type: 'source_unavailable'; source: SourceId; message: string; cause?: SourceError }
  | { type: 'summarizer_error'; message: string; cause?: unknown }
  | { type: 'internal'; message: string; cause?: unknown };

/**
 * Result type for operations that can fail
 */
export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
