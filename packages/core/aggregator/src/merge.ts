/**
 * Id parsing, truncation and ordering helpers
 */

import { Buffer } from 'node:buffer';
import { AggregatorError, Result, err, ok } from './errors.js';
import { isSourceId, RecentUpdate, SOURCE_IDS, SourceId } from './types.js';

export const SNIPPET_LIMIT = 200;
export const ELLIPSIS = '...';
export const DEFAULT_CONTENT_BYTE_LIMIT = 10_000;

export interface ParsedDocumentId {
  source: SourceId;
  nativeId: string;
}

/**
 * Parse "<source>:<native-id>", splitting on the first colon only
 */
export function parseCompositeId(id: string): Result<ParsedDocumentId, AggregatorError> {
  const separator = id.indexOf(':');
  if (separator === -1) {
    return err({
      type: 'malformed_input',
      field: 'id',
      message: `Document id "${id}" must have the form <source>:<id>`,
    });
  }

  const source = id.slice(0, separator);
  const nativeId = id.slice(separator + 1);

  if (!nativeId) {
    return err({ type: 'malformed_input', field: 'id', message: `Document id "${id}" has an empty native id` });
  }

  if (!isSourceId(source)) {
    return err({ type: 'malformed_input', field: 'id', message: `Unknown source "${source}" in document id "${id}"` });
  }

  return ok({ source, nativeId });
}

export function toCompositeId(source: SourceId, nativeId: string): string {
  return `${source}:${nativeId}`;
}

export function truncateSnippet(text: string, limit: number = SNIPPET_LIMIT): string {
  if (text.length <= limit) return text;
  // Do not leave half of a surrogate pair at the cut
  const code = text.charCodeAt(limit - 1);
  const end = code >= 0xd800 && code <= 0xdbff ? limit - 1 : limit;
  return text.slice(0, end) + ELLIPSIS;
}

/**
 * Cap text at maxBytes of UTF-8 without splitting a code point
 */
export function truncateUtf8(text: string, maxBytes: number): string {
  const bytes = Buffer.from(text, 'utf8');
  if (bytes.length <= maxBytes) return text;

  let end = Math.max(0, maxBytes);
  // back off while the cut lands on a continuation byte (10xxxxxx)
  while (end > 0 && (bytes[end] & 0xc0) === 0x80) {
    end--;
  }

  return bytes.subarray(0, end).toString('utf8');
}

export function sourceRank(source: SourceId): number {
  return SOURCE_IDS.indexOf(source);
}

/**
 * De-duplicate and put sources in canonical enumeration order
 */
export function canonicalSources(sources: readonly SourceId[]): SourceId[] {
  return Array.from(new Set(sources)).sort((a, b) => sourceRank(a) - sourceRank(b));
}

function timestampOf(value: string): number {
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? Number.NEGATIVE_INFINITY : parsed;
}

/**
 * Newest first; equal timestamps keep source enumeration order, then input order
 */
export function sortUpdatesByRecency(updates: readonly RecentUpdate[]): RecentUpdate[] {
  return updates
    .map((update, index) => ({ update, index, time: timestampOf(update.lastModified) }))
    .sort((a, b) => {
      if (a.time !== b.time) return a.time > b.time ? -1 : 1;
      const bySource = sourceRank(a.update.source) - sourceRank(b.update.source);
      return bySource !== 0 ? bySource : a.index - b.index;
    })
    .map((entry) => entry.update);
}
