/**
 * Deterministic cache key derivation
 */

import { createHash } from 'node:crypto';

export type CacheKind = 'search' | 'document' | 'updates' | 'summarize';

export type KeyPart = string | number | readonly string[];

/**
 * Canonicalize and hash the inputs of one operation. Array values are
 * treated as sets: duplicates are dropped and members sorted, so any
 * permutation of the same set yields the same key. The caller id is a
 * required part; entries are never shared between identities.
 */
export function cacheKey(kind: CacheKind, callerId: string, parts: Record<string, KeyPart>): string {
  if (!callerId) {
    throw new Error('callerId is required for cache key generation');
  }

  const normalized: Array<[string, string | number | string[]]> = Object.keys(parts)
    .sort()
    .map((name) => {
      const value = parts[name];
      return [name, typeof value === 'string' || typeof value === 'number' ? value : Array.from(new Set(value)).sort()];
    });

  const hash = createHash('sha256')
    .update(JSON.stringify({ kind, caller: callerId, parts: normalized }))
    .digest('hex');

  return `${kind}:${hash}`;
}
