/**
 * Scope checks applied before any cache lookup or adapter call
 */

import type { IdentityContext, SourceId } from './types.js';

export function requiredScope(source: SourceId): string {
  return `${source}:read`;
}

export function isAllowed(identity: IdentityContext, source: SourceId): boolean {
  return identity.scopes.includes(requiredScope(source));
}

/**
 * Split sources into those the caller may read and those it may not,
 * preserving input order within each group
 */
export function partitionByPermission(
  identity: IdentityContext,
  sources: readonly SourceId[]
): { allowed: SourceId[]; denied: SourceId[] } {
  const allowed: SourceId[] = [];
  const denied: SourceId[] = [];

  for (const source of sources) {
    if (isAllowed(identity, source)) {
      allowed.push(source);
    } else {
      denied.push(source);
    }
  }

  return { allowed, denied };
}
