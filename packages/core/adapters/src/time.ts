import type { UpdateType } from '@docmesh/aggregator';

export const DAY_MS = 24 * 60 * 60 * 1000;

const CREATED_WINDOW_MS = 60_000;

/**
 * A record modified within a minute of its creation counts as created
 */
export function classifyUpdate(createdTime: string | undefined, modifiedTime: string | undefined): UpdateType {
  const created = createdTime ? Date.parse(createdTime) : NaN;
  const modified = modifiedTime ? Date.parse(modifiedTime) : NaN;
  if (Number.isNaN(created) || Number.isNaN(modified)) return 'modified';
  return modified - created < CREATED_WINDOW_MS ? 'created' : 'modified';
}

/**
 * Epoch ms at the start of a window of `days` ending at now
 */
export function windowStart(now: number, days: number): number {
  return now - days * DAY_MS;
}
