/**
 * Query parameter parsing. Numeric parameters are clamped into range;
 * anything that is not an integer is rejected.
 */

import { err, ok, type AggregatorError, type Result } from '@docmesh/core';

export const MAX_RESULTS_LIMIT = 100;
export const MAX_DAYS = 30;
export const MAX_SUMMARY_LENGTH = 5000;

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export function parseBoundedInt(
  raw: string | undefined,
  field: string,
  fallback: number,
  max: number
): Result<number, AggregatorError> {
  if (raw === undefined || raw.trim() === '') return ok(fallback);

  const value = Number(raw);
  if (!Number.isInteger(value)) {
    return err({ type: 'malformed_input', field, message: `${field} must be an integer` });
  }
  return ok(clamp(value, 1, max));
}

/**
 * "gdrive, notion" -> ['gdrive', 'notion']; empty means every source
 */
export function parseSources(raw: string | undefined): string[] | undefined {
  const sources = (raw ?? '')
    .split(',')
    .map((source) => source.trim())
    .filter((source) => source.length > 0);
  return sources.length > 0 ? sources : undefined;
}
