import { Hono } from 'hono';
import { DEFAULT_UPDATE_DAYS, DEFAULT_UPDATE_RESULTS, type DocMesh } from '@docmesh/core';
import type { RecentUpdatesResponse } from '@docmesh/shared';
import { errorResponse } from '../errors.js';
import { MAX_DAYS, MAX_RESULTS_LIMIT, parseBoundedInt, parseSources } from '../params.js';
import type { GatewayEnv } from '../types.js';
import { toWireFailures, toWireSkipped, toWireUpdate } from '../wire.js';

/**
 * GET /api/updates?days=&sources=&max_results=
 */
export function createUpdateRoutes(mesh: DocMesh): Hono<GatewayEnv> {
  const updates = new Hono<GatewayEnv>();

  updates.get('/', async (c) => {
    const days = parseBoundedInt(c.req.query('days'), 'days', DEFAULT_UPDATE_DAYS, MAX_DAYS);
    if (!days.ok) return errorResponse(c, days.error);

    const maxResults = parseBoundedInt(c.req.query('max_results'), 'max_results', DEFAULT_UPDATE_RESULTS, MAX_RESULTS_LIMIT);
    if (!maxResults.ok) return errorResponse(c, maxResults.error);

    const result = await mesh.getRecentUpdates(c.get('identity'), {
      sources: parseSources(c.req.query('sources')),
      days: days.value,
      maxResults: maxResults.value,
    });
    if (!result.ok) return errorResponse(c, result.error);

    const body: RecentUpdatesResponse = {
      days: days.value,
      updates: result.value.items.map(toWireUpdate),
      total_count: result.value.items.length,
      failed_sources: toWireFailures(result.value.failures),
      skipped_sources: toWireSkipped(result.value.skipped),
      cached: result.value.cached,
    };
    return c.json(body);
  });

  return updates;
}
