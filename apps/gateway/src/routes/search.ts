import { Hono } from 'hono';
import { DEFAULT_SEARCH_RESULTS, type DocMesh } from '@docmesh/core';
import type { SearchResponse } from '@docmesh/shared';
import { errorResponse } from '../errors.js';
import { MAX_RESULTS_LIMIT, parseBoundedInt, parseSources } from '../params.js';
import type { GatewayEnv } from '../types.js';
import { toWireFailures, toWireSearchResult, toWireSkipped } from '../wire.js';

/**
 * GET /api/search?q=&sources=&max_results=
 */
export function createSearchRoutes(mesh: DocMesh): Hono<GatewayEnv> {
  const search = new Hono<GatewayEnv>();

  search.get('/', async (c) => {
    const maxResults = parseBoundedInt(c.req.query('max_results'), 'max_results', DEFAULT_SEARCH_RESULTS, MAX_RESULTS_LIMIT);
    if (!maxResults.ok) return errorResponse(c, maxResults.error);

    const query = c.req.query('q') ?? '';
    const result = await mesh.search(query, c.get('identity'), {
      sources: parseSources(c.req.query('sources')),
      maxResults: maxResults.value,
    });
    if (!result.ok) return errorResponse(c, result.error);

    const body: SearchResponse = {
      query: query.trim(),
      results: result.value.items.map(toWireSearchResult),
      total_count: result.value.items.length,
      failed_sources: toWireFailures(result.value.failures),
      skipped_sources: toWireSkipped(result.value.skipped),
      cached: result.value.cached,
    };
    return c.json(body);
  });

  return search;
}
