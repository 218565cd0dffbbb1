import { Hono } from 'hono';
import { DEFAULT_SUMMARY_LENGTH, err, ok, type AggregatorError, type DocMesh, type Result } from '@docmesh/core';
import type { SummarizeRequest, SummarizeResponse } from '@docmesh/shared';
import { errorResponse } from '../errors.js';
import { MAX_SUMMARY_LENGTH, clamp } from '../params.js';
import type { GatewayEnv } from '../types.js';
import { toWireFailedDocuments } from '../wire.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseSummarizeRequest(body: unknown): Result<Required<SummarizeRequest>, AggregatorError> {
  if (!isRecord(body)) {
    return err({ type: 'malformed_input', field: 'body', message: 'Request body must be a JSON object' });
  }

  const ids = body.document_ids;
  if (!Array.isArray(ids) || !ids.every((id): id is string => typeof id === 'string')) {
    return err({ type: 'malformed_input', field: 'document_ids', message: 'document_ids must be an array of strings' });
  }

  const maxLength = body.max_length;
  if (maxLength === undefined) {
    return ok({ document_ids: ids, max_length: DEFAULT_SUMMARY_LENGTH });
  }
  if (typeof maxLength !== 'number' || !Number.isInteger(maxLength)) {
    return err({ type: 'malformed_input', field: 'max_length', message: 'max_length must be an integer' });
  }
  return ok({ document_ids: ids, max_length: clamp(maxLength, 1, MAX_SUMMARY_LENGTH) });
}

/**
 * POST /api/summarize { document_ids, max_length? }
 */
export function createSummarizeRoutes(mesh: DocMesh): Hono<GatewayEnv> {
  const summarize = new Hono<GatewayEnv>();

  summarize.post('/', async (c) => {
    let raw: unknown;
    try {
      raw = await c.req.json();
    } catch {
      return errorResponse(c, { type: 'malformed_input', field: 'body', message: 'Request body must be valid JSON' });
    }

    const request = parseSummarizeRequest(raw);
    if (!request.ok) return errorResponse(c, request.error);

    const result = await mesh.summarize(request.value.document_ids, c.get('identity'), {
      maxLength: request.value.max_length,
    });
    if (!result.ok) return errorResponse(c, result.error);

    const body: SummarizeResponse = {
      summary: result.value.summary,
      key_points: result.value.keyPoints,
      source_documents: result.value.sourceDocuments,
      failed_documents: toWireFailedDocuments(result.value.failures),
      cached: result.value.cached,
    };
    return c.json(body);
  });

  return summarize;
}
