import { Hono } from 'hono';
import type { DocMesh } from '@docmesh/core';
import { errorResponse } from '../errors.js';
import type { GatewayEnv } from '../types.js';
import { toWireDocument } from '../wire.js';

/**
 * GET /api/documents/:id, where id is "<source>:<native-id>"
 */
export function createDocumentRoutes(mesh: DocMesh): Hono<GatewayEnv> {
  const documents = new Hono<GatewayEnv>();

  documents.get('/:id', async (c) => {
    const result = await mesh.getDocument(c.req.param('id'), c.get('identity'));
    if (!result.ok) return errorResponse(c, result.error);

    return c.json(toWireDocument(result.value));
  });

  return documents;
}
