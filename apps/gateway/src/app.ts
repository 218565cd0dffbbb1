/**
 * HTTP gateway over the DocMesh facade
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger as requestLogger } from 'hono/logger';
import { defaultLogger, type DocMesh, type Logger } from '@docmesh/core';
import type { ErrorResponse, HealthResponse } from '@docmesh/shared';
import { createAuthMiddleware, type AuthOptions } from './middleware/auth.js';
import { createDocumentRoutes } from './routes/documents.js';
import { createSearchRoutes } from './routes/search.js';
import { createSummarizeRoutes } from './routes/summarize.js';
import { createUpdateRoutes } from './routes/updates.js';
import type { GatewayEnv } from './types.js';

export const VERSION = '0.1.0';

export interface AppDependencies {
  mesh: DocMesh;
  auth: AuthOptions;
  logger?: Logger;
  /** Per-request access log (default true) */
  requestLogging?: boolean;
}

export function createApp(deps: AppDependencies): Hono<GatewayEnv> {
  const log = deps.logger ?? defaultLogger;
  const app = new Hono<GatewayEnv>();

  if (deps.requestLogging ?? true) {
    app.use('*', requestLogger());
  }
  app.use('*', cors({
    origin: '*',
    allowMethods: ['GET', 'POST', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'Authorization'],
  }));

  app.use('/api/*', createAuthMiddleware(deps.auth));

  app.get('/health', (c) => {
    const body: HealthResponse = {
      status: 'healthy',
      version: VERSION,
      timestamp: new Date().toISOString(),
    };
    return c.json(body);
  });

  app.route('/api/search', createSearchRoutes(deps.mesh));
  app.route('/api/documents', createDocumentRoutes(deps.mesh));
  app.route('/api/updates', createUpdateRoutes(deps.mesh));
  app.route('/api/summarize', createSummarizeRoutes(deps.mesh));

  app.notFound((c) => {
    const body: ErrorResponse = { error: { type: 'not_found', message: `Route not found: ${c.req.method} ${c.req.path}` } };
    return c.json(body, 404);
  });

  app.onError((error, c) => {
    log.error('Unhandled gateway error', { path: c.req.path, error: error.message });
    const body: ErrorResponse = { error: { type: 'internal', message: 'Internal server error' } };
    return c.json(body, 500);
  });

  return app;
}
