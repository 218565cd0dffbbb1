/**
 * Gateway entry point
 */

import 'dotenv/config';
import { pathToFileURL } from 'node:url';
import { serve } from '@hono/node-server';
import { DocMesh } from '@docmesh/core';
import { createApp } from './app.js';
import { loadConfig } from './config.js';

export { createApp, VERSION, type AppDependencies } from './app.js';
export { loadConfig, type GatewayConfig } from './config.js';

// Start server only if run directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  const config = loadConfig();
  const mesh = new DocMesh(config.mesh);
  const app = createApp({ mesh, auth: config.auth });

  console.log(`Starting docmesh gateway on port ${config.port}...`);

  serve({
    fetch: app.fetch,
    port: config.port,
  }, (info) => {
    console.log(`✓ docmesh gateway running at http://localhost:${info.port}`);
    console.log(`  Adapters: ${config.mesh.mode ?? 'static'} (${mesh.sources.join(', ')})`);
    console.log(`  Auth: ${config.auth.enabled ? 'JWT' : 'disabled (development identity)'}`);
  });
}
