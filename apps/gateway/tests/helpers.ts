import { vi } from 'vitest';
import { DocMesh } from '@docmesh/core';
import { createApp } from '../src/app.js';
import type { AuthOptions } from '../src/middleware/auth.js';

export const NOW = '2024-05-10T12:00:00.000Z';

export function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/**
 * Gateway over static fixtures with a frozen clock
 */
export function createTestApp(auth: AuthOptions = { enabled: false }) {
  const logger = createLogger();
  const mesh = new DocMesh({ mode: 'static', clock: { now: () => Date.parse(NOW) }, logger });
  const app = createApp({ mesh, auth, logger, requestLogging: false });
  return { app, mesh, logger };
}
