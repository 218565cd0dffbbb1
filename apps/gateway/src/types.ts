import type { IdentityContext } from '@docmesh/core';

/**
 * Hono environment for every /api route; the auth middleware sets identity
 */
export type GatewayEnv = {
  Variables: {
    identity: IdentityContext;
  };
};
