import jwt, { type JwtPayload } from 'jsonwebtoken';
import type { MiddlewareHandler } from 'hono';
import { SOURCE_IDS, createIdentityContext, type IdentityContext } from '@docmesh/core';
import { errorResponse } from '../errors.js';
import type { GatewayEnv } from '../types.js';

export interface AuthOptions {
  enabled: boolean;
  jwtSecret?: string;
}

/**
 * Caller used for every request while auth is disabled
 */
export const DEVELOPMENT_IDENTITY = createIdentityContext({
  userId: 'dev-user',
  email: 'dev@localhost',
  scopes: SOURCE_IDS.map((source) => `${source}:read`),
});

function parseScopes(claim: unknown): string[] {
  if (typeof claim === 'string') {
    return claim.split(/\s+/).filter((scope) => scope.length > 0);
  }
  if (Array.isArray(claim)) {
    return claim.filter((scope): scope is string => typeof scope === 'string');
  }
  return [];
}

/**
 * Build an identity from verified token claims; undefined when the token has no subject
 */
export function identityFromClaims(payload: string | JwtPayload, token: string): IdentityContext | undefined {
  if (typeof payload === 'string' || typeof payload.sub !== 'string' || payload.sub.length === 0) {
    return undefined;
  }

  const email: unknown = payload.email;
  const organizationId: unknown = payload.org_id;

  return createIdentityContext({
    userId: payload.sub,
    email: typeof email === 'string' ? email : '',
    accessToken: token,
    scopes: parseScopes(payload.scopes),
    organizationId: typeof organizationId === 'string' ? organizationId : undefined,
  });
}

/**
 * Bearer JWT authentication for API routes
 */
export function createAuthMiddleware(options: AuthOptions): MiddlewareHandler<GatewayEnv> {
  const secret = options.jwtSecret;
  if (options.enabled && !secret) {
    throw new Error('JWT secret is required when auth is enabled');
  }

  return async (c, next) => {
    if (!options.enabled || !secret) {
      c.set('identity', DEVELOPMENT_IDENTITY);
      await next();
      return;
    }

    const header = c.req.header('Authorization');
    if (!header || !header.startsWith('Bearer ')) {
      return errorResponse(c, { type: 'unauthenticated', message: 'Missing bearer token' });
    }

    const token = header.substring(7).trim();
    let identity: IdentityContext | undefined;
    try {
      identity = identityFromClaims(jwt.verify(token, secret), token);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return errorResponse(c, { type: 'unauthenticated', message: `Invalid token: ${reason}` });
    }

    if (!identity) {
      return errorResponse(c, { type: 'unauthenticated', message: 'Token has no subject' });
    }

    c.set('identity', identity);
    await next();
  };
}
