/**
 * Core error to HTTP response mapping
 */

import type { Context } from 'hono';
import type { AggregatorError } from '@docmesh/core';
import type { ErrorResponse } from '@docmesh/shared';

export type ErrorStatus = 400 | 401 | 403 | 404 | 500 | 502;

export function statusFor(error: AggregatorError): ErrorStatus {
  switch (error.type) {
    case 'unauthenticated':
      return 401;
    case 'malformed_input':
    case 'unsupported_source':
      return 400;
    case 'permission_denied':
    case 'access_denied':
      return 403;
    case 'not_found':
      return 404;
    case 'source_unavailable':
    case 'summarizer_error':
      return 502;
    case 'internal':
      return 500;
  }
}

export function errorBody(error: AggregatorError): ErrorResponse {
  return {
    error: {
      type: error.type,
      message: error.message,
      ...(error.type === 'malformed_input' ? { field: error.field } : {}),
    },
  };
}

export function errorResponse(c: Context, error: AggregatorError): Response {
  return c.json(errorBody(error), statusFor(error));
}
