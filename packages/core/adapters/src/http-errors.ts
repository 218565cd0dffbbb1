/**
 * Translate HTTP client failures into source errors
 */

import { isAxiosError } from 'axios';
import { describeError, type SourceError } from '@docmesh/aggregator';

/**
 * Map an error thrown by an axios call. `subject` names what was being
 * fetched, e.g. "Google Drive document abc".
 */
export function mapHttpError(error: unknown, subject: string): SourceError {
  if (!isAxiosError(error)) {
    return { type: 'permanent', message: `${subject} failed: ${describeError(error)}`, cause: error };
  }

  const status = error.response?.status;
  if (status === undefined) {
    return { type: 'transient', message: `${subject} failed: ${error.message}`, cause: error };
  }

  if (status === 404) {
    return { type: 'not_found', message: `Not found: ${subject}` };
  }
  if (status === 403) {
    return { type: 'access_denied', message: `Access denied: ${subject}` };
  }
  if (status === 401) {
    return { type: 'permanent', message: `Authentication failed: ${subject}`, cause: error };
  }
  if (status === 429 || status >= 500) {
    return { type: 'transient', message: `${subject} failed with status ${status}`, cause: error };
  }

  return { type: 'permanent', message: `${subject} failed with status ${status}`, cause: error };
}
