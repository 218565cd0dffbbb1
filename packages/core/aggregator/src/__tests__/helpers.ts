/**
 * Test doubles for the aggregation engine
 */

import { vi, type Mock } from 'vitest';
import type { SourceError, Result } from '../errors.js';
import {
  createIdentityContext,
  type DocumentContent,
  type IdentityContext,
  type Logger,
  type RecentUpdate,
  type SearchResult,
  type SourceAdapter,
  type SourceId,
} from '../types.js';

export type Behaviour<T> =
  | { kind: 'value'; value: T }
  | { kind: 'error'; error: SourceError }
  | { kind: 'throw'; message: string }
  | { kind: 'hang' };

export interface MockAdapterOptions {
  search?: Behaviour<SearchResult[]>;
  document?: Behaviour<DocumentContent>;
  updates?: Behaviour<RecentUpdate[]>;
  /** Delay before resolving, in ms */
  delayMs?: number;
}

/**
 * In-process adapter with call counters
 */
export class MockAdapter implements SourceAdapter {
  calls = { search: 0, document: 0, updates: 0 };
  lastSignal?: AbortSignal;

  constructor(public readonly source: SourceId, public options: MockAdapterOptions = {}) {}

  async search(_query: string, _maxResults: number, signal: AbortSignal): Promise<Result<SearchResult[], SourceError>> {
    this.calls.search++;
    return this.respond(this.options.search ?? { kind: 'value', value: [] }, signal);
  }

  async getDocument(nativeId: string, signal: AbortSignal): Promise<Result<DocumentContent, SourceError>> {
    this.calls.document++;
    return this.respond(
      this.options.document ?? { kind: 'value', value: makeDocument(this.source, nativeId) },
      signal
    );
  }

  async getRecentUpdates(_days: number, signal: AbortSignal): Promise<Result<RecentUpdate[], SourceError>> {
    this.calls.updates++;
    return this.respond(this.options.updates ?? { kind: 'value', value: [] }, signal);
  }

  private async respond<T>(behaviour: Behaviour<T>, signal: AbortSignal): Promise<Result<T, SourceError>> {
    this.lastSignal = signal;
    if (this.options.delayMs) {
      await new Promise((resolve) => setTimeout(resolve, this.options.delayMs));
    }

    switch (behaviour.kind) {
      case 'value':
        return { ok: true, value: behaviour.value };
      case 'error':
        return { ok: false, error: behaviour.error };
      case 'throw':
        throw new Error(behaviour.message);
      case 'hang':
        return new Promise<Result<T, SourceError>>(() => {});
    }
  }
}

export function makeResult(source: SourceId, nativeId: string, overrides: Partial<SearchResult> = {}): SearchResult {
  return {
    id: `${source}:${nativeId}`,
    title: `${source} ${nativeId}`,
    snippet: `Snippet for ${nativeId}`,
    url: `https://${source}.example.com/${nativeId}`,
    source,
    lastModified: '2024-05-01T10:00:00.000Z',
    author: 'Test Author',
    accessLevel: 'viewer',
    ...overrides,
  };
}

export function makeUpdate(source: SourceId, nativeId: string, lastModified: string): RecentUpdate {
  return {
    id: `${source}:${nativeId}`,
    title: `${source} ${nativeId}`,
    snippet: `Update for ${nativeId}`,
    url: `https://${source}.example.com/${nativeId}`,
    source,
    lastModified,
    author: 'Test Author',
    updateType: 'modified',
  };
}

export function makeDocument(source: SourceId, nativeId: string, content = `Content of ${nativeId}`): DocumentContent {
  return {
    id: `${source}:${nativeId}`,
    title: `Document ${nativeId}`,
    content,
    source,
    url: `https://${source}.example.com/${nativeId}`,
    lastModified: '2024-05-01T10:00:00.000Z',
    author: 'Test Author',
  };
}

export function makeIdentity(scopes: string[], userId = 'user-1'): IdentityContext {
  return createIdentityContext({
    userId,
    email: `${userId}@example.com`,
    accessToken: 'test-token',
    scopes,
  });
}

export function createMockLogger(): Logger & Record<keyof Logger, Mock> {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/**
 * Manually advanced clock
 */
export class FakeClock {
  constructor(private current = 1_700_000_000_000) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}
