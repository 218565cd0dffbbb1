/**
 * Core types for the aggregation engine
 */

import type { AggregatorError, Result, SourceError } from './errors.js';

/**
 * Document sources, in canonical enumeration order
 */
export const SOURCE_IDS = ['gdrive', 'notion', 'slack', 'confluence'] as const;

export type SourceId = (typeof SOURCE_IDS)[number];

export type AccessLevel = 'owner' | 'editor' | 'viewer' | 'restricted';

export type UpdateType = 'created' | 'modified' | 'shared' | 'commented';

/**
 * Authenticated caller for the duration of one logical request.
 * Built with createIdentityContext and never mutated afterwards.
 */
export interface IdentityContext {
  readonly userId: string;
  readonly email: string;
  readonly accessToken?: string;
  readonly scopes: readonly string[];
  readonly organizationId?: string;
}

export interface SearchResult {
  /** Composite id: "<source>:<native-id>" */
  id: string;
  title: string;
  snippet: string;
  url: string;
  source: SourceId;
  /** ISO-8601 */
  lastModified: string;
  author: string;
  accessLevel: AccessLevel;
  metadata?: Record<string, unknown>;
}

export interface DocumentContent {
  id: string;
  title: string;
  content: string;
  source: SourceId;
  url: string;
  lastModified: string;
  author: string;
  metadata?: Record<string, unknown>;
}

export interface RecentUpdate {
  id: string;
  title: string;
  snippet: string;
  url: string;
  source: SourceId;
  lastModified: string;
  author: string;
  updateType: UpdateType;
  metadata?: Record<string, unknown>;
}

export interface SourceDocumentRef {
  id: string;
  title: string;
  source: SourceId;
}

export interface SummaryResult {
  summary: string;
  keyPoints: string[];
  sourceDocuments: SourceDocumentRef[];
}

/**
 * Contract every source adapter satisfies. Adapters are built for one
 * identity and report failures as values; the signal fires when the
 * aggregator gives up on the call.
 */
export interface SourceAdapter {
  readonly source: SourceId;

  search(query: string, maxResults: number, signal: AbortSignal): Promise<Result<SearchResult[], SourceError>>;

  /**
   * @param nativeId - id without the source prefix
   */
  getDocument(nativeId: string, signal: AbortSignal): Promise<Result<DocumentContent, SourceError>>;

  getRecentUpdates(days: number, signal: AbortSignal): Promise<Result<RecentUpdate[], SourceError>>;
}

/**
 * Produces a summary from already-fetched documents
 */
export interface Summarizer {
  summarize(documents: DocumentContent[], maxLength: number): Promise<SummaryResult>;
}

/**
 * Logger interface for internal tracking
 */
export interface Logger {
  debug(message: string, context?: object): void;
  info(message: string, context?: object): void;
  warn(message: string, context?: object): void;
  error(message: string, context?: object): void;
}

export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Default console logger; debug output is silent
 */
export const defaultLogger: Logger = {
  debug: () => {},
  info: (message: string, context?: object) => console.info(`[INFO] ${message}`, context ?? ''),
  warn: (message: string, context?: object) => console.warn(`[WARN] ${message}`, context ?? ''),
  error: (message: string, context?: object) => console.error(`[ERROR] ${message}`, context ?? ''),
};

export interface SourceFailure {
  source: SourceId;
  error: SourceError;
  durationMs: number;
}

export interface SkippedSource {
  source: SourceId;
  reason: 'permission_denied' | 'unsupported';
}

/**
 * Outcome of a multi-source operation. Partial failure is a normal
 * success: failed sources are listed, never thrown.
 */
export interface AggregateResult<T> {
  items: T[];
  failures: SourceFailure[];
  skipped: SkippedSource[];
  cached: boolean;
}

export interface DocumentFailure {
  id: string;
  error: AggregatorError;
}

export interface SummarizeOutcome extends SummaryResult {
  failures: DocumentFailure[];
  cached: boolean;
}

export function isSourceId(value: string): value is SourceId {
  return SOURCE_IDS.some((id) => id === value);
}

/**
 * Build an immutable identity context
 */
export function createIdentityContext(input: {
  userId: string;
  email: string;
  accessToken?: string;
  scopes?: Iterable<string>;
  organizationId?: string;
}): IdentityContext {
  return Object.freeze({
    userId: input.userId,
    email: input.email,
    accessToken: input.accessToken,
    scopes: Object.freeze(Array.from(new Set(input.scopes ?? []))),
    organizationId: input.organizationId,
  });
}

export function isAuthenticated(identity: IdentityContext | null | undefined): identity is IdentityContext {
  return !!identity && typeof identity.userId === 'string' && identity.userId.trim().length > 0;
}
