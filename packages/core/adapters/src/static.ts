/**
 * Fixture-backed adapter for development mode. Serves records from a JSON
 * file with timestamps relative to the current time, so recent-update
 * windows always have something in them.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  defaultLogger,
  err,
  isSourceId,
  ok,
  systemClock,
  toCompositeId,
  truncateSnippet,
  type AccessLevel,
  type Clock,
  type DocumentContent,
  type Logger,
  type RecentUpdate,
  type Result,
  type SearchResult,
  type SourceAdapter,
  type SourceError,
  type SourceId,
} from '@docmesh/aggregator';
import { classifyUpdate, windowStart } from './time.js';

export const SAMPLE_DOCUMENTS_PATH = fileURLToPath(new URL('../fixtures/sample-documents.json', import.meta.url));

const HOUR_MS = 60 * 60 * 1000;
const ACCESS_LEVELS: readonly AccessLevel[] = ['owner', 'editor', 'viewer', 'restricted'];

export interface StaticDocument {
  source: SourceId;
  id: string;
  title: string;
  content: string;
  description?: string;
  url: string;
  author: string;
  accessLevel: AccessLevel;
  createdHoursAgo: number;
  modifiedHoursAgo: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(record: Record<string, unknown>, key: string, where: string): string {
  const value = record[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`${where}.${key} must be a non-empty string`);
  }
  return value;
}

function requireHours(record: Record<string, unknown>, key: string, where: string): number {
  const value = record[key];
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new Error(`${where}.${key} must be a non-negative number`);
  }
  return value;
}

function parseDocument(value: unknown, index: number): StaticDocument {
  const where = `documents[${index}]`;
  if (!isRecord(value)) {
    throw new Error(`${where} must be an object`);
  }

  const source = requireString(value, 'source', where);
  if (!isSourceId(source)) {
    throw new Error(`${where}.source "${source}" is not a known source`);
  }

  const accessLevel = ACCESS_LEVELS.find((level) => level === value.accessLevel);
  if (!accessLevel) {
    throw new Error(`${where}.accessLevel must be one of ${ACCESS_LEVELS.join(', ')}`);
  }

  const description = value.description;
  if (description !== undefined && typeof description !== 'string') {
    throw new Error(`${where}.description must be a string`);
  }

  return {
    source,
    id: requireString(value, 'id', where),
    title: requireString(value, 'title', where),
    content: requireString(value, 'content', where),
    description,
    url: requireString(value, 'url', where),
    author: requireString(value, 'author', where),
    accessLevel,
    createdHoursAgo: requireHours(value, 'createdHoursAgo', where),
    modifiedHoursAgo: requireHours(value, 'modifiedHoursAgo', where),
  };
}

/**
 * Validate a parsed fixture file
 */
export function parseStaticDocuments(raw: unknown): StaticDocument[] {
  if (!isRecord(raw) || !Array.isArray(raw.documents)) {
    throw new Error('Fixture file must contain a "documents" array');
  }
  return raw.documents.map((entry, index) => parseDocument(entry, index));
}

export function loadStaticDocuments(path: string = SAMPLE_DOCUMENTS_PATH): StaticDocument[] {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return parseStaticDocuments(raw);
}

export interface StaticSourceAdapterOptions {
  clock?: Clock;
  logger?: Logger;
}

export class StaticSourceAdapter implements SourceAdapter {
  private documents: StaticDocument[];
  private clock: Clock;
  private logger: Logger;

  constructor(
    readonly source: SourceId,
    documents: readonly StaticDocument[],
    options: StaticSourceAdapterOptions = {}
  ) {
    this.documents = documents.filter((doc) => doc.source === source);
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? defaultLogger;
  }

  async search(query: string, maxResults: number, _signal: AbortSignal): Promise<Result<SearchResult[], SourceError>> {
    const needle = query.trim().toLowerCase();
    const matches = this.documents.filter(
      (doc) => doc.title.toLowerCase().includes(needle) || doc.content.toLowerCase().includes(needle)
    );

    this.logger.debug('Static search completed', { source: this.source, query, count: matches.length });

    return ok(
      matches.slice(0, Math.max(maxResults, 0)).map((doc) => ({
        id: toCompositeId(this.source, doc.id),
        title: doc.title,
        snippet: truncateSnippet(doc.description ?? doc.content),
        url: doc.url,
        source: this.source,
        lastModified: this.hoursAgo(doc.modifiedHoursAgo),
        author: doc.author,
        accessLevel: doc.accessLevel,
      }))
    );
  }

  async getDocument(nativeId: string, _signal: AbortSignal): Promise<Result<DocumentContent, SourceError>> {
    const doc = this.documents.find((candidate) => candidate.id === nativeId);
    if (!doc) {
      return err({ type: 'not_found', message: `Not found: ${this.source} document ${nativeId}`, id: nativeId });
    }
    if (doc.accessLevel === 'restricted') {
      return err({ type: 'access_denied', message: `Access denied: ${this.source} document ${nativeId}`, id: nativeId });
    }

    return ok({
      id: toCompositeId(this.source, doc.id),
      title: doc.title,
      content: doc.content,
      source: this.source,
      url: doc.url,
      lastModified: this.hoursAgo(doc.modifiedHoursAgo),
      author: doc.author,
    });
  }

  async getRecentUpdates(days: number, _signal: AbortSignal): Promise<Result<RecentUpdate[], SourceError>> {
    const cutoff = windowStart(this.clock.now(), days);

    return ok(
      this.documents
        .filter((doc) => this.clock.now() - doc.modifiedHoursAgo * HOUR_MS >= cutoff)
        .map((doc) => {
          const lastModified = this.hoursAgo(doc.modifiedHoursAgo);
          const updateType = classifyUpdate(this.hoursAgo(doc.createdHoursAgo), lastModified);
          return {
            id: toCompositeId(this.source, doc.id),
            title: doc.title,
            snippet: truncateSnippet(doc.description ?? doc.content),
            url: doc.url,
            source: this.source,
            lastModified,
            author: doc.author,
            updateType,
          };
        })
    );
  }

  private hoursAgo(hours: number): string {
    return new Date(this.clock.now() - hours * HOUR_MS).toISOString();
  }
}
