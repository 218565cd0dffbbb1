/**
 * Notion adapter backed by the public REST API
 */

import axios, { type AxiosInstance } from 'axios';
import {
  defaultLogger,
  err,
  ok,
  systemClock,
  toCompositeId,
  truncateSnippet,
  type Clock,
  type DocumentContent,
  type IdentityContext,
  type Logger,
  type RecentUpdate,
  type Result,
  type SearchResult,
  type SourceAdapter,
  type SourceError,
} from '@docmesh/aggregator';
import { mapHttpError } from './http-errors.js';
import { RetryPolicy } from './retry.js';
import { classifyUpdate, windowStart } from './time.js';

export const NOTION_API_URL = 'https://api.notion.com/v1';
export const DEFAULT_NOTION_VERSION = '2022-06-28';

const UPDATES_PAGE_SIZE = 50;
const BLOCK_PAGE_SIZE = 100;

interface RichText {
  plain_text?: string;
}

interface NotionUser {
  id?: string;
  name?: string;
}

export interface NotionPage {
  object?: string;
  id?: string;
  url?: string;
  created_time?: string;
  last_edited_time?: string;
  created_by?: NotionUser;
  last_edited_by?: NotionUser;
  properties?: Record<string, { type?: string; title?: RichText[] }>;
}

interface NotionList<T> {
  results?: T[];
}

/**
 * Blocks carry their text under a key named after the block type
 */
type NotionBlock = { type?: string } & Record<string, unknown>;

export interface NotionAdapterConfig {
  baseUrl?: string;
  /** Value for the Notion-Version header */
  apiVersion?: string;
  client?: AxiosInstance;
  retry?: RetryPolicy;
  logger?: Logger;
  clock?: Clock;
}

export function pageTitle(page: NotionPage): string {
  for (const property of Object.values(page.properties ?? {})) {
    if (property.type === 'title') {
      const title = plainText(property.title);
      if (title) return title;
    }
  }
  return 'Untitled';
}

function plainText(parts: RichText[] | undefined): string {
  return (parts ?? []).map((part) => part.plain_text ?? '').join('');
}

function isRichTextList(value: unknown): value is RichText[] {
  return Array.isArray(value) && value.every((part) => typeof part === 'object' && part !== null);
}

/**
 * Plain text of one block, or '' for blocks without rich text
 */
export function blockText(block: NotionBlock): string {
  if (!block.type) return '';
  const body = block[block.type];
  if (typeof body !== 'object' || body === null || !('rich_text' in body)) return '';
  return isRichTextList(body.rich_text) ? plainText(body.rich_text) : '';
}

export class NotionAdapter implements SourceAdapter {
  readonly source = 'notion' as const;

  private client: AxiosInstance;
  private apiVersion: string;
  private retry: RetryPolicy;
  private logger: Logger;
  private clock: Clock;

  constructor(private identity: IdentityContext, config: NotionAdapterConfig = {}) {
    this.logger = config.logger ?? defaultLogger;
    this.clock = config.clock ?? systemClock;
    this.apiVersion = config.apiVersion ?? DEFAULT_NOTION_VERSION;
    this.retry = config.retry ?? new RetryPolicy({}, { logger: this.logger });
    this.client =
      config.client ??
      axios.create({
        baseURL: config.baseUrl ?? NOTION_API_URL,
        timeout: 10_000,
      });
  }

  async search(query: string, maxResults: number, signal: AbortSignal): Promise<Result<SearchResult[], SourceError>> {
    const headers = this.authHeaders();
    if (!headers.ok) return headers;

    return this.retry.execute(
      async () => {
        try {
          const response = await this.client.post<NotionList<NotionPage>>(
            '/search',
            {
              query,
              filter: { property: 'object', value: 'page' },
              page_size: Math.min(Math.max(maxResults, 1), 100),
            },
            { headers: headers.value, signal }
          );

          const results = (response.data.results ?? []).flatMap((page) => this.toSearchResult(page));
          this.logger.debug('Notion search completed', { query, count: results.length });
          return ok(results);
        } catch (error) {
          return err(mapHttpError(error, 'Notion search'));
        }
      },
      signal,
      'notion.search'
    );
  }

  async getDocument(nativeId: string, signal: AbortSignal): Promise<Result<DocumentContent, SourceError>> {
    const headers = this.authHeaders();
    if (!headers.ok) return headers;

    const pageId = encodeURIComponent(nativeId);

    return this.retry.execute(
      async () => {
        try {
          const [page, blocks] = await Promise.all([
            this.client.get<NotionPage>(`/pages/${pageId}`, { headers: headers.value, signal }),
            this.client.get<NotionList<NotionBlock>>(`/blocks/${pageId}/children`, {
              params: { page_size: BLOCK_PAGE_SIZE },
              headers: headers.value,
              signal,
            }),
          ]);

          const content = (blocks.data.results ?? [])
            .map((block) => blockText(block))
            .filter((line) => line.length > 0)
            .join('\n');

          return ok({
            id: toCompositeId('notion', page.data.id ?? nativeId),
            title: pageTitle(page.data),
            content,
            source: 'notion',
            url: page.data.url ?? '',
            lastModified: page.data.last_edited_time ?? this.nowIso(),
            author: authorOf(page.data),
          });
        } catch (error) {
          return err(mapHttpError(error, `Notion page ${nativeId}`));
        }
      },
      signal,
      'notion.getDocument'
    );
  }

  async getRecentUpdates(days: number, signal: AbortSignal): Promise<Result<RecentUpdate[], SourceError>> {
    const headers = this.authHeaders();
    if (!headers.ok) return headers;

    const cutoff = windowStart(this.clock.now(), days);

    return this.retry.execute(
      async () => {
        try {
          const response = await this.client.post<NotionList<NotionPage>>(
            '/search',
            {
              filter: { property: 'object', value: 'page' },
              sort: { direction: 'descending', timestamp: 'last_edited_time' },
              page_size: UPDATES_PAGE_SIZE,
            },
            { headers: headers.value, signal }
          );

          const updates = (response.data.results ?? [])
            .filter((page) => {
              const edited = page.last_edited_time ? Date.parse(page.last_edited_time) : NaN;
              return !Number.isNaN(edited) && edited >= cutoff;
            })
            .flatMap((page) => this.toRecentUpdate(page));
          return ok(updates);
        } catch (error) {
          return err(mapHttpError(error, 'Notion recent updates'));
        }
      },
      signal,
      'notion.getRecentUpdates'
    );
  }

  private toSearchResult(page: NotionPage): SearchResult[] {
    if (!page.id) return [];
    const title = pageTitle(page);

    return [
      {
        id: toCompositeId('notion', page.id),
        title,
        snippet: truncateSnippet(`Page: ${title}`),
        url: page.url ?? '',
        source: 'notion',
        lastModified: page.last_edited_time ?? this.nowIso(),
        author: authorOf(page),
        accessLevel: 'viewer',
      },
    ];
  }

  private toRecentUpdate(page: NotionPage): RecentUpdate[] {
    if (!page.id) return [];
    const title = pageTitle(page);
    const updateType = classifyUpdate(page.created_time, page.last_edited_time);

    return [
      {
        id: toCompositeId('notion', page.id),
        title,
        snippet: truncateSnippet(`${updateType === 'created' ? 'Created' : 'Edited'} page: ${title}`),
        url: page.url ?? '',
        source: 'notion',
        lastModified: page.last_edited_time ?? this.nowIso(),
        author: page.last_edited_by?.name ?? authorOf(page),
        updateType,
      },
    ];
  }

  private authHeaders(): Result<Record<string, string>, SourceError> {
    if (!this.identity.accessToken) {
      return err({ type: 'permanent', message: 'No Notion access token for caller' });
    }
    return ok({
      Authorization: `Bearer ${this.identity.accessToken}`,
      'Notion-Version': this.apiVersion,
    });
  }

  private nowIso(): string {
    return new Date(this.clock.now()).toISOString();
  }
}

function authorOf(page: NotionPage): string {
  return page.created_by?.name ?? 'Unknown';
}
