/**
 * Google Drive adapter backed by the Drive v3 REST API.
 *
 * Calls are made with the caller's own bearer token, so Drive applies the
 * caller's file-level permissions on top of the scope check done by the
 * aggregator.
 */

import axios, { type AxiosInstance } from 'axios';
import {
  defaultLogger,
  err,
  ok,
  systemClock,
  toCompositeId,
  truncateSnippet,
  type AccessLevel,
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

export const GOOGLE_DRIVE_API_URL = 'https://www.googleapis.com/drive/v3';

const SEARCH_FIELDS = 'files(id,name,description,webViewLink,modifiedTime,owners,mimeType)';
const DOCUMENT_FIELDS = 'id,name,description,webViewLink,modifiedTime,owners,mimeType';
const UPDATE_FIELDS = 'files(id,name,description,webViewLink,modifiedTime,createdTime,owners,lastModifyingUser)';
const UPDATES_PAGE_SIZE = 50;

/** Google Workspace types and the format they are exported as */
const EXPORT_FORMATS: Record<string, string> = {
  'application/vnd.google-apps.document': 'text/plain',
  'application/vnd.google-apps.spreadsheet': 'text/csv',
  'application/vnd.google-apps.presentation': 'text/plain',
};

const DOWNLOADABLE_TYPES = new Set(['text/plain', 'text/markdown', 'text/csv']);

interface DriveUser {
  displayName?: string;
  emailAddress?: string;
  me?: boolean;
}

export interface DriveFile {
  id?: string;
  name?: string;
  description?: string;
  webViewLink?: string;
  mimeType?: string;
  modifiedTime?: string;
  createdTime?: string;
  owners?: DriveUser[];
  lastModifyingUser?: DriveUser;
}

interface DriveFileList {
  files?: DriveFile[];
}

export interface GoogleDriveAdapterConfig {
  baseUrl?: string;
  /** Prepared HTTP client; one is created per adapter otherwise */
  client?: AxiosInstance;
  retry?: RetryPolicy;
  logger?: Logger;
  clock?: Clock;
}

/**
 * Escape a term for use inside a single-quoted Drive query string
 */
export function escapeDriveQuery(term: string): string {
  return term.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

export function buildDriveSearchQuery(query: string): string {
  const term = escapeDriveQuery(query);
  return `(fullText contains '${term}' or name contains '${term}') and trashed=false`;
}

export class GoogleDriveAdapter implements SourceAdapter {
  readonly source = 'gdrive' as const;

  private client: AxiosInstance;
  private retry: RetryPolicy;
  private logger: Logger;
  private clock: Clock;

  constructor(private identity: IdentityContext, config: GoogleDriveAdapterConfig = {}) {
    this.logger = config.logger ?? defaultLogger;
    this.clock = config.clock ?? systemClock;
    this.retry = config.retry ?? new RetryPolicy({}, { logger: this.logger });
    this.client =
      config.client ??
      axios.create({
        baseURL: config.baseUrl ?? GOOGLE_DRIVE_API_URL,
        timeout: 10_000,
      });
  }

  async search(query: string, maxResults: number, signal: AbortSignal): Promise<Result<SearchResult[], SourceError>> {
    const headers = this.authHeaders();
    if (!headers.ok) return headers;

    return this.retry.execute(
      async () => {
        try {
          const response = await this.client.get<DriveFileList>('/files', {
            params: {
              q: buildDriveSearchQuery(query),
              fields: SEARCH_FIELDS,
              pageSize: Math.min(Math.max(maxResults, 1), 100),
              orderBy: 'modifiedTime desc',
            },
            headers: headers.value,
            signal,
          });

          const results = (response.data.files ?? []).flatMap((file) => this.toSearchResult(file));
          this.logger.debug('Google Drive search completed', { query, count: results.length });
          return ok(results);
        } catch (error) {
          return err(mapHttpError(error, 'Google Drive search'));
        }
      },
      signal,
      'gdrive.search'
    );
  }

  async getDocument(nativeId: string, signal: AbortSignal): Promise<Result<DocumentContent, SourceError>> {
    const headers = this.authHeaders();
    if (!headers.ok) return headers;

    const path = `/files/${encodeURIComponent(nativeId)}`;
    const subject = `Google Drive document ${nativeId}`;

    return this.retry.execute(
      async () => {
        let file: DriveFile;
        try {
          const response = await this.client.get<DriveFile>(path, {
            params: { fields: DOCUMENT_FIELDS },
            headers: headers.value,
            signal,
          });
          file = response.data;
        } catch (error) {
          return err(mapHttpError(error, subject));
        }

        const content = await this.fetchContent(path, file.mimeType ?? '', headers.value, signal, subject);
        if (!content.ok) return content;

        return ok({
          id: toCompositeId('gdrive', file.id ?? nativeId),
          title: file.name || 'Untitled',
          content: content.value,
          source: 'gdrive',
          url: file.webViewLink ?? '',
          lastModified: file.modifiedTime ?? this.nowIso(),
          author: file.owners?.[0]?.displayName ?? 'Unknown',
          metadata: { mimeType: file.mimeType },
        });
      },
      signal,
      'gdrive.getDocument'
    );
  }

  async getRecentUpdates(days: number, signal: AbortSignal): Promise<Result<RecentUpdate[], SourceError>> {
    const headers = this.authHeaders();
    if (!headers.ok) return headers;

    const cutoff = new Date(windowStart(this.clock.now(), days)).toISOString();

    return this.retry.execute(
      async () => {
        try {
          const response = await this.client.get<DriveFileList>('/files', {
            params: {
              q: `modifiedTime >= '${cutoff}' and trashed=false`,
              fields: UPDATE_FIELDS,
              pageSize: UPDATES_PAGE_SIZE,
              orderBy: 'modifiedTime desc',
            },
            headers: headers.value,
            signal,
          });

          return ok((response.data.files ?? []).flatMap((file) => this.toRecentUpdate(file)));
        } catch (error) {
          return err(mapHttpError(error, 'Google Drive recent updates'));
        }
      },
      signal,
      'gdrive.getRecentUpdates'
    );
  }

  /**
   * Export Workspace documents, download plain text, describe anything else
   */
  private async fetchContent(
    path: string,
    mimeType: string,
    headers: Record<string, string>,
    signal: AbortSignal,
    subject: string
  ): Promise<Result<string, SourceError>> {
    const exportFormat = EXPORT_FORMATS[mimeType];
    if (!exportFormat && !DOWNLOADABLE_TYPES.has(mimeType)) {
      return ok(`Unsupported file type: ${mimeType}`);
    }

    try {
      const response = exportFormat
        ? await this.client.get<string>(`${path}/export`, {
            params: { mimeType: exportFormat },
            headers,
            responseType: 'text',
            signal,
          })
        : await this.client.get<string>(path, {
            params: { alt: 'media' },
            headers,
            responseType: 'text',
            signal,
          });
      return ok(String(response.data));
    } catch (error) {
      const mapped = mapHttpError(error, subject);
      if (mapped.type === 'transient') return err(mapped);

      this.logger.warn('Could not extract document content', { subject, mimeType, error: mapped.message });
      return ok(`Content not available for ${mimeType} files`);
    }
  }

  private toSearchResult(file: DriveFile): SearchResult[] {
    if (!file.id) return [];

    const owners = file.owners ?? [];
    const accessLevel: AccessLevel = owners.some((owner) => owner.me === true) ? 'owner' : 'viewer';
    const name = file.name || 'Untitled';

    return [
      {
        id: toCompositeId('gdrive', file.id),
        title: name,
        snippet: truncateSnippet(file.description || `Document: ${name} - ${file.mimeType ?? 'Unknown type'}`),
        url: file.webViewLink ?? '',
        source: 'gdrive',
        lastModified: file.modifiedTime ?? this.nowIso(),
        author: owners[0]?.displayName ?? 'Unknown',
        accessLevel,
      },
    ];
  }

  private toRecentUpdate(file: DriveFile): RecentUpdate[] {
    if (!file.id) return [];

    const name = file.name || 'Untitled';
    const updateType = classifyUpdate(file.createdTime, file.modifiedTime);
    const action = updateType === 'created' ? 'Created' : 'Modified';

    return [
      {
        id: toCompositeId('gdrive', file.id),
        title: name,
        snippet: truncateSnippet(file.description || `${action} document: ${name}`),
        url: file.webViewLink ?? '',
        source: 'gdrive',
        lastModified: file.modifiedTime ?? this.nowIso(),
        author: file.lastModifyingUser?.displayName ?? 'Unknown',
        updateType,
      },
    ];
  }

  private authHeaders(): Result<Record<string, string>, SourceError> {
    if (!this.identity.accessToken) {
      return err({ type: 'permanent', message: 'No Google Drive access token for caller' });
    }
    return ok({ Authorization: `Bearer ${this.identity.accessToken}` });
  }

  private nowIso(): string {
    return new Date(this.clock.now()).toISOString();
  }
}
