/**
 * @docmesh/core - one object wiring adapters, caches and the aggregator
 *
 * ```typescript
 * const mesh = new DocMesh({ mode: 'static' });
 * const identity = createIdentityContext({ userId: 'u1', email: 'u1@example.com', scopes: ['gdrive:read'] });
 * const results = await mesh.search('budget', identity, { maxResults: 5 });
 * ```
 */

import {
    AdapterRegistry,
    Aggregator,
    SOURCE_IDS,
    defaultLogger,
    systemClock,
    type AdapterRegistration,
    type AggregateCacheConfig,
    type AggregateResult,
    type AggregatorError,
    type CacheStats,
    type Clock,
    type DocumentContent,
    type IdentityContext,
    type Logger,
    type RecentUpdate,
    type Result,
    type SearchResult,
    type SourceId,
    type SummarizeOutcome,
    type Summarizer,
} from '@docmesh/aggregator';
import {
    GoogleDriveAdapter,
    NotionAdapter,
    RetryPolicy,
    StaticSourceAdapter,
    loadStaticDocuments,
    type RetryConfig,
} from '@docmesh/adapters';
import { ExtractiveSummarizer, OpenAISummarizer } from '@docmesh/summarizer';

export type AdapterMode = 'static' | 'live';

export const DEFAULT_SEARCH_RESULTS = 10;
export const DEFAULT_UPDATE_DAYS = 7;
export const DEFAULT_UPDATE_RESULTS = 20;
export const DEFAULT_SUMMARY_LENGTH = 500;

export interface DocMeshConfig {
    /** 'static' serves fixture records, 'live' calls Google Drive and Notion (default 'static') */
    mode?: AdapterMode;

    cache?: AggregateCacheConfig;

    /** Per-adapter call bound in ms */
    adapterTimeoutMs?: number;

    /** Document content cap in UTF-8 bytes */
    contentByteLimit?: number;

    /** Backoff settings for live adapters */
    retry?: Partial<RetryConfig>;

    notionApiVersion?: string;

    /** Fixture file for static mode */
    fixturesPath?: string;

    /** Use the OpenAI summarizer instead of the extractive one */
    openai?: { apiKey: string; model?: string };

    /** Replaces the built-in summarizer choice */
    summarizer?: Summarizer;

    /** Extra registrations; they replace built-ins for the same source */
    adapters?: AdapterRegistration[];

    logger?: Logger;
    clock?: Clock;
}

export interface SearchOptions {
    sources?: readonly string[];
    maxResults?: number;
}

export interface UpdatesOptions {
    sources?: readonly string[];
    days?: number;
    maxResults?: number;
}

/**
 * Built-in adapter registrations for a mode
 */
export function createDefaultRegistrations(config: DocMeshConfig = {}): AdapterRegistration[] {
    const logger = config.logger ?? defaultLogger;
    const clock = config.clock ?? systemClock;

    if ((config.mode ?? 'static') === 'static') {
        const documents = loadStaticDocuments(config.fixturesPath);
        return SOURCE_IDS.map((source) => ({
            source,
            create: () => new StaticSourceAdapter(source, documents, { clock, logger }),
            reuse: true,
        }));
    }

    const retry = new RetryPolicy(config.retry, { logger });
    return [
        {
            source: 'gdrive',
            create: (identity) => new GoogleDriveAdapter(identity, { retry, logger, clock }),
            reuse: true,
        },
        {
            source: 'notion',
            create: (identity) =>
                new NotionAdapter(identity, { apiVersion: config.notionApiVersion, retry, logger, clock }),
            reuse: true,
        },
    ];
}

/**
 * DocMesh - search, fetch, recent activity and summaries across sources
 */
export class DocMesh {
    readonly mode: AdapterMode;
    readonly aggregator: Aggregator;
    private registry: AdapterRegistry;
    private logger: Logger;

    constructor(config: DocMeshConfig = {}) {
        this.mode = config.mode ?? 'static';
        this.logger = config.logger ?? defaultLogger;

        const registrations = new Map<SourceId, AdapterRegistration>();
        for (const registration of [...createDefaultRegistrations(config), ...(config.adapters ?? [])]) {
            registrations.set(registration.source, registration);
        }
        this.registry = new AdapterRegistry([...registrations.values()]);

        const summarizer =
            config.summarizer ??
            (config.openai?.apiKey
                ? new OpenAISummarizer({ apiKey: config.openai.apiKey, model: config.openai.model, logger: this.logger })
                : new ExtractiveSummarizer());

        this.aggregator = new Aggregator({
            registry: this.registry,
            cache: config.cache,
            summarizer,
            adapterTimeoutMs: config.adapterTimeoutMs,
            contentByteLimit: config.contentByteLimit,
            logger: this.logger,
            clock: config.clock,
        });

        this.logger.info('DocMesh initialized', {
            mode: this.mode,
            sources: this.registry.sources,
            summarizer: summarizer.constructor.name,
        });
    }

    /** Sources with a registered adapter */
    get sources(): SourceId[] {
        return this.registry.sources;
    }

    search(
        query: string,
        identity: IdentityContext | null | undefined,
        options: SearchOptions = {}
    ): Promise<Result<AggregateResult<SearchResult>, AggregatorError>> {
        return this.aggregator.search(query, options.sources, options.maxResults ?? DEFAULT_SEARCH_RESULTS, identity);
    }

    getDocument(
        documentId: string,
        identity: IdentityContext | null | undefined
    ): Promise<Result<DocumentContent, AggregatorError>> {
        return this.aggregator.getDocument(documentId, identity);
    }

    getRecentUpdates(
        identity: IdentityContext | null | undefined,
        options: UpdatesOptions = {}
    ): Promise<Result<AggregateResult<RecentUpdate>, AggregatorError>> {
        return this.aggregator.getRecentUpdates(
            options.sources,
            options.days ?? DEFAULT_UPDATE_DAYS,
            options.maxResults ?? DEFAULT_UPDATE_RESULTS,
            identity
        );
    }

    summarize(
        documentIds: readonly string[],
        identity: IdentityContext | null | undefined,
        options: { maxLength?: number } = {}
    ): Promise<Result<SummarizeOutcome, AggregatorError>> {
        return this.aggregator.summarize(documentIds, options.maxLength ?? DEFAULT_SUMMARY_LENGTH, identity);
    }

    getCacheStats(): Record<'search' | 'document' | 'updates' | 'summary', CacheStats> {
        return this.aggregator.cache.getStats();
    }

    clearCache(): void {
        this.aggregator.clearCache();
        this.registry.clearInstances();
    }
}

export { SOURCE_IDS, createIdentityContext, defaultLogger, err, ok } from '@docmesh/aggregator';
export type {
    AggregateCacheConfig,
    AggregateResult,
    AggregatorError,
    DocumentContent,
    DocumentFailure,
    IdentityContext,
    Logger,
    RecentUpdate,
    Result,
    SearchResult,
    SkippedSource,
    SourceFailure,
    SourceId,
    SummarizeOutcome,
} from '@docmesh/aggregator';
