/**
 * Aggregator - fans one request out to the permitted source adapters,
 * merges what comes back and memoizes it per caller
 */

import { AggregateCache, type AggregateCacheConfig, type CachedSummary } from './cache/aggregate-cache.js';
import { cacheKey } from './cache/keys.js';
import { AggregatorError, Result, SourceError, describeError, err, ok } from './errors.js';
import {
  DEFAULT_CONTENT_BYTE_LIMIT,
  canonicalSources,
  parseCompositeId,
  sortUpdatesByRecency,
  toCompositeId,
  truncateUtf8,
} from './merge.js';
import { partitionByPermission, isAllowed, requiredScope } from './permissions.js';
import type { AdapterRegistry } from './registry.js';
import { SingleFlight } from './single-flight.js';
import {
  AggregateResult,
  Clock,
  DocumentContent,
  DocumentFailure,
  IdentityContext,
  Logger,
  RecentUpdate,
  SOURCE_IDS,
  SearchResult,
  SkippedSource,
  SourceAdapter,
  SourceFailure,
  SourceId,
  SummarizeOutcome,
  Summarizer,
  SummaryResult,
  defaultLogger,
  isAuthenticated,
  isSourceId,
  systemClock,
} from './types.js';

export interface AggregatorConfig {
  registry: AdapterRegistry;
  /** A prepared cache, or the settings to build one */
  cache?: AggregateCache | AggregateCacheConfig;
  summarizer?: Summarizer;
  /** Upper bound on each adapter call (default 5000) */
  adapterTimeoutMs?: number;
  /** Document content cap in UTF-8 bytes (default 10000) */
  contentByteLimit?: number;
  logger?: Logger;
  clock?: Clock;
}

type Operation = 'search' | 'updates';

interface PreparedRequest {
  identity: IdentityContext;
  requested: SourceId[];
  allowed: SourceId[];
  skipped: SkippedSource[];
}

interface FanOutOutcome<T> {
  perSource: Array<{ source: SourceId; items: T[] }>;
  failures: SourceFailure[];
  skipped: SkippedSource[];
}

const UNAUTHENTICATED: AggregatorError = {
  type: 'unauthenticated',
  message: 'Caller is not authenticated',
};

function freezeList<T extends object>(items: readonly T[]): readonly T[] {
  return Object.freeze(items.map((item) => Object.freeze({ ...item })));
}

function freezeSummary(summary: SummaryResult, failures: readonly DocumentFailure[]): CachedSummary {
  return Object.freeze({
    summary: summary.summary,
    keyPoints: Object.freeze([...summary.keyPoints]),
    sourceDocuments: freezeList(summary.sourceDocuments),
    failures: Object.freeze(
      failures.map((failure) => Object.freeze({ id: failure.id, error: Object.freeze({ ...failure.error }) }))
    ),
  });
}

function toOutcome(cached: CachedSummary, fromCache: boolean): SummarizeOutcome {
  return {
    summary: cached.summary,
    keyPoints: cached.keyPoints.slice(),
    sourceDocuments: cached.sourceDocuments.slice(),
    failures: cached.failures.slice(),
    cached: fromCache,
  };
}

function copyAggregate<T>(result: Result<AggregateResult<T>, AggregatorError>): Result<AggregateResult<T>, AggregatorError> {
  if (!result.ok) return result;
  return ok({
    ...result.value,
    items: result.value.items.slice(),
    failures: result.value.failures.slice(),
    skipped: result.value.skipped.slice(),
  });
}

function copyOutcome(result: Result<SummarizeOutcome, AggregatorError>): Result<SummarizeOutcome, AggregatorError> {
  if (!result.ok) return result;
  return ok({
    ...result.value,
    keyPoints: result.value.keyPoints.slice(),
    sourceDocuments: result.value.sourceDocuments.slice(),
    failures: result.value.failures.slice(),
  });
}

export class Aggregator {
  private registry: AdapterRegistry;
  private cacheLayer: AggregateCache;
  private summarizer?: Summarizer;
  private adapterTimeoutMs: number;
  private contentByteLimit: number;
  private logger: Logger;
  private clock: Clock;

  private searchFlights = new SingleFlight<Result<AggregateResult<SearchResult>, AggregatorError>>(copyAggregate);
  private updateFlights = new SingleFlight<Result<AggregateResult<RecentUpdate>, AggregatorError>>(copyAggregate);
  private documentFlights = new SingleFlight<Result<DocumentContent, AggregatorError>>();
  private summaryFlights = new SingleFlight<Result<SummarizeOutcome, AggregatorError>>(copyOutcome);

  constructor(config: AggregatorConfig) {
    if (!config.registry) {
      throw new Error('registry is required');
    }

    const timeout = config.adapterTimeoutMs ?? 5000;
    if (!Number.isFinite(timeout) || timeout <= 0) {
      throw new Error(`Invalid adapter timeout: ${timeout}`);
    }

    const contentByteLimit = config.contentByteLimit ?? DEFAULT_CONTENT_BYTE_LIMIT;
    if (!Number.isInteger(contentByteLimit) || contentByteLimit < 1) {
      throw new Error(`Invalid content byte limit: ${contentByteLimit}`);
    }

    this.registry = config.registry;
    this.clock = config.clock ?? systemClock;
    this.cacheLayer =
      config.cache instanceof AggregateCache ? config.cache : new AggregateCache(config.cache, this.clock);
    this.summarizer = config.summarizer;
    this.adapterTimeoutMs = timeout;
    this.contentByteLimit = contentByteLimit;
    this.logger = config.logger ?? defaultLogger;
  }

  get cache(): AggregateCache {
    return this.cacheLayer;
  }

  /**
   * Search the requested sources (all sources when omitted). Results are
   * concatenated in source enumeration order and truncated to maxResults.
   */
  async search(
    query: string,
    sources: readonly string[] | undefined,
    maxResults: number,
    identity: IdentityContext | null | undefined
  ): Promise<Result<AggregateResult<SearchResult>, AggregatorError>> {
    const prepared = this.prepare(identity, sources);
    if (!prepared.ok) return prepared;

    const trimmed = query.trim();
    if (!trimmed) {
      return err({ type: 'malformed_input', field: 'query', message: 'Query cannot be empty' });
    }

    const { identity: caller, requested, allowed, skipped } = prepared.value;
    const key = cacheKey('search', caller.userId, {
      query: trimmed,
      sources: requested,
      permitted: allowed,
      maxResults,
    });

    const hit = this.cacheLayer.read(this.cacheLayer.search, key);
    if (hit) {
      this.logger.debug('Returning cached search results', { query: trimmed, count: hit.length });
      return ok({ items: hit.slice(), failures: [], skipped, cached: true });
    }

    return this.searchFlights.run(key, async () => {
      const outcome = await this.fanOut('search', caller, allowed, skipped, (adapter, signal) =>
        adapter.search(trimmed, maxResults, signal)
      );
      if (!outcome.ok) return outcome;

      const merged = outcome.value.perSource.flatMap((entry) => entry.items).slice(0, maxResults);
      const frozen = freezeList(merged);
      this.cacheLayer.write(this.cacheLayer.search, key, frozen);

      return ok({
        items: frozen.slice(),
        failures: outcome.value.failures,
        skipped: outcome.value.skipped,
        cached: false,
      });
    });
  }

  /**
   * Recent activity across sources, newest first
   */
  async getRecentUpdates(
    sources: readonly string[] | undefined,
    days: number,
    maxResults: number,
    identity: IdentityContext | null | undefined
  ): Promise<Result<AggregateResult<RecentUpdate>, AggregatorError>> {
    const prepared = this.prepare(identity, sources);
    if (!prepared.ok) return prepared;

    const { identity: caller, requested, allowed, skipped } = prepared.value;
    const key = cacheKey('updates', caller.userId, {
      sources: requested,
      permitted: allowed,
      days,
      maxResults,
    });

    const hit = this.cacheLayer.read(this.cacheLayer.updates, key);
    if (hit) {
      this.logger.debug('Returning cached updates', { days, count: hit.length });
      return ok({ items: hit.slice(), failures: [], skipped, cached: true });
    }

    return this.updateFlights.run(key, async () => {
      const outcome = await this.fanOut('updates', caller, allowed, skipped, (adapter, signal) =>
        adapter.getRecentUpdates(days, signal)
      );
      if (!outcome.ok) return outcome;

      const merged = sortUpdatesByRecency(outcome.value.perSource.flatMap((entry) => entry.items)).slice(
        0,
        maxResults
      );
      const frozen = freezeList(merged);
      this.cacheLayer.write(this.cacheLayer.updates, key, frozen);

      return ok({
        items: frozen.slice(),
        failures: outcome.value.failures,
        skipped: outcome.value.skipped,
        cached: false,
      });
    });
  }

  /**
   * Fetch one document by composite id. Failures for that document
   * propagate; there is no partial result.
   */
  async getDocument(
    compositeId: string,
    identity: IdentityContext | null | undefined
  ): Promise<Result<DocumentContent, AggregatorError>> {
    if (!isAuthenticated(identity)) return err(UNAUTHENTICATED);
    return this.fetchDocument(compositeId, identity);
  }

  /**
   * Fetch every document, tolerating per-id failures, and hand the ones
   * that arrived to the summarizer
   */
  async summarize(
    documentIds: readonly string[],
    maxLength: number,
    identity: IdentityContext | null | undefined
  ): Promise<Result<SummarizeOutcome, AggregatorError>> {
    if (!isAuthenticated(identity)) return err(UNAUTHENTICATED);

    const summarizer = this.summarizer;
    if (!summarizer) {
      return err({ type: 'internal', message: 'No summarizer configured' });
    }

    const ids = Array.from(new Set(documentIds.map((id) => id.trim()).filter((id) => id.length > 0)));
    if (ids.length === 0) {
      return err({ type: 'malformed_input', field: 'document_ids', message: 'At least one document id is required' });
    }

    const permitted = canonicalSources(
      ids.flatMap((id) => {
        const parsed = parseCompositeId(id);
        return parsed.ok && isAllowed(identity, parsed.value.source) ? [parsed.value.source] : [];
      })
    );
    const key = cacheKey('summarize', identity.userId, { ids, permitted, maxLength });

    const hit = this.cacheLayer.read(this.cacheLayer.summary, key);
    if (hit) {
      this.logger.debug('Returning cached summary', { documents: ids.length });
      return ok(toOutcome(hit, true));
    }

    return this.summaryFlights.run(key, async () => {
      const fetched = await Promise.all(ids.map((id) => this.fetchDocument(id, identity)));

      const documents: DocumentContent[] = [];
      const failures: DocumentFailure[] = [];
      fetched.forEach((result, index) => {
        if (result.ok) {
          documents.push(result.value);
        } else {
          failures.push({ id: ids[index], error: result.error });
        }
      });

      if (failures.length > 0) {
        this.logger.warn('Some documents could not be fetched for summarization', {
          failed: failures.map((failure) => ({ id: failure.id, type: failure.error.type })),
        });
      }

      try {
        const summary = freezeSummary(await summarizer.summarize(documents, maxLength), failures);
        this.cacheLayer.write(this.cacheLayer.summary, key, summary);

        this.logger.info('Summary generated', {
          documents: documents.length,
          failed: failures.length,
        });

        return ok(toOutcome(summary, false));
      } catch (error) {
        this.logger.error('Summarizer failed', { error: describeError(error) });
        return err({ type: 'summarizer_error', message: describeError(error), cause: error });
      }
    });
  }

  /**
   * Drop every cached entry
   */
  clearCache(): void {
    this.cacheLayer.clear();
  }

  private prepare(
    identity: IdentityContext | null | undefined,
    sources: readonly string[] | undefined
  ): Result<PreparedRequest, AggregatorError> {
    if (!isAuthenticated(identity)) return err(UNAUTHENTICATED);

    const requestedRaw = sources && sources.length > 0 ? sources : SOURCE_IDS;
    const validated: SourceId[] = [];
    for (const source of requestedRaw) {
      if (!isSourceId(source)) {
        return err({ type: 'malformed_input', field: 'sources', message: `Unknown source "${source}"` });
      }
      validated.push(source);
    }

    const requested = canonicalSources(validated);
    const { allowed, denied } = partitionByPermission(identity, requested);

    for (const source of denied) {
      this.logger.warn('Caller lacks permission for source, skipping', {
        userId: identity.userId,
        source,
        scope: requiredScope(source),
      });
    }

    return ok({
      identity,
      requested,
      allowed,
      skipped: denied.map((source): SkippedSource => ({ source, reason: 'permission_denied' })),
    });
  }

  /**
   * Start one call per permitted source together and wait for all of them.
   * Every task resolves; failures come back as records, never rejections.
   */
  private async fanOut<T>(
    operation: Operation,
    identity: IdentityContext,
    allowed: SourceId[],
    skippedBefore: SkippedSource[],
    call: (adapter: SourceAdapter, signal: AbortSignal) => Promise<Result<T[], SourceError>>
  ): Promise<Result<FanOutOutcome<T>, AggregatorError>> {
    const resolved = this.resolveAdapters(identity, allowed);
    if (!resolved.ok) return resolved;

    const adapters = resolved.value;
    const skipped = [...skippedBefore];
    for (const source of allowed) {
      if (!adapters.has(source)) {
        this.logger.warn('No adapter available for source', { source });
        skipped.push({ source, reason: 'unsupported' });
      }
    }

    const started = this.clock.now();
    const targets = allowed.flatMap((source) => {
      const adapter = adapters.get(source);
      return adapter ? [{ source, adapter }] : [];
    });

    const settled = await Promise.all(
      targets.map(async ({ source, adapter }) => {
        const callStarted = this.clock.now();
        const result = await this.invoke(source, (signal) => call(adapter, signal));
        return { source, result, durationMs: this.clock.now() - callStarted };
      })
    );

    const perSource: Array<{ source: SourceId; items: T[] }> = [];
    const failures: SourceFailure[] = [];

    for (const { source, result, durationMs } of settled) {
      if (result.ok) {
        perSource.push({ source, items: result.value });
      } else {
        this.logger.warn(`Source ${operation} failed, excluding from results`, {
          source,
          errorType: result.error.type,
          error: result.error.message,
          durationMs,
        });
        failures.push({ source, error: result.error, durationMs });
      }
    }

    this.logger.info(`Aggregated ${operation}`, {
      sources: targets.map((target) => target.source),
      succeeded: perSource.length,
      failed: failures.length,
      durationMs: this.clock.now() - started,
    });

    return ok({ perSource, failures, skipped });
  }

  private async fetchDocument(
    compositeId: string,
    identity: IdentityContext
  ): Promise<Result<DocumentContent, AggregatorError>> {
    const parsed = parseCompositeId(compositeId);
    if (!parsed.ok) return parsed;

    const { source, nativeId } = parsed.value;
    if (!isAllowed(identity, source)) {
      this.logger.warn('Caller lacks permission for document source', { userId: identity.userId, source });
      return err({
        type: 'permission_denied',
        source,
        scope: requiredScope(source),
        message: `Missing scope ${requiredScope(source)}`,
      });
    }

    const id = toCompositeId(source, nativeId);
    const key = cacheKey('document', identity.userId, { id });

    const hit = this.cacheLayer.read(this.cacheLayer.document, key);
    if (hit) {
      this.logger.debug('Returning cached document', { id });
      return ok(hit);
    }

    return this.documentFlights.run(key, async () => {
      const resolved = this.resolveAdapters(identity, [source]);
      if (!resolved.ok) return resolved;

      const adapter = resolved.value.get(source);
      if (!adapter) {
        return err({ type: 'unsupported_source', source, message: `No adapter available for ${source}` });
      }

      const result = await this.invoke(source, (signal) => adapter.getDocument(nativeId, signal));
      if (!result.ok) {
        this.logger.warn('Document fetch failed', { id, errorType: result.error.type, error: result.error.message });
        return err(this.documentError(id, source, result.error));
      }

      const document = Object.freeze({
        ...result.value,
        content: truncateUtf8(result.value.content, this.contentByteLimit),
      });
      this.cacheLayer.write(this.cacheLayer.document, key, document);
      return ok(document);
    });
  }

  private documentError(id: string, source: SourceId, error: SourceError): AggregatorError {
    switch (error.type) {
      case 'not_found':
        return { type: 'not_found', id, message: error.message };
      case 'access_denied':
        return { type: 'access_denied', id, message: error.message };
      default:
        return { type: 'source_unavailable', source, message: error.message, cause: error };
    }
  }

  private resolveAdapters(
    identity: IdentityContext,
    sources: SourceId[]
  ): Result<Map<SourceId, SourceAdapter>, AggregatorError> {
    try {
      return ok(this.registry.resolve(identity, sources));
    } catch (error) {
      this.logger.error('Adapter registry failed to resolve adapters', { error: describeError(error) });
      return err({ type: 'internal', message: 'Adapter registry misconfigured', cause: error });
    }
  }

  /**
   * Run one adapter call under the timeout. A timeout aborts the call and
   * counts as a transient failure; a thrown error counts as permanent.
   */
  private async invoke<T>(
    source: SourceId,
    task: (signal: AbortSignal) => Promise<Result<T, SourceError>>
  ): Promise<Result<T, SourceError>> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<Result<T, SourceError>>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve(err({ type: 'transient', message: `${source} did not respond within ${this.adapterTimeoutMs}ms` }));
      }, this.adapterTimeoutMs);
    });

    const guarded = (async (): Promise<Result<T, SourceError>> => {
      try {
        return await task(controller.signal);
      } catch (error) {
        return err({ type: 'permanent', message: describeError(error), cause: error });
      }
    })();

    try {
      return await Promise.race([guarded, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
