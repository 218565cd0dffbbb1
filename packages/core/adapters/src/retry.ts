/**
 * Bounded retry with exponential backoff for adapter calls
 */

import { defaultLogger, type Logger, type Result, type SourceError } from '@docmesh/aggregator';

export interface RetryConfig {
  maxRetries: number;
  initialDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  initialDelay: 1000,
  maxDelay: 10000,
  backoffMultiplier: 2,
};

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Resolves after ms, or as soon as the signal aborts
 */
export const abortableSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });

export interface RetryPolicyOptions {
  sleep?: Sleep;
  logger?: Logger;
}

export class RetryPolicy {
  readonly config: RetryConfig;
  private sleep: Sleep;
  private logger: Logger;

  constructor(config: Partial<RetryConfig> = {}, options: RetryPolicyOptions = {}) {
    const merged = { ...DEFAULT_RETRY_CONFIG, ...config };

    if (!Number.isInteger(merged.maxRetries) || merged.maxRetries < 0) {
      throw new Error(`Invalid maxRetries: ${merged.maxRetries}`);
    }
    if (!(merged.initialDelay >= 0) || !(merged.maxDelay >= merged.initialDelay)) {
      throw new Error(`Invalid retry delays: ${merged.initialDelay}..${merged.maxDelay}`);
    }
    if (!(merged.backoffMultiplier >= 1)) {
      throw new Error(`Invalid backoffMultiplier: ${merged.backoffMultiplier}`);
    }

    this.config = Object.freeze(merged);
    this.sleep = options.sleep ?? abortableSleep;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Delay before retry number `attempt` (0-indexed)
   */
  delayFor(attempt: number): number {
    const { initialDelay, backoffMultiplier, maxDelay } = this.config;
    return Math.min(initialDelay * Math.pow(backoffMultiplier, attempt), maxDelay);
  }

  /**
   * Run the task until it succeeds, fails with anything but a transient
   * error, runs out of retries or the signal aborts. The last result is
   * returned as-is.
   */
  async execute<T>(
    task: (attempt: number) => Promise<Result<T, SourceError>>,
    signal?: AbortSignal,
    context?: string
  ): Promise<Result<T, SourceError>> {
    for (let attempt = 0; ; attempt++) {
      const result = await task(attempt);
      if (result.ok || result.error.type !== 'transient') return result;
      if (attempt >= this.config.maxRetries || signal?.aborted) return result;

      const delayMs = this.delayFor(attempt);
      this.logger.warn('Transient source failure, retrying', {
        context,
        attempt: attempt + 1,
        maxRetries: this.config.maxRetries,
        delayMs,
        error: result.error.message,
      });

      await this.sleep(delayMs, signal);
      if (signal?.aborted) return result;
    }
  }
}
