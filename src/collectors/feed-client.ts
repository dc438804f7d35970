import { logger } from '../shared/logger.js';
import { RateLimiter } from '../shared/rate-limiter.js';
import { Clock, DEFAULT_RETRY_CONFIG, RetryConfig, backoffDelay, systemClock } from '../shared/resilience.js';
import {
  FeedResponseError,
  PermanentFetchError,
  RateLimitExceeded,
  TransientFetchError,
  errorMessage
} from '../shared/errors.js';
import { RawPost, normalizeHandle } from '../shared/types.js';

export interface FeedPageRequest {
  handle: string;
  accountKey: string; // transport-specific id, e.g. a numeric user id
  since: number;
  cursor: string | null;
}

export interface FeedPage {
  posts: RawPost[];
  nextCursor: string | null;
}

/**
 * One physical request per call. Transports report non-2xx responses as
 * FeedResponseError and let anything else (network, timeout) propagate.
 */
export interface FeedTransport {
  readonly name: string;
  resolveAccount?(handle: string): Promise<string>;
  fetchPage(request: FeedPageRequest): Promise<FeedPage>;
}

export interface FeedClientOptions {
  maxRateLimitAttempts: number;
  maxTransientAttempts: number;
  maxPages: number;
  retry: Pick<RetryConfig, 'initialDelayMs' | 'maxDelayMs' | 'backoffMultiplier' | 'jitterPercent'>;
  clock: Clock;
  random: () => number;
}

const DEFAULT_OPTIONS: FeedClientOptions = {
  maxRateLimitAttempts: 3,
  maxTransientAttempts: DEFAULT_RETRY_CONFIG.maxAttempts,
  maxPages: 3,
  retry: DEFAULT_RETRY_CONFIG,
  clock: systemClock,
  random: Math.random
};

export class FeedClient {
  private readonly options: FeedClientOptions;

  constructor(
    private readonly transport: FeedTransport,
    private readonly limiter: RateLimiter,
    options: Partial<FeedClientOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  get transportName(): string {
    return this.transport.name;
  }

  /**
   * Posts by `account` created at or after `since`. The result carries no
   * ordering guarantee; ids are unique within it.
   *
   * All or nothing per account: when any page fails after its retries, the
   * error is thrown and posts from earlier pages are discarded. The next run
   * fetches them again.
   */
  async fetchRecent(account: string, since: number): Promise<RawPost[]> {
    const handle = normalizeHandle(account);
    const resolve = this.transport.resolveAccount?.bind(this.transport);
    const accountKey = resolve
      ? await this.call(handle, 'resolve', () => resolve(handle))
      : handle;

    const collected = new Map<string, RawPost>();
    let cursor: string | null = null;

    for (let page = 1; page <= this.options.maxPages; page++) {
      const request: FeedPageRequest = { handle, accountKey, since, cursor };
      const result = await this.call(handle, `page ${page}`, () => this.transport.fetchPage(request));

      let reachedWindowStart = false;
      for (const post of result.posts) {
        if (post.createdAt < since) {
          reachedWindowStart = true;
          continue;
        }
        if (!collected.has(post.id)) {
          collected.set(post.id, { ...post, account: normalizeHandle(post.account) });
        }
      }

      if (!result.nextCursor || reachedWindowStart || result.posts.length === 0) break;
      cursor = result.nextCursor;
    }

    logger.info(`Fetched ${collected.size} posts from @${handle} via ${this.transport.name}`);
    return [...collected.values()];
  }

  private async call<T>(handle: string, label: string, fn: () => Promise<T>): Promise<T> {
    let rateLimitHits = 0;
    let transientFailures = 0;

    while (true) {
      await this.limiter.acquire();
      try {
        return await fn();
      } catch (error) {
        const response = error instanceof FeedResponseError ? error : null;

        if (response?.status === 429) {
          rateLimitHits++;
          if (rateLimitHits >= this.options.maxRateLimitAttempts) {
            throw new RateLimitExceeded(
              handle,
              `Rate limit still exceeded for @${handle} after ${rateLimitHits} attempts`,
              { cause: error }
            );
          }
          const waitMs = Math.max(this.limiter.minIntervalMs, response.retryAfterMs ?? 0);
          logger.warn(`[@${handle}] ${label}: HTTP 429, backing off ${(waitMs / 1000).toFixed(1)}s`);
          await this.options.clock.sleep(waitMs);
          continue;
        }

        if (response && response.status >= 400 && response.status < 500) {
          throw new PermanentFetchError(
            handle,
            `Feed rejected @${handle} (${label}): HTTP ${response.status} ${response.message}`,
            response.status,
            { cause: error }
          );
        }

        transientFailures++;
        if (transientFailures >= this.options.maxTransientAttempts) {
          throw new TransientFetchError(
            handle,
            `Fetching @${handle} failed after ${transientFailures} attempts: ${errorMessage(error)}`,
            { cause: error }
          );
        }
        const delayMs = backoffDelay(transientFailures, this.options.retry, this.options.random);
        logger.warn(
          `[@${handle}] ${label} attempt ${transientFailures}/${this.options.maxTransientAttempts} failed: ${errorMessage(error)}. Retrying in ${delayMs.toFixed(0)}ms`
        );
        await this.options.clock.sleep(delayMs);
      }
    }
  }
}
