export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type FetchErrorKind = 'rate-limit' | 'transient' | 'permanent';

/**
 * Failure to fetch one account's feed. Carries the handle so the collector
 * can record it against the right account and move on.
 */
export abstract class FetchError extends PipelineError {
  abstract readonly kind: FetchErrorKind;

  constructor(
    readonly account: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }

  get retryable(): boolean {
    return this.kind !== 'permanent';
  }
}

export class RateLimitExceeded extends FetchError {
  readonly kind = 'rate-limit';
}

export class TransientFetchError extends FetchError {
  readonly kind = 'transient';
}

export class PermanentFetchError extends FetchError {
  readonly kind = 'permanent';

  constructor(
    account: string,
    message: string,
    readonly status: number | null,
    options?: { cause?: unknown }
  ) {
    super(account, message, options);
  }
}

// Thrown by transports for a non-2xx response; FeedClient turns it into a FetchError.
export class FeedResponseError extends PipelineError {
  constructor(
    readonly status: number,
    message: string,
    readonly retryAfterMs: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class CacheNotFoundError extends PipelineError {
  constructor(readonly postId: string) {
    super(`Post ${postId} is not in the cache`);
  }
}

export class LexiconLoadError extends PipelineError {}

export class ConfigError extends PipelineError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
