import { logger } from './logger.js';
import { Clock, systemClock } from './resilience.js';

export interface RateLimiterOptions {
  name?: string;
  minIntervalMs: number;
  clock?: Clock;
}

/**
 * Enforces a minimum spacing between grants. One instance is shared by every
 * caller that draws on the same remote quota; concurrent acquire() calls are
 * queued and granted one interval apart.
 */
export class RateLimiter {
  readonly name: string;
  readonly minIntervalMs: number;
  private readonly clock: Clock;
  private lastGrant: number | null = null;
  private queue: Promise<void> = Promise.resolve();
  private grants = 0;

  constructor(options: RateLimiterOptions) {
    if (!Number.isFinite(options.minIntervalMs) || options.minIntervalMs < 0) {
      throw new RangeError(`minIntervalMs must be a non-negative number, got ${options.minIntervalMs}`);
    }
    this.name = options.name ?? 'feed';
    this.minIntervalMs = options.minIntervalMs;
    this.clock = options.clock ?? systemClock;
  }

  acquire(): Promise<void> {
    const turn = this.queue.then(() => this.grant());
    this.queue = turn;
    return turn;
  }

  getStatus() {
    return {
      name: this.name,
      minIntervalMs: this.minIntervalMs,
      grants: this.grants,
      lastGrant: this.lastGrant ? new Date(this.lastGrant).toISOString() : null
    };
  }

  private async grant(): Promise<void> {
    if (this.lastGrant !== null) {
      const waitMs = this.lastGrant + this.minIntervalMs - this.clock.now();
      if (waitMs > 0) {
        logger.debug(`[${this.name}] Pacing: waiting ${(waitMs / 1000).toFixed(1)}s`);
        await this.clock.sleep(waitMs);
      }
    }
    this.lastGrant = this.clock.now();
    this.grants++;
  }
}
