import { logger } from '../shared/logger.js';
import { FetchError, PermanentFetchError, errorMessage } from '../shared/errors.js';
import { PostCache } from '../shared/post-cache.js';
import { Clock, systemClock } from '../shared/resilience.js';
import { Account, PriorityTier, RawPost, normalizeHandle } from '../shared/types.js';
import { FeedClient } from './feed-client.js';

export type CollectionErrorKind = 'rate-limit' | 'transient' | 'permanent' | 'unexpected' | 'cache';

export interface CollectionError {
  account: string;
  kind: CollectionErrorKind;
  message: string;
}

export type AccountStatus = 'ok' | 'failed' | 'skipped' | 'fresh';

export interface AccountCollection {
  account: string;
  status: AccountStatus;
  fetchedCount: number;
  newCount: number;
  skippedCount: number;
  filteredCount: number;
  failedCount: number;
}

export interface CollectionResult {
  startedAt: number;
  finishedAt: number;
  fetchedCount: number;
  newCount: number;
  skippedCount: number;
  filteredCount: number;
  failedCount: number;
  errors: CollectionError[];
  accounts: AccountCollection[];
  newPostIds: string[];
}

export interface CollectorOptions {
  originalsOnly: boolean;
  // Accounts fetched less than this long ago are not requested again; 0 disables.
  freshForMs: number;
  clock: Clock;
}

export interface CollectRunOptions {
  // Fetch every account, however recently it was fetched.
  refresh?: boolean;
}

const TIER_ORDER: Record<PriorityTier, number> = { high: 0, medium: 1, low: 2 };

/**
 * Retweets, replies and bare link shares carry no opinion of the account's
 * own, so they are kept out of the cache.
 */
export function isOriginalPost(post: Pick<RawPost, 'text'>): boolean {
  const text = post.text.trim();
  if (text.startsWith('RT @')) return false;
  if (text.startsWith('@')) return false;
  if (text.length < 20 && text.includes('t.co/')) return false;
  return true;
}

function emptyAccount(account: string): AccountCollection {
  return {
    account,
    status: 'ok',
    fetchedCount: 0,
    newCount: 0,
    skippedCount: 0,
    filteredCount: 0,
    failedCount: 0
  };
}

export class Collector {
  private readonly options: CollectorOptions;

  constructor(
    private readonly feed: FeedClient,
    private readonly cache: PostCache,
    options: Partial<CollectorOptions> = {}
  ) {
    this.options = { originalsOnly: true, freshForMs: 0, clock: systemClock, ...options };
  }

  /**
   * Fetches every account's recent posts and writes the unseen ones to the
   * cache. A failing account is recorded in the result and never stops the
   * rest of the batch. Accounts still fresh in the cache are marked 'fresh'
   * and cost no request.
   */
  async collect(accounts: Account[], lookbackMs: number, runOptions: CollectRunOptions = {}): Promise<CollectionResult> {
    const startedAt = this.options.clock.now();
    const since = startedAt - lookbackMs;
    const ordered = [...accounts].sort((a, b) => TIER_ORDER[a.priorityTier] - TIER_ORDER[b.priorityTier]);

    const errors: CollectionError[] = [];
    const perAccount: AccountCollection[] = [];
    const newPostIds: string[] = [];
    const rejected = new Set<string>();

    logger.info(`Collecting ${ordered.length} accounts via ${this.feed.transportName} (since ${new Date(since).toISOString()})`);

    for (const account of ordered) {
      const handle = normalizeHandle(account.handle);
      const stats = emptyAccount(handle);
      perAccount.push(stats);

      if (rejected.has(handle)) {
        stats.status = 'skipped';
        logger.debug(`Skipping @${handle}: rejected earlier in this run`);
        continue;
      }

      if (!runOptions.refresh && this.isFresh(handle, this.options.clock.now())) {
        stats.status = 'fresh';
        logger.info(`Skipping @${handle}: fetched within the last ${(this.options.freshForMs / 60000).toFixed(0)} minutes`);
        continue;
      }

      let posts: RawPost[];
      try {
        posts = await this.feed.fetchRecent(handle, since);
      } catch (error) {
        stats.status = 'failed';
        if (error instanceof PermanentFetchError) {
          rejected.add(handle);
        }
        const kind: CollectionErrorKind = error instanceof FetchError ? error.kind : 'unexpected';
        errors.push({ account: handle, kind, message: errorMessage(error) });
        logger.error(`Collection failed for @${handle} (${kind}): ${errorMessage(error)}`);
        continue;
      }

      const fetchedAt = this.options.clock.now();
      for (const post of posts) {
        stats.fetchedCount++;

        if (this.options.originalsOnly && !isOriginalPost(post)) {
          stats.filteredCount++;
          continue;
        }
        if (this.cache.has(post.id)) {
          stats.skippedCount++;
          continue;
        }

        try {
          this.cache.upsertRaw(post, fetchedAt);
          stats.newCount++;
          newPostIds.push(post.id);
        } catch (error) {
          stats.failedCount++;
          errors.push({ account: handle, kind: 'cache', message: `Post ${post.id}: ${errorMessage(error)}` });
          logger.error(`Failed to cache post ${post.id} from @${handle}: ${errorMessage(error)}`);
        }
      }

      try {
        this.cache.markFetched(handle, fetchedAt);
      } catch (error) {
        errors.push({ account: handle, kind: 'cache', message: `Fetch time: ${errorMessage(error)}` });
        logger.error(`Failed to record fetch time for @${handle}: ${errorMessage(error)}`);
      }

      logger.info(
        `@${handle}: ${stats.fetchedCount} fetched, ${stats.newCount} new, ${stats.skippedCount} cached, ${stats.filteredCount} filtered`
      );
    }

    const total = (key: 'fetchedCount' | 'newCount' | 'skippedCount' | 'filteredCount' | 'failedCount') =>
      perAccount.reduce((sum, stats) => sum + stats[key], 0);

    const result: CollectionResult = {
      startedAt,
      finishedAt: this.options.clock.now(),
      fetchedCount: total('fetchedCount'),
      newCount: total('newCount'),
      skippedCount: total('skippedCount'),
      filteredCount: total('filteredCount'),
      failedCount: total('failedCount'),
      errors,
      accounts: perAccount,
      newPostIds
    };

    logger.info(
      `Collection complete: ${result.newCount} new / ${result.fetchedCount} fetched, ${errors.length} errors`
    );
    return result;
  }

  private isFresh(handle: string, now: number): boolean {
    if (this.options.freshForMs <= 0) return false;
    const lastFetchedAt = this.cache.lastFetchedAt(handle);
    return lastFetchedAt !== null && now - lastFetchedAt < this.options.freshForMs;
  }
}
