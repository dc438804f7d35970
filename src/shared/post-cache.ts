import Database from 'better-sqlite3';
import { logger } from './logger.js';
import { CacheNotFoundError, PipelineError } from './errors.js';
import { CacheEntry, DerivedFields, Post, PostFilter, RawPost } from './types.js';

interface PostRow {
  id: string;
  account: string;
  text: string;
  created_at: number;
  like_count: number;
  repost_count: number;
  reply_count: number;
  fetched_at: number;
  category: string | null;
  sentiment_score: number | null;
  signals: string;
  cache_version: string | null;
}

export type UpsertOutcome = 'inserted' | 'unchanged' | 'conflict';

export interface AccountCacheSummary {
  account: string;
  postCount: number;
  lastFetchedAt: number;
  newestPostAt: number;
}

type BindValue = string | number;

const STALE_CONDITION = 'cache_version IS NOT ? OR category IS NULL OR sentiment_score IS NULL';

function parseSignals(raw: string): string[] | null {
  try {
    const value: unknown = JSON.parse(raw);
    if (Array.isArray(value) && value.every((s): s is string => typeof s === 'string')) {
      return value;
    }
    return null;
  } catch {
    return null;
  }
}

function rowToEntry(row: PostRow): CacheEntry | null {
  const signals = parseSignals(row.signals);
  if (signals === null) {
    logger.warn(`Skipping cached post ${row.id}: unreadable signals column`);
    return null;
  }
  return {
    post: {
      id: row.id,
      account: row.account,
      text: row.text,
      createdAt: row.created_at,
      likeCount: row.like_count,
      repostCount: row.repost_count,
      replyCount: row.reply_count,
      fetchedAt: row.fetched_at,
      category: row.category,
      sentimentScore: row.sentiment_score,
      signals
    },
    cacheVersion: row.cache_version
  };
}

function isCount(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

function validateRaw(post: RawPost) {
  if (!post.id) {
    throw new PipelineError('Post has no id');
  }
  if (!post.account) {
    throw new PipelineError(`Post ${post.id} has no account`);
  }
  if (!Number.isFinite(post.createdAt)) {
    throw new PipelineError(`Post ${post.id} has an invalid createdAt`);
  }
  if (!isCount(post.likeCount) || !isCount(post.repostCount) || !isCount(post.replyCount)) {
    throw new PipelineError(`Post ${post.id} has invalid engagement counts`);
  }
}

function buildQuery(filter: PostFilter): { sql: string; values: BindValue[] } {
  const clauses: string[] = [];
  const values: BindValue[] = [];

  if (filter.category !== undefined) {
    clauses.push('category = ?');
    values.push(filter.category);
  }
  if (filter.account !== undefined) {
    clauses.push('account = ?');
    values.push(filter.account);
  }
  if (filter.since !== undefined) {
    clauses.push('created_at >= ?');
    values.push(filter.since);
  }
  if (filter.until !== undefined) {
    clauses.push('created_at < ?');
    values.push(filter.until);
  }

  const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
  return {
    sql: `SELECT * FROM posts ${where} ORDER BY created_at DESC, id ASC`,
    values
  };
}

/**
 * Durable store of posts keyed by id. Raw fields are written once by the
 * collector; derived fields (category, sentiment, signals) are rewritten by the
 * scoring stage and stamped with the cache version they were computed under.
 */
export class PostCache {
  private readonly selectOne: Database.Statement<[string], PostRow>;
  private readonly exists: Database.Statement<[string], { found: number }>;
  private readonly insert: Database.Statement<BindValue[]>;
  private readonly writeDerived: Database.Statement<BindValue[]>;
  private readonly selectFetch: Database.Statement<[string], { fetched_at: number }>;
  private readonly writeFetch: Database.Statement<[string, number]>;
  private readonly upsertTx: (post: RawPost, fetchedAt: number) => UpsertOutcome;

  constructor(
    private readonly db: Database.Database,
    private readonly currentVersion: string
  ) {
    this.selectOne = db.prepare<[string], PostRow>('SELECT * FROM posts WHERE id = ?');
    this.exists = db.prepare<[string], { found: number }>('SELECT 1 AS found FROM posts WHERE id = ?');
    this.insert = db.prepare<BindValue[]>(`
      INSERT INTO posts (id, account, text, created_at, like_count, repost_count, reply_count, fetched_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);
    this.writeDerived = db.prepare<BindValue[]>(`
      UPDATE posts SET category = ?, sentiment_score = ?, signals = ?, cache_version = ? WHERE id = ?
    `);

    this.selectFetch = db.prepare<[string], { fetched_at: number }>(
      'SELECT fetched_at FROM account_fetches WHERE account = ?'
    );
    this.writeFetch = db.prepare<[string, number]>(`
      INSERT INTO account_fetches (account, fetched_at) VALUES (?, ?)
      ON CONFLICT(account) DO UPDATE SET fetched_at = excluded.fetched_at
    `);

    this.upsertTx = db.transaction((post: RawPost, fetchedAt: number): UpsertOutcome => {
      const existing = this.selectOne.get(post.id);
      if (!existing) {
        this.insert.run(
          post.id,
          post.account,
          post.text,
          post.createdAt,
          post.likeCount,
          post.repostCount,
          post.replyCount,
          fetchedAt
        );
        return 'inserted';
      }

      if (
        existing.account !== post.account ||
        existing.text !== post.text ||
        existing.created_at !== post.createdAt
      ) {
        return 'conflict';
      }
      return 'unchanged';
    });
  }

  version(): string {
    return this.currentVersion;
  }

  has(id: string): boolean {
    return this.exists.get(id) !== undefined;
  }

  get(id: string): Post | null {
    const row = this.selectOne.get(id);
    if (!row) return null;
    return rowToEntry(row)?.post ?? null;
  }

  /**
   * Inserts a post seen for the first time. A known id is never rewritten:
   * matching immutable fields (account, text, createdAt) give 'unchanged', a
   * mismatch gives 'conflict'. Engagement counts are kept as first cached.
   */
  upsertRaw(post: RawPost, fetchedAt: number = Date.now()): UpsertOutcome {
    validateRaw(post);
    const outcome = this.upsertTx(post, fetchedAt);
    if (outcome === 'conflict') {
      logger.warn(`Post ${post.id} re-fetched with different immutable fields, keeping cached copy`);
    }
    return outcome;
  }

  updateDerived(id: string, derived: DerivedFields, cacheVersion: string = this.currentVersion) {
    const signals = [...new Set(derived.signals)].sort();
    const result = this.writeDerived.run(
      derived.category,
      derived.sentimentScore,
      JSON.stringify(signals),
      cacheVersion,
      id
    );
    if (result.changes === 0) {
      throw new CacheNotFoundError(id);
    }
  }

  /** Records a completed fetch of the account's feed, new posts or not. */
  markFetched(account: string, fetchedAt: number) {
    this.writeFetch.run(account, fetchedAt);
  }

  lastFetchedAt(account: string): number | null {
    return this.selectFetch.get(account)?.fetched_at ?? null;
  }

  /**
   * Lazy view over the cache. Each iteration runs a fresh query, so the
   * returned iterable can be walked more than once.
   */
  entries(filter: PostFilter = {}): Iterable<CacheEntry> {
    const { sql, values } = buildQuery(filter);
    return {
      [Symbol.iterator]: () => this.iterate(sql, values)
    };
  }

  all(filter: PostFilter = {}): Iterable<Post> {
    const entries = this.entries(filter);
    return {
      *[Symbol.iterator]() {
        for (const entry of entries) {
          yield entry.post;
        }
      }
    };
  }

  /**
   * Entries whose derived fields are missing or were computed under another
   * cache version, across the whole cache.
   */
  staleEntries(): Iterable<CacheEntry> {
    const sql = `SELECT * FROM posts WHERE ${STALE_CONDITION} ORDER BY created_at DESC, id ASC`;
    return {
      [Symbol.iterator]: () => this.iterate(sql, [this.currentVersion])
    };
  }

  size(): number {
    const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM posts').get();
    return row?.count ?? 0;
  }

  staleCount(): number {
    const row = this.db
      .prepare<[string], { count: number }>(
        `SELECT COUNT(*) AS count FROM posts WHERE ${STALE_CONDITION}`
      )
      .get(this.currentVersion);
    return row?.count ?? 0;
  }

  summary(): AccountCacheSummary[] {
    return this.db
      .prepare<[], AccountCacheSummary>(`
        SELECT account,
               COUNT(*) AS postCount,
               MAX(fetched_at) AS lastFetchedAt,
               MAX(created_at) AS newestPostAt
        FROM posts
        GROUP BY account
        ORDER BY account
      `)
      .all();
  }

  /** Removes posts created before the cutoff; returns how many were deleted. */
  prune(olderThan: number): number {
    const result = this.db.prepare<[number]>('DELETE FROM posts WHERE created_at < ?').run(olderThan);
    logger.info(`Pruned ${result.changes} cached posts older than ${new Date(olderThan).toISOString()}`);
    return result.changes;
  }

  private *iterate(sql: string, values: BindValue[]): Generator<CacheEntry> {
    const statement = this.db.prepare<BindValue[], PostRow>(sql);
    for (const row of statement.iterate(...values)) {
      const entry = rowToEntry(row);
      if (entry) yield entry;
    }
  }
}
