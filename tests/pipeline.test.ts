import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { Aggregator } from '../src/analyzers/aggregator.js';
import { Categorizer } from '../src/analyzers/categorizer.js';
import { Narrator, TextCompleter } from '../src/analyzers/claude.js';
import { Lexicon } from '../src/analyzers/lexicon.js';
import { SentimentResult, SentimentScorer } from '../src/analyzers/scorer.js';
import { Collector } from '../src/collectors/collector.js';
import { FeedClient } from '../src/collectors/feed-client.js';
import { Pipeline } from '../src/pipeline.js';
import { ReportDataBuilder } from '../src/publisher/report-data.js';
import { openDatabase } from '../src/shared/db.js';
import { Monitor } from '../src/shared/monitor.js';
import { PostCache } from '../src/shared/post-cache.js';
import { RateLimiter } from '../src/shared/rate-limiter.js';
import { Account } from '../src/shared/types.js';
import { FakeClock, HOUR, NOW, ScriptedTransport, rawPost } from './helpers.js';

const TAXONOMY = ['crypto', 'macro', 'general'];

const lexicon = Lexicon.fromDefinition({
  entries: [
    { term: 'bullish', weight: 2, tags: ['bullish'] },
    { term: 'crash', weight: -2, tags: ['bearish', 'risk'] }
  ]
});

const categorizer = Categorizer.fromDefinition({
  taxonomy: TAXONOMY,
  defaultCategory: 'general',
  rules: [
    { category: 'crypto', keywords: ['bitcoin'] },
    { category: 'macro', keywords: ['fed'] }
  ]
});

class PickyScorer extends SentimentScorer {
  override score(text: string): SentimentResult {
    if (text.includes('garbled')) throw new Error('unscorable text');
    return super.score(text);
  }
}

const accounts: Account[] = [
  { handle: 'alice', priorityTier: 'high' },
  { handle: 'bob', priorityTier: 'low' }
];

describe('Pipeline', () => {
  let db: Database.Database;
  let clock: FakeClock;
  let transport: ScriptedTransport;
  let monitor: Monitor;

  interface BuildOptions {
    completer?: TextCompleter | null;
    scorer?: SentimentScorer;
    minIntervalMs?: number;
  }

  function build(version: string, { completer = null, scorer, minIntervalMs = 0 }: BuildOptions = {}) {
    const cache = new PostCache(db, version);
    const feed = new FeedClient(transport, new RateLimiter({ minIntervalMs, clock }), { clock, random: () => 0 });
    const pipeline = new Pipeline({
      accounts,
      collector: new Collector(feed, cache, { clock }),
      cache,
      scorer: scorer ?? new SentimentScorer(lexicon),
      categorizer,
      aggregator: new Aggregator(TAXONOMY),
      builder: new ReportDataBuilder(),
      narrator: completer ? new Narrator(completer, new RateLimiter({ minIntervalMs: 0, clock })) : null,
      monitor,
      clock,
      lookbackHours: 24
    });
    return { pipeline, cache };
  }

  beforeEach(() => {
    db = openDatabase(':memory:');
    clock = new FakeClock();
    monitor = new Monitor();
    transport = new ScriptedTransport()
      .always('alice', {
        posts: [
          rawPost({ id: 'a1', account: 'alice', text: 'Bitcoin looks bullish', likeCount: 4 }),
          rawPost({ id: 'a2', account: 'alice', text: 'The Fed could crash the party', createdAt: NOW - 2 * HOUR })
        ],
        nextCursor: null
      })
      .always('bob', {
        posts: [rawPost({ id: 'b1', account: 'bob', text: 'Lunch time', createdAt: NOW - 3 * HOUR })],
        nextCursor: null
      });
  });

  afterEach(() => {
    db.close();
  });

  it('collects, scores and reports in one run', async () => {
    const { pipeline, cache } = build('v1');

    const { collection, report } = await pipeline.run();

    expect(collection.newCount).toBe(3);
    expect(report.totalPosts).toBe(3);
    expect(report.categories.map(stats => [stats.category, stats.postCount])).toEqual([
      ['crypto', 1],
      ['macro', 1],
      ['general', 1]
    ]);
    expect(report.newPosts.map(post => post.id)).toEqual(['a1', 'a2', 'b1']);
    expect(report.collection).toBe(collection);
    expect(cache.get('a1')).toMatchObject({ category: 'crypto', sentimentScore: 0.5, signals: ['bullish'] });
    expect(cache.get('a2')).toMatchObject({ category: 'macro', sentimentScore: -0.5, signals: ['bearish', 'risk'] });
  });

  it('leaves every cached post with a taxonomy category', async () => {
    const { pipeline, cache } = build('v1');

    await pipeline.run();

    const categories = Array.from(cache.all(), post => post.category);
    expect(categories).toHaveLength(3);
    for (const category of categories) {
      expect(TAXONOMY).toContain(category);
    }
    expect(cache.staleCount()).toBe(0);
  });

  it('keeps category counts consistent with the total', async () => {
    const { pipeline } = build('v1');

    const { report } = await pipeline.run();

    expect(report.categories.reduce((sum, stats) => sum + stats.postCount, 0)).toBe(report.totalPosts);
  });

  it('does not re-score posts already scored under the current version', async () => {
    const { pipeline } = build('v1');
    await pipeline.run();
    const scoredAfterFirst = monitor.getMetrics().postsScored;

    await pipeline.scoreAndAggregate();

    expect(scoredAfterFirst).toBe(3);
    expect(monitor.getMetrics().postsScored).toBe(3);
  });

  it('re-scores without re-fetching when the cache version changes', async () => {
    await build('v1').pipeline.run();
    const requestsBefore = transport.requests.length;
    const { pipeline, cache } = build('v2');

    expect(cache.staleCount()).toBe(3);
    const report = await pipeline.scoreAndAggregate();

    expect(report.cacheVersion).toBe('v2');
    expect(report.totalPosts).toBe(3);
    expect(cache.staleCount()).toBe(0);
    expect(transport.requests).toHaveLength(requestsBefore);
  });

  it('re-scores everything when forced', async () => {
    const { pipeline } = build('v1');
    await pipeline.run();

    await pipeline.scoreAndAggregate({ force: true });

    expect(monitor.getMetrics().postsScored).toBe(6);
  });

  it('only reports posts inside the lookback window', async () => {
    const { pipeline } = build('v1');
    await pipeline.collect();

    const report = await pipeline.scoreAndAggregate({ lookbackHours: 2.5 });

    expect(report.totalPosts).toBe(2);
    expect(report.newPosts).toEqual([]);
  });

  it('categorizes posts collected just before the analysis window opens', async () => {
    transport = new ScriptedTransport()
      .always('alice', {
        posts: [rawPost({ id: 'edge', account: 'alice', text: 'Bitcoin grinding higher', createdAt: NOW - 24 * HOUR + 30_000 })],
        nextCursor: null
      })
      .always('bob', {
        posts: [rawPost({ id: 'b1', account: 'bob', text: 'Lunch time', createdAt: NOW - 3 * HOUR })],
        nextCursor: null
      });
    const { pipeline, cache } = build('v1', { minIntervalMs: 60_000 });

    const { collection, report } = await pipeline.run();

    expect(collection.newCount).toBe(2);
    expect(report.window.since).toBe(new Date(NOW - 24 * HOUR + 60_000).toISOString());
    expect(report.totalPosts).toBe(1);
    expect(cache.get('edge')).toMatchObject({ category: 'crypto', sentimentScore: 0 });
    expect(cache.staleCount()).toBe(0);
  });

  it('scores stale posts that fall outside the reporting window', async () => {
    const { pipeline, cache } = build('v1');
    cache.upsertRaw(rawPost({ id: 'old', text: 'Fed minutes out', createdAt: NOW - 72 * HOUR }), NOW);

    const report = await pipeline.scoreAndAggregate();

    expect(report.totalPosts).toBe(0);
    expect(cache.get('old')).toMatchObject({ category: 'macro', sentimentScore: 0 });
    expect(monitor.getMetrics().postsScored).toBe(1);
  });

  it('skips a post that cannot be scored and reports the rest', async () => {
    transport.always('bob', {
      posts: [rawPost({ id: 'b1', account: 'bob', text: 'garbled feed text', createdAt: NOW - 3 * HOUR })],
      nextCursor: null
    });
    const { pipeline, cache } = build('v1', { scorer: new PickyScorer(lexicon) });

    const { collection, report } = await pipeline.run();

    expect(collection.newCount).toBe(3);
    expect(report.totalPosts).toBe(2);
    expect(report.categories.map(stats => [stats.category, stats.postCount])).toEqual([
      ['crypto', 1],
      ['macro', 1],
      ['general', 0]
    ]);
    expect(report.newPosts.map(post => post.id)).toEqual(['a1', 'a2']);
    expect(cache.get('b1')?.category).toBeNull();
    expect(cache.staleCount()).toBe(1);
  });

  it('skips a post deleted from the cache before its scores are written', async () => {
    const { pipeline, cache } = build('v1');
    await pipeline.collect();
    const removeOnScore = new (class extends SentimentScorer {
      override score(text: string): SentimentResult {
        if (text === 'Lunch time') db.prepare("DELETE FROM posts WHERE id = 'b1'").run();
        return super.score(text);
      }
    })(lexicon);
    const { pipeline: analyzer } = build('v2', { scorer: removeOnScore });

    const report = await analyzer.scoreAndAggregate();

    expect(report.totalPosts).toBe(2);
    expect(cache.has('b1')).toBe(false);
    expect(monitor.getMetrics().postsScored).toBe(2);
  });

  it('reports an empty cache with every category present', async () => {
    const { pipeline } = build('v1');

    const report = await pipeline.scoreAndAggregate();

    expect(report.totalPosts).toBe(0);
    expect(report.categories.map(stats => stats.topPost)).toEqual([null, null, null]);
  });

  it('still produces the report when the narrative fails', async () => {
    const { pipeline } = build('v1', {
      completer: {
        complete: async () => {
          throw new Error('request timed out');
        }
      }
    });

    const { report } = await pipeline.run();

    expect(report.narrative).toBeNull();
    expect(report.totalPosts).toBe(3);
    expect(monitor.getMetrics().narrativesFailed).toBe(1);
  });

  it('attaches the narrative when one is produced', async () => {
    const { pipeline } = build('v1', { completer: { complete: async () => 'Mixed session.' } });

    const { report } = await pipeline.run();

    expect(report.narrative).toBe('Mixed session.');
  });
});
