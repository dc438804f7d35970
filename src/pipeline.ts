import { Aggregator } from './analyzers/aggregator.js';
import { Categorizer } from './analyzers/categorizer.js';
import { Narrator } from './analyzers/claude.js';
import { SentimentScorer } from './analyzers/scorer.js';
import { CollectionResult, Collector } from './collectors/collector.js';
import { ReportData, ReportDataBuilder } from './publisher/report-data.js';
import { errorMessage } from './shared/errors.js';
import { logger } from './shared/logger.js';
import { Monitor } from './shared/monitor.js';
import { PostCache } from './shared/post-cache.js';
import { Clock, systemClock } from './shared/resilience.js';
import { Account, ScoredPost, isScored } from './shared/types.js';

const HOUR_MS = 60 * 60 * 1000;

export interface PipelineDeps {
  accounts: Account[];
  collector: Collector;
  cache: PostCache;
  scorer: SentimentScorer;
  categorizer: Categorizer;
  aggregator: Aggregator;
  builder: ReportDataBuilder;
  narrator: Narrator | null;
  monitor: Monitor;
  clock?: Clock;
  lookbackHours: number;
}

export interface CollectOptions {
  lookbackHours?: number;
  refresh?: boolean;
}

export interface AnalyzeOptions {
  lookbackHours?: number;
  newPostIds?: readonly string[];
  force?: boolean;
  collection?: CollectionResult | null;
}

export interface RunResult {
  collection: CollectionResult;
  report: ReportData;
}

/**
 * Wires collection, scoring and reporting. `collect()` and
 * `scoreAndAggregate()` are independent entry points; either may be re-run
 * at any time.
 */
export class Pipeline {
  private readonly clock: Clock;

  constructor(private readonly deps: PipelineDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  get cache(): PostCache {
    return this.deps.cache;
  }

  get accounts(): readonly Account[] {
    return this.deps.accounts;
  }

  async collect(options: CollectOptions = {}): Promise<CollectionResult> {
    const { collector, monitor, accounts } = this.deps;
    const lookbackHours = options.lookbackHours ?? this.deps.lookbackHours;
    const started = monitor.recordRunStart();

    try {
      const result = await collector.collect(accounts, lookbackHours * HOUR_MS, { refresh: options.refresh });
      monitor.recordCollection(result.fetchedCount, result.newCount, result.errors.length);
      monitor.recordRunComplete('collect', started, true);
      return result;
    } catch (error) {
      monitor.recordRunComplete('collect', started, false);
      if (error instanceof Error) monitor.recordError(error);
      throw error;
    }
  }

  async scoreAndAggregate(options: AnalyzeOptions = {}): Promise<ReportData> {
    const { cache, aggregator, builder, narrator, monitor } = this.deps;
    const lookbackHours = options.lookbackHours ?? this.deps.lookbackHours;
    const started = monitor.recordRunStart();

    try {
      const until = this.clock.now();
      const since = until - lookbackHours * HOUR_MS;
      const version = cache.version();

      const { rescored, failed } = this.rescoreStale(version, options.force ?? false);
      monitor.recordScoring(rescored);

      const scored: ScoredPost[] = [];
      for (const entry of cache.entries({ since })) {
        if (failed.has(entry.post.id) || entry.cacheVersion !== version || !isScored(entry.post)) continue;
        scored.push(entry.post);
      }
      logger.info(`Scored ${rescored} cached posts, ${failed.size} skipped (cache version ${version})`);

      const newIds = new Set(options.newPostIds ?? []);
      const aggregate = aggregator.aggregate(scored);
      const report = builder.build({
        generatedAt: until,
        since,
        until,
        cacheVersion: version,
        aggregate,
        newPosts: scored.filter(post => newIds.has(post.id)),
        collection: options.collection ?? null
      });

      let narrative: string | null = null;
      if (narrator && report.totalPosts > 0) {
        narrative = await narrator.write(report);
        monitor.recordNarrative(narrative !== null);
      }

      monitor.recordRunComplete('analyze', started, true);
      logger.info(`Report built: ${report.totalPosts} posts across ${report.categories.length} categories`);
      return builder.withNarrative(report, narrative);
    } catch (error) {
      monitor.recordRunComplete('analyze', started, false);
      if (error instanceof Error) monitor.recordError(error);
      throw error;
    }
  }

  async run(options: CollectOptions = {}): Promise<RunResult> {
    const collection = await this.collect(options);
    const report = await this.scoreAndAggregate({
      lookbackHours: options.lookbackHours,
      newPostIds: collection.newPostIds,
      collection
    });
    return { collection, report };
  }

  /**
   * Brings every cached post's derived fields up to the current version,
   * inside the reporting window or not. With `force`, every post is scored
   * again. A post that cannot be scored or written back is logged and left
   * out of the report.
   */
  private rescoreStale(version: string, force: boolean): { rescored: number; failed: Set<string> } {
    const { cache, scorer, categorizer } = this.deps;
    // Materialized first: the connection cannot write while a query is open.
    const pending = Array.from(force ? cache.entries() : cache.staleEntries());
    const failed = new Set<string>();
    let rescored = 0;

    for (const { post } of pending) {
      try {
        const { score, signals } = scorer.score(post.text);
        const category = categorizer.categorize(post);
        cache.updateDerived(post.id, { category, sentimentScore: score, signals }, version);
        rescored++;
      } catch (error) {
        failed.add(post.id);
        logger.error(`Skipping post ${post.id}: ${errorMessage(error)}`);
      }
    }
    return { rescored, failed };
  }
}
