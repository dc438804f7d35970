import Database from 'better-sqlite3';
import { Aggregator } from './analyzers/aggregator.js';
import { Categorizer } from './analyzers/categorizer.js';
import { AnthropicCompleter, Narrator, TextCompleter } from './analyzers/claude.js';
import { loadLexicon } from './analyzers/lexicon.js';
import { SentimentScorer } from './analyzers/scorer.js';
import { Collector } from './collectors/collector.js';
import { FeedClient, FeedTransport } from './collectors/feed-client.js';
import { TwitterApiIoTransport } from './collectors/twitterapi-io.js';
import { XApiTransport } from './collectors/x-api.js';
import { Pipeline } from './pipeline.js';
import { ReportDataBuilder } from './publisher/report-data.js';
import { Config } from './shared/config.js';
import { loadAccounts, loadCategories } from './shared/config-files.js';
import { openDatabase } from './shared/db.js';
import { ConfigError } from './shared/errors.js';
import { logger } from './shared/logger.js';
import { Monitor } from './shared/monitor.js';
import { PostCache } from './shared/post-cache.js';
import { RateLimiter } from './shared/rate-limiter.js';
import { Clock, systemClock } from './shared/resilience.js';

const HOUR_MS = 60 * 60 * 1000;

export interface PipelineOverrides {
  transport?: FeedTransport;
  completer?: TextCompleter | null;
  db?: Database.Database;
  monitor?: Monitor;
  clock?: Clock;
}

export interface PipelineContext {
  pipeline: Pipeline;
  cache: PostCache;
  monitor: Monitor;
  close(): void;
}

export function createTransport(config: Config): FeedTransport {
  if (config.get('feedProvider') === 'x-api') {
    const bearerToken = config.get('twitterBearerToken');
    if (!bearerToken) throw new ConfigError('TWITTER_BEARER_TOKEN is required for the x-api provider');
    return new XApiTransport({ bearerToken });
  }

  const apiKey = config.get('twitterApiKey');
  if (!apiKey) throw new ConfigError('TWITTER_API_KEY is required for the twitterapi-io provider');
  return new TwitterApiIoTransport({ apiKey, timeoutMs: config.get('requestTimeoutMs') });
}

function createCompleter(config: Config): TextCompleter | null {
  if (!config.get('enableNarrative')) return null;
  const apiKey = config.get('anthropicApiKey');
  if (!apiKey) {
    logger.warn('ANTHROPIC_API_KEY not set, narratives disabled');
    return null;
  }
  return new AnthropicCompleter(apiKey, config.get('narrativeModel'), config.get('narrativeMaxTokens'));
}

/**
 * Builds a pipeline from configuration files and settings. Fails fast on any
 * missing or malformed configuration.
 */
export function createPipeline(config: Config, overrides: PipelineOverrides = {}): PipelineContext {
  const clock = overrides.clock ?? systemClock;

  const accounts = loadAccounts(config.configFile('accounts.json'));
  const categories = loadCategories(config.configFile('categories.json'));
  const lexicon = loadLexicon(config.configFile('lexicon.json'));
  const categorizer = new Categorizer(categories, accounts);
  const version = `${lexicon.fingerprint()}.${categorizer.fingerprint()}`;

  const transport = overrides.transport ?? createTransport(config);
  const db = overrides.db ?? openDatabase(config.get('dbPath'));
  const cache = new PostCache(db, version);
  const monitor = overrides.monitor ?? new Monitor();

  const limiter = new RateLimiter({ name: transport.name, minIntervalMs: config.get('minRequestIntervalMs'), clock });
  const feed = new FeedClient(transport, limiter, {
    maxRateLimitAttempts: config.get('maxRateLimitAttempts'),
    maxTransientAttempts: config.get('maxTransientAttempts'),
    maxPages: config.get('maxPagesPerAccount'),
    retry: {
      initialDelayMs: config.get('backoffInitialMs'),
      maxDelayMs: config.get('backoffMaxMs'),
      backoffMultiplier: 2,
      jitterPercent: 10
    },
    clock
  });

  const completer = overrides.completer === undefined ? createCompleter(config) : overrides.completer;
  const narrator = completer
    ? new Narrator(completer, new RateLimiter({ name: 'llm', minIntervalMs: config.get('llmMinIntervalMs'), clock }))
    : null;

  const pipeline = new Pipeline({
    accounts,
    collector: new Collector(feed, cache, {
      originalsOnly: config.get('originalsOnly'),
      freshForMs: config.get('freshnessHours') * HOUR_MS,
      clock
    }),
    cache,
    scorer: new SentimentScorer(lexicon),
    categorizer,
    aggregator: new Aggregator(categorizer.taxonomy, categories.sentimentThresholds),
    builder: new ReportDataBuilder(),
    narrator,
    monitor,
    clock,
    lookbackHours: config.get('lookbackHours')
  });

  logger.info(`Pipeline ready: ${accounts.length} accounts, ${transport.name}, cache version ${version}`);

  return {
    pipeline,
    cache,
    monitor,
    close: () => {
      if (!overrides.db) db.close();
    }
  };
}
