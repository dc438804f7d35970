import path from 'node:path';
import cron from 'node-cron';
import { logger } from './logger.js';
import { ConfigError } from './errors.js';

export type FeedProvider = 'twitterapi-io' | 'x-api';

export interface PipelineSettings {
  // Scheduling
  collectSchedule: string; // cron expression (UTC)
  analyzeSchedule: string;

  // Collection
  feedProvider: FeedProvider;
  lookbackHours: number;
  minRequestIntervalMs: number;
  maxRateLimitAttempts: number;
  maxTransientAttempts: number;
  backoffInitialMs: number;
  backoffMaxMs: number;
  requestTimeoutMs: number;
  maxPagesPerAccount: number;
  originalsOnly: boolean;
  freshnessHours: number; // 0 fetches every account on every run

  // Storage
  dbPath: string;
  configDir: string;

  // Narrative
  enableNarrative: boolean;
  narrativeModel: string;
  narrativeMaxTokens: number;
  llmMinIntervalMs: number;

  // API
  twitterApiKey?: string;
  twitterBearerToken?: string;
  anthropicApiKey?: string;
}

const DEFAULT_SETTINGS: PipelineSettings = {
  collectSchedule: '0 */4 * * *', // every 4 hours
  analyzeSchedule: '30 6,18 * * *', // 6:30am and 6:30pm UTC

  feedProvider: 'twitterapi-io',
  lookbackHours: 24,
  minRequestIntervalMs: 5000,
  maxRateLimitAttempts: 3,
  maxTransientAttempts: 3,
  backoffInitialMs: 2000,
  backoffMaxMs: 60000,
  requestTimeoutMs: 30000,
  maxPagesPerAccount: 3,
  originalsOnly: true,
  freshnessHours: 1,

  dbPath: 'data/posts.db',
  configDir: 'config',

  enableNarrative: true,
  narrativeModel: 'claude-3-5-haiku-20241022',
  narrativeMaxTokens: 1500,
  llmMinIntervalMs: 20000
};

function envNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

function envFlag(env: NodeJS.ProcessEnv, key: string): boolean | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  return raw === 'true' || raw === '1';
}

function envProvider(env: NodeJS.ProcessEnv): FeedProvider | undefined {
  const raw = env.FEED_PROVIDER;
  if (raw === undefined || raw === '') return undefined;
  if (raw === 'twitterapi-io' || raw === 'x-api') return raw;
  throw new ConfigError(`FEED_PROVIDER must be "twitterapi-io" or "x-api", got "${raw}"`);
}

function assignDefined<K extends keyof PipelineSettings>(
  target: Partial<PipelineSettings>,
  key: K,
  value: PipelineSettings[K] | undefined
) {
  if (value !== undefined) target[key] = value;
}

export class Config {
  private settings: PipelineSettings;

  constructor(overrides: Partial<PipelineSettings> = {}, env: NodeJS.ProcessEnv = process.env) {
    const fromEnv: Partial<PipelineSettings> = {};
    assignDefined(fromEnv, 'collectSchedule', env.COLLECT_SCHEDULE || undefined);
    assignDefined(fromEnv, 'analyzeSchedule', env.ANALYZE_SCHEDULE || undefined);
    assignDefined(fromEnv, 'feedProvider', envProvider(env));
    assignDefined(fromEnv, 'lookbackHours', envNumber(env, 'LOOKBACK_HOURS'));
    assignDefined(fromEnv, 'minRequestIntervalMs', envNumber(env, 'MIN_REQUEST_INTERVAL_MS'));
    assignDefined(fromEnv, 'maxPagesPerAccount', envNumber(env, 'MAX_PAGES_PER_ACCOUNT'));
    assignDefined(fromEnv, 'originalsOnly', envFlag(env, 'ORIGINALS_ONLY'));
    assignDefined(fromEnv, 'freshnessHours', envNumber(env, 'FRESHNESS_HOURS'));
    assignDefined(fromEnv, 'dbPath', env.CACHE_DB_PATH || undefined);
    assignDefined(fromEnv, 'configDir', env.CONFIG_DIR || undefined);
    assignDefined(fromEnv, 'enableNarrative', envFlag(env, 'ENABLE_NARRATIVE'));
    assignDefined(fromEnv, 'narrativeModel', env.NARRATIVE_MODEL || undefined);
    assignDefined(fromEnv, 'twitterApiKey', env.TWITTER_API_KEY || undefined);
    assignDefined(fromEnv, 'twitterBearerToken', env.TWITTER_BEARER_TOKEN || undefined);
    assignDefined(fromEnv, 'anthropicApiKey', env.ANTHROPIC_API_KEY || undefined);

    this.settings = {
      ...DEFAULT_SETTINGS,
      ...fromEnv,
      ...overrides
    };

    this.validateConfig();
  }

  get<K extends keyof PipelineSettings>(key: K): PipelineSettings[K] {
    return this.settings[key];
  }

  set<K extends keyof PipelineSettings>(key: K, value: PipelineSettings[K]) {
    logger.warn(`Config updated: ${key} = ${String(value)}`);
    this.settings[key] = value;
    this.validateConfig();
  }

  getAll(): PipelineSettings {
    return { ...this.settings };
  }

  configFile(name: string): string {
    return path.resolve(this.settings.configDir, name);
  }

  private validateConfig() {
    const s = this.settings;

    if (s.feedProvider === 'twitterapi-io' && !s.twitterApiKey) {
      logger.warn('Missing required config: twitterApiKey (TWITTER_API_KEY)');
    }
    if (s.feedProvider === 'x-api' && !s.twitterBearerToken) {
      logger.warn('Missing required config: twitterBearerToken (TWITTER_BEARER_TOKEN)');
    }

    if (s.lookbackHours <= 0 || s.lookbackHours > 24 * 30) {
      throw new ConfigError('lookbackHours must be between 0 and 720');
    }
    if (s.minRequestIntervalMs < 0) {
      throw new ConfigError('minRequestIntervalMs must not be negative');
    }
    if (s.maxRateLimitAttempts < 1 || s.maxRateLimitAttempts > 10) {
      throw new ConfigError('maxRateLimitAttempts must be between 1 and 10');
    }
    if (s.maxTransientAttempts < 1 || s.maxTransientAttempts > 10) {
      throw new ConfigError('maxTransientAttempts must be between 1 and 10');
    }
    if (s.backoffInitialMs < 0 || s.backoffMaxMs < s.backoffInitialMs) {
      throw new ConfigError('backoffMaxMs must be at least backoffInitialMs');
    }
    if (s.freshnessHours < 0 || s.freshnessHours > 24 * 7) {
      throw new ConfigError('freshnessHours must be between 0 and 168');
    }
    if (s.maxPagesPerAccount < 1 || s.maxPagesPerAccount > 50) {
      throw new ConfigError('maxPagesPerAccount must be between 1 and 50');
    }
    for (const [key, expression] of [
      ['collectSchedule', s.collectSchedule],
      ['analyzeSchedule', s.analyzeSchedule]
    ] as const) {
      if (!cron.validate(expression)) {
        throw new ConfigError(`${key} is not a valid cron expression: "${expression}"`);
      }
    }
  }

  logConfig() {
    const safe = { ...this.settings };
    if (safe.twitterApiKey) safe.twitterApiKey = '***';
    if (safe.twitterBearerToken) safe.twitterBearerToken = '***';
    if (safe.anthropicApiKey) safe.anthropicApiKey = '***';

    logger.info('Current config', safe);
  }
}
