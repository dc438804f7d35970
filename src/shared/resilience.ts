export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitterPercent: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitterPercent: 10
};

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise(resolve => setTimeout(resolve, ms))
};

/**
 * Delay before retry number `attempt` (1-based): exponential in the attempt,
 * capped at maxDelayMs, with up to jitterPercent added on top.
 */
export function backoffDelay(
  attempt: number,
  config: Pick<RetryConfig, 'initialDelayMs' | 'maxDelayMs' | 'backoffMultiplier' | 'jitterPercent'>,
  random: () => number = Math.random
): number {
  const base = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt - 1);
  const capped = Math.min(base, config.maxDelayMs);
  const jitter = random() * (config.jitterPercent / 100) * capped;
  return Math.min(capped + jitter, config.maxDelayMs);
}
