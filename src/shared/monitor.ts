import { logger } from './logger.js';

export interface HealthMetrics {
  uptime: number; // milliseconds
  runsCompleted: number;
  runsFailed: number;
  postsFetched: number;
  postsNew: number;
  postsScored: number;
  accountErrors: number;
  narrativesGenerated: number;
  narrativesFailed: number;
  lastError: string | null;
  lastErrorTime: number | null;
  successRate: number; // 0-100
}

export interface PerformanceMetrics {
  avgCollectTime: number; // ms
  avgAnalyzeTime: number; // ms
  p95CollectTime: number;
  p95AnalyzeTime: number;
}

export type RunKind = 'collect' | 'analyze';

// Keep the latency windows bounded in a long-running scheduler.
const MAX_SAMPLES = 500;

export class Monitor {
  private startTime = Date.now();
  private metrics: HealthMetrics = {
    uptime: 0,
    runsCompleted: 0,
    runsFailed: 0,
    postsFetched: 0,
    postsNew: 0,
    postsScored: 0,
    accountErrors: 0,
    narrativesGenerated: 0,
    narrativesFailed: 0,
    lastError: null,
    lastErrorTime: null,
    successRate: 100
  };

  private performanceData: Record<RunKind, number[]> = {
    collect: [],
    analyze: []
  };

  recordRunStart() {
    return Date.now();
  }

  recordRunComplete(kind: RunKind, startTime: number, success: boolean) {
    const samples = this.performanceData[kind];
    samples.push(Date.now() - startTime);
    if (samples.length > MAX_SAMPLES) samples.shift();

    if (success) {
      this.metrics.runsCompleted++;
    } else {
      this.metrics.runsFailed++;
    }
    this.updateSuccessRate();
  }

  recordCollection(fetched: number, added: number, accountErrors: number) {
    this.metrics.postsFetched += fetched;
    this.metrics.postsNew += added;
    this.metrics.accountErrors += accountErrors;
  }

  recordScoring(count: number) {
    this.metrics.postsScored += count;
  }

  recordNarrative(success: boolean) {
    if (success) {
      this.metrics.narrativesGenerated++;
    } else {
      this.metrics.narrativesFailed++;
    }
  }

  recordError(error: Error) {
    this.metrics.lastError = error.message;
    this.metrics.lastErrorTime = Date.now();
    logger.error(`Monitor recorded error: ${error.message}`);
  }

  getMetrics(): HealthMetrics {
    return {
      ...this.metrics,
      uptime: Date.now() - this.startTime
    };
  }

  getPerformanceMetrics(): PerformanceMetrics {
    const percentile = (arr: number[], p: number) => {
      const sorted = [...arr].sort((a, b) => a - b);
      const index = Math.ceil((p / 100) * sorted.length) - 1;
      return sorted[Math.max(0, index)] ?? 0;
    };

    return {
      avgCollectTime: this.getAverage(this.performanceData.collect),
      avgAnalyzeTime: this.getAverage(this.performanceData.analyze),
      p95CollectTime: percentile(this.performanceData.collect, 95),
      p95AnalyzeTime: percentile(this.performanceData.analyze, 95)
    };
  }

  getDashboard() {
    const health = this.getMetrics();
    const perf = this.getPerformanceMetrics();
    const uptimeHours = (health.uptime / (1000 * 60 * 60)).toFixed(1);
    const status = health.successRate > 90 ? '✅ HEALTHY' : health.successRate > 70 ? '⚠️  DEGRADED' : '❌ CRITICAL';

    return [
      '=== Feed Sentiment Pipeline ===',
      `Uptime: ${uptimeHours}h | Success rate: ${health.successRate.toFixed(1)}% | ${status}`,
      `Runs: ${health.runsCompleted} ok, ${health.runsFailed} failed`,
      `Posts: ${health.postsFetched} fetched, ${health.postsNew} new, ${health.postsScored} scored`,
      `Account errors: ${health.accountErrors}`,
      `Narratives: ${health.narrativesGenerated} ok, ${health.narrativesFailed} failed`,
      `Collect: avg ${perf.avgCollectTime.toFixed(0)}ms | p95 ${perf.p95CollectTime.toFixed(0)}ms`,
      `Analyze: avg ${perf.avgAnalyzeTime.toFixed(0)}ms | p95 ${perf.p95AnalyzeTime.toFixed(0)}ms`,
      `Last error: ${health.lastError ? health.lastError.slice(0, 80) : 'None'}${
        health.lastErrorTime ? ` at ${new Date(health.lastErrorTime).toISOString()}` : ''
      }`
    ].join('\n');
  }

  private getAverage(arr: number[]): number {
    if (arr.length === 0) return 0;
    return arr.reduce((a, b) => a + b, 0) / arr.length;
  }

  private updateSuccessRate() {
    const total = this.metrics.runsCompleted + this.metrics.runsFailed;
    this.metrics.successRate = total === 0 ? 100 : (this.metrics.runsCompleted / total) * 100;
  }
}
