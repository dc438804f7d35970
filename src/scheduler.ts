import cron, { type ScheduledTask } from 'node-cron';
import type { Pipeline } from './pipeline.js';
import { errorMessage } from './shared/errors.js';
import { logger } from './shared/logger.js';

export type JobName = 'collect' | 'analyze';

export type SchedulablePipeline = Pick<Pipeline, 'collect' | 'scoreAndAggregate'>;

export interface ScheduleOptions {
  collectSchedule: string;
  analyzeSchedule: string;
}

interface JobState {
  running: boolean;
  lastRun: number | null;
  lastError: string | null;
}

/**
 * Runs collection and analysis on cron schedules (UTC). A job whose previous
 * run is still in progress skips the tick rather than overlapping it.
 */
export class PipelineScheduler {
  private isRunning = false;
  private tasks: ScheduledTask[] = [];
  private readonly jobs: Record<JobName, JobState> = {
    collect: { running: false, lastRun: null, lastError: null },
    analyze: { running: false, lastRun: null, lastError: null }
  };

  constructor(
    private readonly pipeline: SchedulablePipeline,
    private readonly schedules: ScheduleOptions
  ) {}

  start() {
    if (this.isRunning) {
      logger.warn('Pipeline scheduler already running');
      return;
    }

    this.isRunning = true;
    this.tasks = [
      cron.schedule(this.schedules.collectSchedule, () => this.trigger('collect'), { timezone: 'UTC' }),
      cron.schedule(this.schedules.analyzeSchedule, () => this.trigger('analyze'), { timezone: 'UTC' })
    ];

    logger.info(
      `Pipeline scheduler started (collect: ${this.schedules.collectSchedule}, analyze: ${this.schedules.analyzeSchedule})`
    );
  }

  stop() {
    for (const task of this.tasks) task.stop();
    this.tasks = [];
    this.isRunning = false;
    logger.info('Pipeline scheduler stopped');
  }

  // Manual trigger, same overlap guard as the cron ticks
  async triggerNow(job: JobName): Promise<boolean> {
    logger.info(`Triggering ${job} immediately...`);
    return this.trigger(job);
  }

  /** Resolves to false when the job was already running and the tick was skipped. */
  private async trigger(job: JobName): Promise<boolean> {
    const state = this.jobs[job];
    if (state.running) {
      logger.warn(`Skipping ${job}: previous run still in progress`);
      return false;
    }

    state.running = true;
    try {
      logger.info(`=== ${job} cycle starting ===`);
      const startTime = Date.now();
      if (job === 'collect') {
        await this.pipeline.collect();
      } else {
        const report = await this.pipeline.scoreAndAggregate();
        for (const line of report.insights) logger.info(line);
      }
      state.lastRun = Date.now();
      state.lastError = null;
      logger.info(`=== ${job} cycle complete (${state.lastRun - startTime}ms) ===`);
    } catch (error) {
      state.lastError = errorMessage(error);
      logger.error(`${job} cycle failed: ${state.lastError}`);
    } finally {
      state.running = false;
    }
    return true;
  }

  getStatus() {
    const describe = (state: JobState) => ({
      running: state.running,
      lastRun: state.lastRun ? new Date(state.lastRun).toISOString() : null,
      lastError: state.lastError
    });
    return {
      running: this.isRunning,
      schedules: { ...this.schedules },
      collect: describe(this.jobs.collect),
      analyze: describe(this.jobs.analyze)
    };
  }
}
