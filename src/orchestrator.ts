import 'dotenv/config';
import { createPipeline } from './bootstrap.js';
import { PipelineScheduler } from './scheduler.js';
import { Config } from './shared/config.js';
import { errorMessage } from './shared/errors.js';
import { logger } from './shared/logger.js';

async function main() {
  const config = new Config();
  config.logConfig();

  const context = createPipeline(config);
  const scheduler = new PipelineScheduler(context.pipeline, {
    collectSchedule: config.get('collectSchedule'),
    analyzeSchedule: config.get('analyzeSchedule')
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    scheduler.stop();
    context.close();
    logger.info(context.monitor.getDashboard());
    process.exit(0);
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  scheduler.start();
  logger.info('Feed sentiment pipeline started');

  // Run once on startup so the cache is warm before the first analysis tick
  await scheduler.triggerNow('collect');
  await scheduler.triggerNow('analyze');
}

main().catch(error => {
  logger.error(`Startup failed: ${errorMessage(error)}`);
  process.exit(1);
});
