#!/usr/bin/env node

import 'dotenv/config';
import { createPipeline, PipelineContext } from './bootstrap.js';
import { ReportData } from './publisher/report-data.js';
import { Config } from './shared/config.js';
import { errorMessage } from './shared/errors.js';
import { logger } from './shared/logger.js';
import { Post, engagementWeight } from './shared/types.js';
import { CliOptions, parseArgs } from './cli-options.js';

function printReport(report: ReportData, json: boolean) {
  if (json) {
    console.log(JSON.stringify(report, null, 2));
    return;
  }

  console.log(`\n=== SENTIMENT REPORT (${report.window.since} → ${report.window.until}) ===`);
  for (const line of report.insights) console.log(`  ${line}`);

  console.table(
    report.categories.map(stats => ({
      category: stats.category,
      posts: stats.postCount,
      engagement: stats.totalEngagement,
      sentiment: stats.meanSentiment.toFixed(2),
      label: stats.sentimentLabel,
      top: stats.topPost ? `@${stats.topPost.account}` : '-'
    }))
  );

  if (report.narrative) {
    console.log('\n=== NARRATIVE ===');
    console.log(report.narrative);
  }
}

async function withPipeline<T>(config: Config, fn: (context: PipelineContext) => Promise<T> | T): Promise<T> {
  const context = createPipeline(config);
  try {
    return await fn(context);
  } finally {
    context.close();
  }
}

async function runCommand(command: string | undefined, options: CliOptions) {
  const config = new Config();

  switch (command) {
    case 'collect':
      await withPipeline(config, async ({ pipeline }) => {
        const result = await pipeline.collect({ lookbackHours: options.hours, refresh: options.refresh });
        if (options.json) {
          console.log(JSON.stringify(result, null, 2));
          return;
        }
        console.log(`\n=== COLLECTION ===`);
        console.table(result.accounts);
        console.log(`New: ${result.newCount} | Cached: ${result.skippedCount} | Filtered: ${result.filteredCount} | Failed: ${result.failedCount}`);
        for (const error of result.errors) console.log(`  ✗ @${error.account} (${error.kind}): ${error.message}`);
      });
      break;
    case 'analyze':
      await withPipeline(config, async ({ pipeline }) => {
        const report = await pipeline.scoreAndAggregate({ lookbackHours: options.hours, force: options.force });
        printReport(report, options.json);
      });
      break;
    case 'run':
      await withPipeline(config, async ({ pipeline }) => {
        const { report } = await pipeline.run({ lookbackHours: options.hours, refresh: options.refresh });
        printReport(report, options.json);
      });
      break;
    case 'cache:stats':
      await withPipeline(config, ({ cache }) => {
        console.log(`\n=== CACHE (version ${cache.version()}) ===`);
        console.log(`Posts: ${cache.size()} | Needing re-score: ${cache.staleCount()}`);
        console.table(
          cache.summary().map(row => ({
            account: row.account,
            posts: row.postCount,
            lastFetched: new Date(row.lastFetchedAt).toISOString(),
            newestPost: new Date(row.newestPostAt).toISOString()
          }))
        );
      });
      break;
    case 'cache:posts':
      await withPipeline(config, ({ cache }) => {
        const posts: Post[] = [];
        for (const post of cache.all({ category: options.category, account: options.account })) {
          posts.push(post);
          if (posts.length >= options.limit) break;
        }
        console.log(`\n=== POSTS (latest ${options.limit}) ===`);
        posts.forEach((post, i) => {
          console.log(`\n${i + 1}. @${post.account} ${new Date(post.createdAt).toISOString()}`);
          console.log(`   ${post.category ?? '(unscored)'} | sentiment ${post.sentimentScore?.toFixed(2) ?? '-'} | engagement ${engagementWeight(post)}`);
          console.log(`   ${post.text.slice(0, 100)}`);
        });
      });
      break;
    case 'cache:prune': {
      const days = options.days ?? 30;
      if (!options.confirm) {
        console.log(`⚠️  This deletes cached posts older than ${days} days. Run with --confirm to proceed`);
        return;
      }
      await withPipeline(config, ({ cache }) => {
        const removed = cache.prune(Date.now() - days * 24 * 60 * 60 * 1000);
        console.log(`✓ Removed ${removed} posts`);
      });
      break;
    }
    case 'config':
      console.log('\n=== CONFIGURATION ===');
      config.logConfig();
      break;
    case 'help':
    case undefined:
      showHelp();
      break;
    default:
      console.log(`Unknown command: ${command}`);
      showHelp();
      process.exitCode = 1;
  }
}

function showHelp() {
  console.log(`
Feed sentiment pipeline CLI

Commands:
  collect [--hours n] [--refresh]
                                 Fetch recent posts into the cache; --refresh
                                 also fetches accounts fetched recently
  analyze [--hours n] [--force]  Score cached posts and print the report
  run [--hours n] [--refresh]    Collect, then analyze
  cache:stats                    Show cache size and per-account summary
  cache:posts [--limit n] [--category c] [--account a]
                                 Show the latest cached posts
  cache:prune [--days n]         Delete posts older than n days (use --confirm)
  config                         Show current configuration
  help                           Show this help

Add --json to collect, analyze or run for machine-readable output.

Examples:
  npm run cli collect
  npm run cli analyze --hours 12 --json
  npm run cli cache:prune --days 14 --confirm
  `);
}

async function main() {
  const [command, ...rest] = process.argv.slice(2);
  logger.debug(`CLI command: ${command ?? 'help'}`);
  await runCommand(command, parseArgs(rest));
}

main().catch(error => {
  logger.error(`CLI error: ${errorMessage(error)}`);
  process.exit(1);
});
