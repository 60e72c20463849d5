#!/usr/bin/env node
/**
 * Compliance News Digest
 *
 * Collects compliance and regulatory news from RSS/Atom feeds and scraped
 * government pages, keeps unseen articles that match the keyword lists,
 * translates foreign-language ones and e-mails a digest.
 *
 * Usage:
 *   node dist/index.js              - Run once and exit (default)
 *   node dist/index.js --run        - Same as above
 *   node dist/index.js --schedule   - Run once, then on CRON_SCHEDULE
 *   node dist/index.js --dry-run    - Fetch and render only; nothing is stored or sent
 */

import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { createPipelineContext } from './bootstrap.js';
import { runPipeline, type PipelineOptions } from './pipeline.js';
import { executeExclusive, startScheduler, stopScheduler } from './scheduler.js';

const args = process.argv.slice(2);
const isScheduled = args.includes('--schedule');
const options: PipelineOptions = { dryRun: args.includes('--dry-run') };

async function executePipeline(): Promise<void> {
  const result = await runPipeline(createPipelineContext(config), options);

  logger.info('');
  logger.info('Pipeline Complete:');
  logger.info(`  ✓ Matched:    ${result.matched} articles`);
  logger.info(`  ✓ Dispatched: ${result.dispatched ? 'yes' : 'no'}`);
  if (result.failedSources > 0) {
    logger.info(`  ⚠ Failed sources: ${result.failedSources}`);
  }
  logger.info(`  ⏱ Duration:   ${(result.durationMs / 1000).toFixed(1)}s`);
}

async function main(): Promise<void> {
  logger.info(
    { env: config.app.env, mode: isScheduled ? 'schedule' : 'run-once', dryRun: options.dryRun },
    'Starting compliance news digest'
  );

  if (!isScheduled) {
    await executePipeline();
    return;
  }

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutting down...');
    stopScheduler();
    process.exit(0);
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  logger.info('Running initial pipeline...');
  await executeExclusive(executePipeline);

  startScheduler(executePipeline, config.scheduler);
  logger.info('Scheduler running. Press Ctrl+C to stop.');
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Application failed');
  process.exit(1);
});
