#!/usr/bin/env node
/**
 * Paper Digest Pipeline
 *
 * Fetches the day's arXiv papers, classifies them with a language model and
 * delivers a digest to the configured channels.
 *
 * Usage:
 *   node dist/index.js --run [--date=YYYY-MM-DD] [--force]  - Run pipeline once and exit
 *   node dist/index.js --service                            - Run on the profile's cron schedule
 *   node dist/index.js --status [--days=7]                  - Stage history
 *   node dist/index.js --papers [--date=...] [--keyword=...] - Classified papers
 *   node dist/index.js --config                             - Effective configuration
 *   node dist/index.js                                      - Default: service mode
 */

import { parseCliArgs, type CliCommand } from './cli.js';
import { config, loadProfile } from './config/index.js';
import { createPipelineContext } from './context.js';
import { closeDatabase, initDatabase } from './db/index.js';
import { getStats } from './db/queries.js';
import { slimResult } from './output/slim.js';
import { runPipeline } from './pipeline.js';
import { describeConfig, queryDocuments, queryStatus } from './reports.js';
import { startScheduler, stopScheduler } from './scheduler.js';
import { logger } from './utils/logger.js';

function print(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

async function execute(command: CliCommand): Promise<number> {
  const profile = loadProfile(config.profile.path);

  if (command.kind === 'config') {
    print(slimResult('config', describeConfig(profile)));
    return 0;
  }

  initDatabase(config.database.path);
  const stats = getStats();
  logger.info(
    { documents: stats.totalDocuments, classified: stats.totalClassified, lastRun: stats.lastRunDate ?? 'never' },
    'Database ready'
  );
  const ctx = createPipelineContext(profile);

  switch (command.kind) {
    case 'run': {
      const controller = new AbortController();
      const abort = (): void => controller.abort();
      process.once('SIGINT', abort);
      process.once('SIGTERM', abort);
      try {
        const summary = await runPipeline(ctx, {
          targetDate: command.targetDate,
          force: command.force,
          signal: controller.signal,
        });
        print(slimResult('run-summary', summary));
        return summary.status === 'failed' ? 1 : 0;
      } finally {
        process.off('SIGINT', abort);
        process.off('SIGTERM', abort);
        closeDatabase();
      }
    }
    case 'status': {
      const report = await queryStatus(ctx.store, { days: command.days });
      print(slimResult('status-history', report));
      closeDatabase();
      return 0;
    }
    case 'papers': {
      const listing = queryDocuments({ date: command.date, keyword: command.keyword });
      print({ date: listing.date, ...slimResult('document-list', listing) });
      closeDatabase();
      return 0;
    }
    case 'service': {
      const shutdown = (): void => {
        logger.info('Shutting down...');
        stopScheduler();
        closeDatabase();
        process.exit(0);
      };
      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);

      startScheduler(ctx);
      logger.info('Running in service mode - waiting for scheduler triggers');
      return 0;
    }
  }
}

async function main(): Promise<void> {
  const command = parseCliArgs(process.argv.slice(2));
  logger.info({ env: config.app.env, command: command.kind }, 'Starting application');
  process.exitCode = await execute(command);
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Application failed');
  closeDatabase();
  process.exit(1);
});
