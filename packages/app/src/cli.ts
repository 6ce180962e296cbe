#!/usr/bin/env tsx

/**
 * CLI entry point for the tapecache command
 *
 * Loads the trade log, then answers `<T> <start> <end>` queries read from
 * stdin. Answers go to stdout and everything else to stderr.
 */

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { isTapeCacheError } from '@tapecache/contracts';
import { attachGlobalHandlers, createLogger, gracefulExit, startTimer } from '@tapecache/logger';
import type { Logger } from '@tapecache/logger';
import { InMemoryTradeSource, loadTradeLog } from '@tapecache/trade-source';
import { getConfigSummary, loadConfig } from './config/index.js';
import { QueryProcessor } from './processor.js';
import type { ProcessorStats } from './processor.js';
import { runQueryLoop } from './query-loop.js';

interface CliOptions {
  trades?: string;
  latencyScale?: string;
  logLevel?: string;
  logFormat?: string;
  logFile?: string;
  verify: boolean;
  stats?: boolean;
}

const program = new Command();

program
  .name('tapecache')
  .description('Answer trade count, buy, sell and volume queries over time ranges through a range cache')
  .version('0.1.0')
  .option('-t, --trades <path>', 'Trade log CSV (overrides TRADES_PATH)')
  .option('--latency-scale <n>', 'Simulated fetch delay in seconds per second of range')
  .option('-l, --log-level <level>', 'Log level: error, warn, info, debug')
  .option('--log-format <format>', 'Log format: pretty or json')
  .option('--log-file <path>', 'Also write JSON logs to this file')
  .option('--no-verify', 'Skip the disjointness check after each cache update')
  .option('--stats', 'Print cache statistics to stderr on exit')
  .parse(process.argv);

const options = program.opts<CliOptions>();

/**
 * One line of `key=value` counters.
 */
function formatStats(stats: ProcessorStats, sourceCalls: number): string {
  return [
    `queries=${stats.queries}`,
    `hit_ranges=${stats.hitRanges}`,
    `fetch_calls=${stats.fetchCalls}`,
    `source_calls=${sourceCalls}`,
    `seconds_fetched=${stats.secondsFetched}`,
    `stale_dropped=${stats.staleDropped}`,
    `cache_entries=${stats.cacheEntries}`,
  ].join(' ');
}

/**
 * Main startup function
 */
async function start(): Promise<void> {
  let logger: Logger | undefined;

  try {
    const config = loadConfig(process.env, {
      'source.tradesPath': options.trades,
      'source.latencyScale': options.latencyScale === undefined ? undefined : Number(options.latencyScale),
      'logging.level': options.logLevel,
      'logging.format': options.logFormat,
      'logging.filePath': options.logFile,
      'cache.verifyInvariants': options.verify ? undefined : false,
      'app.stats': options.stats,
    });

    logger = createLogger({
      level: config.logging.level,
      json: config.logging.format === 'json',
      filePath: config.logging.filePath,
    });

    attachGlobalHandlers(logger);

    logger.info('Starting tapecache', { ...getConfigSummary(config), operation: 'app_startup' });

    const loadTimer = startTimer();
    const trades = await loadTradeLog(config.source.tradesPath, { timezone: config.source.timezone });
    logger.info('Trade log loaded', {
      operation: 'load_trades',
      path: config.source.tradesPath,
      trades: trades.length,
      duration_ms: loadTimer.stop(),
    });

    const source = new InMemoryTradeSource(trades, {
      latencyScale: config.source.latencyScale,
      logger,
    });
    const processor = new QueryProcessor({
      source,
      logger,
      verifyInvariants: config.cache.verifyInvariants,
    });

    const exitCode = await runQueryLoop(processor, {
      input: process.stdin,
      output: process.stdout,
      errorOutput: process.stderr,
      logger,
    });

    if (config.app.stats) {
      process.stderr.write(`${formatStats(processor.getStats(), source.getStats().calls)}\n`);
    }

    logger.info('Input closed', { operation: 'app_shutdown', exit_code: exitCode });
    gracefulExit(logger, exitCode);
  } catch (error) {
    if (logger) {
      logger.error('Application startup failed', {
        error: isTapeCacheError(error) ? error.toJSON() : error,
      });
      gracefulExit(logger, 1);
      return;
    }

    process.stderr.write(`Application startup failed: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(1);
  }
}

// Start the application
start().catch((error: unknown) => {
  process.stderr.write(`Fatal error: ${String(error)}\n`);
  process.exit(1);
});
