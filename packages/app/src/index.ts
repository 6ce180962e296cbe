/**
 * @fileoverview Public API exports for @tapecache/app
 * Query parsing, aggregation and the cached query processor
 */

export { parseQuery } from './parser.js';
export { aggregateTrades } from './aggregator.js';
export { QueryProcessor } from './processor.js';
export { runQueryLoop } from './query-loop.js';
export { loadConfig, getConfigSummary } from './config/index.js';
export { configSchema, envMapping } from './config/schema.js';

export type { QueryProcessorOptions, ProcessorStats } from './processor.js';
export type { QueryLoopOptions, QueryLoopExitCode } from './query-loop.js';
export type { Config } from './config/index.js';
