/**
 * @fileoverview Public API exports for @tapecache/trade-source
 * Backing trade log: CSV loading and a latency-simulating range source
 */

export { InMemoryTradeSource } from './memorySource.js';
export { loadTradeLog, parseTradeLog } from './csvLoader.js';

export type {
  TradeSource,
  InMemoryTradeSourceOptions,
  TradeLogOptions,
  TradeSourceStats,
} from './types.js';
