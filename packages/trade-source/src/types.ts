/**
 * @fileoverview Trade source contract.
 *
 * A trade source is the slow backing store the range cache shields. Every
 * implementation returns the events with `range.start <= timestamp < range.end`.
 */

import type { Interval, TradeEvent } from '@tapecache/contracts';
import type { Logger } from '@tapecache/logger';

/**
 * Range-fetch interface of the backing event log.
 *
 * Latency is assumed to grow with `range.end - range.start`. Failures
 * reject with TradeFetchError.
 */
export interface TradeSource {
  fetchTrades(range: Interval): Promise<TradeEvent[]>;
}

/**
 * Options for InMemoryTradeSource.
 */
export interface InMemoryTradeSourceOptions {
  /**
   * Seconds of simulated delay per second of requested range.
   * 0.00001 makes one day of range cost about 0.864 s.
   * @default 0.00001
   */
  latencyScale?: number;

  /** Delay implementation; replaced in tests */
  sleep?: (ms: number) => Promise<void>;

  logger?: Logger;
}

/**
 * Options for loading a CSV trade log.
 */
export interface TradeLogOptions {
  /**
   * Time zone of the `time` column.
   * @default 'UTC'
   */
  timezone?: string;
}

/**
 * Call counters kept by InMemoryTradeSource.
 */
export interface TradeSourceStats {
  calls: number;
  secondsRequested: number;
  tradesReturned: number;
}
