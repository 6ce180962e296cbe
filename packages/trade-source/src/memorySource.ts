/**
 * @fileoverview In-memory trade log with simulated range-proportional latency.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { containsTimestamp, formatInterval, intervalLength } from '@tapecache/contracts';
import type { Interval, TradeEvent } from '@tapecache/contracts';
import { createChildLogger, createSilentLogger } from '@tapecache/logger';
import type { Logger } from '@tapecache/logger';
import type { InMemoryTradeSourceOptions, TradeSource, TradeSourceStats } from './types.js';

const DEFAULT_LATENCY_SCALE = 0.00001;

/** Longest delay a Node timer accepts */
const MAX_DELAY_MS = 2 ** 31 - 1;

/**
 * Trade source backed by an array held in memory.
 *
 * Trades are sorted by timestamp once; each fetch binary-searches the range
 * and then sleeps in proportion to the range length to model a slow remote
 * store.
 *
 * @example
 * ```typescript
 * const source = new InMemoryTradeSource(await loadTradeLog('./trades.csv'));
 * const trades = await source.fetchTrades({ start: 1700000000, end: 1700003600 });
 * ```
 */
export class InMemoryTradeSource implements TradeSource {
  private readonly trades: TradeEvent[];
  private readonly latencyScale: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;
  private stats: TradeSourceStats = { calls: 0, secondsRequested: 0, tradesReturned: 0 };

  constructor(trades: readonly TradeEvent[], options: InMemoryTradeSourceOptions = {}) {
    const { latencyScale = DEFAULT_LATENCY_SCALE, sleep, logger } = options;

    if (!Number.isFinite(latencyScale) || latencyScale < 0) {
      throw new RangeError(`latencyScale must be a non-negative number, got ${latencyScale}`);
    }

    // Stable sort keeps file order for equal timestamps
    this.trades = [...trades].sort((a, b) => a.timestamp - b.timestamp);
    this.latencyScale = latencyScale;
    this.sleep = sleep ?? ((ms: number) => delay(ms));
    this.logger = createChildLogger(logger ?? createSilentLogger(), { component: 'trade-source' });
  }

  async fetchTrades(range: Interval): Promise<TradeEvent[]> {
    const seconds = intervalLength(range);
    const delayMs = Math.min(Math.round(seconds * this.latencyScale * 1000), MAX_DELAY_MS);
    if (delayMs > 0) {
      await this.sleep(delayMs);
    }

    const result: TradeEvent[] = [];
    for (let i = this.lowerBound(range.start); i < this.trades.length; i++) {
      const trade = this.trades[i];
      if (trade === undefined || !containsTimestamp(range, trade.timestamp)) {
        break;
      }
      result.push(trade);
    }

    this.stats = {
      calls: this.stats.calls + 1,
      secondsRequested: this.stats.secondsRequested + seconds,
      tradesReturned: this.stats.tradesReturned + result.length,
    };

    this.logger.debug('Served trade range', {
      operation: 'fetch_trades',
      range: formatInterval(range),
      trades: result.length,
      simulated_delay_ms: delayMs,
    });

    return result;
  }

  getStats(): TradeSourceStats {
    return { ...this.stats };
  }

  size(): number {
    return this.trades.length;
  }

  /**
   * Index of the first trade with timestamp >= `time`.
   */
  private lowerBound(time: number): number {
    let low = 0;
    let high = this.trades.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      const trade = this.trades[mid];
      if (trade !== undefined && trade.timestamp < time) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low;
  }
}
