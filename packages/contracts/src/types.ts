/**
 * @fileoverview Core data types shared by every tapecache package.
 *
 * All types are pure data structures with no I/O.
 *
 * @module @tapecache/contracts/types
 */

import type { Decimal } from 'decimal.js';

/**
 * Half-open time range `[start, end)` in Unix seconds.
 *
 * @invariant start < end
 */
export interface Interval {
  /** Inclusive start (Unix seconds) */
  readonly start: number;

  /** Exclusive end (Unix seconds) */
  readonly end: number;
}

/**
 * Aggregates computed together for one time range.
 *
 * @invariant count, buys, sells, events are non-negative integers
 * @invariant buys + sells <= count <= events
 * @invariant volume >= 0
 *
 * @example
 * ```typescript
 * const metrics: Metrics = {
 *   count: 2,
 *   buys: 1,
 *   sells: 1,
 *   events: 2,
 *   volume: new Dec('23'),
 * };
 * ```
 */
export interface Metrics {
  /** Distinct trades (by sequence number) */
  count: number;

  /** Distinct trades with positive direction */
  buys: number;

  /** Distinct trades with negative direction */
  sells: number;

  /**
   * Every event, repeated sequence numbers included. `events === count`
   * means no sequence number repeats inside the range.
   */
  events: number;

  /** Sum of price * quantity over every event, repeats included */
  volume: Decimal;
}

/**
 * Trade direction: 1 buy, -1 sell, 0 neutral.
 */
export type TradeDirection = 1 | -1 | 0;

/**
 * A single fill from the trade log.
 */
export interface TradeEvent {
  /** Execution time (Unix seconds, UTC) */
  timestamp: number;

  direction: TradeDirection;

  price: Decimal;

  quantity: Decimal;

  /** Unique within one fetch; not guaranteed unique across fetches */
  sequenceNumber: bigint;
}

/**
 * Metric family a query asks for.
 */
export type MetricKind = 'count' | 'buys' | 'sells' | 'volume';

/**
 * Single-character query selectors.
 */
export const METRIC_SELECTORS = {
  C: 'count',
  B: 'buys',
  S: 'sells',
  V: 'volume',
} as const satisfies Record<string, MetricKind>;

export type MetricSelector = keyof typeof METRIC_SELECTORS;

/**
 * Parsed query line.
 *
 * `range` may be empty (`start === end`); such a query answers zero
 * without touching the cache or the source.
 */
export interface QueryRequest {
  metric: MetricKind;
  range: {
    start: number;
    end: number;
  };
}
