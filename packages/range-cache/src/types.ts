/**
 * Type definitions for the range cache.
 *
 * A cache entry maps one half-open time range to the metrics computed over
 * it. A resolution plan describes how a query range splits into cached hits
 * and gaps that must be fetched.
 */

import type { Interval, Metrics } from '@tapecache/contracts'

/**
 * One cached range and its aggregates.
 *
 * Example:
 * ```typescript
 * const entry: CacheEntry = {
 *   range: { start: 0, end: 10 },
 *   metrics: { count: 1, buys: 1, sells: 0, events: 1, volume: new Dec('20') },
 * }
 * ```
 */
export interface CacheEntry {
  readonly range: Interval
  readonly metrics: Metrics
}

/**
 * How a cached range relates to a query range.
 *
 * - disjoint: no shared second
 * - hit: cached range lies inside the query
 * - left-overlap: cached range starts before the query and ends inside it
 * - right-overlap: cached range starts inside the query and ends after it
 * - contains-query: cached range starts before and ends after the query
 */
export type OverlapKind = 'disjoint' | 'hit' | 'left-overlap' | 'right-overlap' | 'contains-query'

/**
 * A partially overlapping cache entry that will be split once its
 * overlapping part has been refetched.
 *
 * Counts are deduplicated per fetch, so `entry.metrics - refetched` is only
 * exact when no sequence number repeats inside `entry.range`
 * (`events === count`). Otherwise a repeat may straddle the split point and
 * the entry is dropped without a residual, like a containing entry.
 */
export interface StaleEntry {
  entry: CacheEntry
  kind: 'left-overlap' | 'right-overlap'

  /**
   * Part of `entry.range` outside the query. Survives the split with
   * `entry.metrics - refetched metrics` when that split is exact.
   */
  residual: Interval
}

/**
 * A sub-range of the query with no usable cached data.
 *
 * When `stale` is set, `range` is exactly the overlap of the stale entry
 * with the query, so the refetched metrics can be subtracted from it.
 */
export interface RangeGap {
  range: Interval
  stale?: StaleEntry
}

/**
 * Result of resolving a query range against the cache.
 */
export interface RangePlan {
  query: Interval

  /** Entries fully inside the query, ascending by start */
  hits: CacheEntry[]

  /** Ranges to fetch, ascending by start */
  gaps: RangeGap[]

  /** Entries containing the whole query; removed before gaps are stored */
  discarded: CacheEntry[]
}

/**
 * A gap together with the metrics computed from its fetched trades.
 */
export interface GapResult {
  gap: RangeGap
  metrics: Metrics
}
