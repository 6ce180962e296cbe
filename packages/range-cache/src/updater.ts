/**
 * Folds freshly computed gap metrics back into the interval cache.
 *
 * Split rule: a stale entry is replaced by its residual, whose metrics are
 * `stale.metrics - gap metrics`. This holds because the resolver made the
 * gap exactly the stale entry's overlap with the query, and only while no
 * sequence number repeats inside the stale entry. Otherwise the stale entry
 * is dropped and its residual range is fetched again on demand.
 */

import { CacheInvariantError, formatInterval, trySubtractMetrics } from '@tapecache/contracts'
import type { Metrics } from '@tapecache/contracts'
import type { IntervalCache } from './intervalCache.js'
import type { CacheEntry, GapResult, RangeGap, RangePlan } from './types.js'

/**
 * Options for applying a resolved plan.
 */
export interface ApplyOptions {
  /**
   * Run a full disjointness check after the plan is applied.
   * Default: true
   */
  verifyInvariants?: boolean
}

/**
 * What an applied plan threw away instead of reusing.
 */
export interface ApplySummary {
  /** Entries that contained the whole query */
  discarded: number

  /** Stale entries dropped because their split was not exact */
  staleDropped: number
}

/**
 * Remove entries that contained a whole query.
 *
 * @throws CacheInvariantError if an entry is no longer cached
 */
export function discardEntries(cache: IntervalCache, entries: readonly CacheEntry[]): void {
  for (const entry of entries) {
    if (!cache.delete(entry.range)) {
      throw new CacheInvariantError(`discarded entry ${formatInterval(entry.range)} is not cached`, {
        range: formatInterval(entry.range),
      })
    }
  }
}

/**
 * Metrics of the residual left after refetching part of `stale`, or
 * undefined when the split cannot be computed exactly.
 */
export function splitResidual(stale: CacheEntry, refetched: Metrics): Metrics | undefined {
  // A repeated sequence number may sit on both sides of the split point
  if (stale.metrics.events !== stale.metrics.count) {
    return undefined
  }
  return trySubtractMetrics(stale.metrics, refetched)
}

/**
 * Store one gap's metrics, splitting its stale entry first when it has one.
 * A stale entry whose split is not exact is dropped without a residual.
 *
 * @returns false if a stale entry was dropped instead of split
 * @throws CacheInvariantError on a missing stale entry or an overlap
 */
export function applyGapResult(cache: IntervalCache, gap: RangeGap, metrics: Metrics): boolean {
  let split = true

  if (gap.stale) {
    const { entry, residual } = gap.stale
    const residualMetrics = splitResidual(entry, metrics)

    if (!cache.delete(entry.range)) {
      throw new CacheInvariantError(`stale entry ${formatInterval(entry.range)} is not cached`, {
        range: formatInterval(entry.range),
      })
    }

    if (residualMetrics) {
      cache.insert(residual, residualMetrics)
    } else {
      split = false
    }
  }

  cache.insert(gap.range, metrics)
  return split
}

/**
 * Apply a whole plan: drop discarded entries, then store every gap.
 *
 * All-or-nothing: if any step throws, the cache is restored to its state
 * before the call and the error is rethrown. A dropped stale entry is not
 * an error.
 *
 * @param results - One result per gap of `plan`, in any order
 */
export function applyPlan(
  cache: IntervalCache,
  plan: RangePlan,
  results: readonly GapResult[],
  options: ApplyOptions = {}
): ApplySummary {
  const { verifyInvariants = true } = options

  if (results.length !== plan.gaps.length) {
    throw new CacheInvariantError(
      `plan for ${formatInterval(plan.query)} has ${plan.gaps.length} gaps but ${results.length} results`,
      { query: formatInterval(plan.query) }
    )
  }

  const snapshot = cache.snapshot()
  let staleDropped = 0

  try {
    discardEntries(cache, plan.discarded)
    for (const result of results) {
      if (!applyGapResult(cache, result.gap, result.metrics)) {
        staleDropped++
      }
    }
    if (verifyInvariants) {
      cache.assertDisjoint()
    }
  } catch (error) {
    cache.restore(snapshot)
    throw error
  }

  return { discarded: plan.discarded.length, staleDropped }
}
