/**
 * @tapecache/range-cache
 *
 * Interval cache of per-range trade aggregates.
 *
 * Key features:
 * - Sorted, disjoint range store with binary-search overlap lookup
 * - Query resolution into cached hits and gaps to fetch
 * - Stale entry splitting by metric subtraction when the split is exact
 * - All-or-nothing plan application with invariant checks
 *
 * Example usage:
 * ```typescript
 * import { IntervalCache, resolveRange, applyPlan } from '@tapecache/range-cache'
 *
 * const cache = new IntervalCache()
 * const plan = resolveRange(cache, { start: 0, end: 20 })
 * const results = []
 * for (const gap of plan.gaps) {
 *   results.push({ gap, metrics: aggregateTrades(await source.fetchTrades(gap.range)) })
 * }
 * applyPlan(cache, plan, results)
 * ```
 */

export * from './types.js'
export { IntervalCache } from './intervalCache.js'
export { classifyOverlap, resolveRange } from './resolver.js'
export { applyGapResult, applyPlan, discardEntries, splitResidual } from './updater.js'
export type { ApplyOptions, ApplySummary } from './updater.js'
