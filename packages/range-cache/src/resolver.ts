/**
 * Query range resolution against the interval cache.
 *
 * Splits a query range into:
 * - hits: cached entries lying inside the query, reused as-is
 * - gaps: sub-ranges to fetch, some of them linked to a stale entry
 * - discarded: an entry containing the whole query, dropped wholesale
 *
 * Resolution only reads the cache. Nothing is mutated until every gap
 * has been fetched, so a failed fetch leaves the cache as it was.
 */

import type { Interval } from '@tapecache/contracts'
import type { IntervalCache } from './intervalCache.js'
import type { CacheEntry, OverlapKind, RangeGap, RangePlan } from './types.js'

/**
 * Classify a cached range against a query range.
 *
 * Comparisons follow the `[start, end)` convention: ranges that merely
 * touch (`cached.end === query.start`) are disjoint.
 *
 * @example
 * ```typescript
 * classifyOverlap({ start: 0, end: 100 }, { start: 20, end: 100 }) // 'left-overlap'
 * classifyOverlap({ start: 0, end: 100 }, { start: 20, end: 80 })  // 'contains-query'
 * ```
 */
export function classifyOverlap(cached: Interval, query: Interval): OverlapKind {
  if (cached.end <= query.start || cached.start >= query.end) {
    return 'disjoint'
  }
  if (cached.start >= query.start && cached.end <= query.end) {
    return 'hit'
  }
  if (cached.start < query.start && cached.end > query.end) {
    return 'contains-query'
  }
  if (cached.start < query.start) {
    return 'left-overlap'
  }
  return 'right-overlap'
}

/**
 * Compute the hits, gaps and discarded entries for a query.
 *
 * Stale entries: for a left overlap the gap is `[query.start, cached.end)`
 * and the residual `[cached.start, query.start)`; for a right overlap the
 * gap is `[cached.start, query.end)` and the residual
 * `[query.end, cached.end)`. An entry containing the whole query cannot be
 * split without a second fetch, so it is discarded and the query becomes
 * one gap.
 *
 * Every stretch of the query covered by neither a hit nor a stale gap
 * becomes a plain gap. Gaps come back in ascending order.
 *
 * @example
 * ```typescript
 * // cache: [0, 10)
 * resolveRange(cache, { start: 0, end: 20 })
 * // { hits: [[0, 10)], gaps: [{ range: [10, 20) }], discarded: [] }
 * ```
 */
export function resolveRange(cache: IntervalCache, query: Interval): RangePlan {
  const hits: CacheEntry[] = []
  // Hits and stale gaps in start order; what lies between them is uncovered
  const covered: Array<{ range: Interval; gap?: RangeGap }> = []

  for (const entry of cache.findOverlapping(query)) {
    const kind = classifyOverlap(entry.range, query)

    switch (kind) {
      case 'disjoint':
        break

      case 'hit':
        hits.push(entry)
        covered.push({ range: entry.range })
        break

      case 'contains-query':
        // Disjoint entries: nothing else can overlap a query inside this one
        return {
          query,
          hits: [],
          gaps: [{ range: query }],
          discarded: [entry],
        }

      case 'left-overlap': {
        const gap: RangeGap = {
          range: { start: query.start, end: entry.range.end },
          stale: {
            entry,
            kind,
            residual: { start: entry.range.start, end: query.start },
          },
        }
        covered.push({ range: gap.range, gap })
        break
      }

      case 'right-overlap': {
        const gap: RangeGap = {
          range: { start: entry.range.start, end: query.end },
          stale: {
            entry,
            kind,
            residual: { start: query.end, end: entry.range.end },
          },
        }
        covered.push({ range: gap.range, gap })
        break
      }
    }
  }

  const gaps: RangeGap[] = []
  let last = query.start

  for (const segment of covered) {
    if (segment.range.start > last) {
      gaps.push({ range: { start: last, end: segment.range.start } })
    }
    if (segment.gap) {
      gaps.push(segment.gap)
    }
    last = segment.range.end
  }

  if (last < query.end) {
    gaps.push({ range: { start: last, end: query.end } })
  }

  return { query, hits, gaps, discarded: [] }
}
