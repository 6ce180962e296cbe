/**
 * Tests for folding gap results into the cache: stale splits, containment
 * discards, rollback, and cache consistency over many queries.
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { CacheInvariantError, Dec, addMetrics, emptyMetrics, serializeMetrics, sumMetrics } from '@tapecache/contracts'
import type { Interval, Metrics } from '@tapecache/contracts'
import { IntervalCache } from '../src/intervalCache.js'
import { resolveRange } from '../src/resolver.js'
import { applyGapResult, applyPlan, discardEntries, splitResidual } from '../src/updater.js'
import type { GapResult, RangePlan } from '../src/types.js'

function metrics(count: number, buys = 0, sells = 0, volume = '0', events = count): Metrics {
  return { count, buys, sells, events, volume: new Dec(volume) }
}

describe('applyGapResult', () => {
  let cache: IntervalCache

  beforeEach(() => {
    cache = new IntervalCache()
  })

  it('should insert a plain gap', () => {
    expect(applyGapResult(cache, { range: { start: 0, end: 10 } }, metrics(1))).toBe(true)
    expect(cache.get({ start: 0, end: 10 })?.count).toBe(1)
  })

  it('should split a left-overlapping entry into residual and refetched parts', () => {
    cache.insert({ start: 0, end: 100 }, metrics(10, 6, 3, '250.5'))
    const plan = resolveRange(cache, { start: 20, end: 100 })
    const gap = plan.gaps[0]
    expect(gap).toBeDefined()
    if (!gap) return

    expect(applyGapResult(cache, gap, metrics(4, 3, 1, '100.25'))).toBe(true)

    expect(cache.list().map((entry) => entry.range)).toEqual([
      { start: 0, end: 20 },
      { start: 20, end: 100 },
    ])
    const residual = cache.get({ start: 0, end: 20 })
    expect(residual && serializeMetrics(residual)).toEqual({
      count: 6,
      buys: 3,
      sells: 2,
      events: 6,
      volume: '150.25',
    })

    const total = sumMetrics(cache.list().map((entry) => entry.metrics))
    expect(total.count).toBe(10)
    expect(total.volume.toFixed()).toBe('250.5')
  })

  it('should split a right-overlapping entry', () => {
    cache.insert({ start: 50, end: 100 }, metrics(5))
    const plan = resolveRange(cache, { start: 50, end: 60 })
    const gap = plan.gaps[0]
    expect(gap?.stale?.kind).toBe('right-overlap')
    if (!gap) return

    applyGapResult(cache, gap, metrics(2))

    expect(cache.get({ start: 50, end: 60 })?.count).toBe(2)
    expect(cache.get({ start: 60, end: 100 })?.count).toBe(3)
  })

  it('should drop a stale entry holding repeated sequence numbers', () => {
    // One trade seen twice: once before and once after the split point
    cache.insert({ start: 0, end: 100 }, metrics(1, 1, 0, '30', 2))
    const gap = resolveRange(cache, { start: 20, end: 100 }).gaps[0]
    if (!gap) throw new Error('expected a gap')

    expect(applyGapResult(cache, gap, metrics(1, 0, 1, '10'))).toBe(false)
    expect(cache.list().map((entry) => entry.range)).toEqual([{ start: 20, end: 100 }])
    expect(cache.get({ start: 20, end: 100 })?.sells).toBe(1)
  })

  it('should drop a stale entry the refetch exceeds', () => {
    cache.insert({ start: 0, end: 100 }, metrics(1))
    const gap = resolveRange(cache, { start: 20, end: 100 }).gaps[0]
    if (!gap) throw new Error('expected a gap')

    expect(applyGapResult(cache, gap, metrics(2))).toBe(false)
    expect(cache.list().map((entry) => [entry.range, entry.metrics.count])).toEqual([
      [{ start: 20, end: 100 }, 2],
    ])
  })
})

describe('splitResidual', () => {
  const stale = { range: { start: 0, end: 100 }, metrics: metrics(5, 3, 2, '50') }

  it('should subtract the refetched part', () => {
    const residual = splitResidual(stale, metrics(2, 1, 1, '20'))
    expect(residual && serializeMetrics(residual)).toEqual({
      count: 3,
      buys: 2,
      sells: 1,
      events: 3,
      volume: '30',
    })
  })

  it('should refuse an entry with repeats', () => {
    const repeated = { range: stale.range, metrics: metrics(5, 3, 2, '50', 6) }
    expect(splitResidual(repeated, metrics(1, 1, 0, '10'))).toBeUndefined()
  })
})

describe('discardEntries', () => {
  it('should fail loudly when the entry is gone', () => {
    const cache = new IntervalCache()
    expect(() =>
      discardEntries(cache, [{ range: { start: 0, end: 10 }, metrics: metrics(1) }])
    ).toThrow('discarded entry [0, 10) is not cached')
  })
})

describe('applyPlan', () => {
  let cache: IntervalCache

  beforeEach(() => {
    cache = new IntervalCache()
  })

  it('should replace a containing entry with the query range', () => {
    cache.insert({ start: 0, end: 100 }, metrics(10))
    const plan = resolveRange(cache, { start: 20, end: 80 })

    const summary = applyPlan(cache, plan, [{ gap: plan.gaps[0] ?? { range: plan.query }, metrics: metrics(7) }])

    expect(summary).toEqual({ discarded: 1, staleDropped: 0 })
    expect(cache.list().map((entry) => [entry.range, entry.metrics.count])).toEqual([
      [{ start: 20, end: 80 }, 7],
    ])
  })

  it('should reject a result list that does not match the plan', () => {
    const plan = resolveRange(cache, { start: 0, end: 10 })
    expect(() => applyPlan(cache, plan, [])).toThrow('has 1 gaps but 0 results')
  })

  it('should count stale entries dropped instead of split', () => {
    cache.insert({ start: 0, end: 15 }, metrics(2, 0, 0, '0', 3))
    cache.insert({ start: 35, end: 60 }, metrics(1))
    const plan = resolveRange(cache, { start: 10, end: 40 })
    const results = plan.gaps.map((gap) => ({ gap, metrics: metrics(0) }))

    expect(applyPlan(cache, plan, results)).toEqual({ discarded: 0, staleDropped: 1 })
    expect(cache.list().map((entry) => entry.range)).toEqual([
      { start: 10, end: 15 },
      { start: 15, end: 35 },
      { start: 35, end: 40 },
      { start: 40, end: 60 },
    ])
  })

  it('should roll back every change when one gap fails', () => {
    cache.insert({ start: 0, end: 15 }, metrics(2))
    cache.insert({ start: 35, end: 60 }, metrics(1))
    const plan = resolveRange(cache, { start: 10, end: 40 })
    // Lands inside the plain gap [15, 35) after the plan was resolved
    cache.insert({ start: 20, end: 25 }, metrics(1))
    const results: GapResult[] = plan.gaps.map((gap) => ({ gap, metrics: metrics(0) }))

    expect(() => applyPlan(cache, plan, results)).toThrow(CacheInvariantError)
    expect(cache.list().map((entry) => entry.range)).toEqual([
      { start: 0, end: 15 },
      { start: 20, end: 25 },
      { start: 35, end: 60 },
    ])
  })
})

describe('cache consistency over many queries', () => {
  // Synthetic log: second t carries (t % 3) trades of 1 unit volume each
  function truth(range: Interval): Metrics {
    let total = emptyMetrics()
    for (let t = range.start; t < range.end; t++) {
      const n = t % 3
      total = addMetrics(total, metrics(n, t % 2 === 0 ? n : 0, t % 2 === 0 ? 0 : n, String(n)))
    }
    return total
  }

  function seededRandom(seed: number): () => number {
    let state = seed
    return () => {
      state = (state * 1664525 + 1013904223) % 4294967296
      return state / 4294967296
    }
  }

  function answer(cache: IntervalCache, query: Interval): Metrics {
    const plan: RangePlan = resolveRange(cache, query)
    const results = plan.gaps.map((gap) => ({ gap, metrics: truth(gap.range) }))
    applyPlan(cache, plan, results)
    return sumMetrics([...plan.hits, ...results].map((item) => item.metrics))
  }

  it('should answer every query like a cold cache and keep every entry exact', () => {
    const cache = new IntervalCache()
    const random = seededRandom(42)

    for (let i = 0; i < 300; i++) {
      const start = Math.floor(random() * 200)
      const end = start + 1 + Math.floor(random() * 60)
      const query = { start, end }

      expect(serializeMetrics(answer(cache, query))).toEqual(serializeMetrics(truth(query)))
      expect(() => cache.assertDisjoint()).not.toThrow()
    }

    for (const entry of cache.list()) {
      expect(serializeMetrics(entry.metrics)).toEqual(serializeMetrics(truth(entry.range)))
    }
  })
})
