/**
 * In-memory store of disjoint time ranges and their aggregates.
 *
 * Entries are kept in an array sorted by start. Because entries never
 * overlap, sorting by start also sorts by end, so overlap lookups and
 * inserts use binary search instead of scanning every key.
 */

import { CacheInvariantError, formatInterval, intervalsEqual, overlaps } from '@tapecache/contracts'
import type { Interval, Metrics } from '@tapecache/contracts'
import type { CacheEntry } from './types.js'

/**
 * Sorted, disjoint mapping from interval to metrics.
 *
 * Unbounded: nothing is evicted. Not safe for concurrent mutation; the
 * query processor serializes access.
 *
 * Example:
 * ```typescript
 * const cache = new IntervalCache()
 * cache.insert({ start: 0, end: 10 }, metrics)
 * cache.findOverlapping({ start: 5, end: 20 }) // [{ range: [0, 10), metrics }]
 * ```
 */
export class IntervalCache {
  private entries: CacheEntry[] = []

  /**
   * Entries sharing at least one second with `range`, ascending by start.
   */
  findOverlapping(range: Interval): CacheEntry[] {
    const result: CacheEntry[] = []

    for (let i = this.firstEndingAfter(range.start); i < this.entries.length; i++) {
      const entry = this.entries[i]
      if (entry === undefined || entry.range.start >= range.end) {
        break
      }
      result.push(entry)
    }

    return result
  }

  /**
   * Metrics stored for exactly `range`, or undefined.
   */
  get(range: Interval): Metrics | undefined {
    const index = this.indexOf(range)
    return index === -1 ? undefined : this.entries[index]?.metrics
  }

  has(range: Interval): boolean {
    return this.indexOf(range) !== -1
  }

  /**
   * Store metrics for a range that overlaps no existing entry.
   *
   * @throws CacheInvariantError if `range` is empty or overlaps an entry
   */
  insert(range: Interval, metrics: Metrics): void {
    if (range.start >= range.end) {
      throw new CacheInvariantError(`cannot cache empty range ${formatInterval(range)}`, {
        range: formatInterval(range),
      })
    }

    const index = this.firstStartingAtOrAfter(range.start)
    const before = this.entries[index - 1]
    const after = this.entries[index]

    for (const neighbour of [before, after]) {
      if (neighbour !== undefined && overlaps(neighbour.range, range)) {
        throw new CacheInvariantError(
          `range ${formatInterval(range)} overlaps cached ${formatInterval(neighbour.range)}`,
          { range: formatInterval(range), existing: formatInterval(neighbour.range) }
        )
      }
    }

    this.entries.splice(index, 0, { range, metrics })
  }

  /**
   * Remove the entry stored for exactly `range`.
   *
   * @returns true if an entry was removed
   */
  delete(range: Interval): boolean {
    const index = this.indexOf(range)
    if (index === -1) {
      return false
    }
    this.entries.splice(index, 1)
    return true
  }

  /**
   * Check every adjacent pair for overlap.
   *
   * @throws CacheInvariantError naming the first overlapping pair
   */
  assertDisjoint(): void {
    for (let i = 1; i < this.entries.length; i++) {
      const prev = this.entries[i - 1]
      const next = this.entries[i]
      if (prev === undefined || next === undefined) {
        continue
      }
      if (prev.range.end > next.range.start || prev.range.start >= prev.range.end) {
        throw new CacheInvariantError(
          `cached ranges ${formatInterval(prev.range)} and ${formatInterval(next.range)} overlap`,
          { first: formatInterval(prev.range), second: formatInterval(next.range) }
        )
      }
    }
  }

  /**
   * Copy of all entries, ascending by start.
   */
  list(): CacheEntry[] {
    return [...this.entries]
  }

  /**
   * Opaque copy of the current state for `restore`.
   */
  snapshot(): readonly CacheEntry[] {
    return [...this.entries]
  }

  restore(snapshot: readonly CacheEntry[]): void {
    this.entries = [...snapshot]
  }

  size(): number {
    return this.entries.length
  }

  clear(): void {
    this.entries = []
  }

  private indexOf(range: Interval): number {
    const index = this.firstStartingAtOrAfter(range.start)
    const entry = this.entries[index]
    return entry !== undefined && intervalsEqual(entry.range, range) ? index : -1
  }

  /**
   * Index of the first entry with start >= `start` (entries.length if none).
   */
  private firstStartingAtOrAfter(start: number): number {
    let low = 0
    let high = this.entries.length
    while (low < high) {
      const mid = (low + high) >>> 1
      const entry = this.entries[mid]
      if (entry !== undefined && entry.range.start < start) {
        low = mid + 1
      } else {
        high = mid
      }
    }
    return low
  }

  /**
   * Index of the first entry with end > `time` (entries.length if none).
   */
  private firstEndingAfter(time: number): number {
    let low = 0
    let high = this.entries.length
    while (low < high) {
      const mid = (low + high) >>> 1
      const entry = this.entries[mid]
      if (entry !== undefined && entry.range.end <= time) {
        low = mid + 1
      } else {
        high = mid
      }
    }
    return low
  }
}
