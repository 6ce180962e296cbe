/**
 * @fileoverview Half-open interval helpers.
 *
 * Every comparison in tapecache goes through these functions so that the
 * `[start, end)` convention is applied in one place.
 *
 * @module @tapecache/contracts/interval
 */

import { TapeCacheError } from './errors.js';
import type { Interval } from './types.js';

/**
 * Creates an interval, rejecting empty or inverted ranges.
 *
 * @throws TapeCacheError (INVALID_INTERVAL) if start >= end or either bound is not a safe integer
 *
 * @example
 * ```typescript
 * const day = makeInterval(1700000000, 1700086400);
 * ```
 */
export function makeInterval(start: number, end: number): Interval {
  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end)) {
    throw new TapeCacheError('INVALID_INTERVAL', `interval bounds must be integers: ${start}, ${end}`, {
      start,
      end,
    });
  }
  if (start >= end) {
    throw new TapeCacheError('INVALID_INTERVAL', `interval start must be before end: [${start}, ${end})`, {
      start,
      end,
    });
  }
  return { start, end };
}

/**
 * True when the two ranges share at least one second.
 */
export function overlaps(a: Interval, b: Interval): boolean {
  return a.start < b.end && b.start < a.end;
}

/**
 * True when `inner` lies entirely within `outer`.
 */
export function containsInterval(outer: Interval, inner: Interval): boolean {
  return inner.start >= outer.start && inner.end <= outer.end;
}

/**
 * True when `timestamp` falls in `[start, end)`.
 */
export function containsTimestamp(range: Interval, timestamp: number): boolean {
  return timestamp >= range.start && timestamp < range.end;
}

export function intervalLength(range: Interval): number {
  return range.end - range.start;
}

export function intervalsEqual(a: Interval, b: Interval): boolean {
  return a.start === b.start && a.end === b.end;
}

/**
 * Formats an interval for logs, e.g. `[0, 10)`.
 */
export function formatInterval(range: Interval): string {
  return `[${range.start}, ${range.end})`;
}
