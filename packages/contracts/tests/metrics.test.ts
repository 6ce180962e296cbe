/**
 * @fileoverview Tests for interval helpers and metrics arithmetic.
 */

import { describe, it, expect } from 'vitest';
import {
  makeInterval,
  overlaps,
  containsInterval,
  containsTimestamp,
  intervalLength,
  formatInterval,
} from '../src/interval.js';
import {
  Dec,
  emptyMetrics,
  addMetrics,
  subtractMetrics,
  trySubtractMetrics,
  sumMetrics,
  metricsEqual,
  formatMetric,
  serializeMetrics,
} from '../src/metrics.js';
import { CacheInvariantError, TapeCacheError } from '../src/errors.js';
import type { Metrics } from '../src/types.js';

function metrics(count: number, buys: number, sells: number, volume: string): Metrics {
  return { count, buys, sells, events: count, volume: new Dec(volume) };
}

describe('intervals', () => {
  it('should create a half-open interval', () => {
    const range = makeInterval(0, 10);
    expect(range).toEqual({ start: 0, end: 10 });
    expect(intervalLength(range)).toBe(10);
    expect(formatInterval(range)).toBe('[0, 10)');
  });

  it('should reject empty, inverted and fractional ranges', () => {
    expect(() => makeInterval(5, 5)).toThrow(TapeCacheError);
    expect(() => makeInterval(6, 5)).toThrow('interval start must be before end: [6, 5)');
    expect(() => makeInterval(0.5, 5)).toThrow('interval bounds must be integers');
  });

  it('should treat touching ranges as disjoint', () => {
    expect(overlaps({ start: 0, end: 10 }, { start: 10, end: 20 })).toBe(false);
    expect(overlaps({ start: 0, end: 11 }, { start: 10, end: 20 })).toBe(true);
    expect(overlaps({ start: 12, end: 15 }, { start: 10, end: 20 })).toBe(true);
  });

  it('should test containment', () => {
    expect(containsInterval({ start: 0, end: 20 }, { start: 0, end: 20 })).toBe(true);
    expect(containsInterval({ start: 0, end: 20 }, { start: 5, end: 21 })).toBe(false);
    expect(containsTimestamp({ start: 0, end: 10 }, 0)).toBe(true);
    expect(containsTimestamp({ start: 0, end: 10 }, 10)).toBe(false);
  });
});

describe('metrics arithmetic', () => {
  it('should add field-wise', () => {
    const total = addMetrics(metrics(2, 1, 1, '10.5'), metrics(3, 2, 0, '0.25'));
    expect(serializeMetrics(total)).toEqual({ count: 5, buys: 3, sells: 1, events: 5, volume: '10.75' });
  });

  it('should subtract field-wise', () => {
    const residual = subtractMetrics(metrics(10, 6, 3, '100'), metrics(4, 2, 1, '40.1'));
    expect(serializeMetrics(residual)).toEqual({ count: 6, buys: 4, sells: 2, events: 6, volume: '59.9' });
  });

  it('should refuse a negative residual', () => {
    expect(() => subtractMetrics(metrics(1, 1, 0, '5'), metrics(2, 1, 0, '5'))).toThrow(
      CacheInvariantError
    );
    expect(() => subtractMetrics(metrics(1, 1, 0, '5'), metrics(1, 1, 0, '5.01'))).toThrow(
      'residual metrics would be negative'
    );
  });

  it('should return undefined instead of a negative residual', () => {
    expect(trySubtractMetrics(metrics(1, 1, 0, '5'), metrics(2, 1, 0, '5'))).toBeUndefined();
    const zero = trySubtractMetrics(metrics(2, 1, 1, '5'), metrics(2, 1, 1, '5'));
    expect(zero && metricsEqual(zero, emptyMetrics())).toBe(true);
  });

  it('should subtract repeated events separately from distinct trades', () => {
    const stale: Metrics = { count: 1, buys: 1, sells: 0, events: 2, volume: new Dec('20') };
    const refetched: Metrics = { count: 1, buys: 0, sells: 1, events: 1, volume: new Dec('10') };

    expect(trySubtractMetrics(stale, refetched)).toBeUndefined();
  });

  it('should sum an empty list to zero', () => {
    expect(metricsEqual(sumMetrics([]), emptyMetrics())).toBe(true);
  });

  it('should keep full decimal precision', () => {
    const big = new Dec('123456789012345678901234567890.123456789');
    const tiny = new Dec('0.000000000000000000000000001');
    const total = big.plus(tiny);
    expect(total.toFixed()).toBe('123456789012345678901234567890.123456789000000000000000001');
  });

  it('should format each metric kind', () => {
    const m = metrics(7, 4, 2, '20.50');
    expect(formatMetric(m, 'count')).toBe('7');
    expect(formatMetric(m, 'buys')).toBe('4');
    expect(formatMetric(m, 'sells')).toBe('2');
    expect(formatMetric(m, 'volume')).toBe('20.5');
    expect(formatMetric(emptyMetrics(), 'volume')).toBe('0');
  });
});
