/**
 * @fileoverview Metrics arithmetic.
 *
 * Volume is held as a decimal.js value created through `Dec`, a constructor
 * configured so that sums and products never round and strings never switch
 * to exponential notation.
 *
 * @module @tapecache/contracts/metrics
 */

import { Decimal } from 'decimal.js';
import { CacheInvariantError } from './errors.js';
import type { MetricKind, Metrics } from './types.js';

/**
 * Decimal constructor used for every price, quantity and volume.
 */
export const Dec = Decimal.clone({
  precision: 1000,
  toExpNeg: -9e15,
  toExpPos: 9e15,
});

export function emptyMetrics(): Metrics {
  return { count: 0, buys: 0, sells: 0, events: 0, volume: new Dec(0) };
}

export function addMetrics(a: Metrics, b: Metrics): Metrics {
  return {
    count: a.count + b.count,
    buys: a.buys + b.buys,
    sells: a.sells + b.sells,
    events: a.events + b.events,
    volume: a.volume.plus(b.volume),
  };
}

/**
 * Field-wise `a - b`, or undefined when any field would go negative.
 */
export function trySubtractMetrics(a: Metrics, b: Metrics): Metrics | undefined {
  const result: Metrics = {
    count: a.count - b.count,
    buys: a.buys - b.buys,
    sells: a.sells - b.sells,
    events: a.events - b.events,
    volume: a.volume.minus(b.volume),
  };

  if (
    result.count < 0 ||
    result.buys < 0 ||
    result.sells < 0 ||
    result.events < 0 ||
    result.volume.isNegative()
  ) {
    return undefined;
  }

  return result;
}

/**
 * Field-wise `a - b`.
 *
 * @throws CacheInvariantError if any field would go negative
 */
export function subtractMetrics(a: Metrics, b: Metrics): Metrics {
  const result = trySubtractMetrics(a, b);

  if (result === undefined) {
    throw new CacheInvariantError('residual metrics would be negative', {
      minuend: serializeMetrics(a),
      subtrahend: serializeMetrics(b),
    });
  }

  return result;
}

export function sumMetrics(items: Iterable<Metrics>): Metrics {
  let total = emptyMetrics();
  for (const item of items) {
    total = addMetrics(total, item);
  }
  return total;
}

export function metricsEqual(a: Metrics, b: Metrics): boolean {
  return (
    a.count === b.count &&
    a.buys === b.buys &&
    a.sells === b.sells &&
    a.events === b.events &&
    a.volume.eq(b.volume)
  );
}

/**
 * Renders one metric as the CLI prints it: integer text for counts,
 * unrounded plain decimal text for volume.
 *
 * @example
 * ```typescript
 * formatMetric({ count: 1, buys: 1, sells: 0, events: 1, volume: new Dec('20.50') }, 'volume'); // '20.5'
 * ```
 */
export function formatMetric(metrics: Metrics, kind: MetricKind): string {
  switch (kind) {
    case 'count':
      return String(metrics.count);
    case 'buys':
      return String(metrics.buys);
    case 'sells':
      return String(metrics.sells);
    case 'volume':
      return metrics.volume.toFixed();
  }
}

/**
 * JSON-safe form for logs and error payloads.
 */
export function serializeMetrics(metrics: Metrics): Record<string, number | string> {
  return {
    count: metrics.count,
    buys: metrics.buys,
    sells: metrics.sells,
    events: metrics.events,
    volume: metrics.volume.toFixed(),
  };
}
