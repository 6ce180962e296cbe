/**
 * Single-pass trade aggregation
 */

import { Dec } from '@tapecache/contracts';
import type { Metrics, TradeEvent } from '@tapecache/contracts';

/**
 * Compute count, buys, sells and volume over one gap's trades.
 *
 * Count, buys and sells see each sequence number once; events and volume
 * cover every event, repeats included. Sequence numbers are only unique
 * within one fetch, so call this once per gap.
 *
 * @example
 * ```typescript
 * aggregateTrades([
 *   { timestamp: 5, direction: 1, price: new Dec('10'), quantity: new Dec('2'), sequenceNumber: 1n },
 * ]);
 * // { count: 1, buys: 1, sells: 0, events: 1, volume: new Dec('20') }
 * ```
 */
export function aggregateTrades(trades: Iterable<TradeEvent>): Metrics {
  const seen = new Set<bigint>();
  let count = 0;
  let buys = 0;
  let sells = 0;
  let events = 0;
  let volume = new Dec(0);

  for (const trade of trades) {
    events++;
    volume = volume.plus(trade.price.times(trade.quantity));

    if (seen.has(trade.sequenceNumber)) {
      continue;
    }
    seen.add(trade.sequenceNumber);

    count++;
    if (trade.direction === 1) {
      buys++;
    } else if (trade.direction === -1) {
      sells++;
    }
  }

  return { count, buys, sells, events, volume };
}
