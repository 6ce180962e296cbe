/**
 * @fileoverview Main entry point for @tapecache/contracts.
 *
 * Exports the shared data types, interval helpers, metrics arithmetic and
 * error classes used across the tapecache packages.
 *
 * @module @tapecache/contracts
 */

// Data types
export type {
  Interval,
  Metrics,
  TradeDirection,
  TradeEvent,
  MetricKind,
  MetricSelector,
  QueryRequest,
} from './types.js';

export { METRIC_SELECTORS } from './types.js';

// Interval helpers
export {
  makeInterval,
  overlaps,
  containsInterval,
  containsTimestamp,
  intervalLength,
  intervalsEqual,
  formatInterval,
} from './interval.js';

// Metrics arithmetic
export {
  Dec,
  emptyMetrics,
  addMetrics,
  subtractMetrics,
  trySubtractMetrics,
  sumMetrics,
  metricsEqual,
  formatMetric,
  serializeMetrics,
} from './metrics.js';

// Error classes and guards
export {
  TapeCacheError,
  QueryParseError,
  TradeFetchError,
  CacheInvariantError,
  TradeLogLoadError,
  isTapeCacheError,
  isQueryParseError,
  isTradeFetchError,
  isCacheInvariantError,
} from './errors.js';

export type { QueryField } from './errors.js';
