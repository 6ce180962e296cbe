/**
 * Query line parsing
 *
 * A query line reads `<T> <start> <end>`: one metric selector (C, B, S or V)
 * and two Unix-second timestamps separated by whitespace.
 */

import { METRIC_SELECTORS, QueryParseError } from '@tapecache/contracts';
import type { MetricSelector, QueryRequest } from '@tapecache/contracts';

const TIMESTAMP_PATTERN = /^[+-]?\d+$/;

/**
 * Parse one query line.
 *
 * `start > end` is rejected on the `end` field. `start === end` is a valid
 * empty range.
 *
 * @throws QueryParseError naming the offending field
 *
 * @example
 * ```typescript
 * parseQuery('V 1700000000 1700003600');
 * // { metric: 'volume', range: { start: 1700000000, end: 1700003600 } }
 * ```
 */
export function parseQuery(line: string): QueryRequest {
  const fields = line.trim().split(/\s+/).filter((field) => field.length > 0);

  if (fields.length !== 3) {
    throw new QueryParseError(`invalid query with ${fields.length} fields`, {
      field: 'line',
      value: line,
      line,
    });
  }

  const [selector = '', rawStart = '', rawEnd = ''] = fields;

  if (!isMetricSelector(selector)) {
    throw new QueryParseError(`invalid query type: ${selector}`, {
      field: 'metric',
      value: selector,
      line,
    });
  }

  const start = parseTimestamp(rawStart, 'start', line);
  const end = parseTimestamp(rawEnd, 'end', line);

  if (start > end) {
    throw new QueryParseError(`invalid end timestamp: ${rawEnd} is before start ${rawStart}`, {
      field: 'end',
      value: rawEnd,
      line,
    });
  }

  return {
    metric: METRIC_SELECTORS[selector],
    range: { start, end },
  };
}

function isMetricSelector(value: string): value is MetricSelector {
  return Object.prototype.hasOwnProperty.call(METRIC_SELECTORS, value);
}

function parseTimestamp(raw: string, field: 'start' | 'end', line: string): number {
  const value = TIMESTAMP_PATTERN.test(raw) ? Number(raw) : Number.NaN;

  if (!Number.isSafeInteger(value)) {
    throw new QueryParseError(`invalid ${field} timestamp: ${raw}`, {
      field,
      value: raw,
      line,
    });
  }

  return value;
}
