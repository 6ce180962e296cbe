/**
 * @fileoverview Custom Winston formats for the tapecache logger
 * Standard fields, query ID injection and the pretty console layout.
 */

import { format } from 'winston';
import { getRequestId } from './request-context.js';

/**
 * Fields printed first in pretty mode, in this order.
 */
const LEADING_FIELDS = ['component', 'request_id', 'operation', 'range'] as const;

/**
 * Winston-internal keys that pretty mode never prints as context.
 */
const INTERNAL_FIELDS = new Set(['level', 'message', 'timestamp', 'stack', 'splat']);

/**
 * Adds an ISO timestamp, expands Error objects, and injects the active
 * query's request_id from AsyncLocalStorage when the entry lacks one.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),

  format.errors({ stack: true }),

  format((info) => {
    const requestId = getRequestId();
    if (requestId && !info['request_id']) {
      info['request_id'] = requestId;
    }
    return info;
  })()
);

/**
 * Human-readable single-line output.
 *
 * @example
 * ```typescript
 * // [2026-03-02T12:34:56.789+00:00] info: Fetched gap component=processor request_id=q-3 range="[0, 10)" trades=4
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const context: string[] = [];
    const leading = new Set<string>(LEADING_FIELDS);

    for (const key of LEADING_FIELDS) {
      const value = info[key];
      if (value !== undefined) {
        context.push(`${key}=${typeof value === 'string' && key !== 'range' ? value : JSON.stringify(value)}`);
      }
    }

    for (const [key, value] of Object.entries(info)) {
      if (INTERNAL_FIELDS.has(key) || leading.has(key)) {
        continue;
      }
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${String(info['timestamp'])}] ${info.level}: ${String(info.message)}${contextStr}`;

    const stack = info['stack'];
    if (typeof stack === 'string') {
      return `${baseMsg}\n${stack}`;
    }

    return baseMsg;
  })
);
