/**
 * @fileoverview CSV trade log loader.
 *
 * Expected layout: one header row, then
 * `time,direction,price,quantity,sequence_number` with `time` formatted
 * `YYYY-MM-DD HH:mm:ss`. Loading is a fallible startup step: any unreadable
 * file or malformed row raises TradeLogLoadError and nothing is returned.
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import moment from 'moment-timezone';
import type { Decimal } from 'decimal.js';
import { Dec, TradeLogLoadError } from '@tapecache/contracts';
import type { TradeDirection, TradeEvent } from '@tapecache/contracts';
import type { TradeLogOptions } from './types.js';

const TIME_FORMAT = 'YYYY-MM-DD HH:mm:ss';
const COLUMN_COUNT = 5;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const UNSIGNED_PATTERN = /^\d+$/;

/**
 * Read and parse a trade log file.
 *
 * @throws TradeLogLoadError with `path` and, for row errors, the 1-based file `row`
 *
 * @example
 * ```typescript
 * const trades = await loadTradeLog('./trades.csv');
 * ```
 */
export async function loadTradeLog(path: string, options: TradeLogOptions = {}): Promise<TradeEvent[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new TradeLogLoadError(`cannot read trade log: ${describe(error)}`, { path });
  }

  return parseTradeLog(content, path, options);
}

/**
 * Parse trade log text. `path` only labels errors.
 *
 * @throws TradeLogLoadError on malformed CSV or rows
 */
export function parseTradeLog(content: string, path: string, options: TradeLogOptions = {}): TradeEvent[] {
  const { timezone = 'UTC' } = options;

  if (moment.tz.zone(timezone) === null) {
    throw new TradeLogLoadError(`unknown time zone "${timezone}"`, { path, timezone });
  }

  let records: unknown;
  try {
    records = parse(content, {
      from_line: 2,
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
    });
  } catch (error) {
    throw new TradeLogLoadError(`malformed CSV: ${describe(error)}`, { path });
  }

  if (!Array.isArray(records)) {
    throw new TradeLogLoadError('malformed CSV: expected rows', { path });
  }

  return records.map((record: unknown, index) => parseRow(record, index + 2, path, timezone));
}

function parseRow(record: unknown, row: number, path: string, timezone: string): TradeEvent {
  const fail = (message: string): never => {
    throw new TradeLogLoadError(`row ${row}: ${message}`, { path, row });
  };

  if (!Array.isArray(record) || record.length !== COLUMN_COUNT) {
    return fail(`expected ${COLUMN_COUNT} columns`);
  }

  const fields: string[] = record.map((value: unknown) => String(value));
  const [time = '', direction = '', price = '', quantity = '', sequence = ''] = fields;

  const parsedTime = moment.tz(time, TIME_FORMAT, true, timezone);
  if (!parsedTime.isValid()) {
    return fail(`invalid time "${time}", expected ${TIME_FORMAT}`);
  }

  if (!INTEGER_PATTERN.test(direction)) {
    return fail(`invalid direction "${direction}"`);
  }

  if (!UNSIGNED_PATTERN.test(sequence)) {
    return fail(`invalid sequence number "${sequence}"`);
  }

  return {
    timestamp: parsedTime.unix(),
    direction: toDirection(Number(direction)),
    price: parseDecimal(price, 'price', fail),
    quantity: parseDecimal(quantity, 'quantity', fail),
    sequenceNumber: BigInt(sequence),
  };
}

function parseDecimal(value: string, field: string, fail: (message: string) => never): Decimal {
  let parsed: Decimal;
  try {
    parsed = new Dec(value);
  } catch {
    return fail(`invalid ${field} "${value}"`);
  }
  if (!parsed.isFinite() || parsed.isNegative()) {
    return fail(`${field} must be a non-negative number, got "${value}"`);
  }
  return parsed;
}

function toDirection(value: number): TradeDirection {
  if (value > 0) return 1;
  if (value < 0) return -1;
  return 0;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
