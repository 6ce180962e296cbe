/**
 * Tests for query line parsing
 */

import { describe, it, expect } from 'vitest';
import { QueryParseError } from '@tapecache/contracts';
import { parseQuery } from '../src/parser.js';

function parseError(line: string): QueryParseError {
  try {
    parseQuery(line);
  } catch (error) {
    if (error instanceof QueryParseError) {
      return error;
    }
    throw error;
  }
  throw new Error(`expected "${line}" to be rejected`);
}

describe('parseQuery', () => {
  it('should parse each metric selector', () => {
    expect(parseQuery('C 0 10')).toEqual({ metric: 'count', range: { start: 0, end: 10 } });
    expect(parseQuery('B 0 10').metric).toBe('buys');
    expect(parseQuery('S 0 10').metric).toBe('sells');
    expect(parseQuery('V 0 10').metric).toBe('volume');
  });

  it('should accept extra whitespace and signed timestamps', () => {
    expect(parseQuery('  V \t-5   +7 ')).toEqual({ metric: 'volume', range: { start: -5, end: 7 } });
  });

  it('should accept an empty range', () => {
    expect(parseQuery('C 5 5').range).toEqual({ start: 5, end: 5 });
  });

  it('should reject the wrong number of fields', () => {
    const error = parseError('C 0');

    expect(error.field).toBe('line');
    expect(error.message).toBe('invalid query with 2 fields');
    expect(parseError('C 0 10 20').message).toBe('invalid query with 4 fields');
  });

  it('should reject an unknown selector', () => {
    const error = parseError('X 0 10');

    expect(error.field).toBe('metric');
    expect(error.message).toBe('invalid query type: X');
    expect(parseError('CC 0 10').field).toBe('metric');
    expect(parseError('c 0 10').field).toBe('metric');
  });

  it('should reject a malformed start timestamp', () => {
    const error = parseError('C abc 10');

    expect(error.field).toBe('start');
    expect(error.message).toBe('invalid start timestamp: abc');
    expect(error.data).toEqual({ field: 'start', value: 'abc', line: 'C abc 10' });
  });

  it('should reject fractional and unsafe end timestamps', () => {
    expect(parseError('C 0 1.5').field).toBe('end');
    expect(parseError('C 0 9007199254740992').message).toBe('invalid end timestamp: 9007199254740992');
  });

  it('should reject an end before the start', () => {
    const error = parseError('C 10 5');

    expect(error.field).toBe('end');
    expect(error.code).toBe('QUERY_PARSE');
    expect(error.message).toBe('invalid end timestamp: 5 is before start 10');
  });
});
