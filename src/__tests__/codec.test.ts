import { describe, it, expect, afterEach, beforeEach } from 'vitest';
import { columnKindForPgType, encodeRow, encodeValue } from '../services/codec.js';

describe('encodeValue', () => {
  it('maps null and undefined to null', () => {
    expect(encodeValue(null)).toBeNull();
    expect(encodeValue(undefined)).toBeNull();
  });

  it('converts decimal columns to numbers', () => {
    expect(encodeValue('12.50', 'decimal')).toBe(12.5);
    expect(encodeValue('-0.125', 'decimal')).toBe(-0.125);
    expect(encodeValue(3, 'decimal')).toBe(3);
  });

  it('leaves numeric-looking text alone outside decimal columns', () => {
    expect(encodeValue('12.50')).toBe('12.50');
  });

  it('renders zoned timestamps as UTC ISO-8601', () => {
    const value = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));
    expect(encodeValue(value, 'timestamptz')).toBe('2024-01-02T03:04:05.000Z');
    expect(encodeValue(value)).toBe('2024-01-02T03:04:05.000Z');
  });

  it('renders zoneless timestamps as wall-clock time', () => {
    expect(encodeValue(new Date(2024, 0, 2, 3, 4, 5, 60), 'timestamp')).toBe(
      '2024-01-02T03:04:05.060'
    );
  });

  it('keeps non-finite decimals as text', () => {
    expect(encodeValue('NaN', 'decimal')).toBe('NaN');
    expect(encodeValue('Infinity', 'decimal')).toBe('Infinity');
    expect(encodeValue(Number.NEGATIVE_INFINITY, 'decimal')).toBe('-Infinity');
  });

  it('renders date columns as YYYY-MM-DD', () => {
    expect(encodeValue(new Date(2024, 1, 29), 'date')).toBe('2024-02-29');
  });

  it('maps invalid dates to null', () => {
    expect(encodeValue(new Date('not a date'))).toBeNull();
  });

  it('keeps safe bigints as numbers and larger ones as text', () => {
    expect(encodeValue(42n)).toBe(42);
    expect(encodeValue(9223372036854775807n)).toBe('9223372036854775807');
  });

  it('parses bigint column strings', () => {
    expect(encodeValue('15', 'bigint')).toBe(15);
    expect(encodeValue('9007199254740993', 'bigint')).toBe('9007199254740993');
  });

  it('passes strings and booleans through', () => {
    expect(encodeValue('completed')).toBe('completed');
    expect(encodeValue(false)).toBe(false);
  });

  it('keeps non-finite numbers as text', () => {
    expect(encodeValue(Number.NaN)).toBe('NaN');
    expect(encodeValue(Number.POSITIVE_INFINITY)).toBe('Infinity');
  });

  it('encodes buffers as base64', () => {
    expect(encodeValue(Buffer.from('hi'))).toBe('aGk=');
  });

  it('encodes JSON column values element-wise', () => {
    expect(encodeValue({ at: new Date(Date.UTC(2024, 0, 1)), ids: [1n, 2n], note: null })).toEqual({
      at: '2024-01-01T00:00:00.000Z',
      ids: [1, 2],
      note: null,
    });
  });
});

describe('encodeValue away from UTC', () => {
  let previous: string | undefined;

  beforeEach(() => {
    previous = process.env.TZ;
    process.env.TZ = 'Asia/Tehran';
  });

  afterEach(() => {
    if (previous === undefined) {
      delete process.env.TZ;
    } else {
      process.env.TZ = previous;
    }
  });

  it('does not shift zoneless timestamps by the host offset', () => {
    const value = new Date(2024, 0, 5, 10, 0, 0);
    expect(encodeValue(value, 'timestamp')).toBe('2024-01-05T10:00:00.000');
    expect(encodeValue(value, 'timestamptz')).toBe('2024-01-05T06:30:00.000Z');
  });

  it('keeps the calendar day of date columns', () => {
    expect(encodeValue(new Date(2024, 0, 5), 'date')).toBe('2024-01-05');
  });
});

describe('encodeRow', () => {
  it('orders keys by the column list and drops extras', () => {
    const row = encodeRow({ b: 2, a: 'x', extra: true }, ['a', 'b']);
    expect(Object.keys(row)).toEqual(['a', 'b']);
    expect(row).toEqual({ a: 'x', b: 2 });
  });

  it('applies per-column kinds', () => {
    const kinds = new Map([['total', 'decimal' as const]]);
    expect(encodeRow({ total: '99.90', code: '99.90' }, ['total', 'code'], kinds)).toEqual({
      total: 99.9,
      code: '99.90',
    });
  });

  it('fills missing columns with null', () => {
    expect(encodeRow({}, ['missing'])).toEqual({ missing: null });
  });
});

describe('columnKindForPgType', () => {
  it('maps known PostgreSQL type ids', () => {
    expect(columnKindForPgType(1700)).toBe('decimal');
    expect(columnKindForPgType(20)).toBe('bigint');
    expect(columnKindForPgType(1082)).toBe('date');
    expect(columnKindForPgType(1114)).toBe('timestamp');
    expect(columnKindForPgType(1184)).toBe('timestamptz');
    expect(columnKindForPgType(25)).toBe('other');
  });
});
