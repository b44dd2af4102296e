import { toDateTime, toInteger, toIsoString } from './coerce';

describe('toInteger', () => {
  it('converts digit strings, ignoring surrounding whitespace and sign', () => {
    expect(toInteger('42')).toBe(42);
    expect(toInteger(' -7 ')).toBe(-7);
    expect(toInteger('+3')).toBe(3);
  });

  it('leaves numbers and non-integer input untouched', () => {
    expect(toInteger(12)).toBe(12);
    expect(toInteger(4.5)).toBe(4.5);
    expect(toInteger('4.5')).toBe('4.5');
    expect(toInteger('many')).toBe('many');
    expect(toInteger('')).toBe('');
    expect(toInteger(true)).toBe(true);
    expect(toInteger(null)).toBeNull();
  });

  it('leaves digit strings beyond the safe integer range as text', () => {
    expect(toInteger('9007199254740991')).toBe(9007199254740991);
    expect(toInteger('9007199254740993')).toBe('9007199254740993');
  });
});

describe('toDateTime', () => {
  const iso = (value: unknown): unknown => {
    const result = toDateTime(value);
    return result instanceof Date ? result.toISOString() : result;
  };

  it('reads a bare date as midnight UTC', () => {
    expect(iso('2021-01-01')).toBe('2021-01-01T00:00:00.000Z');
  });

  it('reads zone-less date-times as UTC', () => {
    expect(iso('2021-01-01T10:30:00')).toBe('2021-01-01T10:30:00.000Z');
    expect(iso('2021-01-01 10:30')).toBe('2021-01-01T10:30:00.000Z');
    expect(iso('2021-01-01T10:30:00.250')).toBe('2021-01-01T10:30:00.250Z');
  });

  it('applies explicit offsets', () => {
    expect(iso('2021-01-01T10:30:00Z')).toBe('2021-01-01T10:30:00.000Z');
    expect(iso('2021-01-01T10:30:00+02:00')).toBe('2021-01-01T08:30:00.000Z');
    expect(iso('2021-01-01T10:30:00+0200')).toBe('2021-01-01T08:30:00.000Z');
  });

  it('rejects dates that are not on the calendar', () => {
    expect(iso('2021-02-30')).toBe('2021-02-30');
    expect(iso('2021-13-01')).toBe('2021-13-01');
    expect(iso('2021-01-01T24:00')).toBe('2021-01-01T24:00');
    expect(iso('2024-02-29')).toBe('2024-02-29T00:00:00.000Z');
  });

  it('reads numbers as Unix timestamps in seconds or milliseconds', () => {
    expect(iso(1609459200)).toBe('2021-01-01T00:00:00.000Z');
    expect(iso(1609459200000)).toBe('2021-01-01T00:00:00.000Z');
    expect(toDateTime(Number.POSITIVE_INFINITY)).toBe(Number.POSITIVE_INFINITY);
  });

  it('keeps years between 1 and 9999', () => {
    expect(iso('0050-03-01')).toBe('0050-03-01T00:00:00.000Z');
    expect(iso('9999-12-31T23:59:59Z')).toBe('9999-12-31T23:59:59.000Z');
    expect(iso('0000-01-01')).toBe('0000-01-01');
    expect(iso('9999-12-31T23:30:00-02:00')).toBe('9999-12-31T23:30:00-02:00');
    expect(toDateTime(300000000000000)).toBe(300000000000000);
    expect(toDateTime(-62135596801000)).toBe(-62135596801000);
  });

  it('turns an out-of-range Date into an invalid one', () => {
    const result = toDateTime(new Date(Date.UTC(10000, 0, 1)));

    expect(result instanceof Date && Number.isNaN(result.getTime())).toBe(true);
  });

  it('copies Date instances', () => {
    const original = new Date('2021-06-15T12:00:00.000Z');
    const result = toDateTime(original);

    expect(result).toEqual(original);
    expect(result).not.toBe(original);
  });

  it('leaves unreadable input untouched', () => {
    expect(toDateTime('yesterday')).toBe('yesterday');
    expect(toDateTime(true)).toBe(true);
    expect(toDateTime(undefined)).toBeUndefined();
  });
});

describe('toIsoString', () => {
  it('formats dates and passes other values through', () => {
    expect(toIsoString(new Date(Date.UTC(2021, 0, 1)))).toBe('2021-01-01T00:00:00.000Z');
    expect(toIsoString('2021')).toBe('2021');
  });
});
