const INTEGER_PATTERN = /^[+-]?\d+$/;
const DATE_TIME_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

// Above this magnitude a numeric timestamp is read as milliseconds.
const MILLISECOND_THRESHOLD = 2e10;

// Years outside this range do not print as YYYY in ISO-8601.
const MIN_YEAR = 1;
const MAX_YEAR = 9999;

/**
 * Coerces integer-like input. Anything that cannot be read as an integer is
 * returned untouched so the `@IsInt()` check reports it.
 */
export function toInteger(value: unknown): unknown {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!INTEGER_PATTERN.test(trimmed)) {
      return value;
    }
    const parsed = Number(trimmed);
    return Number.isSafeInteger(parsed) ? parsed : value;
  }

  return value;
}

/**
 * Coerces date-time input into a `Date`.
 *
 * Accepts `Date` instances, ISO-8601 dates and date-times (zone-less values
 * are UTC) and Unix timestamps, all within years 1 to 9999. Unreadable input
 * is returned untouched for `@IsDate()` to reject; a `Date` out of range
 * becomes an invalid one.
 */
export function toDateTime(value: unknown): unknown {
  if (value instanceof Date) {
    return withinYearRange(new Date(value.getTime())) ?? new Date(Number.NaN);
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      return value;
    }
    return withinYearRange(new Date(Math.abs(value) > MILLISECOND_THRESHOLD ? value : value * 1000)) ?? value;
  }

  if (typeof value === 'string') {
    return parseIsoDateTime(value.trim()) ?? value;
  }

  return value;
}

export function toIsoString(value: unknown): unknown {
  return value instanceof Date ? value.toISOString() : value;
}

function parseIsoDateTime(input: string): Date | undefined {
  const match = DATE_TIME_PATTERN.exec(input);
  if (!match) {
    return undefined;
  }

  const [, year, month, day, hours, minutes, seconds, zone] = match;
  if (!isCalendarDate(Number(year), Number(month), Number(day))) {
    return undefined;
  }
  if (hours !== undefined && (Number(hours) > 23 || Number(minutes) > 59 || Number(seconds ?? 0) > 59)) {
    return undefined;
  }

  let normalized = input.replace(' ', 'T');
  if (hours === undefined) {
    normalized += 'T00:00:00';
  }
  if (zone === undefined) {
    normalized += 'Z';
  } else if (/^[+-]\d{4}$/.test(zone)) {
    normalized = `${normalized.slice(0, -zone.length)}${zone.slice(0, 3)}:${zone.slice(3)}`;
  }

  return withinYearRange(new Date(normalized));
}

function withinYearRange(date: Date): Date | undefined {
  if (Number.isNaN(date.getTime())) {
    return undefined;
  }

  const year = date.getUTCFullYear();
  return year >= MIN_YEAR && year <= MAX_YEAR ? date : undefined;
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }

  // setUTCFullYear keeps years below 100 literal, unlike Date.UTC.
  const lastDay = new Date(0);
  lastDay.setUTCFullYear(year, month, 0);
  return day <= lastDay.getUTCDate();
}
