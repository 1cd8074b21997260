import { InputValidationError } from './errors';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 86_400_000;

export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return (
    date.getUTCFullYear() === Number(y) &&
    date.getUTCMonth() === Number(m) - 1 &&
    date.getUTCDate() === Number(d)
  );
}

/**
 * Days since 1970-01-01 for an ISO calendar date. Throws on anything that is
 * not a real YYYY-MM-DD date.
 */
export function toEpochDay(value: string, field = 'date'): number {
  if (!isIsoDate(value)) {
    throw new InputValidationError(`Invalid ${field} "${value}": expected a YYYY-MM-DD calendar date`, {
      field,
      value,
    });
  }
  const [y, m, d] = value.split('-').map(Number);
  return Date.UTC(y, m - 1, d) / MS_PER_DAY;
}

// Calendar date of `now` in the given IANA time zone
export function todayInTimeZone(timeZone: string, now: Date = new Date()): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(now);
  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '';
  return `${part('year')}-${part('month')}-${part('day')}`;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}
