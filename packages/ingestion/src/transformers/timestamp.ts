/**
 * Naive ISO timestamps as published by Socrata, with an optional fraction of
 * up to six digits and no offset.
 */
const NAIVE_TIMESTAMP =
  /^(\d{4})-(\d{1,2})-(\d{1,2})T(\d{1,2}):(\d{1,2}):(\d{1,2})(?:\.(\d{1,6}))?$/;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29;
  return DAYS_IN_MONTH[month - 1] ?? 0;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Interpret a naive timestamp as UTC and render it as
 * `YYYY-MM-DDTHH:MM:SS[.ffffff]+00:00`. The fraction is widened to
 * microseconds and left out when it is zero.
 *
 * Returns `null` for absent or empty input. A non-empty value in any other
 * shape (including out-of-range fields) comes back unchanged, so malformed
 * timestamps reach the store verbatim rather than failing the record.
 */
export function normalizeTimestamp(
  value: string | null | undefined,
): string | null {
  if (!value) {
    return null;
  }

  const match = NAIVE_TIMESTAMP.exec(value);
  if (!match) {
    return value;
  }

  const [, y, mo, d, h, mi, s, fraction] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);

  if (
    year < 1 ||
    month < 1 ||
    month > 12 ||
    day < 1 ||
    day > daysInMonth(year, month) ||
    hour > 23 ||
    minute > 59 ||
    second > 59
  ) {
    return value;
  }

  const micros = fraction ? Number(fraction.padEnd(6, "0")) : 0;
  const date = `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
  const time = `${pad(hour)}:${pad(minute)}:${pad(second)}`;
  const frac = micros > 0 ? `.${pad(micros, 6)}` : "";

  return `${date}T${time}${frac}+00:00`;
}
