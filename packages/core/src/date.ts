import { MS_PER_SECOND } from '#constants/time';

const MONTH_NAMES = [
  'Jan',
  'Feb',
  'Mar',
  'Apr',
  'May',
  'Jun',
  'Jul',
  'Aug',
  'Sep',
  'Oct',
  'Nov',
  'Dec',
];

// IMF-fixdate, e.g. Sun, 06 Nov 1994 08:49:37 GMT (the day name is not cross-checked)
const HTTP_DATE_PATTERN =
  /^(Sun|Mon|Tue|Wed|Thu|Fri|Sat), (\d{2}) ([A-Z][a-z]{2}) (\d{4}) (\d{2}):(\d{2}):(\d{2}) GMT$/;

/**
 * formats a date with the fixed http date grammar (IMF-fixdate, UTC)
 * @param date the date to format, sub-second precision is dropped
 * @returns the http date string
 * @example
 * ```typescript
 * formatHttpDate(new Date('2024-01-01T00:00:00Z')); // 'Mon, 01 Jan 2024 00:00:00 GMT'
 * ```
 */
export function formatHttpDate(date: Date): string {
  return date.toUTCString();
}

/**
 * parses an http date, accepting only the IMF-fixdate form
 * @param value raw header value
 * @returns the parsed date, or undefined when the value is absent or malformed
 */
export function parseHttpDate(value: string | undefined): Date | undefined {
  const match = value ? HTTP_DATE_PATTERN.exec(value.trim()) : null;

  if (!match) {
    return undefined;
  }

  const [, , day, monthName, year, hours, minutes, seconds] = match;
  const month = MONTH_NAMES.indexOf(monthName ?? '');

  if (month < 0) {
    return undefined;
  }

  const date = new Date(
    Date.UTC(
      Number(year),
      month,
      Number(day),
      Number(hours),
      Number(minutes),
      Number(seconds),
    ),
  );

  // rejects overflowing fields such as 31 Feb or 25:00:00
  if (
    date.getUTCDate() !== Number(day) ||
    date.getUTCHours() !== Number(hours) ||
    date.getUTCMinutes() !== Number(minutes) ||
    date.getUTCSeconds() !== Number(seconds)
  ) {
    return undefined;
  }

  return date;
}

/**
 * truncates a date to whole seconds, the precision of http dates
 * @param date the date to truncate
 * @returns number of whole seconds since the epoch
 */
export function toHttpSeconds(date: Date): number {
  return Math.floor(date.getTime() / MS_PER_SECOND);
}
