import moment from 'moment';

/**
 * Calendar arithmetic over plain ISO strings.
 *
 * Dates travel through the app as `YYYY-MM-DD`, times as `HH:mm:ss` and
 * date-times as `YYYY-MM-DDTHH:mm:ss`. Everything is computed in UTC mode so
 * day arithmetic never crosses a DST boundary; the strings carry no zone.
 */

export const ISO_DATE = 'YYYY-MM-DD';
export const ISO_TIME = 'HH:mm:ss';
export const ISO_DATETIME = 'YYYY-MM-DDTHH:mm:ss';

function day(date: string): moment.Moment {
  return moment.utc(date, ISO_DATE, true);
}

export function addDays(date: string, days: number): string {
  return day(date).add(days, 'days').format(ISO_DATE);
}

/** 1 = Monday … 7 = Sunday. */
export function isoWeekday(date: string): number {
  return day(date).isoWeekday();
}

export function startOfMonth(date: string, offsetMonths = 0): string {
  return day(date).add(offsetMonths, 'months').startOf('month').format(ISO_DATE);
}

export function endOfMonth(date: string, offsetMonths = 0): string {
  return day(date).add(offsetMonths, 'months').endOf('month').format(ISO_DATE);
}

export function startOfYear(date: string, offsetYears = 0): string {
  return day(date).add(offsetYears, 'years').startOf('year').format(ISO_DATE);
}

export function endOfYear(date: string, offsetYears = 0): string {
  return day(date).add(offsetYears, 'years').endOf('year').format(ISO_DATE);
}

/** Strict parse of `input` with a moment format string. */
export function parseDate(input: string, format: string): string | undefined {
  const parsed = moment.utc(input, format, true);
  return parsed.isValid() ? parsed.format(ISO_DATE) : undefined;
}

export function parseDateTime(input: string, format: string): string | undefined {
  const parsed = moment.utc(input, format, true);
  return parsed.isValid() ? parsed.format(ISO_DATETIME) : undefined;
}

export function formatDate(date: string, format: string): string {
  return day(date).format(format);
}

export function formatDateTime(dateTime: string, format: string): string {
  return moment.utc(dateTime, ISO_DATETIME, true).format(format);
}

export function combine(date: string, time: string): string {
  return `${date}T${time}`;
}

export function datePart(dateTime: string): string {
  return dateTime.slice(0, 10);
}

export function makeTime(hour: number, minute = 0, second = 0): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return `${pad(hour)}:${pad(minute)}:${pad(second)}`;
}

export function hourOf(time: string): number {
  return Number(time.slice(0, 2));
}

/** `HH:mm` view of an `HH:mm:ss` time. */
export function shortTime(time: string): string {
  return time.slice(0, 5);
}

export function localToday(): string {
  return moment().format(ISO_DATE);
}

export function localNow(): string {
  return moment().format(ISO_TIME);
}
