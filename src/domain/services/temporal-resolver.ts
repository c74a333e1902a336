import { WEEKDAY_KEYWORDS } from '@domain/types/keyword.js';
import type { DateFilter, IsoDate, TimeFilter, TimeOfDay } from '@domain/types/temporal.js';
import {
  addDays,
  endOfMonth,
  endOfYear,
  hourOf,
  isoWeekday,
  makeTime,
  parseDate,
  startOfMonth,
  startOfYear,
} from '@shared/lib/calendar.js';
import type { KeywordRegistry } from './keyword-registry.js';

export interface ResolveOptions {
  referenceDate: IsoDate;
  /** moment.js formats tried in order after every keyword. */
  formats: readonly string[];
  registry: KeywordRegistry;
}

const single = (date: IsoDate): DateFilter => ({ type: 'single', date });
const range = (start: IsoDate, end: IsoDate): DateFilter => ({ type: 'range', start, end });

/**
 * Resolve one date token: relative day keywords, week/month/year periods,
 * weekday names (most recent on or before the reference date), then the
 * configured formats. First match wins.
 */
export function resolveDateToken(token: string, options: ResolveOptions): DateFilter | undefined {
  const { referenceDate: ref, formats, registry } = options;
  const keyword = registry.resolve(token);

  switch (keyword) {
    case 'today':
      return single(ref);
    case 'yesterday':
      return single(addDays(ref, -1));
    case 'tomorrow':
      return single(addDays(ref, 1));
    case 'last week': {
      const lastSunday = addDays(ref, -isoWeekday(ref));
      return range(addDays(lastSunday, -6), lastSunday);
    }
    case 'this week': {
      const monday = addDays(ref, 1 - isoWeekday(ref));
      return range(monday, addDays(monday, 6));
    }
    case 'last month':
      return range(startOfMonth(ref, -1), endOfMonth(ref, -1));
    case 'this month':
      return range(startOfMonth(ref), endOfMonth(ref));
    case 'last year':
      return range(startOfYear(ref, -1), endOfYear(ref, -1));
    case 'this year':
      return range(startOfYear(ref), endOfYear(ref));
    case 'monday':
    case 'tuesday':
    case 'wednesday':
    case 'thursday':
    case 'friday':
    case 'saturday':
    case 'sunday': {
      const target = WEEKDAY_KEYWORDS.indexOf(keyword) + 1;
      const daysAgo = (isoWeekday(ref) - target + 7) % 7;
      return single(addDays(ref, -daysAgo));
    }
    default:
      break;
  }

  for (const format of formats) {
    const date = parseDate(token.trim(), format);
    if (date) return single(date);
  }
  return undefined;
}

/**
 * Combine a start token and an optional end token into one filter.
 *
 * A period on the start side wins outright; a period on the end side wins over
 * a single start day; two single days become a range in the order given, even
 * when reversed. An end token that does not resolve is ignored.
 */
export function parseDateToken(
  start: string,
  end: string | undefined,
  options: ResolveOptions,
): DateFilter | undefined {
  const first = resolveDateToken(start, options);
  if (!first) return undefined;
  if (first.type === 'range') return first;

  const second = end === undefined ? undefined : resolveDateToken(end, options);
  if (!second) return first;
  if (second.type === 'range') return second;
  return range(first.date, second.date);
}

// ── Times ────────────────────────────────────────────────────────────────────

const TWELVE_HOUR = /^(.*?)(am|pm)$/i;
const TWENTY_FOUR_HOUR = /^(\d{1,2}):(\d{2})$/;
const DIGITS = /^\d+$/;

function parseTwelveHour(token: string): TimeOfDay | undefined {
  const match = TWELVE_HOUR.exec(token);
  if (!match) return undefined;
  const [, core = '', suffix = ''] = match;
  const parts = core.trim().split(':');
  if (parts.length > 3 || !parts.every((part) => DIGITS.test(part))) return undefined;

  const [hour = 0, minute = 0, second = 0] = parts.map(Number);
  if (hour < 1 || hour > 12 || minute > 59 || second > 59) return undefined;

  const pm = suffix.toLowerCase() === 'pm';
  const hour24 = hour === 12 ? (pm ? 12 : 0) : pm ? hour + 12 : hour;
  return makeTime(hour24, minute, second);
}

/** Strict 24-hour `HH:MM`, as written in day-file headings. */
export function parseClockTime(token: string): TimeOfDay | undefined {
  const match = TWENTY_FOUR_HOUR.exec(token.trim());
  if (!match) return undefined;
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) return undefined;
  return makeTime(hour, minute);
}

/**
 * Resolve a time token: named times of day, then 12-hour `h[:mm[:ss]]am|pm`,
 * then 24-hour `HH:MM`, then a bare hour 0–23. Out-of-range parts reject the
 * token rather than clamp.
 */
export function parseTimeToken(token: string, registry: KeywordRegistry): TimeOfDay | undefined {
  const trimmed = token.trim();

  switch (registry.resolve(trimmed)) {
    case 'morning':
      return makeTime(8);
    case 'noon':
      return makeTime(12);
    case 'evening':
      return makeTime(18);
    case 'night':
      return makeTime(21);
    case 'midnight':
      return makeTime(0);
    default:
      break;
  }

  const twelveHour = parseTwelveHour(trimmed);
  if (twelveHour) return twelveHour;

  const clock = parseClockTime(trimmed);
  if (clock) return clock;

  if (DIGITS.test(trimmed)) {
    const hour = Number(trimmed);
    if (hour <= 23) return makeTime(hour);
  }
  return undefined;
}

// ── Time filters ─────────────────────────────────────────────────────────────

/**
 * Build a time-of-day filter. Two tokens give `[start, end)`. A single token
 * naming a part of the day gives that part's range; any other time matches
 * its whole hour. An end token that does not resolve is ignored.
 */
export function parseTimeFilter(
  start: string,
  end: string | undefined,
  registry: KeywordRegistry,
): TimeFilter | undefined {
  if (end !== undefined) {
    const from = parseTimeToken(start, registry);
    const to = parseTimeToken(end, registry);
    if (!from) return undefined;
    if (to) return { type: 'range', start: from, end: to };
  }

  switch (registry.resolve(start)) {
    case 'morning':
      return { type: 'range', start: makeTime(6), end: makeTime(12) };
    case 'noon':
      return { type: 'range', start: makeTime(12), end: makeTime(18) };
    case 'evening':
      return { type: 'range', start: makeTime(18), end: makeTime(21) };
    case 'night':
      return { type: 'range', start: makeTime(21), end: makeTime(6) };
    default:
      break;
  }

  const time = parseTimeToken(start, registry);
  return time ? { type: 'single', time } : undefined;
}

export function timeIsInRange(filter: TimeFilter, time: TimeOfDay): boolean {
  switch (filter.type) {
    case 'single':
      return hourOf(filter.time) === hourOf(time);
    case 'range':
      return filter.start <= filter.end
        ? filter.start <= time && time < filter.end
        : time >= filter.start || time < filter.end;
  }
}

export function dateIsInFilter(filter: DateFilter, date: IsoDate): boolean {
  switch (filter.type) {
    case 'single':
      return filter.date === date;
    case 'range':
      return filter.start <= date && date <= filter.end;
  }
}
