import type { DateFilter, TimeOfDay } from '@domain/types/temporal.js';
import type { ParsedInput } from '@domain/types/entry.js';
import { parseDateTime, datePart } from '@shared/lib/calendar.js';
import { parseDateToken, parseTimeToken, type ResolveOptions } from './temporal-resolver.js';

const PREFIX_SEPARATOR = ': ';
const ISO_PREFIX_FORMATS = ['YYYY-MM-DDTHH:mm', 'YYYY-MM-DDTHH:mm:ss'];

interface Prefix {
  date?: DateFilter;
  time?: TimeOfDay;
  rest: string;
}

function parseIsoPrefix(prefix: string): { date: DateFilter; time: TimeOfDay } | undefined {
  for (const format of ISO_PREFIX_FORMATS) {
    const dateTime = parseDateTime(prefix, format);
    if (dateTime) {
      return { date: { type: 'single', date: datePart(dateTime) }, time: dateTime.slice(11) };
    }
  }
  return undefined;
}

/**
 * Split `"<when>: <text>"`. The prefix is tried as an ISO date-time, then as
 * `<date> at <time>` (either side may fail on its own), then as a bare date.
 * Anything else leaves the whole input as text.
 */
function parsePrefix(input: string, options: ResolveOptions): Prefix {
  const idx = input.indexOf(PREFIX_SEPARATOR);
  if (idx === -1) return { rest: input };

  const prefix = input.slice(0, idx).trim();
  const rest = input.slice(idx + 1);

  const iso = parseIsoPrefix(prefix);
  if (iso) return { ...iso, rest };

  const { registry } = options;
  const atWord = registry.findWord('at', prefix);
  const atPosition = registry.findPosition('at', prefix);
  if (atWord !== undefined && atPosition !== undefined) {
    const dayText = prefix.slice(0, atPosition).trim();
    const timeText = prefix.slice(atPosition + atWord.length).trim();
    return {
      date: parseDateToken(dayText, undefined, options),
      time: parseTimeToken(timeText, registry),
      rest,
    };
  }

  const date = parseDateToken(prefix, undefined, options);
  if (date) return { date, rest };
  return { rest: input };
}

/**
 * Title runs to the first line break, else through the first `.`, `?` or `!`,
 * else the whole text.
 */
export function splitTitleBody(text: string): { title: string; body: string } {
  const newline = text.search(/[\r\n]/);
  if (newline !== -1) {
    return { title: text.slice(0, newline).trim(), body: text.slice(newline + 1).trim() };
  }
  const terminator = text.search(/[.?!]/);
  if (terminator !== -1) {
    return { title: text.slice(0, terminator + 1).trim(), body: text.slice(terminator + 1).trim() };
  }
  return { title: text.trim(), body: '' };
}

/** Drop Markdown heading marks around a title. */
export function normalizeTitle(title: string): string {
  return title.replace(/^[#\s]+/, '').replace(/[#\s]+$/, '');
}

export function parseRawUserInput(text: string, options: ResolveOptions): ParsedInput {
  const prefix = parsePrefix(text, options);
  const { title, body } = splitTitleBody(prefix.rest.trim());

  const date = prefix.date
    ? prefix.date.type === 'single'
      ? prefix.date.date
      : prefix.date.start
    : options.referenceDate;

  return {
    date,
    ...(prefix.time ? { time: prefix.time } : {}),
    title: normalizeTitle(title),
    body,
    tags: [],
    explicitDate: prefix.date !== undefined,
  };
}
