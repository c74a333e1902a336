import type { StoredJournalEntry, TagCount } from '@domain/types/index.js';
import { bold, cyan, dim, green, magenta, visiblePadEnd, yellow } from '@shared/lib/ansi.js';
import { formatDate, shortTime } from '@shared/lib/calendar.js';

export type EntryStyle = 'long' | 'short';

const TAG_IN_TEXT = /(^|\s)(@[A-Za-z0-9_][\w-]*)/g;

function highlightTags(text: string): string {
  return text.replace(TAG_IN_TEXT, (_match, lead: string, tag: string) => `${lead}${green(tag)}`);
}

export function formatTagList(tags: readonly string[]): string {
  return tags.length > 0 ? `[${tags.map((tag) => green(tag)).join(' - ')}]` : '';
}

/** One line per entry: `2025-08-15 09:00 - Title [tag - tag]`. */
export function formatEntryLine(entry: StoredJournalEntry): string {
  const line = `${cyan(entry.date)} ${magenta(shortTime(entry.time))} - ${yellow(entry.title)}`;
  const tags = formatTagList(entry.tags);
  return tags ? `${line} ${tags}` : line;
}

/** Heading with the day in `dateFormat`, then the body. */
export function formatEntryDetail(entry: StoredJournalEntry, dateFormat: string): string {
  const heading = bold(`## ${formatDate(entry.date, dateFormat)} ${shortTime(entry.time)}: ${entry.title}`);
  const body = entry.body.trimEnd();
  return body ? `${heading}\n${highlightTags(body)}` : heading;
}

export function formatEntries(
  entries: readonly StoredJournalEntry[],
  options: { style: EntryStyle; dateFormat: string },
): string {
  if (entries.length === 0) return 'No entries found.';
  if (options.style === 'short') return entries.map(formatEntryLine).join('\n');
  return entries.map((entry) => `${formatEntryDetail(entry, options.dateFormat)}\n${dim('---')}`).join('\n\n');
}

/** Tag table, most used first as given. */
export function formatTagCounts(tags: readonly TagCount[]): string {
  if (tags.length === 0) return 'No tags found.';
  const width = Math.max(...tags.map(({ tag }) => tag.length + 1)) + 2;
  return tags.map(({ tag, count }) => `${visiblePadEnd(green(`@${tag}`), width)}${count}`).join('\n');
}
