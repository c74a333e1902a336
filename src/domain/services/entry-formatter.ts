import type { JournalEntry, TodoEntry } from '@domain/types/entry.js';
import type { IsoDate } from '@domain/types/temporal.js';
import { formatDate, formatDateTime, shortTime } from '@shared/lib/calendar.js';

export const TODO_LIST_HEADER = '# All my pending todos';
const TODO_BODY_INDENT = '      ';

/** `# <date>` followed by the blank line that precedes the first block. */
export function formatDayHeader(date: IsoDate, headerFormat: string): string {
  return `# ${formatDate(date, headerFormat)}\n\n`;
}

const BODY_HEADING = /^(\\*## )/gm;
const ESCAPED_BODY_HEADING = /^\\(\\*## )/gm;

/**
 * Body lines that would read back as a block heading get one more leading
 * backslash; Markdown renders `\## ` as a literal `## `.
 */
export function escapeBodyHeadings(body: string): string {
  return body.replace(BODY_HEADING, '\\$1');
}

export function unescapeBodyHeadings(body: string): string {
  return body.replace(ESCAPED_BODY_HEADING, '$1');
}

export function formatJournalBlock(entry: Pick<JournalEntry, 'time' | 'title' | 'body'>): string {
  const heading = `## ${shortTime(entry.time)} - ${entry.title}\n\n`;
  const body = escapeBodyHeadings(entry.body.replace(/\n+$/, ''));
  return body ? `${heading}${body}\n\n` : heading;
}

/** Whole day file, blocks in the order given. */
export function formatDayFile(
  date: IsoDate,
  entries: readonly Pick<JournalEntry, 'time' | 'title' | 'body'>[],
  headerFormat: string,
): string {
  return formatDayHeader(date, headerFormat) + entries.map(formatJournalBlock).join('');
}

export function formatTodoListHeader(): string {
  return `${TODO_LIST_HEADER}\n\n`;
}

export function formatTodoBlock(
  entry: Pick<TodoEntry, 'title' | 'body' | 'status' | 'dueDate' | 'doneDate'>,
  datetimeFormat: string,
): string {
  const box = entry.status === 'done' ? '- [x]' : '- [ ]';
  let line = `${box} ${entry.title}`;
  if (entry.dueDate) line += ` | ${formatDateTime(entry.dueDate, datetimeFormat)}`;
  if (entry.doneDate) {
    line += entry.dueDate ? ' | ' : ' | | ';
    line += formatDateTime(entry.doneDate, datetimeFormat);
  }

  const body = entry.body.trim();
  if (!body) return `${line}\n`;
  const indented = body
    .split('\n')
    .map((bodyLine) => (bodyLine ? TODO_BODY_INDENT + bodyLine : ''))
    .join('\n');
  return `${line}\n${indented}\n`;
}
