import type { TodoEntry, TodoStatus } from '@domain/types/entry.js';
import type { IsoDate, IsoDateTime } from '@domain/types/temporal.js';
import type { ParseOutcome } from '@domain/types/query.js';
import { combine, parseDateTime } from '@shared/lib/calendar.js';
import { parseClockTime } from './temporal-resolver.js';
import { extractTags } from './tags.js';

const ENTRY_START = /^- \[([ xX])\] /;
const BODY_INDENT = /^ {1,6}/;
const FIELD_SEPARATOR = ' | ';

export interface TodoParseOptions {
  /** moment.js format of due/done fields. */
  datetimeFormat: string;
  /** Day a bare `HH:MM` field falls on. */
  referenceDate: IsoDate;
}

interface PendingTodo {
  status: TodoStatus;
  head: string;
  bodyLines: string[];
}

/**
 * Parse a todo list:
 *
 * ```md
 * # All my pending todos
 *
 * - [ ] Title | 20/08/2025 07:00 | 22/08/2025 18:00
 *       Body
 * - [x] Another
 * ```
 *
 * A bad header or a bad date field is reported without dropping entries.
 */
export function parseTodoFile(content: string, options: TodoParseOptions): ParseOutcome<TodoEntry> {
  if (content.trim() === '') {
    return { entries: [], errors: ['Empty file: expected a header line starting with `#`.'] };
  }

  const entries: TodoEntry[] = [];
  const errors: string[] = [];
  const [header = '', ...lines] = content.split(/\r?\n/);

  if (!header.trimStart().startsWith('#')) {
    errors.push(`Invalid todo list header: expected a first line starting with \`#\`, found \`${header}\`.`);
  }

  const parseField = (field: string, title: string): IsoDateTime | undefined => {
    if (field === '') return undefined;
    const dateTime = parseDateTime(field, options.datetimeFormat);
    if (dateTime) return dateTime;
    const time = parseClockTime(field);
    if (time) return combine(options.referenceDate, time);
    errors.push(`Invalid date \`${field}\` in todo \`${title}\`. Expected \`${options.datetimeFormat}\` or \`HH:MM\`.`);
    return undefined;
  };

  const flush = (todo: PendingTodo | undefined): void => {
    if (!todo) return;
    const separator = todo.head.indexOf(FIELD_SEPARATOR);
    const title = (separator === -1 ? todo.head : todo.head.slice(0, separator)).trim();
    const fields = separator === -1
      ? []
      : todo.head.slice(separator + FIELD_SEPARATOR.length).split('|').map((field) => field.trim());
    const body = todo.bodyLines.join('\n').trim();
    const dueDate = parseField(fields[0] ?? '', title);
    const doneDate = parseField(fields[1] ?? '', title);

    entries.push({
      title,
      body,
      tags: extractTags(`${title}\n${body}`),
      status: todo.status,
      ...(dueDate ? { dueDate } : {}),
      ...(doneDate ? { doneDate } : {}),
    });
  };

  let current: PendingTodo | undefined;
  for (const line of lines) {
    const trimmed = line.trimStart();
    const start = ENTRY_START.exec(trimmed);
    if (start) {
      flush(current);
      current = {
        status: start[1] === ' ' ? 'pending' : 'done',
        head: trimmed.slice(start[0].length),
        bodyLines: [],
      };
      continue;
    }
    current?.bodyLines.push(line.replace(BODY_INDENT, ''));
  }
  flush(current);

  return { entries, errors };
}
