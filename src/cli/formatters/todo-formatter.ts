import type { StoredTodoEntry } from '@domain/types/index.js';
import { cyan, dim, green, red, yellow } from '@shared/lib/ansi.js';
import { formatDateTime } from '@shared/lib/calendar.js';
import { formatTagList } from './journal-formatter.js';

const BODY_INDENT = '    ';

function statusIcon(todo: StoredTodoEntry): string {
  return todo.status === 'done' ? green('[x]') : red('[ ]');
}

/** `3. [ ] Title - due 16/08/2025 07:00 [tag]` */
export function formatTodoLine(todo: StoredTodoEntry, datetimeFormat: string): string {
  const parts = [`${dim(`${todo.index}.`)} ${statusIcon(todo)} ${yellow(todo.title)}`];
  if (todo.dueDate) parts.push(cyan(`- due ${formatDateTime(todo.dueDate, datetimeFormat)}`));
  if (todo.doneDate) parts.push(dim(`- done ${formatDateTime(todo.doneDate, datetimeFormat)}`));
  const tags = formatTagList(todo.tags);
  if (tags) parts.push(tags);
  return parts.join(' ');
}

export function formatTodos(
  todos: readonly StoredTodoEntry[],
  options: { style: 'long' | 'short'; datetimeFormat: string },
): string {
  if (todos.length === 0) return 'No todos found.';
  return todos
    .map((todo) => {
      const line = formatTodoLine(todo, options.datetimeFormat);
      if (options.style === 'short' || !todo.body) return line;
      const body = todo.body
        .split('\n')
        .map((bodyLine) => (bodyLine ? BODY_INDENT + bodyLine : ''))
        .join('\n');
      return `${line}\n${body}`;
    })
    .join('\n');
}
