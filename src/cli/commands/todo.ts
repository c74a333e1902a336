import type { Command } from 'commander';
import { z } from 'zod/v4';
import type { StoredTodoEntry } from '@domain/types/entry.js';
import type { Todos } from '@features/todos/todo-service.js';
import { withCommandContext, parseCommandOptions, toJson } from '@cli/utils.js';
import { formatTodoLine, formatTodos } from '@cli/formatters/todo-formatter.js';
import { formatQueryErrors } from '@cli/formatters/query-error-formatter.js';
import { InvalidInputError } from '@shared/lib/errors.js';

const ListOptionsSchema = z.object({
  due: z.string().optional(),
  dueTo: z.string().optional(),
  done: z.string().optional(),
  status: z.enum(['pending', 'done', 'all']).default('all'),
  tags: z.array(z.string()).optional(),
  style: z.enum(['long', 'short']).default('long'),
});

const INDEX_PATTERN = /^\d+$/;

// ---- Interactive: pick a pending todo ----

async function selectPendingTodo(todos: Todos, datetimeFormat: string): Promise<number> {
  const { select } = await import('@inquirer/prompts');
  const pending = todos.readEntries({ status: 'pending' }).entries;
  if (pending.length === 0) throw new InvalidInputError('', 'there are no pending todos');

  return select<number>({
    message: 'Which todo is done?',
    choices: pending.map((todo) => ({ name: formatTodoLine(todo, datetimeFormat), value: todo.index })),
  });
}

function parseIndex(raw: string): number {
  if (!INDEX_PATTERN.test(raw)) throw new InvalidInputError(raw, 'expected the number shown by "daylog todo list"');
  return Number(raw);
}

export function registerTodoCommands(parent: Command): void {
  const todo = parent
    .command('todo')
    .alias('t')
    .description('Manage the todo list');

  // ---- add <text...> ----
  todo
    .command('add <text...>')
    .description('Add a todo, e.g. daylog todo add tomorrow at 9: Call the bank')
    .action(withCommandContext((ctx, words) => {
      const text = words.join(' ').trim();
      if (!text) throw new InvalidInputError(text, 'nothing to add');

      const entry = ctx.runtime().todos.createFromInput(text);
      if (ctx.globalOpts.json) {
        console.log(toJson(entry));
        return;
      }
      console.log(`Added todo #${entry.index} to ${entry.path}`);
    }));

  // ---- list ----
  todo
    .command('list')
    .alias('ls')
    .description('Show todos sorted by due date')
    .option('--due <date>', 'Due on this day or in this period')
    .option('--due-to <date>', 'End of a due date range started with --due')
    .option('--done <date>', 'Done on this day or in this period')
    .option('--status <status>', 'pending, done or all')
    .option('--tags <tags...>', 'Only todos with any of these tags')
    .option('--style <style>', 'long or short')
    .action(withCommandContext((ctx) => {
      const opts = parseCommandOptions(ListOptionsSchema, ctx.cmd);
      const { todos, settings } = ctx.runtime();
      const result = todos.findEntries({
        ...(opts.due !== undefined ? { due: opts.due } : {}),
        ...(opts.dueTo !== undefined ? { dueTo: opts.dueTo } : {}),
        ...(opts.done !== undefined ? { done: opts.done } : {}),
        ...(opts.status !== 'all' ? { status: opts.status } : {}),
        ...(opts.tags ? { tags: opts.tags } : {}),
      });

      if (ctx.globalOpts.json) {
        console.log(toJson(result));
        return;
      }
      console.log(formatTodos(result.entries, { style: opts.style, datetimeFormat: settings.todoDatetimeFormat }));
      if (result.errors.length > 0) console.log(formatQueryErrors(result.errors));
    }));

  // ---- done [index] ----
  todo
    .command('done [index]')
    .description('Mark a todo as done (omit index to pick one)')
    .action(withCommandContext(async (ctx, args) => {
      const { todos, settings } = ctx.runtime();
      const [raw] = args;

      let index: number;
      if (raw !== undefined) {
        index = parseIndex(raw);
      } else if (process.stdin.isTTY && !ctx.globalOpts.json) {
        index = await selectPendingTodo(todos, settings.todoDatetimeFormat);
      } else {
        throw new InvalidInputError('', 'give the number of the todo to mark as done');
      }

      const done: StoredTodoEntry = todos.markDone(index);
      if (ctx.globalOpts.json) {
        console.log(toJson(done));
        return;
      }
      console.log(`Marked todo #${done.index} as done: ${done.title}`);
    }));
}
