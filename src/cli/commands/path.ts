import type { Command } from 'commander';
import { withCommandContext, toJson } from '@cli/utils.js';

export function registerPathCommand(parent: Command): void {
  parent
    .command('path')
    .description('Print where journal entries and todos are stored')
    .action(withCommandContext((ctx) => {
      const { journal, todos } = ctx.runtime();
      if (ctx.globalOpts.json) {
        console.log(toJson({ journalDir: journal.root, todoList: todos.path }));
        return;
      }
      console.log(`Journal: ${journal.root}`);
      console.log(`Todos:   ${todos.path}`);
    }));
}
