import type { Command } from 'commander';
import { withCommandContext, toJson } from '@cli/utils.js';
import { formatQueryErrors } from '@cli/formatters/query-error-formatter.js';
import { InvalidInputError } from '@shared/lib/errors.js';

export function registerWriteCommand(parent: Command): void {
  parent
    .command('write <text...>')
    .alias('w')
    .description('Add a journal entry, e.g. daylog write yesterday at 6am: Title. Body @tag')
    .action(withCommandContext((ctx, words) => {
      const text = words.join(' ').trim();
      if (!text) throw new InvalidInputError(text, 'nothing to write');

      const { journal } = ctx.runtime();
      const result = journal.createEntry(text);

      if (ctx.globalOpts.json) {
        console.log(toJson(result));
        return;
      }
      console.log(`Added new entry to ${result.entry.path}`);
      if (result.errors.length > 0) {
        console.log('The day file has errors, so the entry was appended without sorting.');
        console.log(formatQueryErrors(result.errors));
      }
    }));
}
