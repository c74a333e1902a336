import type { Command } from 'commander';
import { withCommandContext, toJson } from '@cli/utils.js';
import { formatTagCounts } from '@cli/formatters/journal-formatter.js';
import { formatQueryErrors } from '@cli/formatters/query-error-formatter.js';

export function registerTagsCommand(parent: Command): void {
  parent
    .command('tags')
    .description('List every @tag in the journal with its number of entries')
    .action(withCommandContext((ctx) => {
      const result = ctx.runtime().journal.searchAllTags();
      if (ctx.globalOpts.json) {
        console.log(toJson(result));
        return;
      }
      console.log(formatTagCounts(result.tags));
      if (result.errors.length > 0) console.log(formatQueryErrors(result.errors));
    }));
}
