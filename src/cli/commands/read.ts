import type { Command } from 'commander';
import { z } from 'zod/v4';
import { withCommandContext, parseCommandOptions, toJson } from '@cli/utils.js';
import { formatEntries } from '@cli/formatters/journal-formatter.js';
import { formatQueryErrors } from '@cli/formatters/query-error-formatter.js';

const ReadOptionsSchema = z.object({
  on: z.string().optional(),
  from: z.string().optional(),
  to: z.string().optional(),
  at: z.string().optional(),
  until: z.string().optional(),
  tags: z.array(z.string()).optional(),
  count: z.boolean().default(false),
  style: z.enum(['long', 'short']).default('long'),
});

export function registerReadCommand(parent: Command): void {
  parent
    .command('read')
    .alias('r')
    .description('Show journal entries, filtered by date, time of day and tags')
    .option('--on <date>', 'A day or period: today, last week, monday, 15/08/2025...')
    .option('--from <date>', 'Start of a date range (ends today unless --to is given)')
    .option('--to <date>', 'End of a date range')
    .option('--at <time>', 'A time or part of the day: 9am, 14:30, morning, night...')
    .option('--until <time>', 'End of a time range started with --at')
    .option('--tags <tags...>', 'Only entries with any of these tags')
    .option('--count', 'Print only the number of matching entries')
    .option('--style <style>', 'long or short')
    .action(withCommandContext((ctx) => {
      const opts = parseCommandOptions(ReadOptionsSchema, ctx.cmd);
      const { journal, settings } = ctx.runtime();
      const result = journal.findEntries({
        ...(opts.on !== undefined ? { on: opts.on } : {}),
        ...(opts.from !== undefined ? { from: opts.from } : {}),
        ...(opts.to !== undefined ? { to: opts.to } : {}),
        ...(opts.at !== undefined ? { at: opts.at } : {}),
        ...(opts.until !== undefined ? { until: opts.until } : {}),
        ...(opts.tags ? { tags: opts.tags } : {}),
      });

      if (ctx.globalOpts.json) {
        console.log(toJson(opts.count ? { count: result.entries.length, errors: result.errors } : result));
        return;
      }

      console.log(
        opts.count
          ? `${result.entries.length} entries found.`
          : formatEntries(result.entries, { style: opts.style, dateFormat: settings.journalDateFormat }),
      );
      if (result.errors.length > 0) console.log(formatQueryErrors(result.errors));
    }));
}
