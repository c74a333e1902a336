import type { Command } from 'commander';
import { CANONICAL_KEYWORDS } from '@domain/types/keyword.js';
import { withCommandContext, toJson } from '@cli/utils.js';
import { bold, cyan, dim } from '@shared/lib/ansi.js';

export function registerKeywordsCommand(parent: Command): void {
  parent
    .command('keywords')
    .alias('kw')
    .description('Show the date and time keywords and the configured synonyms')
    .action(withCommandContext((ctx) => {
      const synonyms = ctx.runtime().registry.synonyms();
      if (ctx.globalOpts.json) {
        console.log(toJson({ keywords: CANONICAL_KEYWORDS, synonyms: Object.fromEntries(synonyms) }));
        return;
      }

      const lines = [bold('Keywords:'), ...CANONICAL_KEYWORDS.map((keyword) => `  ${cyan(keyword)}`)];
      lines.push('', bold('Synonyms:'));
      if (synonyms.length === 0) {
        lines.push(dim('  none configured'));
      } else {
        lines.push(...synonyms.map(([alias, target]) => `  ${alias} -> ${cyan(target)}`));
      }
      console.log(lines.join('\n'));
    }));
}
