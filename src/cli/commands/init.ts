import { existsSync } from 'node:fs';
import { homedir } from 'node:os';
import type { Command } from 'commander';
import { z } from 'zod/v4';
import { withCommandContext, parseCommandOptions, toJson } from '@cli/utils.js';
import { resolveConfigPath, writeDefaultConfig } from '@infra/config/config-loader.js';
import { DaylogError } from '@shared/lib/errors.js';

const InitOptionsSchema = z.object({
  force: z.boolean().default(false),
});

export function registerInitCommand(parent: Command): void {
  parent
    .command('init')
    .description('Write a configuration file holding every default')
    .option('--force', 'Overwrite an existing configuration file')
    .action(withCommandContext((ctx) => {
      const opts = parseCommandOptions(InitOptionsSchema, ctx.cmd);
      const { path } = resolveConfigPath(ctx.globalOpts.config, process.env, homedir());
      if (existsSync(path) && !opts.force) {
        throw new DaylogError(`A configuration file already exists at ${path}. Pass --force to overwrite it.`);
      }

      const config = writeDefaultConfig(path, process.env, homedir());
      if (ctx.globalOpts.json) {
        console.log(toJson({ path, config }));
        return;
      }
      console.log(`Wrote configuration to ${path}`);
      console.log(`Journal entries go to ${config.journalDir ?? ''}`);
      console.log(`Todos go to ${config.todoListDir ?? ''}`);
    }));
}
