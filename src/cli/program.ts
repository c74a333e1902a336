import { Command } from 'commander';
import { setLoggerOptions } from '@shared/lib/logger.js';
import { registerInitCommand } from './commands/init.js';
import { registerWriteCommand } from './commands/write.js';
import { registerReadCommand } from './commands/read.js';
import { registerTagsCommand } from './commands/tags.js';
import { registerTodoCommands } from './commands/todo.js';
import { registerKeywordsCommand } from './commands/keywords.js';
import { registerPathCommand } from './commands/path.js';

const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('daylog')
    .description('Markdown journal and todo list with natural date input')
    .version(VERSION)
    .option('--json', 'Output in JSON format')
    .option('--verbose', 'Enable verbose logging')
    .option('--config <path>', 'Use this configuration file');

  // Wire --verbose to logger before any command runs
  program.hook('preAction', (_thisCommand, actionCommand) => {
    const opts = actionCommand.optsWithGlobals();
    setLoggerOptions({ level: opts['verbose'] === true ? 'debug' : 'info' });
  });

  registerInitCommand(program);
  registerWriteCommand(program);
  registerReadCommand(program);
  registerTagsCommand(program);
  registerTodoCommands(program);
  registerKeywordsCommand(program);
  registerPathCommand(program);

  return program;
}
