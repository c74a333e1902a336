import { Command } from 'commander';
import { z } from 'zod/v4';
import { loadSettings } from '@infra/config/config-loader.js';
import { ValidationError } from '@shared/lib/errors.js';
import { buildRuntime, type Runtime } from './runtime.js';

export const GlobalOptionsSchema = z.object({
  json: z.boolean().default(false),
  verbose: z.boolean().default(false),
  config: z.string().optional(),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

export interface CommandContext {
  globalOpts: GlobalOptions;
  cmd: Command;
  /** Loads the configuration and wires the services on first call. */
  runtime(): Runtime;
}

type CommandHandler = (ctx: CommandContext, args: string[]) => void | Promise<void>;

/**
 * Validate a command's local options with a zod schema.
 * Throws ValidationError naming every bad option.
 */
export function parseCommandOptions<T extends z.ZodType>(schema: T, cmd: Command): z.output<T> {
  const result = schema.safeParse(cmd.opts());
  if (!result.success) {
    const details = result.error.issues.map((issue) => {
      const option = issue.path.map(String).join('.');
      return option ? `--${option}: ${issue.message}` : issue.message;
    });
    throw new ValidationError(`Invalid options: ${details.join('; ')}`, result.error.issues);
  }
  return result.data;
}

/** Extract global CLI options from a Commander command. */
export function getGlobalOptions(cmd: Command): GlobalOptions {
  const result = GlobalOptionsSchema.safeParse(cmd.optsWithGlobals());
  return result.success ? result.data : { json: false, verbose: false };
}

function positionalStrings(arg: unknown): string[] {
  if (Array.isArray(arg)) return arg.filter((item): item is string => typeof item === 'string');
  return typeof arg === 'string' ? [arg] : [];
}

/**
 * Wrap a CLI command handler with standard boilerplate:
 * extracts global options, builds the runtime lazily, catches errors.
 *
 * Commander's .action() callback receives (...positionalArgs, localOpts, cmd).
 * The wrapper strips the last two, passes cmd via context, and flattens the
 * positional args (variadic ones arrive as arrays) into one string list.
 */
export function withCommandContext(handler: CommandHandler): (...args: unknown[]) => Promise<void> {
  return async (...args: unknown[]) => {
    const cmd = args.at(-1);
    if (!(cmd instanceof Command)) {
      throw new TypeError('withCommandContext: expected Commander to pass the command last');
    }
    const positionalArgs = args.slice(0, -2).flatMap(positionalStrings);
    const globalOpts = getGlobalOptions(cmd);

    let runtime: Runtime | undefined;
    const ctx: CommandContext = {
      globalOpts,
      cmd,
      runtime: () => (runtime ??= buildRuntime(loadSettings({ configPath: globalOpts.config }))),
    };

    try {
      await handler(ctx, positionalArgs);
    } catch (error) {
      handleCommandError(error, globalOpts.verbose);
    }
  };
}

export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/**
 * Centralized error handler for CLI commands.
 * Prints the error message, and optionally the stack trace if verbose is enabled.
 */
export function handleCommandError(error: unknown, verbose: boolean): void {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  if (verbose && error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exitCode = 1;
}
