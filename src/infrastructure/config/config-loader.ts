import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';
import { DaylogConfigSchema, type DaylogConfig, type DaylogSettings } from '@domain/types/config.js';
import { DAYLOG_ENV, DAYLOG_PATHS } from '@shared/constants/paths.js';
import { ConfigError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';
import { JsonFileError, readJsonFile, writeJsonFile } from '@infra/persistence/json-file.js';

export type Env = Record<string, string | undefined>;

export interface ConfigLocation {
  path: string;
  /** Named by flag or environment; a missing file is then an error. */
  explicit: boolean;
}

export interface LoadSettingsOptions {
  configPath?: string;
  env?: Env;
  home?: string;
}

export function expandHome(path: string, home: string): string {
  if (path === '~') return home;
  if (path.startsWith('~/')) return join(home, path.slice(2));
  return path;
}

function absolute(path: string, home: string): string {
  const expanded = expandHome(path, home);
  return isAbsolute(expanded) ? expanded : resolve(expanded);
}

/** `--config`, then `$DAYLOG_CONFIG`, then `$XDG_CONFIG_HOME/daylog/config.json`. */
export function resolveConfigPath(configPath: string | undefined, env: Env, home: string): ConfigLocation {
  if (configPath) return { path: absolute(configPath, home), explicit: true };

  const fromEnv = env[DAYLOG_ENV.config];
  if (fromEnv) return { path: absolute(fromEnv, home), explicit: true };

  const configHome = env[DAYLOG_ENV.xdgConfigHome] || join(home, '.config');
  return { path: join(configHome, DAYLOG_PATHS.appDir, DAYLOG_PATHS.config), explicit: false };
}

export function defaultDataDir(env: Env, home: string): string {
  const dataHome = env[DAYLOG_ENV.xdgDataHome] || join(home, '.local', 'share');
  return join(dataHome, DAYLOG_PATHS.appDir);
}

function readConfig(location: ConfigLocation): DaylogConfig {
  try {
    return readJsonFile(location.path, DaylogConfigSchema);
  } catch (err) {
    if (!(err instanceof JsonFileError)) throw err;
    if (err.kind === 'missing' && !location.explicit) {
      logger.debug('No config file, using defaults', { path: location.path });
      return DaylogConfigSchema.parse({});
    }
    throw new ConfigError(location.path, err.message);
  }
}

/** Load the config file and resolve every directory to an absolute path. */
export function loadSettings(options: LoadSettingsOptions = {}): DaylogSettings {
  const env = options.env ?? process.env;
  const home = options.home ?? homedir();
  const location = resolveConfigPath(options.configPath, env, home);
  const config = readConfig(location);
  const dataDir = defaultDataDir(env, home);

  return {
    ...config,
    journalDir: absolute(config.journalDir ?? join(dataDir, DAYLOG_PATHS.journal), home),
    todoListDir: absolute(config.todoListDir ?? join(dataDir, DAYLOG_PATHS.todos), home),
  };
}

/**
 * Write a config file holding every default, with the data directories
 * spelled out so users can see where entries go.
 */
export function writeDefaultConfig(path: string, env: Env, home: string): DaylogConfig {
  const dataDir = defaultDataDir(env, home);
  const config = DaylogConfigSchema.parse({
    journalDir: join(dataDir, DAYLOG_PATHS.journal),
    todoListDir: join(dataDir, DAYLOG_PATHS.todos),
  });
  writeJsonFile(path, config, DaylogConfigSchema);
  logger.debug('Wrote default config', { path });
  return config;
}
