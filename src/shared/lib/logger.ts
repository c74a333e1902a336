export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m', // grey
  info: '',
  warn: '\x1b[33m', // yellow
  error: '\x1b[31m', // red
};

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
}

type LogData = Record<string, unknown>;

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
  child(defaults: LogData): Logger;
}

function createLogger(options: LoggerOptions = {}, defaults: LogData = {}): Logger {
  const minLevel = LOG_LEVELS[options.level ?? 'info'];
  const jsonMode = options.json ?? false;

  function log(level: LogLevel, message: string, data?: LogData): void {
    if (LOG_LEVELS[level] < minLevel) return;
    const fields = { ...defaults, ...data };
    const hasFields = Object.keys(fields).length > 0;

    if (jsonMode) {
      const record = { level, message, timestamp: new Date().toISOString(), ...fields };
      process.stderr.write(JSON.stringify(record) + '\n');
      return;
    }

    const color = LEVEL_COLORS[level];
    const reset = color ? '\x1b[0m' : '';
    const dataStr = hasFields ? ` ${JSON.stringify(fields)}` : '';
    process.stderr.write(`${color}[${level}]${reset} ${message}${dataStr}\n`);
  }

  return {
    debug: (msg, data) => log('debug', msg, data),
    info: (msg, data) => log('info', msg, data),
    warn: (msg, data) => log('warn', msg, data),
    error: (msg, data) => log('error', msg, data),
    child: (extra) => createLogger(options, { ...defaults, ...extra }),
  };
}

/**
 * Global logger. Writes to stderr so command output on stdout stays pipeable.
 * Reconfigure with setLoggerOptions() (the CLI does this for --verbose).
 */
export let logger: Logger = createLogger();

export function setLoggerOptions(options: LoggerOptions): void {
  logger = createLogger(options);
}
