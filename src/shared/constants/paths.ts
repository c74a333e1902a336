export const DAYLOG_PATHS = {
  appDir: 'daylog',
  journal: 'journal',
  todos: 'todos',
  todoFile: 'todos.md',
  config: 'config.json',
} as const;

/** Environment variables read when locating the config and data directories. */
export const DAYLOG_ENV = {
  config: 'DAYLOG_CONFIG',
  xdgConfigHome: 'XDG_CONFIG_HOME',
  xdgDataHome: 'XDG_DATA_HOME',
} as const;
