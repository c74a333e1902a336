import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadSettings, resolveConfigPath, expandHome, writeDefaultConfig } from './config-loader.js';
import { ConfigError } from '@shared/lib/errors.js';

let home: string;

beforeEach(() => {
  home = mkdtempSync(join(tmpdir(), 'daylog-config-test-'));
});

afterEach(() => {
  rmSync(home, { recursive: true, force: true });
});

describe('expandHome', () => {
  it('expands a leading tilde only', () => {
    expect(expandHome('~', '/home/u')).toBe('/home/u');
    expect(expandHome('~/notes', '/home/u')).toBe('/home/u/notes');
    expect(expandHome('/abs/~/x', '/home/u')).toBe('/abs/~/x');
  });
});

describe('resolveConfigPath', () => {
  it('defaults to the XDG config location', () => {
    expect(resolveConfigPath(undefined, {}, '/home/u')).toEqual({
      path: '/home/u/.config/daylog/config.json',
      explicit: false,
    });
    expect(resolveConfigPath(undefined, { XDG_CONFIG_HOME: '/xdg' }, '/home/u').path).toBe('/xdg/daylog/config.json');
  });

  it('prefers the flag over the environment', () => {
    const env = { DAYLOG_CONFIG: '~/env.json' };
    expect(resolveConfigPath(undefined, env, '/home/u')).toEqual({ path: '/home/u/env.json', explicit: true });
    expect(resolveConfigPath('/etc/daylog.json', env, '/home/u')).toEqual({ path: '/etc/daylog.json', explicit: true });
  });
});

describe('loadSettings', () => {
  it('uses defaults when the default config file is missing', () => {
    const settings = loadSettings({ env: {}, home });
    expect(settings.journalDir).toBe(join(home, '.local', 'share', 'daylog', 'journal'));
    expect(settings.todoListDir).toBe(join(home, '.local', 'share', 'daylog', 'todos'));
    expect(settings.defaultTime).toBe('21:00');
  });

  it('places data under XDG_DATA_HOME when set', () => {
    const settings = loadSettings({ env: { XDG_DATA_HOME: '/data' }, home });
    expect(settings.journalDir).toBe('/data/daylog/journal');
  });

  it('fails when an explicitly named file is missing', () => {
    expect(() => loadSettings({ configPath: join(home, 'nope.json'), env: {}, home })).toThrow(ConfigError);
  });

  it('fails on invalid JSON', () => {
    const path = join(home, 'bad.json');
    writeFileSync(path, '{ nope');
    expect(() => loadSettings({ configPath: path, env: {}, home })).toThrow(/Invalid JSON/);
  });

  it('fails on a schema violation', () => {
    const path = join(home, 'invalid.json');
    writeFileSync(path, JSON.stringify({ defaultTime: '25:00' }));
    expect(() => loadSettings({ configPath: path, env: {}, home })).toThrow(ConfigError);
  });

  it('reads values and expands the home directory', () => {
    const path = join(home, 'config.json');
    writeFileSync(
      path,
      JSON.stringify({ journalDir: '~/notes', referenceDate: '2025-08-15', synonyms: { ytd: 'yesterday' } }),
    );
    const settings = loadSettings({ configPath: path, env: {}, home });
    expect(settings.journalDir).toBe(join(home, 'notes'));
    expect(settings.referenceDate).toBe('2025-08-15');
    expect(settings.synonyms).toEqual({ ytd: 'yesterday' });
  });
});

describe('writeDefaultConfig', () => {
  it('writes a file loadSettings reads back', () => {
    const path = join(home, 'cfg', 'config.json');
    const written = writeDefaultConfig(path, {}, home);
    const settings = loadSettings({ configPath: path, env: {}, home });
    expect(settings.journalDir).toBe(written.journalDir);
    expect(settings.inputDateFormats).toEqual(['DD/MM/YYYY']);
  });
});
