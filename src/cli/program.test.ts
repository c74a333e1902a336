import { createProgram } from './program.js';

describe('createProgram', () => {
  it('creates a commander program with the correct name', () => {
    expect(createProgram().name()).toBe('daylog');
  });

  it('has the expected top-level commands', () => {
    const commandNames = createProgram().commands.map((c) => c.name());
    expect(commandNames).toEqual(['init', 'write', 'read', 'tags', 'todo', 'keywords', 'path']);
  });

  it('registers short aliases', () => {
    const aliases = Object.fromEntries(createProgram().commands.map((c) => [c.name(), c.alias()]));
    expect(aliases).toMatchObject({ write: 'w', read: 'r', todo: 't', keywords: 'kw' });
  });

  it('todo has add, list and done subcommands', () => {
    const todo = createProgram().commands.find((c) => c.name() === 'todo');
    expect(todo?.commands.map((c) => c.name())).toEqual(['add', 'list', 'done']);
  });

  it('has global --json, --verbose and --config options', () => {
    const optionNames = createProgram().options.map((o) => o.long);
    expect(optionNames).toContain('--json');
    expect(optionNames).toContain('--verbose');
    expect(optionNames).toContain('--config');
  });
});
