import type { IClock } from '@domain/ports/clock.js';
import type { ITextStore } from '@domain/ports/text-store.js';
import type { StoredTodoEntry, TodoEntry } from '@domain/types/entry.js';
import type { QueryError, QueryResult, ReadTodoOptions, TodoQuery } from '@domain/types/query.js';
import type { DateFilter, IsoDateTime, TimeOfDay } from '@domain/types/temporal.js';
import type { KeywordRegistry } from '@domain/services/keyword-registry.js';
import { parseRawUserInput } from '@domain/services/input-parser.js';
import { parseTodoFile } from '@domain/services/todo-parser.js';
import { formatTodoBlock, formatTodoListHeader } from '@domain/services/entry-formatter.js';
import { extractTags, hasAnyTag } from '@domain/services/tags.js';
import {
  dateIsInFilter,
  parseDateToken,
  resolveDateToken,
  type ResolveOptions,
} from '@domain/services/temporal-resolver.js';
import { todoFilePath } from '@infra/persistence/journal-layout.js';
import { combine, datePart } from '@shared/lib/calendar.js';
import { InvalidInputError, MalformedFileError, TodoNotFoundError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';

export interface TodosOptions {
  todoListDir: string;
  /** moment.js format of the due/done fields. */
  datetimeFormat: string;
  inputFormats: readonly string[];
  defaultTime: TimeOfDay;
  registry: KeywordRegistry;
  clock: IClock;
  store: ITextStore;
}

export type NewTodo = Omit<TodoEntry, 'tags'>;

function inFilter(filter: DateFilter | undefined, dateTime: IsoDateTime | undefined): boolean {
  if (!filter) return true;
  return dateTime !== undefined && dateIsInFilter(filter, datePart(dateTime));
}

/** Undated todos first, then by due date; ties keep file order. */
function byDueDate(a: StoredTodoEntry, b: StoredTodoEntry): number {
  if (a.dueDate === b.dueDate) return 0;
  if (a.dueDate === undefined) return -1;
  if (b.dueDate === undefined) return 1;
  return a.dueDate.localeCompare(b.dueDate);
}

/** The single todo list at `todoListDir/todos.md`. */
export class Todos {
  private readonly log = logger.child({ component: 'todos' });

  constructor(private readonly options: TodosOptions) {}

  get path(): string {
    return todoFilePath(this.options.todoListDir);
  }

  private resolveOptions(): ResolveOptions {
    return {
      referenceDate: this.options.clock.today(),
      formats: this.options.inputFormats,
      registry: this.options.registry,
    };
  }

  private parseContent(content: string): QueryResult<StoredTodoEntry> {
    const parsed = parseTodoFile(content, {
      datetimeFormat: this.options.datetimeFormat,
      referenceDate: this.options.clock.today(),
    });
    return {
      entries: parsed.entries.map((entry, i) => ({ ...entry, path: this.path, index: i + 1 })),
      errors: parsed.errors.map((message): QueryError => ({ type: 'file-error', path: this.path, message })),
    };
  }

  /** Append one todo, creating the list with its header when needed. */
  createEntry(todo: NewTodo): StoredTodoEntry {
    const { store, datetimeFormat } = this.options;
    const path = this.path;
    const block = formatTodoBlock(todo, datetimeFormat);
    const tags = extractTags(`${todo.title}\n${todo.body}`);

    if (!store.exists(path)) {
      store.write(path, formatTodoListHeader() + block);
      this.log.debug('Created todo list', { path });
      return { ...todo, tags, path, index: 1 };
    }

    const content = store.read(path);
    const count = this.parseContent(content).entries.length;
    store.append(path, (content.endsWith('\n') ? '' : '\n') + block);
    this.log.debug('Appended todo', { path, index: count + 1 });
    return { ...todo, tags, path, index: count + 1 };
  }

  /**
   * Parse free text into a pending todo. A named date becomes the due date at
   * the named time (or the default time); a bare time is due today.
   */
  createFromInput(text: string): StoredTodoEntry {
    const parsed = parseRawUserInput(text, this.resolveOptions());
    if (!parsed.title) {
      throw new InvalidInputError(text, 'a todo needs a title');
    }

    let dueDate: IsoDateTime | undefined;
    if (parsed.explicitDate) {
      dueDate = combine(parsed.date, parsed.time ?? this.options.defaultTime);
    } else if (parsed.time) {
      dueDate = combine(parsed.date, parsed.time);
    }

    return this.createEntry({
      title: parsed.title,
      body: parsed.body,
      status: 'pending',
      ...(dueDate ? { dueDate } : {}),
    });
  }

  parseFile(): QueryResult<StoredTodoEntry> {
    let content: string;
    try {
      content = this.options.store.read(this.path);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { entries: [], errors: [{ type: 'file-error', path: this.path, message }] };
    }
    return this.parseContent(content);
  }

  /** Filtered todos sorted by due date. A list that does not exist yet is empty. */
  readEntries(options: ReadTodoOptions = {}): QueryResult<StoredTodoEntry> {
    if (!this.options.store.exists(this.path)) return { entries: [], errors: [] };

    const { entries, errors } = this.parseFile();
    const { dueDate, doneDate, status, tags } = options;
    const filtered = [...entries]
      .sort(byDueDate)
      .filter((entry) => inFilter(dueDate, entry.dueDate))
      .filter((entry) => inFilter(doneDate, entry.doneDate))
      .filter((entry) => !status || entry.status === status)
      .filter((entry) => !tags || tags.length === 0 || hasAnyTag(entry.tags, tags));
    return { entries: filtered, errors };
  }

  /**
   * Resolve typed date tokens, then read. Unresolvable tokens are reported; a
   * bad `dueTo` is dropped, while a bad or missing start returns no entries.
   */
  findEntries(query: TodoQuery): QueryResult<StoredTodoEntry> {
    const options = this.resolveOptions();
    const errors: QueryError[] = [];
    for (const input of [query.due, query.dueTo, query.done]) {
      if (input !== undefined && !resolveDateToken(input, options)) {
        errors.push({ type: 'invalid-date', input, message: 'Not a valid date or keyword.' });
      }
    }
    if (query.due === undefined && query.dueTo !== undefined) {
      errors.push({ type: 'invalid-date', input: query.dueTo, message: 'An end date needs a start date.' });
      return { entries: [], errors };
    }

    const dueDate = query.due === undefined ? undefined : parseDateToken(query.due, query.dueTo, options);
    const doneDate = query.done === undefined ? undefined : parseDateToken(query.done, undefined, options);
    if ((query.due !== undefined && !dueDate) || (query.done !== undefined && !doneDate)) {
      return { entries: [], errors };
    }

    const result = this.readEntries({
      ...(dueDate ? { dueDate } : {}),
      ...(doneDate ? { doneDate } : {}),
      ...(query.status ? { status: query.status } : {}),
      ...(query.tags && query.tags.length > 0 ? { tags: query.tags } : {}),
    });
    return { entries: result.entries, errors: [...errors, ...result.errors] };
  }

  /**
   * Mark the todo at 1-based `index` (file order) as done and rewrite the list.
   * The header line is kept as written.
   */
  markDone(
    index: number,
    at: IsoDateTime = combine(this.options.clock.today(), this.options.clock.now()),
  ): StoredTodoEntry {
    const { store, datetimeFormat } = this.options;
    const path = this.path;
    if (!store.exists(path)) throw new TodoNotFoundError(index, 0);

    const content = store.read(path);
    const { entries, errors } = this.parseContent(content);
    if (errors.length > 0) {
      throw new MalformedFileError(path, errors.map((error) => error.message));
    }

    const target = entries[index - 1];
    if (!Number.isInteger(index) || !target) throw new TodoNotFoundError(index, entries.length);

    const done: StoredTodoEntry = { ...target, status: 'done', doneDate: at };
    const header = content.split(/\r?\n/, 1)[0] ?? '';
    const blocks = entries.map((entry) => formatTodoBlock(entry.index === index ? done : entry, datetimeFormat));
    store.write(path, `${header}\n\n${blocks.join('')}`);
    this.log.debug('Marked todo done', { path, index });
    return done;
  }
}
