import type { IClock } from '@domain/ports/clock.js';
import type { ITextStore } from '@domain/ports/text-store.js';
import type { JournalEntry, ParsedInput, StoredJournalEntry } from '@domain/types/entry.js';
import type {
  JournalQuery,
  QueryError,
  QueryResult,
  ReadEntriesOptions,
  TagCount,
  TagsResult,
} from '@domain/types/query.js';
import type { DateFilter, IsoDate, TimeFilter, TimeOfDay } from '@domain/types/temporal.js';
import type { KeywordRegistry } from '@domain/services/keyword-registry.js';
import { parseRawUserInput } from '@domain/services/input-parser.js';
import { parseJournalFile } from '@domain/services/entry-parser.js';
import { formatDayFile, formatDayHeader, formatJournalBlock } from '@domain/services/entry-formatter.js';
import { extractTags, hasAnyTag } from '@domain/services/tags.js';
import {
  dateIsInFilter,
  parseDateToken,
  parseTimeFilter,
  parseTimeToken,
  resolveDateToken,
  timeIsInRange,
  type ResolveOptions,
} from '@domain/services/temporal-resolver.js';
import { dayFilePath, monthDir, yearDir } from '@infra/persistence/journal-layout.js';
import { addDays, startOfMonth, startOfYear } from '@shared/lib/calendar.js';
import { InvalidInputError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';

export interface JournalOptions {
  journalDir: string;
  /** moment.js format of day-file headers. */
  headerFormat: string;
  /** moment.js formats for typed dates. */
  inputFormats: readonly string[];
  /** Time given to entries that name a date but no time. */
  defaultTime: TimeOfDay;
  registry: KeywordRegistry;
  clock: IClock;
  store: ITextStore;
}

/** Fields needed to write one entry; `time` falls back as described on `writeEntry`. */
export type NewJournalEntry = Pick<ParsedInput, 'date' | 'time' | 'title' | 'body' | 'explicitDate'>;

export interface CreateEntryResult {
  entry: StoredJournalEntry;
  /** Parse errors of the existing day file; non-empty means the entry was appended unsorted. */
  errors: QueryError[];
}

const INVALID_DATE = 'Not a valid date or keyword.';
const INVALID_TIME = 'Not a valid time or keyword.';

function fileErrors(path: string, messages: readonly string[]): QueryError[] {
  return messages.map((message): QueryError => ({ type: 'file-error', path, message }));
}

function byDateTime(a: JournalEntry, b: JournalEntry): number {
  return a.date.localeCompare(b.date) || a.time.localeCompare(b.time);
}

/**
 * Journal of day files under `journalDir/YYYY/MM/YYYY-MM-DD.md`.
 *
 * Reads never throw for bad files: every problem lands in the result's
 * `errors` next to whatever entries could still be read.
 */
export class Journal {
  private readonly log = logger.child({ component: 'journal' });

  constructor(private readonly options: JournalOptions) {}

  get root(): string {
    return this.options.journalDir;
  }

  private resolveOptions(): ResolveOptions {
    return {
      referenceDate: this.options.clock.today(),
      formats: this.options.inputFormats,
      registry: this.options.registry,
    };
  }

  parseInput(text: string): ParsedInput {
    return parseRawUserInput(text, this.resolveOptions());
  }

  /** Parse free text such as `"yesterday at 6am: Title. Body"` and store it. */
  createEntry(text: string): CreateEntryResult {
    const parsed = this.parseInput(text);
    if (!parsed.title) {
      throw new InvalidInputError(text, 'an entry needs a title');
    }
    return this.writeEntry(parsed);
  }

  /**
   * Store one entry. Without a time, an explicit date gets the default time
   * and an implicit one gets the current time.
   *
   * A new or blank day file gets the header and this block. An existing file is
   * re-written with all entries sorted by time, unless it does not parse
   * cleanly; the block is then appended as-is and the parse errors returned.
   */
  writeEntry(input: NewJournalEntry): CreateEntryResult {
    const { store, headerFormat, journalDir } = this.options;
    const time = input.time ?? (input.explicitDate ? this.options.defaultTime : this.options.clock.now());
    const path = dayFilePath(journalDir, input.date);
    const fresh: JournalEntry = {
      date: input.date,
      time,
      title: input.title,
      body: input.body,
      tags: extractTags(`${input.title}\n${input.body}`),
    };
    const entry: StoredJournalEntry = { ...fresh, path };

    const content = store.exists(path) ? store.read(path) : '';
    if (content.trim() === '') {
      store.write(path, formatDayHeader(input.date, headerFormat) + formatJournalBlock(fresh));
      this.log.debug('Created day file', { path });
      return { entry, errors: [] };
    }

    const existing = parseJournalFile(content, headerFormat);
    if (existing.errors.length > 0) {
      const separator = content.endsWith('\n') ? '' : '\n';
      store.append(path, separator + formatJournalBlock(fresh));
      this.log.warn('Day file has parse errors; appended without re-sorting', {
        path,
        errors: existing.errors.length,
      });
      return { entry, errors: fileErrors(path, existing.errors) };
    }

    const entries = [...existing.entries, fresh].sort((a, b) => a.time.localeCompare(b.time));
    store.write(path, formatDayFile(input.date, entries, headerFormat));
    this.log.debug('Rewrote day file', { path, entries: entries.length });
    return { entry, errors: [] };
  }

  /** Entries of one file, each tagged with its path. */
  parseFile(path: string): QueryResult<StoredJournalEntry> {
    let content: string;
    try {
      content = this.options.store.read(path);
    } catch (err) {
      return { entries: [], errors: fileErrors(path, [err instanceof Error ? err.message : String(err)]) };
    }
    const parsed = parseJournalFile(content, this.options.headerFormat);
    return {
      entries: parsed.entries.map((entry) => ({ ...entry, path })),
      errors: fileErrors(path, parsed.errors),
    };
  }

  /**
   * Load, merge and filter entries. A single day reads one file, a range walks
   * its days (skipping missing year and month directories whole), and no date
   * filter scans the entire journal.
   */
  readEntries(options: ReadEntriesOptions = {}): QueryResult<StoredJournalEntry> {
    const entries: StoredJournalEntry[] = [];
    const errors: QueryError[] = [];

    for (const path of this.candidateFiles(options.dates)) {
      const result = this.parseFile(path);
      entries.push(...result.entries);
      errors.push(...result.errors);
    }

    const { dates, time, tags } = options;
    const filtered = entries
      .filter((entry) => !dates || dateIsInFilter(dates, entry.date))
      .filter((entry) => !time || timeIsInRange(time, entry.time))
      .filter((entry) => !tags || tags.length === 0 || hasAnyTag(entry.tags, tags))
      .sort(byDateTime);

    return { entries: filtered, errors };
  }

  /**
   * Resolve typed tokens and read. `on` wins over `from`/`to`; `from` without
   * `to` runs until today. Tokens that do not resolve are reported. A bad end
   * token is dropped and the query runs on its start; a bad or missing start
   * returns no entries.
   */
  findEntries(query: JournalQuery): QueryResult<StoredJournalEntry> {
    const errors: QueryError[] = [];
    const options = this.resolveOptions();
    let failed = false;

    const checkDate = (input: string | undefined): void => {
      if (input !== undefined && !resolveDateToken(input, options)) {
        errors.push({ type: 'invalid-date', input, message: INVALID_DATE });
      }
    };
    const checkTime = (input: string | undefined): void => {
      if (input !== undefined && !parseTimeToken(input, options.registry)) {
        errors.push({ type: 'invalid-time', input, message: INVALID_TIME });
      }
    };

    let dates: DateFilter | undefined;
    if (query.on !== undefined) {
      checkDate(query.on);
      dates = parseDateToken(query.on, undefined, options);
      if (!dates) failed = true;
    } else if (query.from !== undefined) {
      checkDate(query.from);
      checkDate(query.to);
      dates = parseDateToken(query.from, query.to ?? 'today', options);
      if (!dates) failed = true;
    } else if (query.to !== undefined) {
      errors.push({ type: 'invalid-date', input: query.to, message: 'An end date needs a start date.' });
      failed = true;
    }

    let time: TimeFilter | undefined;
    if (query.at !== undefined) {
      time = parseTimeFilter(query.at, query.until, options.registry);
      if (!time) {
        errors.push({ type: 'invalid-time', input: query.at, message: INVALID_TIME });
        failed = true;
      }
      checkTime(query.until);
    } else if (query.until !== undefined) {
      errors.push({ type: 'invalid-time', input: query.until, message: 'An end time needs a start time.' });
      failed = true;
    }

    if (failed) return { entries: [], errors };
    const result = this.readEntries({
      ...(dates ? { dates } : {}),
      ...(time ? { time } : {}),
      ...(query.tags && query.tags.length > 0 ? { tags: query.tags } : {}),
    });
    return { entries: result.entries, errors: [...errors, ...result.errors] };
  }

  /** Every tag in the journal with its number of entries, most used first. */
  searchAllTags(): TagsResult {
    const { entries, errors } = this.readEntries();
    const counts = new Map<string, number>();
    for (const entry of entries) {
      for (const tag of entry.tags) {
        counts.set(tag, (counts.get(tag) ?? 0) + 1);
      }
    }
    const tags: TagCount[] = [...counts]
      .map(([tag, count]) => ({ tag, count }))
      .sort((a, b) => b.count - a.count || a.tag.localeCompare(b.tag));
    return { tags, errors };
  }

  private candidateFiles(dates: DateFilter | undefined): string[] {
    if (!dates) return this.options.store.listMarkdown(this.options.journalDir);
    if (dates.type === 'single') {
      const path = dayFilePath(this.options.journalDir, dates.date);
      return this.options.store.exists(path) ? [path] : [];
    }
    return this.filesInRange(dates.start, dates.end);
  }

  private filesInRange(start: IsoDate, end: IsoDate): string[] {
    const { store, journalDir } = this.options;
    const files: string[] = [];
    let day = start;
    while (day <= end) {
      if (!store.isDirectory(yearDir(journalDir, day))) {
        day = startOfYear(day, 1);
        continue;
      }
      if (!store.isDirectory(monthDir(journalDir, day))) {
        day = startOfMonth(day, 1);
        continue;
      }
      const path = dayFilePath(journalDir, day);
      if (store.exists(path)) files.push(path);
      day = addDays(day, 1);
    }
    return files;
  }
}
