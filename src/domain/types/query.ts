import { z } from 'zod/v4';
import type { DateFilter, TimeFilter } from './temporal.js';
import type { TodoStatus } from './entry.js';

// ── Errors ───────────────────────────────────────────────────────────────────

export const QueryErrorSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('invalid-date'), input: z.string(), message: z.string() }),
  z.object({ type: z.literal('invalid-time'), input: z.string(), message: z.string() }),
  z.object({ type: z.literal('file-error'), path: z.string(), message: z.string() }),
]);
export type QueryError = z.infer<typeof QueryErrorSchema>;

// ── Results ──────────────────────────────────────────────────────────────────

/** Entries plus every non-fatal problem met while producing them. */
export interface QueryResult<T> {
  entries: T[];
  errors: QueryError[];
}

/** Outcome of parsing one file's text; errors are plain messages without a path. */
export interface ParseOutcome<T> {
  entries: T[];
  errors: string[];
}

export interface TagCount {
  tag: string;
  count: number;
}

export interface TagsResult {
  tags: TagCount[];
  errors: QueryError[];
}

// ── Options ──────────────────────────────────────────────────────────────────

export interface ReadEntriesOptions {
  dates?: DateFilter;
  time?: TimeFilter;
  /** OR semantics, case-insensitive. */
  tags?: string[];
}

/** Raw, unresolved tokens as typed on the command line. */
export interface JournalQuery {
  on?: string;
  from?: string;
  to?: string;
  at?: string;
  until?: string;
  tags?: string[];
}

export interface ReadTodoOptions {
  dueDate?: DateFilter;
  doneDate?: DateFilter;
  status?: TodoStatus;
  tags?: string[];
}

/** Raw todo-list tokens; `due` and `dueTo` combine like `from`/`to`. */
export interface TodoQuery {
  due?: string;
  dueTo?: string;
  done?: string;
  status?: TodoStatus;
  tags?: string[];
}
