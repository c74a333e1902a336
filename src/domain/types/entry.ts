import { z } from 'zod/v4';
import { IsoDate, IsoDateTime, TimeOfDay } from './temporal.js';

// ── Parsed input ─────────────────────────────────────────────────────────────

export const ParsedInputSchema = z.object({
  date: IsoDate,
  /** Absent when the input named no time; the caller picks a default. */
  time: TimeOfDay.optional(),
  title: z.string(),
  body: z.string(),
  /** Always empty here: tags are derived from stored text on read. */
  tags: z.array(z.string()),
  /** False when the date defaulted to the reference date. */
  explicitDate: z.boolean(),
});
export type ParsedInput = z.infer<typeof ParsedInputSchema>;

// ── Journal ──────────────────────────────────────────────────────────────────

export const JournalEntrySchema = z.object({
  date: IsoDate,
  time: TimeOfDay,
  title: z.string(),
  body: z.string(),
  tags: z.array(z.string()),
});
export type JournalEntry = z.infer<typeof JournalEntrySchema>;

/** A journal entry that came from (or went to) a file on disk. */
export const StoredJournalEntrySchema = JournalEntrySchema.extend({
  path: z.string(),
});
export type StoredJournalEntry = z.infer<typeof StoredJournalEntrySchema>;

// ── Todos ────────────────────────────────────────────────────────────────────

export const TodoStatus = z.enum(['pending', 'done']);
export type TodoStatus = z.infer<typeof TodoStatus>;

export const TodoEntrySchema = z.object({
  title: z.string(),
  body: z.string(),
  tags: z.array(z.string()),
  status: TodoStatus,
  dueDate: IsoDateTime.optional(),
  doneDate: IsoDateTime.optional(),
});
export type TodoEntry = z.infer<typeof TodoEntrySchema>;

export const StoredTodoEntrySchema = TodoEntrySchema.extend({
  path: z.string(),
  /** 1-based position in the todo file. */
  index: z.number().int().positive(),
});
export type StoredTodoEntry = z.infer<typeof StoredTodoEntrySchema>;
