import { z } from 'zod/v4';
import { IsoDate } from './temporal.js';
import { SynonymMapSchema } from './keyword.js';

export const DaylogConfigSchema = z.object({
  /** Root of the journal tree (`YYYY/MM/YYYY-MM-DD.md`). Defaults under the XDG data dir. */
  journalDir: z.string().min(1).optional(),
  /** Directory holding `todos.md`. Defaults under the XDG data dir. */
  todoListDir: z.string().min(1).optional(),
  /** Used when an entry names a date but no time. `HH:mm`. */
  defaultTime: z.string().regex(/^([01]?\d|2[0-3]):[0-5]\d$/, 'Expected a 24-hour time like 21:00').default('21:00'),
  /** Pins "today" for relative dates; unset means the system date. */
  referenceDate: IsoDate.optional(),
  /** moment.js format of the `# ...` header line of a day file. */
  journalDateFormat: z.string().min(1).default('dddd, DD MMM YYYY'),
  /** moment.js formats tried in order for typed dates. */
  inputDateFormats: z.array(z.string().min(1)).min(1).default(['DD/MM/YYYY']),
  /** moment.js format of todo due/done fields. */
  todoDatetimeFormat: z.string().min(1).default('DD/MM/YYYY HH:mm'),
  synonyms: SynonymMapSchema.default({}),
});

export type DaylogConfig = z.infer<typeof DaylogConfigSchema>;

/** Config with every directory resolved to an absolute path. */
export type DaylogSettings = DaylogConfig & {
  journalDir: string;
  todoListDir: string;
};
