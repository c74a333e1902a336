import { z } from 'zod/v4';

// ── Keywords ─────────────────────────────────────────────────────────────────

/** Canonical temporal keywords, spelled the way users type them. */
export const Keyword = z.enum([
  'at',
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday',
  'today',
  'yesterday',
  'tomorrow',
  'morning',
  'noon',
  'evening',
  'night',
  'midnight',
  'last week',
  'this week',
  'last month',
  'this month',
  'last year',
  'this year',
]);
export type Keyword = z.infer<typeof Keyword>;

export const CANONICAL_KEYWORDS: readonly Keyword[] = Keyword.options;

/** Weekdays in ISO order, so index + 1 is the ISO weekday number. */
export const WEEKDAY_KEYWORDS = [
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday',
] as const satisfies readonly Keyword[];
export type WeekdayKeyword = (typeof WEEKDAY_KEYWORDS)[number];

// ── Synonyms ─────────────────────────────────────────────────────────────────

/** User synonyms: alias → the keyword (or an earlier alias) it stands for. */
export const SynonymMapSchema = z.record(z.string().min(1), z.string().min(1));
export type SynonymMap = z.infer<typeof SynonymMapSchema>;
