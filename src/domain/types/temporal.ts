import { z } from 'zod/v4';

// ── Scalars ──────────────────────────────────────────────────────────────────

/** Calendar date, `YYYY-MM-DD`. */
export const IsoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date like 2025-08-15');
export type IsoDate = z.infer<typeof IsoDate>;

/** Wall-clock time, `HH:mm:ss`. */
export const TimeOfDay = z.string().regex(/^\d{2}:\d{2}:\d{2}$/, 'Expected a time like 09:30:00');
export type TimeOfDay = z.infer<typeof TimeOfDay>;

/** Zone-less date-time, `YYYY-MM-DDTHH:mm:ss`. */
export const IsoDateTime = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$/, 'Expected a date-time like 2025-08-15T09:30:00');
export type IsoDateTime = z.infer<typeof IsoDateTime>;

// ── Filters ──────────────────────────────────────────────────────────────────

/** A single day or an inclusive range. A range may be reversed; it then matches nothing. */
export const DateFilterSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('single'), date: IsoDate }),
  z.object({ type: z.literal('range'), start: IsoDate, end: IsoDate }),
]);
export type DateFilter = z.infer<typeof DateFilterSchema>;

/**
 * `single` matches every time within the same hour.
 * `range` is half-open `[start, end)` and wraps past midnight when start > end.
 */
export const TimeFilterSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('single'), time: TimeOfDay }),
  z.object({ type: z.literal('range'), start: TimeOfDay, end: TimeOfDay }),
]);
export type TimeFilter = z.infer<typeof TimeFilterSchema>;
