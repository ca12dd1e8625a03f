import { z } from 'zod';

export const syncStatusSchema = z.enum(['success', 'failed']);

export type SyncStatus = z.infer<typeof syncStatusSchema>;

export const syncTypeSchema = z.enum(['full', 'incremental']);

export type SyncType = z.infer<typeof syncTypeSchema>;

// ── Log entry ─────────────────────────────────────────────────
// Append-only. `sync_time` is assigned by the repository on insert.

export const syncLogEntrySchema = z.object({
  sync_time: z.date(),
  status: syncStatusSchema,
  sync_type: syncTypeSchema,
  records_processed: z.number().int().nonnegative(),
  records_scraped: z.number().int().nonnegative().optional(),
  error_message: z.string().min(1).optional(),
  duration_ms: z.number().int().nonnegative(),
});

export type SyncLogEntry = z.infer<typeof syncLogEntrySchema>;

export type NewSyncLogEntry = Omit<SyncLogEntry, 'sync_time'>;

/**
 * Next `sync_time` for an append. Guarantees strictly increasing
 * values even when two entries land in the same millisecond.
 */
export function nextSyncTime(now: Date, previous: Date | undefined): Date {
  if (previous !== undefined && now.getTime() <= previous.getTime()) {
    return new Date(previous.getTime() + 1);
  }
  return now;
}
