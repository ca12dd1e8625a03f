import { z } from 'zod';

import { syncStatusSchema, syncTypeSchema } from './syncLog.js';

// ── Pagination ────────────────────────────────────────────────

/** Why report pagination ended. Anything but `last_page` may be incomplete. */
export const stopReasonSchema = z.enum(['last_page', 'page_limit', 'stale_pages']);

export type StopReason = z.infer<typeof stopReasonSchema>;

// ── SyncResult ────────────────────────────────────────────────
// Structured outcome of one orchestrator run. Returned, never thrown.

export const syncResultSchema = z.object({
  status: syncStatusSchema,
  syncType: syncTypeSchema,
  startedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
  cutoff: z.string().datetime().optional(),
  pagesVisited: z.number().int().nonnegative(),
  stoppedBy: stopReasonSchema.optional(),
  rowsRejected: z.number().int().nonnegative(),
  recordsScraped: z.number().int().nonnegative(),
  invalidDates: z.number().int().nonnegative(),
  recordsProcessed: z.number().int().nonnegative(),
  inserted: z.number().int().nonnegative(),
  updated: z.number().int().nonnegative(),
  logRecorded: z.boolean(),
  errorMessage: z.string().min(1).optional(),
});

export type SyncResult = z.infer<typeof syncResultSchema>;

// ── Read model ────────────────────────────────────────────────

export const healthReportSchema = z.object({
  status: z.enum(['healthy', 'unhealthy']),
  databaseConnected: z.boolean(),
  totalAccounts: z.number().int().nonnegative(),
  latestSync: z.object({
    time: z.string().datetime().nullable(),
    recordsProcessed: z.number().int().nonnegative(),
  }),
  error: z.string().optional(),
  timestamp: z.string().datetime(),
});

export type HealthReport = z.infer<typeof healthReportSchema>;

export const statsReportSchema = z.object({
  accountStats: z.object({
    totalAccounts: z.number().int().nonnegative(),
    accountsToday: z.number().int().nonnegative(),
    accountsThisWeek: z.number().int().nonnegative(),
    accountsThisMonth: z.number().int().nonnegative(),
  }),
  syncStats: z.object({
    totalSyncs: z.number().int().nonnegative(),
    successfulSyncs: z.number().int().nonnegative(),
    failedSyncs: z.number().int().nonnegative(),
    successRate: z.number().min(0).max(100),
  }),
  timestamp: z.string().datetime(),
});

export type StatsReport = z.infer<typeof statsReportSchema>;
