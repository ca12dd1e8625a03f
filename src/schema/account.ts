import { z } from 'zod';

// ── Raw table row ─────────────────────────────────────────────
// Column order is a fixed contract with the portal's report table.

export const RAW_ROW_FIELDS = [
  'date',
  'user_id',
  'account_number',
  'name',
  'email',
  'campaign_source',
  'id_status',
  'poa_status',
] as const;

export type RawRowField = (typeof RAW_ROW_FIELDS)[number];

/** Fields that must be non-blank for a row to be accepted. */
export const REQUIRED_ROW_FIELDS: readonly RawRowField[] = RAW_ROW_FIELDS.slice(0, 5);

export const rawAccountRowSchema = z.object({
  date: z.string(),
  user_id: z.string(),
  account_number: z.string(),
  name: z.string(),
  email: z.string(),
  campaign_source: z.string(),
  id_status: z.string(),
  poa_status: z.string(),
});

export type RawAccountRow = z.infer<typeof rawAccountRowSchema>;

// ── Normalized record ─────────────────────────────────────────

export const accountRecordSchema = z.object({
  account_number: z.string().trim().min(1),
  user_id: z.string().trim().min(1),
  name: z.string().trim().min(1),
  email: z.string().trim().min(1),
  campaign_source: z.string().trim(),
  id_status: z.string().trim(),
  poa_status: z.string().trim(),
  date: z.date().optional(),
  date_string: z.string(),
});

export type AccountRecord = z.infer<typeof accountRecordSchema>;

// ── Stored document ───────────────────────────────────────────

export const storedAccountSchema = accountRecordSchema.extend({
  scraped_at: z.date(),
  last_updated: z.date(),
});

export type StoredAccount = z.infer<typeof storedAccountSchema>;
