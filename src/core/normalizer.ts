import { RowValidationError } from '../errors.js';
import { accountRecordSchema } from '../schema/index.js';
import type { AccountRecord, RawAccountRow } from '../schema/index.js';
import * as log from '../utils/logger.js';

// ── Date parsing ─────────────────────────────────────────────

const DAY_MONTH_YEAR = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

/**
 * Parse `DD/MM/YYYY` into a UTC-midnight Date.
 * Rejects anything that is not a real calendar date (31/02/2024, 00/01/2024).
 */
export function parseDayMonthYear(text: string): Date | undefined {
  const match = DAY_MONTH_YEAR.exec(text.trim());
  if (!match) return undefined;

  const day = Number(match[1]);
  const month = Number(match[2]);
  const year = Number(match[3]);

  // setUTCFullYear keeps years below 100 literal, unlike Date.UTC
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return undefined;
  }
  return date;
}

// ── Row normalization ────────────────────────────────────────

export type NormalizeOutcome =
  | { ok: true; record: AccountRecord; dateParsed: boolean }
  | { ok: false; error: RowValidationError };

/**
 * Validate and convert one raw row. A malformed date never fails the
 * row: `date` is left unset and `date_string` keeps the source text.
 */
export function normalizeRow(raw: RawAccountRow): NormalizeOutcome {
  const date = parseDayMonthYear(raw.date);

  const parsed = accountRecordSchema.safeParse({
    account_number: raw.account_number,
    user_id: raw.user_id,
    name: raw.name,
    email: raw.email,
    campaign_source: raw.campaign_source,
    id_status: raw.id_status,
    poa_status: raw.poa_status,
    date_string: raw.date.trim(),
    ...(date !== undefined ? { date } : {}),
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.');
    return {
      ok: false,
      error: new RowValidationError(
        `Account ${raw.account_number || '(blank)'}: ${issue?.message ?? 'invalid row'}${field ? ` (${field})` : ''}`,
        field,
      ),
    };
  }

  return { ok: true, record: parsed.data, dateParsed: date !== undefined };
}

export interface NormalizeResult {
  records: AccountRecord[];
  invalidDates: number;
  rejected: number;
}

export function normalizeRows(rows: readonly RawAccountRow[]): NormalizeResult {
  const records: AccountRecord[] = [];
  let invalidDates = 0;
  let rejected = 0;

  for (const raw of rows) {
    const outcome = normalizeRow(raw);
    if (!outcome.ok) {
      rejected++;
      log.warn(`Row rejected: ${outcome.error.message}`);
      continue;
    }
    if (!outcome.dateParsed) {
      invalidDates++;
      log.warn(
        `Account ${outcome.record.account_number}: unparseable date "${outcome.record.date_string}", kept without date`,
      );
    }
    records.push(outcome.record);
  }

  return { records, invalidDates, rejected };
}
