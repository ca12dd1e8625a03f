import { Schema } from 'mongoose';
import type { Connection, Model } from 'mongoose';

import type { StoredAccount, SyncLogEntry } from '../schema/index.js';

export const ACCOUNTS_COLLECTION = 'accounts';
export const SYNC_LOGS_COLLECTION = 'sync_logs';

// ── accounts ─────────────────────────────────────────────────

const accountSchema = new Schema<StoredAccount>(
  {
    account_number: { type: String, required: true, unique: true },
    user_id: { type: String, required: true, index: true },
    name: { type: String, required: true },
    email: { type: String, required: true },
    // may be blank in the report; `required` would reject ''
    campaign_source: { type: String, default: '' },
    id_status: { type: String, default: '' },
    poa_status: { type: String, default: '' },
    date: { type: Date, index: true },
    date_string: { type: String, default: '' },
    scraped_at: { type: Date, required: true, index: true },
    last_updated: { type: Date, required: true },
  },
  { collection: ACCOUNTS_COLLECTION, versionKey: false },
);

// ── sync_logs ────────────────────────────────────────────────

const syncLogSchema = new Schema<SyncLogEntry>(
  {
    sync_time: { type: Date, required: true },
    status: { type: String, enum: ['success', 'failed'], required: true },
    sync_type: { type: String, enum: ['full', 'incremental'], required: true },
    records_processed: { type: Number, required: true },
    records_scraped: { type: Number },
    error_message: { type: String },
    duration_ms: { type: Number, required: true },
  },
  { collection: SYNC_LOGS_COLLECTION, versionKey: false },
);

syncLogSchema.index({ sync_time: -1 });
syncLogSchema.index({ status: 1, sync_time: -1 });

// ── Binding ──────────────────────────────────────────────────
// Models are bound per connection so each run owns its own pool.

export interface SyncModels {
  Account: Model<StoredAccount>;
  SyncLog: Model<SyncLogEntry>;
}

export function bindModels(connection: Connection): SyncModels {
  return {
    Account: connection.model<StoredAccount>('Account', accountSchema),
    SyncLog: connection.model<SyncLogEntry>('SyncLog', syncLogSchema),
  };
}
