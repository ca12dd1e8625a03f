import type {
  NewSyncLogEntry,
  StoredAccount,
  SyncLogEntry,
  SyncStatus,
} from '../schema/index.js';

// ── Repository ports ─────────────────────────────────────────
// Two implementations: mongoose (production) and in-memory (tests,
// --dry-run). Everything above this layer depends only on these.

export interface AccountRepository {
  findByAccountNumber(accountNumber: string): Promise<StoredAccount | null>;
  /** Returns false when the account number already exists. */
  insert(account: StoredAccount): Promise<boolean>;
  /** Replace every field except `account_number` and `scraped_at`. */
  replace(account: StoredAccount): Promise<void>;
  /** Newest `scraped_at` first. */
  list(): Promise<StoredAccount[]>;
  /** Count accounts, optionally only those registered on or after `since`. */
  count(since?: Date): Promise<number>;
}

export interface SyncLogRepository {
  /** Append an entry; `sync_time` is assigned here. */
  append(entry: NewSyncLogEntry): Promise<SyncLogEntry>;
  latest(status?: SyncStatus): Promise<SyncLogEntry | null>;
  count(status?: SyncStatus): Promise<number>;
}

export interface SyncStore {
  readonly accounts: AccountRepository;
  readonly syncLogs: SyncLogRepository;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  ping(): Promise<boolean>;
}
