import { nextSyncTime } from '../schema/index.js';
import type {
  NewSyncLogEntry,
  StoredAccount,
  SyncLogEntry,
  SyncStatus,
} from '../schema/index.js';
import type { AccountRepository, SyncLogRepository, SyncStore } from './repository.js';

/**
 * In-process store for tests and dry runs.
 * Documents are cloned on the way in and out, like a real database.
 */
export interface MemoryStore extends SyncStore {
  readonly connectCount: number;
  readonly disconnectCount: number;
  /** Make the next `connect()` calls fail, to simulate an outage. */
  failConnect(error: Error | null): void;
}

export function createMemoryStore(clock: () => Date = () => new Date()): MemoryStore {
  const accounts = new Map<string, StoredAccount>();
  const logs: SyncLogEntry[] = [];
  let connectCount = 0;
  let disconnectCount = 0;
  let connectError: Error | null = null;

  const accountRepo: AccountRepository = {
    async findByAccountNumber(accountNumber) {
      const found = accounts.get(accountNumber);
      return found === undefined ? null : structuredClone(found);
    },
    async insert(account) {
      if (accounts.has(account.account_number)) return false;
      accounts.set(account.account_number, structuredClone(account));
      return true;
    },
    async replace(account) {
      const existing = accounts.get(account.account_number);
      accounts.set(account.account_number, {
        ...structuredClone(account),
        scraped_at: existing?.scraped_at ?? account.scraped_at,
      });
    },
    async list() {
      return [...accounts.values()]
        .sort((a, b) => b.scraped_at.getTime() - a.scraped_at.getTime())
        .map((a) => structuredClone(a));
    },
    async count(since) {
      if (since === undefined) return accounts.size;
      let n = 0;
      for (const a of accounts.values()) {
        if (a.date !== undefined && a.date.getTime() >= since.getTime()) n++;
      }
      return n;
    },
  };

  const logRepo: SyncLogRepository = {
    async append(entry: NewSyncLogEntry) {
      const stored: SyncLogEntry = {
        ...structuredClone(entry),
        sync_time: nextSyncTime(clock(), logs.at(-1)?.sync_time),
      };
      logs.push(stored);
      return structuredClone(stored);
    },
    async latest(status?: SyncStatus) {
      for (let i = logs.length - 1; i >= 0; i--) {
        const entry = logs[i];
        if (entry !== undefined && (status === undefined || entry.status === status)) {
          return structuredClone(entry);
        }
      }
      return null;
    },
    async count(status?: SyncStatus) {
      return status === undefined ? logs.length : logs.filter((l) => l.status === status).length;
    },
  };

  return {
    accounts: accountRepo,
    syncLogs: logRepo,
    get connectCount() {
      return connectCount;
    },
    get disconnectCount() {
      return disconnectCount;
    },
    failConnect(error) {
      connectError = error;
    },
    async connect() {
      if (connectError !== null) throw connectError;
      connectCount++;
    },
    async disconnect() {
      disconnectCount++;
    },
    async ping() {
      return connectError === null;
    },
  };
}
