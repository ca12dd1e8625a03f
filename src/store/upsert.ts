import type { AccountRecord, StoredAccount } from '../schema/index.js';
import * as log from '../utils/logger.js';
import type { AccountRepository } from './repository.js';

export interface UpsertCounts {
  inserted: number;
  updated: number;
}

/**
 * Merges records into the account collection keyed by `account_number`.
 * Each record is idempotent on its own; a batch is not atomic.
 */
export class UpsertStore {
  constructor(
    private readonly accounts: AccountRepository,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async upsert(records: readonly AccountRecord[]): Promise<UpsertCounts> {
    const counts: UpsertCounts = { inserted: 0, updated: 0 };

    for (const record of dedupe(records)) {
      const now = this.clock();
      const existing = await this.accounts.findByAccountNumber(record.account_number);

      if (existing === null) {
        const doc: StoredAccount = { ...record, scraped_at: now, last_updated: now };
        if (await this.accounts.insert(doc)) {
          counts.inserted++;
          continue;
        }
        // lost a race with another writer; fall through to replace
        log.detail(`Account ${record.account_number} appeared during insert, updating instead`);
        await this.accounts.replace(doc);
        counts.updated++;
        continue;
      }

      await this.accounts.replace({
        ...record,
        scraped_at: existing.scraped_at,
        last_updated: now,
      });
      counts.updated++;
    }

    log.sync(`Upsert: ${String(counts.inserted)} inserted, ${String(counts.updated)} updated`);
    return counts;
  }
}

/** One record per account number, later rows winning, first-seen order kept. */
function dedupe(records: readonly AccountRecord[]): AccountRecord[] {
  const byNumber = new Map<string, AccountRecord>();
  for (const record of records) {
    byNumber.set(record.account_number, record);
  }
  return [...byNumber.values()];
}
