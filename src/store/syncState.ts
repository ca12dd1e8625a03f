import type { AccountRecord } from '../schema/index.js';
import type { SyncLogRepository } from './repository.js';

/** Derives the incremental cutoff from the sync history. */
export class SyncStateTracker {
  constructor(private readonly syncLogs: SyncLogRepository) {}

  /** `sync_time` of the latest successful run, if there is one. */
  async cutoff(): Promise<Date | undefined> {
    const latest = await this.syncLogs.latest('success');
    return latest?.sync_time;
  }
}

/**
 * Records registered strictly after `cutoff`. Records without a parsed
 * date are never kept.
 */
export function filterSince(records: readonly AccountRecord[], cutoff: Date): AccountRecord[] {
  const threshold = cutoff.getTime();
  return records.filter((r) => r.date !== undefined && r.date.getTime() > threshold);
}
