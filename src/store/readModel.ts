import { errorMessage } from '../errors.js';
import type { HealthReport, StatsReport, StoredAccount } from '../schema/index.js';
import type { SyncStore } from './repository.js';

// ── Read-only queries over the synced data ───────────────────
// Each call owns its connection: connect, query, disconnect.

const DAY_MS = 24 * 60 * 60 * 1000;

async function withStore<T>(store: SyncStore, fn: () => Promise<T>): Promise<T> {
  await store.connect();
  try {
    return await fn();
  } finally {
    await store.disconnect();
  }
}

export function listAccounts(store: SyncStore): Promise<StoredAccount[]> {
  return withStore(store, () => store.accounts.list());
}

/** Never throws: an unreachable store is reported as `unhealthy`. */
export async function checkHealth(
  store: SyncStore,
  now: Date = new Date(),
): Promise<HealthReport> {
  try {
    return await withStore<HealthReport>(store, async () => {
      const databaseConnected = await store.ping();
      const totalAccounts = await store.accounts.count();
      const latest = await store.syncLogs.latest('success');
      return {
        status: databaseConnected ? 'healthy' : 'unhealthy',
        databaseConnected,
        totalAccounts,
        latestSync: {
          time: latest?.sync_time.toISOString() ?? null,
          recordsProcessed: latest?.records_processed ?? 0,
        },
        timestamp: now.toISOString(),
      };
    });
  } catch (err) {
    return {
      status: 'unhealthy',
      databaseConnected: false,
      totalAccounts: 0,
      latestSync: { time: null, recordsProcessed: 0 },
      error: errorMessage(err),
      timestamp: now.toISOString(),
    };
  }
}

/** UTC midnight at the start of `now`'s day. */
export function startOfUtcDay(now: Date): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
}

/**
 * Account registrations counted by `date` (today, last 7 days, last 30
 * days) and the sync success rate as a percentage with two decimals.
 */
export function computeStats(store: SyncStore, now: Date = new Date()): Promise<StatsReport> {
  const today = startOfUtcDay(now);
  const weekAgo = new Date(today.getTime() - 7 * DAY_MS);
  const monthAgo = new Date(today.getTime() - 30 * DAY_MS);

  return withStore(store, async () => {
    const [totalAccounts, accountsToday, accountsThisWeek, accountsThisMonth] = await Promise.all([
      store.accounts.count(),
      store.accounts.count(today),
      store.accounts.count(weekAgo),
      store.accounts.count(monthAgo),
    ]);
    const [totalSyncs, successfulSyncs] = await Promise.all([
      store.syncLogs.count(),
      store.syncLogs.count('success'),
    ]);

    return {
      accountStats: { totalAccounts, accountsToday, accountsThisWeek, accountsThisMonth },
      syncStats: {
        totalSyncs,
        successfulSyncs,
        failedSyncs: totalSyncs - successfulSyncs,
        successRate: totalSyncs > 0 ? Math.round((successfulSyncs / totalSyncs) * 10_000) / 100 : 0,
      },
      timestamp: now.toISOString(),
    };
  });
}
