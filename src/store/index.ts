/**
 * Store module.
 * Repository ports, the MongoDB and in-memory implementations, and the
 * sync-state, upsert and read-model logic built on them.
 */

export type { AccountRepository, SyncLogRepository, SyncStore } from './repository.js';
export { MongoSyncStore, redactUri } from './mongo.js';
export { bindModels, ACCOUNTS_COLLECTION, SYNC_LOGS_COLLECTION } from './models.js';
export type { SyncModels } from './models.js';
export { createMemoryStore } from './memory.js';
export type { MemoryStore } from './memory.js';
export { SyncStateTracker, filterSince } from './syncState.js';
export { UpsertStore } from './upsert.js';
export type { UpsertCounts } from './upsert.js';
export { listAccounts, checkHealth, computeStats, startOfUtcDay } from './readModel.js';
