import mongoose from 'mongoose';
import type { Connection } from 'mongoose';

import { STORE } from '../config/defaults.js';
import type { StoreSettings } from '../config/settings.js';
import { StoreConnectivityError, errorMessage } from '../errors.js';
import { nextSyncTime, storedAccountSchema, syncLogEntrySchema } from '../schema/index.js';
import type { StoredAccount, SyncLogEntry } from '../schema/index.js';
import * as log from '../utils/logger.js';
import { bindModels } from './models.js';
import type { SyncModels } from './models.js';
import type { AccountRepository, SyncLogRepository, SyncStore } from './repository.js';

const DUPLICATE_KEY = 11000;

/** Hide credentials before a URI reaches a log line or error message. */
export function redactUri(uri: string): string {
  return uri.replace(/\/\/[^@/]+@/, '//***@');
}

function isDuplicateKey(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === DUPLICATE_KEY;
}

// ── Store ────────────────────────────────────────────────────

/**
 * MongoDB-backed store. One connection per run: `connect()` opens it and
 * builds the indexes, `disconnect()` closes it.
 */
export class MongoSyncStore implements SyncStore {
  private connection: Connection | null = null;
  private models: SyncModels | null = null;

  readonly accounts: AccountRepository;
  readonly syncLogs: SyncLogRepository;

  constructor(
    private readonly settings: StoreSettings,
    private readonly clock: () => Date = () => new Date(),
  ) {
    this.accounts = this.createAccountRepository();
    this.syncLogs = this.createSyncLogRepository();
  }

  async connect(): Promise<void> {
    if (this.connection !== null) return;

    const { uri, dbName } = this.settings;
    log.info(`Connecting to MongoDB at ${redactUri(uri)} (db: ${dbName})`);

    const connection = mongoose.createConnection(uri, {
      dbName,
      serverSelectionTimeoutMS: STORE.SERVER_SELECTION_TIMEOUT,
      connectTimeoutMS: STORE.CONNECT_TIMEOUT,
      socketTimeoutMS: STORE.SOCKET_TIMEOUT,
      retryWrites: true,
      writeConcern: { w: 'majority' },
    });

    try {
      await connection.asPromise();
      const models = bindModels(connection);
      await Promise.all([models.Account.init(), models.SyncLog.init()]);
      this.connection = connection;
      this.models = models;
    } catch (err) {
      await connection.close().catch((closeErr: unknown) => {
        log.detail(`Closing failed connection: ${errorMessage(closeErr)}`);
      });
      throw new StoreConnectivityError(
        `Cannot connect to MongoDB at ${redactUri(uri)}: ${errorMessage(err)}`,
        err,
      );
    }
  }

  async disconnect(): Promise<void> {
    const connection = this.connection;
    this.connection = null;
    this.models = null;
    if (connection === null) return;

    try {
      await connection.close();
    } catch (err) {
      log.warn(`MongoDB disconnect failed: ${errorMessage(err)}`);
    }
  }

  async ping(): Promise<boolean> {
    const db = this.connection?.db;
    if (db === undefined) return false;
    try {
      await db.admin().ping();
      return true;
    } catch (err) {
      log.warn(`MongoDB ping failed: ${errorMessage(err)}`);
      return false;
    }
  }

  // ── Repositories ───────────────────────────────────────────

  private require(): SyncModels {
    if (this.models === null) {
      throw new StoreConnectivityError('MongoDB store is not connected');
    }
    return this.models;
  }

  private createAccountRepository(): AccountRepository {
    return {
      findByAccountNumber: async (accountNumber) => {
        const doc = await this.require().Account.findOne({ account_number: accountNumber }).lean();
        return doc === null ? null : toAccount(doc);
      },

      insert: async (account) => {
        try {
          await this.require().Account.create(account);
          return true;
        } catch (err) {
          if (isDuplicateKey(err)) return false;
          throw err;
        }
      },

      replace: async (account) => {
        const { account_number, scraped_at: _scrapedAt, date, ...fields } = account;
        await this.require().Account.updateOne(
          { account_number },
          date === undefined
            ? { $set: fields, $unset: { date: 1 } }
            : { $set: { ...fields, date } },
        );
      },

      list: async () => {
        const docs = await this.require().Account.find().sort({ scraped_at: -1 }).lean();
        return docs.map(toAccount);
      },

      count: async (since) => {
        const filter = since === undefined ? {} : { date: { $gte: since } };
        return this.require().Account.countDocuments(filter);
      },
    };
  }

  private createSyncLogRepository(): SyncLogRepository {
    return {
      append: async (entry) => {
        const { SyncLog } = this.require();
        const previous = await SyncLog.findOne().sort({ sync_time: -1 }).lean();
        const stored: SyncLogEntry = {
          ...entry,
          sync_time: nextSyncTime(this.clock(), previous?.sync_time),
        };
        await SyncLog.create(stored);
        return stored;
      },

      latest: async (status) => {
        const doc = await this.require()
          .SyncLog.findOne(status === undefined ? {} : { status })
          .sort({ sync_time: -1 })
          .lean();
        return doc === null ? null : syncLogEntrySchema.parse(stripNulls(doc));
      },

      count: async (status) =>
        this.require().SyncLog.countDocuments(status === undefined ? {} : { status }),
    };
  }
}

// ── Document mapping ─────────────────────────────────────────
// Lean documents carry `_id` and may hold nulls for absent optionals;
// the zod schemas strip the former, `stripNulls` the latter.

function toAccount(doc: object): StoredAccount {
  return storedAccountSchema.parse(stripNulls(doc));
}

function stripNulls(doc: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(doc).filter(([, value]) => value !== null));
}
