import { PACING } from '../config/defaults.js';
import type { Pacing } from '../config/defaults.js';
import type { SyncSettings } from '../config/settings.js';
import { errorMessage } from '../errors.js';
import { CredentialSession, TableExtractor, withBrowser } from '../browser/index.js';
import type { BrowserLifecycle, ExtractionResult, RandomSource } from '../browser/index.js';
import type {
  NewSyncLogEntry,
  StopReason,
  SyncResult,
  SyncStatus,
  SyncType,
} from '../schema/index.js';
import { SyncStateTracker, UpsertStore, filterSince } from '../store/index.js';
import type { SyncStore } from '../store/index.js';
import * as log from '../utils/logger.js';
import { normalizeRows } from './normalizer.js';

// ── Public types ─────────────────────────────────────────────

export interface SyncOrchestratorOptions {
  settings: SyncSettings;
  store: SyncStore;
  lifecycle: BrowserLifecycle;
  /** Defaults to humanized pacing. */
  pacing?: Pacing | undefined;
  clock?: (() => Date) | undefined;
  random?: RandomSource | undefined;
}

/** Counters filled in as a run progresses; partial on failure. */
interface RunProgress {
  syncType: SyncType;
  cutoff: Date | undefined;
  pagesVisited: number;
  stoppedBy: StopReason | undefined;
  rowsRejected: number;
  recordsScraped: number;
  invalidDates: number;
  recordsProcessed: number;
  inserted: number;
  updated: number;
}

// ── Orchestrator ─────────────────────────────────────────────

/**
 * Runs full and incremental syncs end to end. Every run appends exactly
 * one sync log entry when the store is reachable, and returns a
 * SyncResult instead of throwing. Runs are serialized: a run requested
 * while another is active starts when that one finishes.
 */
export class SyncOrchestrator {
  private tail: Promise<void> = Promise.resolve();
  private active = 0;

  private readonly clock: () => Date;
  private readonly pacing: Pacing;

  constructor(private readonly options: SyncOrchestratorOptions) {
    this.clock = options.clock ?? (() => new Date());
    this.pacing = options.pacing ?? PACING;
  }

  /** Runs queued or in progress. */
  get pending(): number {
    return this.active;
  }

  runFull(): Promise<SyncResult> {
    return this.serialize(() => this.execute('full'));
  }

  /** Falls back to a full run when no successful sync has been logged. */
  runIncremental(): Promise<SyncResult> {
    return this.serialize(() => this.execute('incremental'));
  }

  // ── Serialization ──────────────────────────────────────────

  private serialize(fn: () => Promise<SyncResult>): Promise<SyncResult> {
    this.active++;
    const run = this.tail.then(fn).finally(() => {
      this.active--;
    });
    // the caller observes a rejection through `run`; the queue moves on
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  // ── Run ────────────────────────────────────────────────────

  private async execute(requested: SyncType): Promise<SyncResult> {
    const { store } = this.options;
    const startedAt = this.clock();
    const progress: RunProgress = {
      syncType: requested,
      cutoff: undefined,
      pagesVisited: 0,
      stoppedBy: undefined,
      rowsRejected: 0,
      recordsScraped: 0,
      invalidDates: 0,
      recordsProcessed: 0,
      inserted: 0,
      updated: 0,
    };

    log.section(`${requested === 'full' ? 'Full' : 'Incremental'} sync started`);

    let failure: string | undefined;
    let connected = false;

    try {
      await store.connect();
      connected = true;
      await this.pipeline(progress);
    } catch (err) {
      failure = errorMessage(err) || (err instanceof Error ? err.name : 'Unknown error');
      log.error(`Sync failed: ${failure}`);
    }

    const status: SyncStatus = failure === undefined ? 'success' : 'failed';
    const durationMs = Math.max(0, this.clock().getTime() - startedAt.getTime());
    if (failure !== undefined) progress.recordsProcessed = 0;

    let logRecorded = false;
    try {
      if (connected) {
        await store.syncLogs.append(toLogEntry(progress, status, durationMs, failure));
        logRecorded = true;
      } else {
        log.warn('Store unreachable; sync log entry not recorded');
      }
    } catch (err) {
      log.error(`Could not record sync log entry: ${errorMessage(err)}`);
    } finally {
      if (connected) await store.disconnect();
    }

    log.sync(
      `Sync ${status}: ${String(progress.recordsProcessed)} processed in ${(durationMs / 1000).toFixed(1)}s`,
    );

    return {
      status,
      syncType: progress.syncType,
      startedAt: startedAt.toISOString(),
      durationMs,
      ...(progress.cutoff !== undefined ? { cutoff: progress.cutoff.toISOString() } : {}),
      pagesVisited: progress.pagesVisited,
      ...(progress.stoppedBy !== undefined ? { stoppedBy: progress.stoppedBy } : {}),
      rowsRejected: progress.rowsRejected,
      recordsScraped: progress.recordsScraped,
      invalidDates: progress.invalidDates,
      recordsProcessed: progress.recordsProcessed,
      inserted: progress.inserted,
      updated: progress.updated,
      logRecorded,
      ...(failure !== undefined ? { errorMessage: failure } : {}),
    };
  }

  private async pipeline(progress: RunProgress): Promise<void> {
    const { store } = this.options;

    // ── 1. Cutoff (incremental only) ─────────────────────────

    if (progress.syncType === 'incremental') {
      progress.cutoff = await new SyncStateTracker(store.syncLogs).cutoff();
      if (progress.cutoff === undefined) {
        log.sync('No successful sync recorded yet, running a full sync');
        progress.syncType = 'full';
      } else {
        log.sync(`Cutoff: ${progress.cutoff.toISOString()}`);
      }
    }

    // ── 2. Browser: login, open report, extract ──────────────

    const extraction = await this.scrape();
    progress.pagesVisited = extraction.pagesVisited;
    progress.stoppedBy = extraction.stoppedBy;
    progress.rowsRejected = extraction.rowsRejected;
    if (extraction.stoppedBy !== 'last_page') {
      log.warn(`Pagination ended early (${extraction.stoppedBy}); the report may be incomplete`);
    }

    // ── 3. Normalize ─────────────────────────────────────────

    const normalized = normalizeRows(extraction.rows);
    progress.rowsRejected += normalized.rejected;
    progress.invalidDates = normalized.invalidDates;
    progress.recordsScraped = normalized.records.length;

    // ── 4. Filter (incremental only) ─────────────────────────

    const records =
      progress.cutoff === undefined
        ? normalized.records
        : filterSince(normalized.records, progress.cutoff);
    if (progress.cutoff !== undefined) {
      log.sync(
        `${String(records.length)} of ${String(normalized.records.length)} records are newer than the cutoff`,
      );
    }

    // ── 5. Upsert ────────────────────────────────────────────

    const upsert = new UpsertStore(store.accounts, this.clock);
    const counts = await upsert.upsert(records);
    progress.inserted = counts.inserted;
    progress.updated = counts.updated;
    progress.recordsProcessed = counts.inserted + counts.updated;
  }

  private scrape(): Promise<ExtractionResult> {
    const { settings, lifecycle, random } = this.options;
    const pacing = this.pacing;

    return withBrowser(
      lifecycle,
      { headless: settings.headless, stealth: settings.stealth },
      async (page) => {
        const session = new CredentialSession(page, {
          loginUrl: settings.portal.loginUrl,
          locators: settings.locators,
          pacing,
          screenshotDir: settings.screenshotDir,
          random,
        });
        await session.login(settings.credentials);
        log.login('Logged in');

        const extractor = new TableExtractor(page, {
          reportUrl: settings.portal.reportUrl,
          locators: settings.locators,
          pacing,
          maxPages: settings.maxPages,
          screenshotDir: settings.screenshotDir,
          random,
        });
        await extractor.openReport();
        return extractor.extractAll();
      },
    );
  }
}

function toLogEntry(
  progress: RunProgress,
  status: SyncStatus,
  durationMs: number,
  failure: string | undefined,
): NewSyncLogEntry {
  return {
    status,
    sync_type: progress.syncType,
    records_processed: progress.recordsProcessed,
    duration_ms: durationMs,
    ...(progress.syncType === 'incremental' ? { records_scraped: progress.recordsScraped } : {}),
    ...(failure !== undefined ? { error_message: failure } : {}),
  };
}
