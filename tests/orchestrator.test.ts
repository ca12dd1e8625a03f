import { describe, it, expect, vi } from 'vitest';

import { BrowserLifecycle, ShutdownCoordinator } from '../src/browser/index.js';
import type { BrowserLauncher, LaunchedBrowser } from '../src/browser/index.js';
import { NO_PACING } from '../src/config/index.js';
import type { SyncSettings } from '../src/config/index.js';
import { SyncOrchestrator } from '../src/core/index.js';
import { createMemoryStore } from '../src/store/index.js';
import type { MemoryStore } from '../src/store/index.js';
import {
  LOGIN_URL,
  REPORT_URL,
  TEST_LOCATORS,
  accountCells,
  createPortal,
} from './support/fakePortal.js';
import type { PortalScript } from './support/fakePortal.js';

// ── Fixtures ──────────────────────────────────────────────────

const NOW = new Date('2024-06-15T12:00:00.000Z');
const clock = (): Date => NOW;

const SETTINGS: SyncSettings = {
  headless: true,
  stealth: false,
  maxPages: 500,
  intervalHours: 6,
  screenshotDir: undefined,
  portal: { baseUrl: 'https://portal.test', loginUrl: LOGIN_URL, reportUrl: REPORT_URL },
  credentials: { email: 'agent@example.com', password: 'test-secret' },
  locators: TEST_LOCATORS,
};

/**
 * Three pages of ten accounts. Account 7 has a blank date cell and is
 * rejected at extraction; accounts 1-5 registered after NOW.
 */
function reportPages(): string[][][] {
  return [0, 1, 2].map((p) =>
    Array.from({ length: 10 }, (_, r) => {
      const n = p * 10 + r + 1;
      return accountCells(n, n === 7 ? '' : n <= 5 ? '20/06/2024' : '01/05/2024');
    }),
  );
}

class FakeLauncher implements BrowserLauncher {
  launches = 0;
  closes = 0;
  open = 0;
  maxOpen = 0;

  constructor(private readonly script: PortalScript) {}

  async launch(): Promise<LaunchedBrowser> {
    this.launches++;
    this.open++;
    this.maxOpen = Math.max(this.maxOpen, this.open);
    return {
      page: createPortal(this.script).page,
      close: async () => {
        this.closes++;
        this.open--;
      },
    };
  }
}

function setup(script: PortalScript = { pages: reportPages() }) {
  const store: MemoryStore = createMemoryStore(clock);
  const launcher = new FakeLauncher(script);
  const coordinator = new ShutdownCoordinator();
  const lifecycle = new BrowserLifecycle(launcher, coordinator);
  const orchestrator = new SyncOrchestrator({
    settings: SETTINGS,
    store,
    lifecycle,
    pacing: NO_PACING,
    clock,
  });
  return { store, launcher, coordinator, lifecycle, orchestrator };
}

// ── Full sync ─────────────────────────────────────────────────

describe('SyncOrchestrator.runFull', () => {
  it('scrapes three pages, inserts 29 accounts and logs the run', async () => {
    const { store, launcher, lifecycle, orchestrator } = setup();

    const result = await orchestrator.runFull();

    expect(result).toMatchObject({
      status: 'success',
      syncType: 'full',
      pagesVisited: 3,
      stoppedBy: 'last_page',
      rowsRejected: 1,
      recordsScraped: 29,
      invalidDates: 0,
      inserted: 29,
      updated: 0,
      recordsProcessed: 29,
      logRecorded: true,
    });
    expect(result).not.toHaveProperty('errorMessage');
    expect(await store.accounts.count()).toBe(29);
    expect(await store.accounts.findByAccountNumber('ACC1007')).toBeNull();

    const entry = await store.syncLogs.latest();
    expect(entry).toEqual({
      sync_time: NOW,
      status: 'success',
      sync_type: 'full',
      records_processed: 29,
      duration_ms: 0,
    });

    expect(launcher.closes).toBe(1);
    expect(lifecycle.isOpen).toBe(false);
    expect(store.disconnectCount).toBe(1);
  });

  it('updates every account on a rerun', async () => {
    const { store, orchestrator } = setup();

    await orchestrator.runFull();
    const rerun = await orchestrator.runFull();

    expect(rerun.inserted).toBe(0);
    expect(rerun.updated).toBe(29);
    expect(rerun.recordsProcessed).toBe(29);
    expect(await store.accounts.count()).toBe(29);
    expect(await store.syncLogs.count('success')).toBe(2);
  });

  it('counts each account once when the next control never disables', async () => {
    const { store, orchestrator } = setup({ pages: reportPages(), nextAlwaysEnabled: true });

    const result = await orchestrator.runFull();

    expect(result).toMatchObject({
      status: 'success',
      pagesVisited: 3,
      stoppedBy: 'stale_pages',
      rowsRejected: 1,
      recordsScraped: 29,
      recordsProcessed: 29,
    });
    expect(await store.accounts.count()).toBe(29);
  });

  it('keeps an account whose date cannot be parsed', async () => {
    const { store, orchestrator } = setup({
      pages: [[accountCells(1), accountCells(2, 'pending'), accountCells(3)]],
    });

    const result = await orchestrator.runFull();

    expect(result.inserted).toBe(3);
    expect(result.invalidDates).toBe(1);
    const stored = await store.accounts.findByAccountNumber('ACC1002');
    expect(stored?.date_string).toBe('pending');
    expect(stored).not.toHaveProperty('date');
  });

  it('logs a failed run when login cannot be confirmed', async () => {
    const { store, launcher, coordinator, orchestrator } = setup({
      pages: reportPages(),
      loginSucceeds: false,
    });

    const result = await orchestrator.runFull();

    expect(result.status).toBe('failed');
    expect(result.recordsProcessed).toBe(0);
    expect(result.errorMessage).toBe('Login appears to have failed: no logged-in indicator found');
    expect(result.logRecorded).toBe(true);

    const entry = await store.syncLogs.latest();
    expect(entry?.status).toBe('failed');
    expect(entry?.records_processed).toBe(0);
    expect(entry?.error_message).toBe('Login appears to have failed: no logged-in indicator found');

    expect(launcher.closes).toBe(1);
    expect(launcher.open).toBe(0);
    expect(coordinator.openCount).toBe(0);
    expect(await store.accounts.count()).toBe(0);
  });

  it('fails without launching a browser when the store is unreachable', async () => {
    const { store, launcher, orchestrator } = setup();
    store.failConnect(new Error('connect ECONNREFUSED 127.0.0.1:27017'));

    const result = await orchestrator.runFull();

    expect(result.status).toBe('failed');
    expect(result.errorMessage).toBe('connect ECONNREFUSED 127.0.0.1:27017');
    expect(result.logRecorded).toBe(false);
    expect(launcher.launches).toBe(0);
    expect(await store.syncLogs.count()).toBe(0);
  });

  it('reports a sync log write failure in the result', async () => {
    const { store, orchestrator } = setup();
    vi.spyOn(store.syncLogs, 'append').mockRejectedValue(new Error('write concern timeout'));

    const result = await orchestrator.runFull();

    expect(result.status).toBe('success');
    expect(result.logRecorded).toBe(false);
    expect(store.disconnectCount).toBe(1);
  });

  it('serializes concurrent runs', async () => {
    const { launcher, orchestrator } = setup();

    const both = Promise.all([orchestrator.runFull(), orchestrator.runFull()]);
    expect(orchestrator.pending).toBe(2);
    const [first, second] = await both;

    expect(first.status).toBe('success');
    expect(second.status).toBe('success');
    expect(first.inserted).toBe(29);
    expect(second.updated).toBe(29);
    expect(launcher.maxOpen).toBe(1);
    expect(orchestrator.pending).toBe(0);
  });
});

// ── Incremental sync ──────────────────────────────────────────

describe('SyncOrchestrator.runIncremental', () => {
  it('runs a full sync when nothing has succeeded yet', async () => {
    const { store, orchestrator } = setup();

    const result = await orchestrator.runIncremental();

    expect(result.syncType).toBe('full');
    expect(result.inserted).toBe(29);
    expect(result).not.toHaveProperty('cutoff');
    expect((await store.syncLogs.latest())?.sync_type).toBe('full');
  });

  it('keeps only accounts registered after the last successful sync', async () => {
    const { store, orchestrator } = setup();
    await orchestrator.runFull();

    const result = await orchestrator.runIncremental();

    expect(result).toMatchObject({
      status: 'success',
      syncType: 'incremental',
      cutoff: '2024-06-15T12:00:00.000Z',
      recordsScraped: 29,
      recordsProcessed: 5,
      inserted: 0,
      updated: 5,
    });

    const entry = await store.syncLogs.latest();
    expect(entry).toMatchObject({
      status: 'success',
      sync_type: 'incremental',
      records_scraped: 29,
      records_processed: 5,
    });
  });

  it('never keeps an account without a parsed date', async () => {
    const { store, orchestrator } = setup({
      pages: [
        [accountCells(1, '20/06/2024'), accountCells(2, 'pending'), accountCells(3, '01/05/2024')],
      ],
    });
    await store.syncLogs.append({
      status: 'success',
      sync_type: 'full',
      records_processed: 0,
      duration_ms: 0,
    });

    const result = await orchestrator.runIncremental();

    expect(result.recordsScraped).toBe(3);
    expect(result.inserted).toBe(1);
    expect(await store.accounts.findByAccountNumber('ACC1002')).toBeNull();
  });
});
