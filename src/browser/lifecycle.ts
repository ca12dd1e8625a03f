import { chromium } from 'playwright';

import { STEALTH } from '../config/defaults.js';
import { errorMessage } from '../errors.js';
import * as log from '../utils/logger.js';
import { wrapPage } from './driver.js';
import type { PortalPage } from './driver.js';
import type { ShutdownCoordinator } from './shutdown.js';

// ── Public types ─────────────────────────────────────────────

export interface LaunchOptions {
  headless: boolean;
  stealth: boolean;
}

export interface LaunchedBrowser {
  readonly page: PortalPage;
  close(): Promise<void>;
}

export interface BrowserLauncher {
  launch(options: LaunchOptions): Promise<LaunchedBrowser>;
}

// ── Playwright launcher ──────────────────────────────────────

// Runs before any page script: hides the usual automation tells.
const STEALTH_INIT_SCRIPT = `
Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
Object.defineProperty(navigator, 'languages', { get: () => ['en-US', 'en'] });
Object.defineProperty(navigator, 'plugins', { get: () => [1, 2, 3, 4, 5] });
window.chrome = window.chrome || { runtime: {} };
`;

export const playwrightLauncher: BrowserLauncher = {
  async launch({ headless, stealth }) {
    const browser = await chromium.launch({
      headless,
      args: stealth ? [...STEALTH.ARGS] : [],
    });

    try {
      const context = await browser.newContext(
        stealth
          ? { userAgent: STEALTH.USER_AGENT, viewport: { ...STEALTH.VIEWPORT }, locale: 'en-US' }
          : {},
      );
      if (stealth) {
        await context.addInitScript(STEALTH_INIT_SCRIPT);
      }
      const page = await context.newPage();

      return {
        page: wrapPage(page),
        close: () => browser.close(),
      };
    } catch (err) {
      await browser.close();
      throw err;
    }
  },
};

// ── Lifecycle ────────────────────────────────────────────────

/**
 * Exclusive owner of one browser session. While a session is open it is
 * registered with the shutdown coordinator so a signal can force it
 * closed; `release()` is idempotent and never throws.
 */
export class BrowserLifecycle {
  private browser: LaunchedBrowser | null = null;
  private unregister: (() => void) | null = null;

  constructor(
    private readonly launcher: BrowserLauncher,
    private readonly coordinator: ShutdownCoordinator,
  ) {}

  get isOpen(): boolean {
    return this.browser !== null;
  }

  async acquire(headless: boolean, stealthMode: boolean): Promise<PortalPage> {
    if (this.browser !== null) {
      throw new Error('Browser already acquired; release it before acquiring again');
    }
    if (this.coordinator.isShuttingDown) {
      throw new Error('Shutdown in progress; refusing to launch a browser');
    }

    log.info(`Launching browser (headless=${String(headless)}, stealth=${String(stealthMode)})`);
    const browser = await this.launcher.launch({ headless, stealth: stealthMode });
    if (this.coordinator.isShuttingDown) {
      await browser.close();
      throw new Error('Shutdown started while the browser was launching');
    }
    this.browser = browser;
    this.unregister = this.coordinator.register({
      name: 'browser',
      release: () => this.release(),
    });
    return browser.page;
  }

  async release(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.unregister?.();
    this.unregister = null;
    if (browser === null) return;

    try {
      await browser.close();
      log.info('Browser closed');
    } catch (err) {
      log.warn(`Browser close failed: ${errorMessage(err)}`);
    }
  }
}

/** Scope-bound form: the browser is released however `fn` exits. */
export async function withBrowser<T>(
  lifecycle: BrowserLifecycle,
  options: LaunchOptions,
  fn: (page: PortalPage) => Promise<T>,
): Promise<T> {
  const page = await lifecycle.acquire(options.headless, options.stealth);
  try {
    return await fn(page);
  } finally {
    await lifecycle.release();
  }
}
