import { mkdir } from 'node:fs/promises';
import path from 'node:path';

import type { Locator, Page } from 'playwright';

import { errorMessage } from '../errors.js';
import type { SessionCookie, StorageScope, StorageSnapshot } from '../schema/index.js';
import * as log from '../utils/logger.js';

// ── Ports ────────────────────────────────────────────────────
// The pipeline talks to the browser only through these two shapes.
// `wrapPage` adapts a Playwright page; tests supply scripted fakes.

export type ElementState = 'attached' | 'visible';

export interface Timed {
  timeout: number;
}

export interface PortalElement {
  first(): PortalElement;
  nth(index: number): PortalElement;
  locator(selector: string): PortalElement;
  count(): Promise<number>;
  waitFor(options: Timed & { state: ElementState }): Promise<void>;
  click(options: Timed): Promise<void>;
  hover(options: Timed): Promise<void>;
  fill(value: string, options: Timed): Promise<void>;
  pressSequentially(text: string, options: Timed): Promise<void>;
  press(key: string, options: Timed): Promise<void>;
  isEnabled(options: Timed): Promise<boolean>;
  getAttribute(name: string, options: Timed): Promise<string | null>;
  innerText(options: Timed): Promise<string>;
}

export interface PortalPage {
  goto(url: string, options: Timed): Promise<void>;
  url(): string;
  locator(selector: string): PortalElement;
  waitForTimeout(ms: number): Promise<void>;
  cookies(): Promise<SessionCookie[]>;
  readStorage(scope: StorageScope): Promise<StorageSnapshot>;
  screenshot(path: string): Promise<void>;
}

// ── Playwright adapter ───────────────────────────────────────

export function wrapPage(page: Page): PortalPage {
  return {
    async goto(url, { timeout }) {
      await page.goto(url, { timeout, waitUntil: 'domcontentloaded' });
    },
    url: () => page.url(),
    locator: (selector) => wrapLocator(page.locator(selector)),
    waitForTimeout: (ms) => page.waitForTimeout(ms),
    async cookies() {
      const cookies = await page.context().cookies();
      return cookies.map((c) => ({ name: c.name, value: c.value, domain: c.domain }));
    },
    readStorage: (scope) => page.evaluate(snapshotStorage, scope),
    async screenshot(path) {
      await page.screenshot({ path, fullPage: true });
    },
  };
}

export function wrapLocator(locator: Locator): PortalElement {
  return {
    first: () => wrapLocator(locator.first()),
    nth: (index) => wrapLocator(locator.nth(index)),
    locator: (selector) => wrapLocator(locator.locator(selector)),
    count: () => locator.count(),
    waitFor: (options) => locator.waitFor(options),
    click: (options) => locator.click(options),
    hover: (options) => locator.hover(options),
    fill: (value, options) => locator.fill(value, options),
    pressSequentially: (text, options) => locator.pressSequentially(text, options),
    press: (key, options) => locator.press(key, options),
    isEnabled: (options) => locator.isEnabled(options),
    getAttribute: (name, options) => locator.getAttribute(name, options),
    innerText: (options) => locator.innerText(options),
  };
}

// ── Debug screenshots ────────────────────────────────────────

/** Best-effort full-page screenshot; a no-op when `dir` is unset. */
export async function captureScreenshot(
  page: PortalPage,
  dir: string | undefined,
  name: string,
): Promise<void> {
  if (dir === undefined) return;
  try {
    await mkdir(dir, { recursive: true });
    await page.screenshot(path.join(dir, `${name}.png`));
  } catch (err) {
    log.detail(`Screenshot ${name} skipped: ${errorMessage(err)}`);
  }
}

// ── Browser-context extraction ───────────────────────────────
// This function is serialized and executed inside the browser.
// It must NOT reference any outer-scope variables.

function snapshotStorage(scope: StorageScope): StorageSnapshot {
  const storage = scope === 'local' ? window.localStorage : window.sessionStorage;
  const snapshot: Record<string, string> = {};
  for (let i = 0; i < storage.length; i++) {
    const key = storage.key(i);
    if (key !== null) snapshot[key] = storage.getItem(key) ?? '';
  }
  return snapshot;
}
