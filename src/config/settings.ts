import { envConfigSchema, LOCATOR_TARGETS } from '../schema/index.js';
import type {
  Credentials,
  EnvConfig,
  FileConfig,
  LocatorOverrides,
  LocatorSet,
} from '../schema/index.js';
import { LIMITS, SCHEDULE, STORE } from './defaults.js';

// ── Resolved settings ───────────────────────────────────────

export interface PortalUrls {
  baseUrl: string;
  loginUrl: string;
  reportUrl: string;
}

export interface StoreSettings {
  uri: string;
  dbName: string;
}

export interface SyncSettings {
  headless: boolean;
  stealth: boolean;
  maxPages: number;
  intervalHours: number;
  screenshotDir: string | undefined;
  portal: PortalUrls;
  credentials: Credentials;
  locators: LocatorSet;
}

/** Flags a CLI command may pass. Unset flags fall through to file/env. */
export interface CliOverrides {
  headless?: boolean | undefined;
  stealth?: boolean | undefined;
  maxPages?: number | undefined;
  intervalHours?: number | undefined;
  screenshotDir?: string | undefined;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ── Env loader ──────────────────────────────────────────────

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return envConfigSchema.parse(env);
}

export function resolveStoreSettings(env: EnvConfig): StoreSettings {
  return {
    uri: env.MONGODB_URI ?? STORE.MONGODB_URI,
    dbName: env.DATABASE_NAME ?? STORE.DATABASE_NAME,
  };
}

// ── Merge ───────────────────────────────────────────────────
// Precedence: CLI flag > config file > environment > default.

export function resolveSyncSettings(
  cli: CliOverrides,
  file: FileConfig,
  env: EnvConfig,
  defaultLocators: LocatorSet,
): SyncSettings {
  const baseUrl = file.portal?.baseUrl ?? env.PORTAL_BASE_URL;
  if (baseUrl === undefined) {
    throw new ConfigError(
      'Portal base URL is required (set PORTAL_BASE_URL or portal.baseUrl in the config file)',
    );
  }

  const email = env.PORTAL_EMAIL;
  const password = env.PORTAL_PASSWORD;
  if (email === undefined || password === undefined) {
    throw new ConfigError('PORTAL_EMAIL and PORTAL_PASSWORD must be set');
  }

  const root = baseUrl.replace(/\/+$/, '');

  return {
    headless: cli.headless ?? file.headless ?? false,
    stealth: cli.stealth ?? file.stealth ?? true,
    maxPages: cli.maxPages ?? file.maxPages ?? LIMITS.MAX_PAGES,
    intervalHours: cli.intervalHours ?? file.intervalHours ?? SCHEDULE.INTERVAL_HOURS,
    screenshotDir: cli.screenshotDir ?? file.screenshotDir ?? env.PORTAL_SCREENSHOT_DIR,
    portal: {
      baseUrl: root,
      loginUrl: file.portal?.loginUrl ?? env.PORTAL_LOGIN_URL ?? `${root}/login`,
      reportUrl: file.portal?.reportUrl ?? env.PORTAL_REPORT_URL ?? `${root}/report/accounts`,
    },
    credentials: { email, password },
    locators: mergeLocators(defaultLocators, file.locators ?? {}),
  };
}

export function mergeLocators(defaults: LocatorSet, overrides: LocatorOverrides): LocatorSet {
  const merged: LocatorSet = { ...defaults };
  for (const target of LOCATOR_TARGETS) {
    const chain = overrides[target];
    if (chain !== undefined) merged[target] = chain;
  }
  return merged;
}
