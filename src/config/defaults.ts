/**
 * Default configuration values.
 * All values are overridable via config file or CLI flags.
 */

export const TIMEOUTS = {
  NAVIGATION_TIMEOUT: 30_000,
  ACTION_TIMEOUT: 8_000,
  RESOLVE_ATTEMPT: 2_000,
  LOGIN_ENTRY_ATTEMPT: 3_000,
  LOGIN_INDICATOR: 5_000,
  TABLE_WAIT: 10_000,
} as const;

export const LIMITS = {
  MAX_PAGES: 500,
  MAX_STALE_PAGES: 2,
} as const;

export const SCHEDULE = {
  INTERVAL_HOURS: 6,
  TICK_MS: 60_000,
  COOLDOWN_MS: 300_000,
} as const;

export const STORE = {
  MONGODB_URI: 'mongodb://localhost:27017/',
  DATABASE_NAME: 'portal_data',
  SERVER_SELECTION_TIMEOUT: 10_000,
  CONNECT_TIMEOUT: 10_000,
  SOCKET_TIMEOUT: 20_000,
} as const;

/** [min, max] millisecond ranges for humanized pacing. */
export type PaceRange = readonly [number, number];

export interface Pacing {
  keystroke: PaceRange;
  betweenFields: PaceRange;
  afterNavigation: PaceRange;
  afterSubmit: PaceRange;
  afterHover: PaceRange;
  pageTurn: PaceRange;
}

export const PACING: Pacing = {
  keystroke: [50, 150],
  betweenFields: [500, 1_000],
  afterNavigation: [2_000, 3_000],
  afterSubmit: [3_000, 5_000],
  afterHover: [200, 500],
  pageTurn: [1_000, 2_000],
};

/** No waits at all. Used by tests and dry runs against fakes. */
export const NO_PACING: Pacing = {
  keystroke: [0, 0],
  betweenFields: [0, 0],
  afterNavigation: [0, 0],
  afterSubmit: [0, 0],
  afterHover: [0, 0],
  pageTurn: [0, 0],
};

export const STEALTH = {
  USER_AGENT:
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  VIEWPORT: { width: 1920, height: 1080 },
  ARGS: [
    '--disable-blink-features=AutomationControlled',
    '--disable-dev-shm-usage',
    '--no-sandbox',
    '--window-size=1920,1080',
  ],
} as const;
