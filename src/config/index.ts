/**
 * Configuration module.
 * Loads and validates runtime config from env, CLI flags, and config files.
 * Zod-validated. Precedence is explicit in `resolveSyncSettings`.
 */

export { TIMEOUTS, LIMITS, SCHEDULE, STORE, PACING, NO_PACING, STEALTH } from './defaults.js';
export type { Pacing, PaceRange } from './defaults.js';
export { loadConfigFile, loadOptionalConfigFile, loadDefaultLocators } from './loader.js';
export {
  ConfigError,
  loadEnvConfig,
  mergeLocators,
  resolveStoreSettings,
  resolveSyncSettings,
} from './settings.js';
export type { CliOverrides, PortalUrls, StoreSettings, SyncSettings } from './settings.js';
