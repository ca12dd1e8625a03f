/**
 * Report generation module.
 * Renders sync results and read-model output as text or key-sorted JSON.
 */

export {
  serializeJSON,
  formatSyncResult,
  formatHealth,
  formatStats,
  formatAccountsTable,
} from './reporter.js';
