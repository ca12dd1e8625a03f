/**
 * CLI module: a thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 * No business logic lives here.
 */

export {
  EXIT_CODES,
  registerSyncCommands,
  registerReadCommands,
  addSyncOptions,
  toCliOverrides,
  exitCodeFor,
  parsePositiveInt,
  parsePositiveNumber,
} from './run.js';
export type { SyncCommandOptions } from './run.js';
