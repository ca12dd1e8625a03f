/**
 * Core module.
 * Row normalization, the sync pipeline and the recurring scheduler.
 */

export { parseDayMonthYear, normalizeRow, normalizeRows } from './normalizer.js';
export type { NormalizeOutcome, NormalizeResult } from './normalizer.js';
export { SyncOrchestrator } from './orchestrator.js';
export type { SyncOrchestratorOptions } from './orchestrator.js';
export { Scheduler, abortableSleep } from './scheduler.js';
export type { SchedulerOptions, Sleep } from './scheduler.js';
