/**
 * Schema module: single source of truth for all data shapes.
 * Zod schemas + inferred TypeScript types.
 * Every boundary validates through these schemas.
 */

export * from './account.js';
export * from './syncLog.js';
export * from './session.js';
export * from './locator.js';
export * from './config.js';
export * from './result.js';
