/**
 * portal-sync library entry.
 * The CLI in `src/cli` is one consumer; everything it uses is exported here.
 */

export * from './errors.js';
export * from './schema/index.js';
export * from './config/index.js';
export * from './browser/index.js';
export * from './store/index.js';
export * from './core/index.js';
export * from './report/index.js';
