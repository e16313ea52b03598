/**
 * Schema module: single source of truth for all data shapes.
 * Zod schemas + inferred TypeScript types.
 * Config files, cookie files and scripts validate through these schemas.
 */

export * from './config.js';
export * from './cookie.js';
export * from './capture.js';
export * from './step.js';
