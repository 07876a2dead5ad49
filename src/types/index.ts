/**
 * Main type exports for tagged-limiter
 */

export * from './limiter.js';
export * from './schemas/index.js';
