/**
 * Zod schema exports for tagged-limiter configuration validation
 *
 * @example
 * ```typescript
 * import { TagLimitSchema } from 'tagged-limiter';
 *
 * const result = TagLimitSchema.safeParse(-1);
 * if (!result.success) {
 *   console.error(result.error.issues);
 * }
 * ```
 */

export * from './config.js';
