/**
 * Default Configuration Constants
 *
 * Values used when neither the caller nor config/runtime.yaml supplies one.
 */

/**
 * Tagged Limiter Configuration
 */
export const TAGGED_LIMITER = {
  /** Concurrent running tasks allowed per tag */
  DEFAULT_MAX_CONCURRENT_PER_TAG: 2,
} as const;

/**
 * Pooled Task Runner Configuration
 */
export const TASK_RUNNER = {
  /** Concurrent lanes shared by every tag */
  DEFAULT_CONCURRENCY: 4,

  /** Wait used by callers draining the runner on shutdown (ms) */
  TERMINATION_TIMEOUT_MS: 1_000,
} as const;

/**
 * Logging Configuration
 */
export const LOGGING = {
  DEFAULT_LEVEL: 'info',
  DEFAULT_NAME: 'tagged-limiter',
} as const;
