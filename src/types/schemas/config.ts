/**
 * Runtime Configuration Schemas
 *
 * Zod schemas for validating runtime.yaml and constructor arguments.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import { LOGGING, TAGGED_LIMITER, TASK_RUNNER } from '../../config/defaults.js';

/**
 * Per-tag concurrency limit. Zero is legal: every submission stays pending.
 */
export const TagLimitSchema = z
  .number({ invalid_type_error: 'must be a number' })
  .int('must be an integer')
  .min(0, 'must be >= 0');

/**
 * Lanes of a pooled task runner
 */
export const RunnerConcurrencySchema = z
  .number({ invalid_type_error: 'must be a number' })
  .int('must be an integer')
  .min(1, 'must be >= 1');

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

/**
 * Tagged Limiter Configuration
 */
export const TaggedLimiterConfigSchema = z
  .object({
    max_concurrent_per_tag: TagLimitSchema.default(TAGGED_LIMITER.DEFAULT_MAX_CONCURRENT_PER_TAG),
  })
  .default({});

/**
 * Task Runner Configuration
 */
export const TaskRunnerConfigSchema = z
  .object({
    concurrency: RunnerConcurrencySchema.default(TASK_RUNNER.DEFAULT_CONCURRENCY),
    termination_timeout_ms: z
      .number()
      .int()
      .positive('must be positive')
      .default(TASK_RUNNER.TERMINATION_TIMEOUT_MS),
  })
  .default({});

/**
 * Logging Configuration
 */
export const LoggingConfigSchema = z
  .object({
    level: LogLevelSchema.default(LOGGING.DEFAULT_LEVEL),
    name: z.string().min(1, 'Logger name cannot be empty').default(LOGGING.DEFAULT_NAME),
  })
  .default({});

/**
 * Complete Runtime Configuration. Missing sections and fields take the
 * values from config/defaults.ts.
 */
export const RuntimeConfigSchema = z.object({
  tagged_limiter: TaggedLimiterConfigSchema,
  task_runner: TaskRunnerConfigSchema,
  logging: LoggingConfigSchema,
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;
