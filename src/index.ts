export { TaggedLimiter, type TaggedLimiterOptions } from './core/tagged-limiter.js';
export { PooledTaskRunner, type PooledTaskRunnerOptions } from './core/task-runner.js';
export {
  createTaggedLimiter,
  type CreateTaggedLimiterOptions,
  type TaggedLimiterBundle,
} from './api/create-limiter.js';

export {
  loadConfig,
  validateConfig,
  initializeConfig,
  getConfig,
  resetConfig,
  getLimiterConfig,
  type Config,
  type Environment,
  type LimiterConfig,
} from './config/loader.js';
export { TAGGED_LIMITER, TASK_RUNNER, LOGGING } from './config/defaults.js';

export { LimiterError, ConfigurationError, RunnerShutdownError } from './utils/errors.js';
export { createLogger, lazyLog, type CreateLoggerOptions, type LogLevel } from './utils/logger.js';

export * from './types/index.js';
