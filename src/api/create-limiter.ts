/**
 * Factory wiring a TaggedLimiter to a runner and logger
 *
 * Nothing here is cached: each call builds new instances and the caller owns
 * their lifetime. close() drains a runner the factory built; a runner passed
 * in stays with whoever created it.
 */

import type { Logger } from 'pino';
import { getLimiterConfig, type LimiterConfig } from '../config/loader.js';
import { PooledTaskRunner } from '../core/task-runner.js';
import { TaggedLimiter } from '../core/tagged-limiter.js';
import type { TaskRunner } from '../types/limiter.js';
import { createLogger } from '../utils/logger.js';

export interface CreateTaggedLimiterOptions {
  /** Per-tag limit; defaults to tagged_limiter.max_concurrent_per_tag */
  limit?: number;
  /** Runner to dispatch to; a PooledTaskRunner sized by task_runner.concurrency otherwise */
  runner?: TaskRunner;
  logger?: Logger;
  /** Settings to use instead of the global configuration */
  config?: LimiterConfig;
}

export interface TaggedLimiterBundle<R extends TaskRunner = TaskRunner> {
  limiter: TaggedLimiter;
  runner: R;
  logger: Logger;
  /**
   * Shut down the factory-built runner and wait up to
   * task_runner.termination_timeout_ms for its work to settle.
   *
   * @returns false if work was still running when the timeout elapsed
   */
  close(): Promise<boolean>;
}

export function createTaggedLimiter(
  options: CreateTaggedLimiterOptions & { runner: TaskRunner }
): TaggedLimiterBundle;
export function createTaggedLimiter(
  options?: CreateTaggedLimiterOptions & { runner?: undefined }
): TaggedLimiterBundle<PooledTaskRunner>;
export function createTaggedLimiter(options: CreateTaggedLimiterOptions = {}): TaggedLimiterBundle {
  const config = options.config ?? getLimiterConfig();
  const logger =
    options.logger ?? createLogger({ level: config.logLevel, name: config.loggerName });
  let ownedRunner: PooledTaskRunner | undefined;
  let runner: TaskRunner;
  if (options.runner) {
    runner = options.runner;
  } else {
    ownedRunner = new PooledTaskRunner({ concurrency: config.runnerConcurrency, logger });
    runner = ownedRunner;
  }
  const limiter = new TaggedLimiter(runner, options.limit ?? config.maxConcurrentPerTag, {
    logger,
  });

  const close = async (): Promise<boolean> => {
    if (!ownedRunner) {
      return true;
    }
    ownedRunner.shutdown();
    return ownedRunner.awaitTermination(config.terminationTimeoutMs);
  };

  return { limiter, runner, logger, close };
}
