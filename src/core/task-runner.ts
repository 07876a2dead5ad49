/**
 * Pooled Task Runner
 *
 * Runs work on a fixed number of concurrent lanes fed by a FIFO backlog.
 * Work starts on a later turn of the event loop, never inside execute().
 *
 * After shutdown() no new work is accepted; the backlog and running work
 * still complete, and awaitTermination() resolves once everything settled.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import type { RunnableWork, TaskRunner, TaskRunnerEvents, TaskRunnerStats } from '../types/limiter.js';
import { RunnerConcurrencySchema } from '../types/schemas/config.js';
import { RunnerShutdownError } from '../utils/errors.js';
import { lazyLog } from '../utils/logger.js';
import { parseOrThrow } from '../utils/validation.js';

export interface PooledTaskRunnerOptions {
  /** Number of work items allowed to run at once (integer >= 1) */
  concurrency: number;
  logger?: Logger;
}

export class PooledTaskRunner extends EventEmitter<TaskRunnerEvents> implements TaskRunner {
  private readonly concurrency: number;
  private readonly logger?: Logger;
  private readonly backlog: RunnableWork[] = [];
  private readonly idleWaiters: Array<() => void> = [];
  private active = 0;
  private pumpScheduled = false;
  private isShutdown = false;

  private completed = 0;
  private failed = 0;

  /**
   * @throws {ConfigurationError} If concurrency is not an integer >= 1
   */
  constructor(options: PooledTaskRunnerOptions) {
    super();
    this.concurrency = parseOrThrow(RunnerConcurrencySchema, options.concurrency, 'concurrency');
    this.logger = options.logger;
  }

  /**
   * @throws {RunnerShutdownError} If shutdown() has been called
   */
  public execute(work: RunnableWork): void {
    if (this.isShutdown) {
      throw new RunnerShutdownError();
    }

    this.backlog.push(work);
    this.schedulePump();
  }

  /**
   * Stop accepting work. Already queued work still runs.
   */
  public shutdown(): void {
    if (this.isShutdown) {
      return;
    }
    this.isShutdown = true;
    this.logger?.info(
      { active: this.active, queued: this.backlog.length },
      'PooledTaskRunner shutting down'
    );
  }

  public isIdle(): boolean {
    return this.active === 0 && this.backlog.length === 0;
  }

  /**
   * Wait until no work is running or queued.
   *
   * @returns true if the runner went idle, false if the timeout elapsed first
   */
  public awaitTermination(timeoutMs: number): Promise<boolean> {
    if (this.isIdle()) {
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      const onIdle = (): void => {
        clearTimeout(timeoutHandle);
        resolve(true);
      };
      const timeoutHandle = setTimeout(() => {
        const index = this.idleWaiters.indexOf(onIdle);
        if (index !== -1) {
          this.idleWaiters.splice(index, 1);
        }
        resolve(false);
      }, timeoutMs);
      this.idleWaiters.push(onIdle);
    });
  }

  public getStats(): TaskRunnerStats {
    return {
      concurrency: this.concurrency,
      active: this.active,
      queued: this.backlog.length,
      completed: this.completed,
      failed: this.failed,
      shutdown: this.isShutdown,
    };
  }

  private schedulePump(): void {
    if (this.pumpScheduled) {
      return;
    }
    this.pumpScheduled = true;
    setImmediate(() => {
      this.pumpScheduled = false;
      this.pump();
    });
  }

  private pump(): void {
    while (this.active < this.concurrency) {
      const work = this.backlog.shift();
      if (!work) {
        break;
      }
      this.active++;
      void this.runLane(work);
    }
  }

  private async runLane(work: RunnableWork): Promise<void> {
    try {
      await work();
    } catch (error) {
      this.failed++;
      this.logger?.error({ err: error }, 'Task failed');
      try {
        this.emit('taskError', error);
      } catch (err) {
        this.logger?.error({ err }, 'Error emitting taskError event');
      }
    } finally {
      this.active--;
      this.completed++;
      lazyLog(
        this.logger,
        'debug',
        () => ({ active: this.active, queued: this.backlog.length }),
        'Lane freed'
      );
      this.afterLaneFreed();
    }
  }

  private afterLaneFreed(): void {
    if (this.backlog.length > 0) {
      this.schedulePump();
      return;
    }
    if (this.active > 0) {
      return;
    }

    for (const resolve of this.idleWaiters.splice(0)) {
      resolve();
    }
    try {
      this.emit('idle');
    } catch (err) {
      this.logger?.error({ err }, 'Error emitting idle event');
    }
  }
}
