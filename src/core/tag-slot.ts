/**
 * Per-tag admission bookkeeping
 *
 * A slot lets at most `limit` tasks of its tag run at once and keeps a single
 * pending task for when capacity frees up. A task submitted while another is
 * pending replaces it; the replaced task never runs.
 *
 * Every method runs to completion on the event loop, so running/pending are
 * never observed mid-update.
 */

import type { Logger } from 'pino';
import type { SlotAnomalyKind, SlotSnapshot, Task, TaskRunner } from '../types/limiter.js';
import { lazyLog } from '../utils/logger.js';

/**
 * Receives slot transitions; the owning limiter turns them into events and stats
 */
export interface SlotListener {
  onDispatched(tag: string, running: number): void;
  onQueued(tag: string, replacedPending: boolean): void;
  onFinished(tag: string, running: number): void;
  onRejected(tag: string, error: unknown): void;
  onAnomaly(tag: string, kind: SlotAnomalyKind, observed: number): void;
}

export class TagSlot {
  private running = 0;
  private pending: Task | null = null;

  constructor(
    public readonly tag: string,
    private readonly limit: number,
    private readonly runner: TaskRunner,
    private readonly listener: SlotListener,
    private readonly logger?: Logger
  ) {}

  /**
   * Run the task now if under the limit, otherwise make it the pending task.
   *
   * @returns true if the task was put in the pending slot and may be dropped,
   * false if it was handed to the runner
   */
  public run(task: Task): boolean {
    lazyLog(this.logger, 'debug', () => ({ tag: this.tag, running: this.running }), 'run()');

    if (this.running > this.limit) {
      this.logger?.warn(
        { tag: this.tag, running: this.running, limit: this.limit },
        'Running count exceeds the limit, clamping'
      );
      this.listener.onAnomaly(this.tag, 'overflow', this.running);
      this.running = this.limit;
    }

    if (this.running === this.limit) {
      const replacedPending = this.pending !== null;
      this.pending = task;
      lazyLog(
        this.logger,
        'debug',
        () => ({ tag: this.tag, limit: this.limit, replacedPending }),
        'At limit, updating pending'
      );
      this.listener.onQueued(this.tag, replacedPending);
      return true;
    }

    this.running++;
    try {
      this.runner.execute(async () => {
        try {
          await task();
        } finally {
          this.onTaskFinished();
        }
      });
    } catch (error) {
      this.running--;
      this.logger?.error({ err: error, tag: this.tag }, 'Task runner refused work, task dropped');
      this.listener.onRejected(this.tag, error);
      return true;
    }

    lazyLog(this.logger, 'debug', () => ({ tag: this.tag, running: this.running }), 'Task dispatched');
    this.listener.onDispatched(this.tag, this.running);
    return false;
  }

  /**
   * Completion hook, called once after each dispatched task settles.
   */
  public onTaskFinished(): void {
    if (this.running <= 0) {
      this.logger?.warn(
        { tag: this.tag, running: this.running },
        'Task finished while no task was running, clamping'
      );
      this.listener.onAnomaly(this.tag, 'underflow', this.running);
      this.running = 1;
    }

    this.running--;
    lazyLog(this.logger, 'debug', () => ({ tag: this.tag, running: this.running }), 'Task finished');
    this.listener.onFinished(this.tag, this.running);

    if (this.pending !== null) {
      const next = this.pending;
      this.pending = null;
      lazyLog(this.logger, 'debug', () => ({ tag: this.tag }), 'Running pending task');
      this.run(next);
    }
  }

  public snapshot(): SlotSnapshot {
    return {
      tag: this.tag,
      limit: this.limit,
      running: this.running,
      hasPending: this.pending !== null,
    };
  }
}
