/**
 * Tagged Limiter
 *
 * Imposes a concurrency limit on each tag and keeps at most one pending task
 * per tag. When more tasks arrive while one is already pending, the pending
 * task is dropped and replaced by the most recent one, so this only fits work
 * where the latest request for a tag is the one that matters (refreshing a
 * view, re-issuing a query).
 *
 * Architecture:
 * - One TagSlot per tag, created on first submission and kept for the
 *   limiter's lifetime
 * - The same limit applies to every tag
 * - Running the work is delegated to an external TaskRunner; the limiter only
 *   decides admission
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { TagSlot, type SlotListener } from './tag-slot.js';
import type {
  SlotSnapshot,
  TaggedLimiterEvents,
  TaggedLimiterStats,
  Task,
  TaskRunner,
} from '../types/limiter.js';
import { TagLimitSchema } from '../types/schemas/config.js';
import { parseOrThrow } from '../utils/validation.js';

export interface TaggedLimiterOptions {
  logger?: Logger;
}

export class TaggedLimiter extends EventEmitter<TaggedLimiterEvents> {
  private readonly runner: TaskRunner;
  private readonly limit: number;
  private readonly logger?: Logger;
  private readonly slots = new Map<string, TagSlot>();
  private readonly listener: SlotListener;

  // Statistics
  private totalDispatched = 0;
  private totalQueued = 0;
  private totalDropped = 0;
  private totalFinished = 0;
  private totalRejected = 0;
  private totalAnomalies = 0;

  /**
   * @param runner - Runs admitted tasks; its lifetime stays with the caller
   * @param limit - Maximum concurrently running tasks per tag (integer >= 0)
   * @throws {ConfigurationError} If limit is negative or not an integer
   */
  constructor(runner: TaskRunner, limit: number, options: TaggedLimiterOptions = {}) {
    super();
    this.runner = runner;
    this.limit = parseOrThrow(TagLimitSchema, limit, 'limit');
    this.logger = options.logger;
    this.listener = {
      onDispatched: (tag, running) => {
        this.totalDispatched++;
        this.guardEmit('dispatched', () => this.emit('dispatched', tag, running));
      },
      onQueued: (tag, replacedPending) => {
        this.totalQueued++;
        if (replacedPending) {
          this.totalDropped++;
          this.guardEmit('dropped', () => this.emit('dropped', tag));
        }
        this.guardEmit('queued', () => this.emit('queued', tag));
      },
      onFinished: (tag, running) => {
        this.totalFinished++;
        this.guardEmit('finished', () => this.emit('finished', tag, running));
      },
      onRejected: (tag, error) => {
        this.totalRejected++;
        this.guardEmit('rejected', () => this.emit('rejected', tag, error));
      },
      onAnomaly: (tag, kind, observed) => {
        this.totalAnomalies++;
        this.guardEmit('anomaly', () => this.emit('anomaly', tag, kind, observed));
      },
    };

    this.logger?.info({ limit: this.limit }, 'TaggedLimiter initialized');
  }

  /**
   * Run the task now if its tag is under the limit; otherwise make it the
   * tag's pending task, dropping whichever task was pending before.
   *
   * @returns Whether the task was queued in the pending slot (and so may never run)
   */
  public submit(tag: string, task: Task): boolean {
    return this.slotFor(tag).run(task);
  }

  /**
   * Snapshot of a tag's slot, without creating one
   */
  public inspect(tag: string): SlotSnapshot | undefined {
    return this.slots.get(tag)?.snapshot();
  }

  public getStats(): TaggedLimiterStats {
    // fromEntries defines own keys, so a "__proto__" tag stays an entry
    const perTag: Record<string, SlotSnapshot> = Object.fromEntries(
      Array.from(this.slots, ([tag, slot]): [string, SlotSnapshot] => [tag, slot.snapshot()])
    );

    return {
      limit: this.limit,
      tags: this.slots.size,
      totalDispatched: this.totalDispatched,
      totalQueued: this.totalQueued,
      totalDropped: this.totalDropped,
      totalFinished: this.totalFinished,
      totalRejected: this.totalRejected,
      totalAnomalies: this.totalAnomalies,
      perTag,
    };
  }

  private slotFor(tag: string): TagSlot {
    let slot = this.slots.get(tag);
    if (!slot) {
      slot = new TagSlot(tag, this.limit, this.runner, this.listener, this.logger);
      this.slots.set(tag, slot);
    }
    return slot;
  }

  private guardEmit(event: keyof TaggedLimiterEvents, emit: () => void): void {
    try {
      emit();
    } catch (err) {
      this.logger?.error({ err, event }, `Error emitting ${event} event`);
    }
  }
}
