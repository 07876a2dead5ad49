import { describe, it, expect, vi, beforeEach } from 'vitest';
import { pino, type Logger } from 'pino';
import { TagSlot, type SlotListener } from '../../../src/core/tag-slot.js';
import { ManualRunner } from '../../helpers/gated-task.js';

function createListener(): SlotListener {
  return {
    onDispatched: vi.fn(),
    onQueued: vi.fn(),
    onFinished: vi.fn(),
    onRejected: vi.fn(),
    onAnomaly: vi.fn(),
  };
}

describe('TagSlot', () => {
  let runner: ManualRunner;
  let listener: SlotListener;
  let logger: Logger;

  beforeEach(() => {
    runner = new ManualRunner();
    listener = createListener();
    logger = pino({ level: 'silent' });
  });

  it('hands the task to the runner while under the limit', () => {
    const slot = new TagSlot('a', 2, runner, listener, logger);

    expect(slot.run(vi.fn())).toBe(false);
    expect(runner.queue).toHaveLength(1);
    expect(listener.onDispatched).toHaveBeenCalledWith('a', 1);
    expect(slot.snapshot()).toEqual({ tag: 'a', limit: 2, running: 1, hasPending: false });
  });

  it('reports whether a queued task replaced an earlier pending one', () => {
    const slot = new TagSlot('a', 0, runner, listener, logger);

    expect(slot.run(vi.fn())).toBe(true);
    expect(slot.run(vi.fn())).toBe(true);

    expect(listener.onQueued).toHaveBeenNthCalledWith(1, 'a', false);
    expect(listener.onQueued).toHaveBeenNthCalledWith(2, 'a', true);
    expect(runner.queue).toHaveLength(0);
  });

  it('runs the completion hook when the task throws', async () => {
    const slot = new TagSlot('a', 1, runner, listener, logger);
    const next = vi.fn();

    slot.run(() => {
      throw new Error('boom');
    });
    slot.run(next);

    await expect(runner.runNext()).rejects.toThrow('boom');

    expect(listener.onFinished).toHaveBeenCalledWith('a', 0);
    expect(runner.queue).toHaveLength(1);
    expect(slot.snapshot()).toEqual({ tag: 'a', limit: 1, running: 1, hasPending: false });

    await runner.runNext();
    expect(next).toHaveBeenCalledOnce();
    expect(slot.snapshot().running).toBe(0);
  });

  it('clamps and logs a running count above the limit, then queues', () => {
    const warn = vi.spyOn(logger, 'warn');
    const slot = new TagSlot('a', 1, runner, listener, logger);
    // Only a bookkeeping bug elsewhere could leave the count this high
    Reflect.set(slot, 'running', 3);

    expect(slot.run(vi.fn())).toBe(true);

    expect(warn).toHaveBeenCalledWith(
      { tag: 'a', running: 3, limit: 1 },
      'Running count exceeds the limit, clamping'
    );
    expect(listener.onAnomaly).toHaveBeenCalledWith('a', 'overflow', 3);
    expect(listener.onQueued).toHaveBeenCalledWith('a', false);
    expect(runner.queue).toHaveLength(0);
    expect(slot.snapshot()).toEqual({ tag: 'a', limit: 1, running: 1, hasPending: true });
  });

  it('clamps and logs a completion without a running task', () => {
    const warn = vi.spyOn(logger, 'warn');
    const slot = new TagSlot('a', 2, runner, listener, logger);

    slot.onTaskFinished();

    expect(warn).toHaveBeenCalledWith(
      { tag: 'a', running: 0 },
      'Task finished while no task was running, clamping'
    );
    expect(listener.onAnomaly).toHaveBeenCalledWith('a', 'underflow', 0);
    expect(listener.onFinished).toHaveBeenCalledWith('a', 0);
    expect(slot.snapshot().running).toBe(0);
  });

  it('queues the pending task again when no capacity frees up', () => {
    const slot = new TagSlot('a', 0, runner, listener, logger);
    slot.run(vi.fn());

    slot.onTaskFinished();

    expect(runner.queue).toHaveLength(0);
    expect(listener.onQueued).toHaveBeenCalledTimes(2);
    expect(listener.onQueued).toHaveBeenLastCalledWith('a', false);
    expect(slot.snapshot()).toEqual({ tag: 'a', limit: 0, running: 0, hasPending: true });
  });

  it('undoes admission when the runner refuses the work', () => {
    const refusal = new Error('refused');
    const refusing = {
      execute: vi.fn(() => {
        throw refusal;
      }),
    };
    const error = vi.spyOn(logger, 'error');
    const slot = new TagSlot('a', 1, refusing, listener, logger);

    expect(slot.run(vi.fn())).toBe(true);

    expect(listener.onRejected).toHaveBeenCalledWith('a', refusal);
    expect(listener.onDispatched).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith(
      { err: refusal, tag: 'a' },
      'Task runner refused work, task dropped'
    );
    expect(slot.snapshot().running).toBe(0);
  });

  it('builds debug context only when debug logging is enabled', () => {
    const debug = vi.spyOn(logger, 'debug');
    const slot = new TagSlot('a', 1, runner, listener, logger);

    slot.run(vi.fn());

    expect(debug).not.toHaveBeenCalled();
  });
});
