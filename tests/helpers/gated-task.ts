/**
 * Test helpers for driving tasks through the limiter step by step
 */

import type { RunnableWork, Task, TaskRunner } from '../../src/types/limiter.js';

/**
 * A task that records that it started and then waits until released
 */
export interface GatedTask {
  task: Task;
  release(): void;
  fail(error: Error): void;
  hasRun(): boolean;
  runs(): number;
}

export function createGatedTask(): GatedTask {
  let runs = 0;
  let open: () => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const gate = new Promise<void>((resolve, rejectGate) => {
    open = resolve;
    reject = rejectGate;
  });
  // A gate failed before its task ran must not surface as an unhandled rejection
  gate.catch(() => undefined);

  return {
    task: async () => {
      runs++;
      await gate;
    },
    release: () => open(),
    fail: (error) => reject(error),
    hasRun: () => runs > 0,
    runs: () => runs,
  };
}

/**
 * Let several turns of the event loop pass so that runner lanes start and
 * completion callbacks settle.
 */
export async function settle(rounds = 5): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

/**
 * Runner that only collects work; tests run it explicitly
 */
export class ManualRunner implements TaskRunner {
  public readonly queue: RunnableWork[] = [];

  public execute(work: RunnableWork): void {
    this.queue.push(work);
  }

  public async runNext(): Promise<void> {
    const work = this.queue.shift();
    if (!work) {
      throw new Error('No work queued');
    }
    await work();
  }
}
