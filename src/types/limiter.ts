/**
 * Types shared by the tagged limiter and its task runners
 */

/**
 * Opaque unit of work. A thrown error or rejected promise marks it as failed.
 */
export type Task = () => void | Promise<void>;

/**
 * Work as handed to a runner: always promise-returning, and it only rejects
 * when the wrapped task failed.
 */
export type RunnableWork = () => Promise<void>;

/**
 * External executor the limiter dispatches admitted work to.
 *
 * Implementations run the work asynchronously relative to the caller and own
 * the handling of its rejection. Throwing from execute means the work was
 * refused and will never run.
 */
export interface TaskRunner {
  execute(work: RunnableWork): void;
}

export type SlotAnomalyKind = 'overflow' | 'underflow';

/**
 * Tagged limiter events
 */
export interface TaggedLimiterEvents {
  dispatched: (tag: string, running: number) => void;
  queued: (tag: string) => void;
  dropped: (tag: string) => void;
  finished: (tag: string, running: number) => void;
  rejected: (tag: string, error: unknown) => void;
  anomaly: (tag: string, kind: SlotAnomalyKind, observed: number) => void;
}

export interface SlotSnapshot {
  tag: string;
  limit: number;
  running: number;
  hasPending: boolean;
}

export interface TaggedLimiterStats {
  limit: number;
  tags: number;
  totalDispatched: number;
  totalQueued: number;
  totalDropped: number;
  totalFinished: number;
  totalRejected: number;
  totalAnomalies: number;
  perTag: Record<string, SlotSnapshot>;
}

/**
 * Pooled task runner events
 */
export interface TaskRunnerEvents {
  taskError: (error: unknown) => void;
  idle: () => void;
}

export interface TaskRunnerStats {
  concurrency: number;
  active: number;
  queued: number;
  /** Settled work items, failures included */
  completed: number;
  failed: number;
  shutdown: boolean;
}
