/**
 * TaskQueue - cooperative background work on the event loop.
 *
 * Tasks run in time-budgeted slices and yield with `setImmediate` between slices, so long jobs
 * (index construction, LOD precompute) never hold the loop for more than one slice. Results are
 * handed back through `onComplete`; tasks never write into their owner's state themselves.
 */

import { BACKGROUND_SLICE_BUDGET_MS } from '../config/defaults';

export interface BackgroundTask<R> {
  /** Runs one unit of work. Returns `true` once the task has finished. */
  step(): boolean;
  /** Called once after `step()` returned `true`. */
  result(): R;
}

export interface TaskCallbacks<R> {
  onComplete?: (result: R) => void;
  /** Defaults to logging via `console.error`. */
  onError?: (error: unknown) => void;
}

export interface TaskHandle {
  /** Drops the task if it has not completed yet. Completed/cancelled handles ignore this. */
  cancel(): void;
  isDone(): boolean;
}

export interface TaskQueue {
  schedule<R>(task: BackgroundTask<R>, callbacks?: TaskCallbacks<R>): TaskHandle;
  /** Number of tasks not yet completed or cancelled. */
  pendingCount(): number;
  /** Resolves once the queue has drained (immediately if it already has). */
  whenIdle(): Promise<void>;
  cancelAll(): void;
  dispose(): void;
}

type QueueEntry = {
  readonly run: () => boolean;
  readonly fail: (error: unknown) => void;
  done: boolean;
};

export function createTaskQueue(sliceBudgetMs: number = BACKGROUND_SLICE_BUDGET_MS): TaskQueue {
  if (!Number.isFinite(sliceBudgetMs) || sliceBudgetMs <= 0) {
    throw new Error(`createTaskQueue(sliceBudgetMs): must be a positive number. Received: ${String(sliceBudgetMs)}`);
  }

  let queue: QueueEntry[] = [];
  let immediate: ReturnType<typeof setImmediate> | null = null;
  let idleWaiters: Array<() => void> = [];
  let disposed = false;

  const assertNotDisposed = (): void => {
    if (disposed) throw new Error('TaskQueue is disposed.');
  };

  const notifyIdle = (): void => {
    if (queue.length > 0) return;
    const waiters = idleWaiters;
    idleWaiters = [];
    for (const resolve of waiters) resolve();
  };

  const pump = (): void => {
    immediate = null;
    const sliceStart = performance.now();

    while (performance.now() - sliceStart < sliceBudgetMs) {
      // Callbacks may schedule or cancel entries, so look the head up again every step.
      const entry = queue.find((e) => !e.done);
      if (!entry) break;

      try {
        if (entry.run()) entry.done = true;
      } catch (error) {
        entry.done = true;
        entry.fail(error);
      }
    }

    queue = queue.filter((entry) => !entry.done);
    if (queue.length > 0) {
      ensureScheduled();
    } else {
      notifyIdle();
    }
  };

  const ensureScheduled = (): void => {
    if (immediate !== null || disposed) return;
    immediate = setImmediate(pump);
  };

  const schedule = <R>(task: BackgroundTask<R>, callbacks: TaskCallbacks<R> = {}): TaskHandle => {
    assertNotDisposed();

    const fail = (error: unknown): void => {
      if (callbacks.onError) {
        callbacks.onError(error);
      } else {
        console.error('TaskQueue: background task failed:', error);
      }
    };

    const entry: QueueEntry = {
      run: () => {
        if (!task.step()) return false;
        callbacks.onComplete?.(task.result());
        return true;
      },
      fail,
      done: false,
    };

    queue.push(entry);
    ensureScheduled();

    return {
      cancel: () => {
        if (entry.done) return;
        entry.done = true;
        queue = queue.filter((e) => e !== entry);
        notifyIdle();
      },
      isDone: () => entry.done,
    };
  };

  const pendingCount: TaskQueue['pendingCount'] = () => queue.filter((entry) => !entry.done).length;

  const whenIdle: TaskQueue['whenIdle'] = () => {
    if (queue.length === 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      idleWaiters.push(resolve);
    });
  };

  const cancelAll: TaskQueue['cancelAll'] = () => {
    for (const entry of queue) entry.done = true;
    queue = [];
    notifyIdle();
  };

  const dispose: TaskQueue['dispose'] = () => {
    if (disposed) return;
    cancelAll();
    disposed = true;
    if (immediate !== null) {
      clearImmediate(immediate);
      immediate = null;
    }
  };

  return { schedule, pendingCount, whenIdle, cancelAll, dispose };
}
