import type { Hertz, Series, StreamBufferOptions } from '../config/types';
import { resolveStreamBufferOptions } from '../config/OptionResolver';
import { streamBufferDefaults } from '../config/defaults';
import { createRateTracker } from './createRateTracker';

export type StreamSnapshot<T> = Readonly<{
  data: Series<T>;
  /** Arrivals per second, measured over the trailing second at the last flush. */
  dataRate: number;
  active: boolean;
}>;

export type StreamUpdateCallback<T> = (snapshot: StreamSnapshot<T>) => void;

export interface StreamBuffer<T> {
  /**
   * Queues a value for the next flush. Legal whether or not the stream is active; never flushes.
   */
  push(value: T): void;
  pushMany(values: ReadonlyArray<T>): void;
  /** Arms the flush timer. No-op when already active. */
  start(): void;
  /** Disarms the flush timer. Idempotent; no flush runs after this returns. */
  stop(): void;
  isActive(): boolean;
  /**
   * Moves every pending value into the window, evicting the oldest values beyond `windowSize`,
   * and refreshes `dataRate`. With nothing pending this is a no-op.
   */
  flush(): void;
  /** Drops pending and windowed values and resets `dataRate` to 0. */
  clear(): void;
  /** Replaces the window with the last `windowSize` of `values` and drops pending values. */
  setData(values: ReadonlyArray<T>): void;
  /** Current window, oldest first. A new array is published on every change. */
  getData(): Series<T>;
  getDataRate(): number;
  getPendingCount(): number;
  getWindowSize(): number;
  getUpdateFrequency(): Hertz;
  onUpdate(callback: StreamUpdateCallback<T>): () => void;
  /** Stops the stream and drops listeners (best-effort). Safe to call multiple times. */
  dispose(): void;
}

/**
 * Coalesces values pushed at arbitrary rates into a bounded sliding window on a fixed cadence.
 *
 * Producers and the flush share one event loop, so a push can never interleave with a flush.
 * Backpressure is handled by eviction: the window keeps the newest `windowSize` values and
 * silently drops older ones.
 */
export function createStreamBuffer<T>(options: StreamBufferOptions = {}): StreamBuffer<T> {
  const { windowSize, updateFrequency, now } = resolveStreamBufferOptions(options);
  const intervalMs = 1000 / updateFrequency;

  const rate = createRateTracker(streamBufferDefaults.rateWindowMs);
  const listeners = new Set<StreamUpdateCallback<T>>();

  let pending: T[] = [];
  let windowData: Series<T> = [];
  let dataRate = 0;
  let active = false;
  let timer: ReturnType<typeof setInterval> | null = null;
  let disposed = false;

  const assertNotDisposed = (): void => {
    if (disposed) throw new Error('createStreamBuffer: StreamBuffer is disposed.');
  };

  const emit = (): void => {
    const snapshot: StreamSnapshot<T> = { data: windowData, dataRate, active };
    // Emit to a snapshot so additions/removals during emit don't affect this update.
    for (const cb of Array.from(listeners)) {
      try {
        cb(snapshot);
      } catch (error) {
        console.error('StreamBuffer: update listener threw:', error);
      }
    }
  };

  const push: StreamBuffer<T>['push'] = (value) => {
    assertNotDisposed();
    pending.push(value);
    rate.record(now());
  };

  const pushMany: StreamBuffer<T>['pushMany'] = (values) => {
    assertNotDisposed();
    if (values.length === 0) return;
    for (const value of values) pending.push(value);
    rate.record(now(), values.length);
  };

  const flush: StreamBuffer<T>['flush'] = () => {
    assertNotDisposed();
    if (pending.length === 0) return;

    const drained = pending;
    pending = [];

    const next = windowData.concat(drained);
    windowData = next.length > windowSize ? next.slice(next.length - windowSize) : next;
    dataRate = rate.count(now());
    emit();
  };

  const tick = (): void => {
    // A tick queued before stop() must not publish.
    if (!active || disposed) return;
    flush();
  };

  const start: StreamBuffer<T>['start'] = () => {
    assertNotDisposed();
    if (active) return;
    active = true;
    timer = setInterval(tick, intervalMs);
    emit();
  };

  const stop: StreamBuffer<T>['stop'] = () => {
    if (timer !== null) {
      clearInterval(timer);
      timer = null;
    }
    if (!active) return;
    active = false;
    if (!disposed) emit();
  };

  const clear: StreamBuffer<T>['clear'] = () => {
    assertNotDisposed();
    pending = [];
    windowData = [];
    rate.clear();
    dataRate = 0;
    emit();
  };

  const setData: StreamBuffer<T>['setData'] = (values) => {
    assertNotDisposed();
    pending = [];
    windowData = values.length > windowSize ? values.slice(values.length - windowSize) : values.slice();
    emit();
  };

  const onUpdate: StreamBuffer<T>['onUpdate'] = (callback) => {
    assertNotDisposed();
    listeners.add(callback);
    return () => {
      listeners.delete(callback);
    };
  };

  const dispose: StreamBuffer<T>['dispose'] = () => {
    if (disposed) return;
    disposed = true;
    stop();
    listeners.clear();
    pending = [];
  };

  return {
    push,
    pushMany,
    start,
    stop,
    isActive: () => active,
    flush,
    clear,
    setData,
    getData: () => windowData,
    getDataRate: () => dataRate,
    getPendingCount: () => pending.length,
    getWindowSize: () => windowSize,
    getUpdateFrequency: () => updateFrequency,
    onUpdate,
    dispose,
  };
}
