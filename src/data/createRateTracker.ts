export interface RateTracker {
  /** Records `count` arrivals at time `now` (ms). */
  record(now: number, count?: number): void;
  /** Arrivals within the trailing window ending at `now`. */
  count(now: number): number;
  clear(): void;
}

/**
 * Counts arrivals within a trailing time window. Expired timestamps are dropped from the head, so each
 * prune is amortized O(1) per arrival.
 */
export function createRateTracker(windowMs: number): RateTracker {
  if (!Number.isFinite(windowMs) || windowMs <= 0) {
    throw new Error(`createRateTracker(windowMs): must be a positive number. Received: ${String(windowMs)}`);
  }

  let timestamps: number[] = [];
  let head = 0;

  const prune = (now: number): void => {
    const cutoff = now - windowMs;
    // Strictly newer than the cutoff stays.
    while (head < timestamps.length && timestamps[head] <= cutoff) head++;

    if (head > 0 && (head >= 4096 || head > timestamps.length >> 1)) {
      timestamps = timestamps.slice(head);
      head = 0;
    }
  };

  const record: RateTracker['record'] = (now, count = 1) => {
    for (let i = 0; i < count; i++) timestamps.push(now);
    prune(now);
  };

  const count: RateTracker['count'] = (now) => {
    prune(now);
    return timestamps.length - head;
  };

  const clear: RateTracker['clear'] = () => {
    timestamps = [];
    head = 0;
  };

  return { record, count, clear };
}
