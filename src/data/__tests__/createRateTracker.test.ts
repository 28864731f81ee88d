import { describe, it, expect } from 'vitest';
import { createRateTracker } from '../createRateTracker';

describe('createRateTracker', () => {
  it('counts arrivals strictly inside the trailing window', () => {
    const tracker = createRateTracker(1000);
    tracker.record(0);
    tracker.record(500);
    tracker.record(999);

    expect(tracker.count(999)).toBe(3);
    expect(tracker.count(1000)).toBe(2);
    expect(tracker.count(1499)).toBe(2);
    expect(tracker.count(1500)).toBe(1);
    expect(tracker.count(5000)).toBe(0);
  });

  it('records batches at a single timestamp', () => {
    const tracker = createRateTracker(1000);
    tracker.record(10, 5);
    tracker.record(20, 0);

    expect(tracker.count(20)).toBe(5);
  });

  it('stays correct across head compaction', () => {
    const tracker = createRateTracker(100);
    for (let t = 0; t < 10_000; t++) tracker.record(t);

    // Timestamps 9900..9999 are newer than the cutoff 9899.
    expect(tracker.count(9999)).toBe(100);
  });

  it('clears all arrivals', () => {
    const tracker = createRateTracker(1000);
    tracker.record(1, 3);
    tracker.clear();
    expect(tracker.count(1)).toBe(0);
  });

  it('rejects a non-positive window', () => {
    expect(() => createRateTracker(0)).toThrow('createRateTracker(windowMs): must be a positive number. Received: 0');
  });
});
