import { describe, it, expect } from 'vitest';
import {
  adaptiveSample,
  lttbMidpointSample,
  minMaxSample,
  reduceSeries,
  uniformSample,
} from '../sampleSeries';
import type { SamplingStrategy } from '../../config/types';

const range = (n: number): number[] => Array.from({ length: n }, (_, i) => i);

const reducingStrategies: ReadonlyArray<SamplingStrategy> = [
  { type: 'uniform' },
  { type: 'lttb', buckets: 1000 },
  { type: 'lttb', buckets: 5 },
  { type: 'minmax' },
  { type: 'adaptive', threshold: 0.5 },
];

describe('sampleSeries', () => {
  describe('uniformSample', () => {
    it('reduces 1000 points to 100 keeping both anchors', () => {
      const out = uniformSample(range(1000), 100);

      expect(out).toHaveLength(100);
      expect(out[0]).toBe(0);
      expect(out[1]).toBe(10);
      expect(out[98]).toBe(980);
      expect(out[99]).toBe(999);
    });

    it('overwrites the final stride slot with the last element', () => {
      // step = 10 / 3; strided indices are 0, 3, 6; the last slot becomes 9.
      expect(uniformSample(range(10), 3)).toEqual([0, 3, 9]);
    });
  });

  describe('lttbMidpointSample', () => {
    it('takes the midpoint of each interior bucket', () => {
      expect(lttbMidpointSample(range(10), 4)).toEqual([0, 3, 6, 9]);
      expect(lttbMidpointSample(range(20), 5)).toEqual([0, 6, 10, 14, 19]);
    });

    it('keeps only the anchors with two buckets', () => {
      expect(lttbMidpointSample(range(50), 2)).toEqual([0, 49]);
    });
  });

  describe('minMaxSample', () => {
    it('emits bucket midpoints framed by the anchors', () => {
      expect(minMaxSample(range(10), 4)).toEqual([0, 2, 7, 9]);
    });

    it('uses buckets of length / (targetPoints / 2)', () => {
      const out = minMaxSample(range(1000), 100);

      expect(out).toHaveLength(52);
      expect(out[1]).toBe(10);
      expect(out[2]).toBe(30);
      expect(out[50]).toBe(990);
      expect(out[51]).toBe(999);
    });

    it('never exceeds targetPoints', () => {
      expect(minMaxSample(range(10), 3)).toEqual([0, 5, 9]);
      expect(minMaxSample(range(10), 2)).toEqual([0, 9]);
    });
  });

  describe('adaptiveSample', () => {
    it('falls back to uniform sampling regardless of threshold', () => {
      const data = range(500);
      expect(adaptiveSample(data, 0.01, 37)).toEqual(uniformSample(data, 37));
      expect(adaptiveSample(data, 1000, 37)).toEqual(uniformSample(data, 37));
    });
  });

  describe('reduceSeries', () => {
    it('returns the original reference for the none strategy', () => {
      const data = range(5000);
      expect(reduceSeries(data, 10, { type: 'none' })).toBe(data);
    });

    it('returns the original reference when the input already fits', () => {
      const data = range(50);
      for (const strategy of reducingStrategies) {
        expect(reduceSeries(data, 50, strategy)).toBe(data);
        expect(reduceSeries(data, 80, strategy)).toBe(data);
      }
    });

    it('caps lttb output at min(buckets, targetCount)', () => {
      expect(reduceSeries(range(1000), 100, { type: 'lttb', buckets: 1000 })).toHaveLength(100);
      expect(reduceSeries(range(1000), 100, { type: 'lttb', buckets: 10 })).toHaveLength(10);
    });

    it('bounds output size and preserves anchors for every reducing strategy', () => {
      for (const strategy of reducingStrategies) {
        for (const n of [3, 10, 101, 999, 5000]) {
          for (const k of [2, 3, 7, 100]) {
            if (n <= k) continue;
            const data = range(n);
            const out = reduceSeries(data, k, strategy);

            expect(out.length).toBeLessThanOrEqual(k);
            expect(out[0]).toBe(0);
            expect(out[out.length - 1]).toBe(n - 1);
          }
        }
      }
    });

    it('is idempotent when re-reducing at the same target', () => {
      for (const strategy of reducingStrategies) {
        const once = reduceSeries(range(4000), 64, strategy);
        expect(reduceSeries(once, 64, strategy)).toBe(once);
      }
    });

    it('works on arbitrary element types', () => {
      const data = range(9).map((i) => ({ t: i, label: `p${i}` }));
      const out = reduceSeries(data, 3, { type: 'uniform' });
      expect(out.map((p) => p.label)).toEqual(['p0', 'p3', 'p8']);
    });

    it('rejects targetCount below 2 or non-integer', () => {
      expect(() => reduceSeries(range(10), 1, { type: 'uniform' })).toThrow(
        'reduceSeries: targetPoints must be an integer >= 2. Received: 1'
      );
      expect(() => reduceSeries(range(10), 2.5, { type: 'minmax' })).toThrow(/targetPoints must be an integer >= 2/);
    });

    it('rejects invalid strategy parameters', () => {
      expect(() => reduceSeries(range(10), 4, { type: 'lttb', buckets: 1 })).toThrow(
        'reduceSeries: lttb buckets must be an integer >= 2. Received: 1'
      );
      expect(() => reduceSeries(range(10), 4, { type: 'adaptive', threshold: Number.NaN })).toThrow(
        /adaptive threshold must be a finite number/
      );
    });
  });
});
