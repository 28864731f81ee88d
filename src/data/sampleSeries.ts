import type { SamplingStrategy, Series } from '../config/types';
import { assertTargetPoints, resolveSamplingStrategy } from '../config/OptionResolver';

/**
 * Picks `targetPoints` evenly strided elements. The final slot is always the source's last element,
 * which can duplicate or skip one element near the tail.
 */
export function uniformSample<T>(data: Series<T>, targetPoints: number): Series<T> {
  const n = data.length;
  if (n <= targetPoints) return data;

  const step = n / targetPoints;
  const out: T[] = [];
  for (let i = 0; i < targetPoints; i++) {
    out.push(data[Math.floor(i * step)]);
  }
  out[targetPoints - 1] = data[n - 1];
  return out;
}

/**
 * Bucketed sampling in the shape of Largest-Triangle-Three-Buckets.
 *
 * The first and last points are kept verbatim. The interior is cut into `buckets - 2` ranges of
 * `length / buckets` elements and each range contributes its midpoint element. No triangle areas are
 * computed, so peaks that fall between midpoints are not guaranteed to survive.
 */
export function lttbMidpointSample<T>(data: Series<T>, buckets: number): Series<T> {
  const n = data.length;
  if (n <= buckets) return data;

  const bucketSize = n / buckets;
  const out: T[] = [data[0]];

  for (let i = 1; i < buckets - 1; i++) {
    const rangeStart = Math.floor(i * bucketSize);
    const rangeEnd = Math.min(Math.floor((i + 1) * bucketSize), n);
    out.push(data[Math.floor((rangeStart + rangeEnd) / 2)]);
  }

  out.push(data[n - 1]);
  return out;
}

/**
 * Walks the series in buckets of `length / (targetPoints / 2)` elements and emits each bucket's midpoint
 * element, framed by the first and last points. Output never exceeds `targetPoints`.
 */
export function minMaxSample<T>(data: Series<T>, targetPoints: number): Series<T> {
  const n = data.length;
  if (n <= targetPoints) return data;

  const half = Math.floor(targetPoints / 2);
  // n > targetPoints >= 2 * half, so every bucket holds at least two elements.
  const bucketSize = Math.floor(n / half);
  const maxMidpoints = targetPoints - 2;

  const out: T[] = [data[0]];
  let midpoints = 0;
  for (let start = 0; start < n && midpoints < maxMidpoints; start += bucketSize) {
    const end = Math.min(start + bucketSize, n);
    out.push(data[Math.floor((start + end) / 2)]);
    midpoints++;
  }

  out.push(data[n - 1]);
  return out;
}

/**
 * Placeholder for variance-driven sampling: `threshold` is accepted and ignored, output is uniform.
 */
export function adaptiveSample<T>(data: Series<T>, _threshold: number, targetPoints: number): Series<T> {
  return uniformSample(data, targetPoints);
}

/**
 * Reduces `data` to a representative subset using `strategy`.
 *
 * Returns the ORIGINAL data reference when:
 * - `strategy.type === 'none'`
 * - `data.length <= targetCount`
 *
 * Otherwise the result is a new array whose first and last elements are the source's first and last
 * elements. Only `uniform` (and `adaptive`, which delegates to it) returns exactly `targetCount` elements;
 * `lttb` returns `min(buckets, targetCount)` and `minmax` at most `targetCount`.
 *
 * @throws {Error} If `targetCount` is not an integer >= 2 or the strategy's parameters are invalid.
 */
export function reduceSeries<T>(data: Series<T>, targetCount: number, strategy: SamplingStrategy): Series<T> {
  assertTargetPoints('reduceSeries', targetCount);
  const resolved = resolveSamplingStrategy('reduceSeries', strategy);

  if (resolved.type === 'none') return data;
  if (data.length <= targetCount) return data;

  switch (resolved.type) {
    case 'uniform':
      return uniformSample(data, targetCount);
    case 'lttb':
      return lttbMidpointSample(data, Math.min(resolved.buckets, targetCount));
    case 'minmax':
      return minMaxSample(data, targetCount);
    case 'adaptive':
      return adaptiveSample(data, resolved.threshold, targetCount);
    default: {
      const exhaustive: never = resolved;
      return exhaustive;
    }
  }
}
