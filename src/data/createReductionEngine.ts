import type {
  Bounds,
  IndexRange,
  Milliseconds,
  Point,
  ReductionEngineOptions,
  RenderMetrics,
  SamplingStrategy,
  Series,
  SpatialIndexBuildOptions,
  XYAccessor,
} from '../config/types';
import {
  assertTargetPoints,
  isSameSamplingStrategy,
  resolveReductionEngineOptions,
  resolveSamplingStrategy,
} from '../config/OptionResolver';
import { reductionEngineDefaults } from '../config/defaults';
import { createTaskQueue, type TaskHandle, type TaskQueue } from '../core/createTaskQueue';
import { buildSpatialIndex, type SpatialIndexBuild } from '../interaction/createSpatialIndex';
import { reduceSeries } from './sampleSeries';

export type ReductionEngineEvent =
  | Readonly<{ type: 'data'; length: number }>
  | Readonly<{ type: 'strategy'; strategy: SamplingStrategy }>
  | Readonly<{ type: 'level'; level: number }>
  | Readonly<{ type: 'spatialIndex'; size: number }>;

export type ReductionEngineCallback = (event: ReductionEngineEvent) => void;

export interface ReductionEngine<T> {
  getData(): Series<T>;
  getOriginalCount(): number;
  /**
   * Replaces the raw series wholesale. Drops every cached level, cancels pending precompute, and
   * discards the spatial index. Long series are precomputed again in the background.
   */
  setData(data: Series<T>): void;
  getSamplingStrategy(): SamplingStrategy;
  /** Switching to a different strategy invalidates and rebuilds the LOD cache. */
  setSamplingStrategy(strategy: SamplingStrategy): void;
  /**
   * Returns a reduced copy of the raw series (or of `range`, clamped to the series).
   *
   * Slices that already fit in `targetPoints` come back unreduced. Otherwise the slice is reduced to
   * the largest ladder level not above `targetPoints`, or to `targetPoints` itself when it is below
   * every level. Whole-series reductions are memoized per level; sub-range reductions are not.
   *
   * Throws if `targetPoints` is not an integer >= 2.
   */
  optimizedData(range?: IndexRange, targetPoints?: number): Series<T>;
  /**
   * Filters the raw series to `minX <= x <= maxX` and reduces the result to `targetPoints`
   * (default: one point per pixel). Never cached.
   */
  dataForViewport(
    minX: number,
    maxX: number,
    pixelWidth: number,
    valueAccessor: XYAccessor<T>,
    targetPoints?: number
  ): Series<T>;
  /**
   * Starts building a spatial index over the current raw series in the background, replacing any
   * previous index. The index is dropped again on `setData`.
   */
  buildSpatialIndex(
    valueAccessor: XYAccessor<T>,
    bounds: Bounds,
    options?: SpatialIndexBuildOptions
  ): SpatialIndexBuild<T>;
  /** `null` until a spatial index over the current data has finished building. */
  pointsNear(center: Point, radius: number): T[] | null;
  isSpatialIndexReady(): boolean;
  /** Ladder levels currently present in the cache, ascending. */
  getCachedLevels(): number[];
  getLodLevels(): ReadonlyArray<number>;
  getMetrics(): RenderMetrics;
  resetMetrics(): void;
  /** Clears data, cache, spatial index, and metrics. */
  reset(): void;
  onChange(callback: ReductionEngineCallback): () => void;
  /** Resolves once background work (precompute, index construction) has drained. */
  whenIdle(): Promise<void>;
  dispose(): void;
}

type MetricsState = {
  lastQueryTime: number;
  averageQueryTime: number;
  totalQueries: number;
  cacheHits: number;
  cacheMisses: number;
};

const createMetricsState = (): MetricsState => ({
  lastQueryTime: 0,
  averageQueryTime: 0,
  totalQueries: 0,
  cacheHits: 0,
  cacheMisses: 0,
});

/**
 * Largest ladder level that does not exceed `targetPoints`, or `null` when every level is larger.
 */
export function resolveLodLevel(levels: ReadonlyArray<number>, targetPoints: number): number | null {
  let best: number | null = null;
  for (const level of levels) {
    if (level <= targetPoints && (best === null || level > best)) best = level;
  }
  return best;
}

const clampRange = (range: IndexRange | undefined, length: number): IndexRange => {
  if (!range) return { start: 0, end: length };
  const start = Math.min(length, Math.max(0, Math.floor(range.start)));
  const end = Math.min(length, Math.max(start, Math.floor(range.end)));
  return { start, end };
};

export interface ReductionEngineDeps {
  /** Shared background queue. The engine only disposes a queue it created itself. */
  readonly taskQueue?: TaskQueue;
}

/**
 * Owns one raw series and serves level-of-detail reductions of it.
 *
 * The LOD cache is an immutable map that is swapped wholesale on every publish. Background
 * precompute results carry the generation they were computed for and are dropped if the data or
 * strategy changed in the meantime, so no stale level ever becomes visible.
 */
export function createReductionEngine<T>(
  data: Series<T> = [],
  options: ReductionEngineOptions = {},
  deps: ReductionEngineDeps = {}
): ReductionEngine<T> {
  const resolved = resolveReductionEngineOptions(options);
  const { lodLevels, eagerThreshold } = resolved;

  const ownsQueue = deps.taskQueue === undefined;
  const taskQueue = deps.taskQueue ?? createTaskQueue();

  let rawData: Series<T> = data.slice();
  let strategy: SamplingStrategy = resolved.samplingStrategy;
  let generation = 0;
  let lodCache: ReadonlyMap<number, Series<T>> = new Map();
  let precomputeHandles: TaskHandle[] = [];
  let spatialBuild: SpatialIndexBuild<T> | null = null;
  let metrics = createMetricsState();
  let disposed = false;

  const listeners = new Set<ReductionEngineCallback>();

  const assertNotDisposed = (): void => {
    if (disposed) throw new Error('ReductionEngine is disposed.');
  };

  const emit = (event: ReductionEngineEvent): void => {
    for (const cb of Array.from(listeners)) {
      try {
        cb(event);
      } catch (error) {
        console.error('ReductionEngine: change listener threw:', error);
      }
    }
  };

  const recordQuery = (startTime: number): void => {
    const elapsed = performance.now() - startTime;
    const total = metrics.totalQueries + 1;
    metrics = {
      ...metrics,
      lastQueryTime: elapsed,
      totalQueries: total,
      averageQueryTime: (metrics.averageQueryTime * (total - 1) + elapsed) / total,
    };
  };

  const publishLevel = (level: number, sampled: Series<T>): void => {
    const next = new Map(lodCache);
    next.set(level, sampled);
    lodCache = next;
  };

  const cancelPrecompute = (): void => {
    for (const handle of precomputeHandles) handle.cancel();
    precomputeHandles = [];
  };

  const schedulePrecompute = (): void => {
    if (rawData.length <= eagerThreshold) return;

    const scheduledGeneration = generation;
    const source = rawData;
    const activeStrategy = strategy;

    for (const level of lodLevels) {
      if (level >= source.length) continue;

      let sampled: Series<T> = source;
      const handle = taskQueue.schedule(
        {
          step: () => {
            sampled = reduceSeries(source, level, activeStrategy);
            return true;
          },
          result: () => sampled,
        },
        {
          onComplete: (result) => {
            // Superseded by setData/setSamplingStrategy while queued.
            if (scheduledGeneration !== generation || lodCache.has(level)) return;
            publishLevel(level, result);
            emit({ type: 'level', level });
          },
        }
      );
      precomputeHandles.push(handle);
    }
  };

  const discardSpatialIndex = (): void => {
    if (spatialBuild) {
      spatialBuild.cancel();
      spatialBuild = null;
    }
  };

  const invalidate = (): void => {
    generation++;
    cancelPrecompute();
    lodCache = new Map();
  };

  const optimizedData: ReductionEngine<T>['optimizedData'] = (
    range,
    targetPoints = reductionEngineDefaults.targetPoints
  ) => {
    assertNotDisposed();
    assertTargetPoints('ReductionEngine.optimizedData', targetPoints);
    const startTime = performance.now();

    try {
      const { start, end } = clampRange(range, rawData.length);
      const isWholeSeries = start === 0 && end === rawData.length;
      const slice = isWholeSeries ? rawData : rawData.slice(start, end);

      if (slice.length <= targetPoints) return slice;

      const level = resolveLodLevel(lodLevels, targetPoints);
      // Below the smallest level there is nothing to memoize against.
      if (level === null) return reduceSeries(slice, targetPoints, strategy);
      if (!isWholeSeries) return reduceSeries(slice, level, strategy);

      const cached = lodCache.get(level);
      if (cached) {
        metrics = { ...metrics, cacheHits: metrics.cacheHits + 1 };
        return cached;
      }

      metrics = { ...metrics, cacheMisses: metrics.cacheMisses + 1 };
      const sampled = reduceSeries(rawData, level, strategy);
      publishLevel(level, sampled);
      return sampled;
    } finally {
      recordQuery(startTime);
    }
  };

  const dataForViewport: ReductionEngine<T>['dataForViewport'] = (
    minX,
    maxX,
    pixelWidth,
    valueAccessor,
    targetPoints = Math.floor(pixelWidth)
  ) => {
    assertNotDisposed();
    assertTargetPoints('ReductionEngine.dataForViewport', targetPoints);
    const startTime = performance.now();

    try {
      const visible = rawData.filter((element) => {
        const { x } = valueAccessor(element);
        return x >= minX && x <= maxX;
      });
      return reduceSeries(visible, targetPoints, strategy);
    } finally {
      recordQuery(startTime);
    }
  };

  const setData: ReductionEngine<T>['setData'] = (next) => {
    assertNotDisposed();
    rawData = next.slice();
    invalidate();
    discardSpatialIndex();
    schedulePrecompute();
    emit({ type: 'data', length: rawData.length });
  };

  const setSamplingStrategy: ReductionEngine<T>['setSamplingStrategy'] = (next) => {
    assertNotDisposed();
    const resolvedStrategy = resolveSamplingStrategy('ReductionEngine.setSamplingStrategy', next);
    if (isSameSamplingStrategy(resolvedStrategy, strategy)) return;
    strategy = resolvedStrategy;
    invalidate();
    schedulePrecompute();
    emit({ type: 'strategy', strategy });
  };

  const buildIndex: ReductionEngine<T>['buildSpatialIndex'] = (valueAccessor, bounds, buildOptions = {}) => {
    assertNotDisposed();
    discardSpatialIndex();

    const build = buildSpatialIndex(
      taskQueue,
      rawData,
      valueAccessor,
      bounds,
      {
        gridSize: buildOptions.gridSize ?? resolved.spatialIndex.gridSize,
        chunkSize: buildOptions.chunkSize ?? resolved.spatialIndex.chunkSize,
      },
      (index) => {
        if (spatialBuild !== build) return;
        emit({ type: 'spatialIndex', size: index.size() });
      }
    );
    spatialBuild = build;
    return build;
  };

  const pointsNear: ReductionEngine<T>['pointsNear'] = (center, radius) => {
    assertNotDisposed();
    return spatialBuild ? spatialBuild.query(center, radius) : null;
  };

  const getMetrics: ReductionEngine<T>['getMetrics'] = () => ({
    lastQueryTime: metrics.lastQueryTime as Milliseconds,
    averageQueryTime: metrics.averageQueryTime as Milliseconds,
    totalQueries: metrics.totalQueries,
    cacheHits: metrics.cacheHits,
    cacheMisses: metrics.cacheMisses,
  });

  const reset: ReductionEngine<T>['reset'] = () => {
    assertNotDisposed();
    rawData = [];
    invalidate();
    discardSpatialIndex();
    metrics = createMetricsState();
    emit({ type: 'data', length: 0 });
  };

  const onChange: ReductionEngine<T>['onChange'] = (callback) => {
    listeners.add(callback);
    return () => {
      listeners.delete(callback);
    };
  };

  const dispose: ReductionEngine<T>['dispose'] = () => {
    if (disposed) return;
    disposed = true;
    invalidate();
    discardSpatialIndex();
    listeners.clear();
    if (ownsQueue) taskQueue.dispose();
  };

  schedulePrecompute();

  return {
    getData: () => rawData,
    getOriginalCount: () => rawData.length,
    setData,
    getSamplingStrategy: () => strategy,
    setSamplingStrategy,
    optimizedData,
    dataForViewport,
    buildSpatialIndex: buildIndex,
    pointsNear,
    isSpatialIndexReady: () => spatialBuild !== null && spatialBuild.isReady(),
    getCachedLevels: () => Array.from(lodCache.keys()).sort((a, b) => a - b),
    getLodLevels: () => lodLevels,
    getMetrics,
    resetMetrics: () => {
      metrics = createMetricsState();
    },
    reset,
    onChange,
    whenIdle: () => taskQueue.whenIdle(),
    dispose,
  };
}
