import type {
  Bounds,
  Hertz,
  ReductionEngineOptions,
  SamplingStrategy,
  SpatialIndexBuildOptions,
  StreamBufferOptions,
  UpdateFrequency,
} from './types';
import {
  defaultLodLevels,
  defaultSamplingStrategy,
  reductionEngineDefaults,
  spatialIndexDefaults,
  streamBufferDefaults,
  updateFrequencyHz,
} from './defaults';

export type ResolvedSpatialIndexOptions = Readonly<{
  gridSize: number;
  chunkSize: number;
}>;

export type ResolvedReductionEngineOptions = Readonly<{
  samplingStrategy: SamplingStrategy;
  lodLevels: ReadonlyArray<number>;
  eagerThreshold: number;
  spatialIndex: ResolvedSpatialIndexOptions;
}>;

export type ResolvedStreamBufferOptions = Readonly<{
  windowSize: number;
  updateFrequency: Hertz;
  now: () => number;
}>;

const isPositiveInteger = (v: unknown): v is number =>
  typeof v === 'number' && Number.isInteger(v) && v > 0;

const isNonNegativeInteger = (v: unknown): v is number =>
  typeof v === 'number' && Number.isInteger(v) && v >= 0;

/**
 * Throws unless `targetPoints` is an integer >= 2.
 */
export function assertTargetPoints(context: string, targetPoints: number): void {
  if (!Number.isInteger(targetPoints) || targetPoints < 2) {
    throw new Error(`${context}: targetPoints must be an integer >= 2. Received: ${String(targetPoints)}`);
  }
}

/**
 * Validates a sampling strategy and returns a copy holding only its own fields.
 */
export function resolveSamplingStrategy(context: string, strategy: SamplingStrategy): SamplingStrategy {
  switch (strategy.type) {
    case 'none':
      return { type: 'none' };
    case 'uniform':
      return { type: 'uniform' };
    case 'minmax':
      return { type: 'minmax' };
    case 'lttb': {
      if (!Number.isInteger(strategy.buckets) || strategy.buckets < 2) {
        throw new Error(`${context}: lttb buckets must be an integer >= 2. Received: ${String(strategy.buckets)}`);
      }
      return { type: 'lttb', buckets: strategy.buckets };
    }
    case 'adaptive': {
      if (!Number.isFinite(strategy.threshold)) {
        throw new Error(`${context}: adaptive threshold must be a finite number. Received: ${String(strategy.threshold)}`);
      }
      return { type: 'adaptive', threshold: strategy.threshold };
    }
    default: {
      const exhaustive: never = strategy;
      throw new Error(`${context}: unknown sampling strategy ${JSON.stringify(exhaustive)}`);
    }
  }
}

export function isSameSamplingStrategy(a: SamplingStrategy, b: SamplingStrategy): boolean {
  if (a.type !== b.type) return false;
  if (a.type === 'lttb' && b.type === 'lttb') return a.buckets === b.buckets;
  if (a.type === 'adaptive' && b.type === 'adaptive') return a.threshold === b.threshold;
  return true;
}

export function resolveBounds(context: string, bounds: Bounds): Bounds {
  const { x, y, width, height } = bounds;
  if (!Number.isFinite(x) || !Number.isFinite(y)) {
    throw new Error(`${context}: bounds origin must be finite. Received: (${String(x)}, ${String(y)})`);
  }
  if (!(Number.isFinite(width) && width > 0) || !(Number.isFinite(height) && height > 0)) {
    throw new Error(
      `${context}: bounds width and height must be positive. Received: ${String(width)}x${String(height)}`
    );
  }
  return { x, y, width, height };
}

export function resolveSpatialIndexOptions(
  context: string,
  options: SpatialIndexBuildOptions = {}
): ResolvedSpatialIndexOptions {
  const gridSize = options.gridSize ?? spatialIndexDefaults.gridSize;
  if (!isPositiveInteger(gridSize)) {
    throw new Error(`${context}: gridSize must be a positive integer. Received: ${String(gridSize)}`);
  }
  const chunkSize = options.chunkSize ?? spatialIndexDefaults.chunkSize;
  if (!isPositiveInteger(chunkSize)) {
    throw new Error(`${context}: chunkSize must be a positive integer. Received: ${String(chunkSize)}`);
  }
  return { gridSize, chunkSize };
}

export function resolveReductionEngineOptions(options: ReductionEngineOptions = {}): ResolvedReductionEngineOptions {
  const context = 'createReductionEngine(options)';

  const samplingStrategy = resolveSamplingStrategy(context, options.samplingStrategy ?? defaultSamplingStrategy);

  const levelsInput = options.lodLevels ?? defaultLodLevels;
  if (levelsInput.length === 0) {
    throw new Error(`${context}: lodLevels must contain at least one level.`);
  }
  for (const level of levelsInput) {
    if (!Number.isInteger(level) || level < 2) {
      throw new Error(`${context}: lodLevels entries must be integers >= 2. Received: ${String(level)}`);
    }
  }
  const lodLevels = Array.from(new Set(levelsInput)).sort((a, b) => a - b);

  const eagerThreshold = options.eagerThreshold ?? reductionEngineDefaults.eagerThreshold;
  if (!isNonNegativeInteger(eagerThreshold)) {
    throw new Error(`${context}: eagerThreshold must be a non-negative integer. Received: ${String(eagerThreshold)}`);
  }

  return {
    samplingStrategy,
    lodLevels,
    eagerThreshold,
    spatialIndex: resolveSpatialIndexOptions(context, {
      gridSize: options.gridSize,
      chunkSize: options.chunkSize,
    }),
  };
}

export function resolveUpdateFrequency(context: string, frequency: UpdateFrequency): Hertz {
  const hz = typeof frequency === 'string' ? updateFrequencyHz[frequency] : frequency.custom;
  if (typeof hz !== 'number' || !Number.isFinite(hz) || hz <= 0) {
    throw new Error(`${context}: updateFrequency must be a positive number of hertz. Received: ${JSON.stringify(frequency)}`);
  }
  return hz as Hertz;
}

export function resolveStreamBufferOptions(options: StreamBufferOptions = {}): ResolvedStreamBufferOptions {
  const context = 'createStreamBuffer(options)';

  const windowSize = options.windowSize ?? streamBufferDefaults.windowSize;
  if (!isPositiveInteger(windowSize)) {
    throw new Error(`${context}: windowSize must be a positive integer. Received: ${String(windowSize)}`);
  }

  return {
    windowSize,
    updateFrequency: resolveUpdateFrequency(context, options.updateFrequency ?? streamBufferDefaults.updateFrequency),
    now: options.now ?? Date.now,
  };
}
