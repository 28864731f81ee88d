/**
 * Public types for series-lod.
 */

/**
 * An ordered, immutable sequence of the caller's element type.
 * Components never mutate a series they are handed.
 */
export type Series<T> = ReadonlyArray<T>;

export type Point = Readonly<{ x: number; y: number }>;

/**
 * Axis-aligned rectangle in data space. `x`/`y` are the minimum corner.
 */
export type Bounds = Readonly<{
  x: number;
  y: number;
  width: number;
  height: number;
}>;

/** Half-open index range `[start, end)`. */
export type IndexRange = Readonly<{ start: number; end: number }>;

/** Maps an element of a series to its position in data space. */
export type XYAccessor<T> = (element: T) => Point;

export type NoSampling = Readonly<{ type: 'none' }>;
export type UniformSampling = Readonly<{ type: 'uniform' }>;
/**
 * Bucket sampling keeping the first/last points plus one representative per bucket.
 * `buckets` caps the output size (the effective count is `min(buckets, targetCount)`).
 */
export type LttbSampling = Readonly<{ type: 'lttb'; buckets: number }>;
export type MinMaxSampling = Readonly<{ type: 'minmax' }>;
/**
 * Reserved for variance-driven density. Currently samples uniformly; `threshold` is accepted but unused.
 */
export type AdaptiveSampling = Readonly<{ type: 'adaptive'; threshold: number }>;

export type SamplingStrategy =
  | NoSampling
  | UniformSampling
  | LttbSampling
  | MinMaxSampling
  | AdaptiveSampling;

export type SamplingStrategyType = SamplingStrategy['type'];

/**
 * Branded type for millisecond durations.
 * Use this to distinguish milliseconds from other numeric values at compile time.
 */
export type Milliseconds = number & { readonly __brand: 'Milliseconds' };

/**
 * Branded type for frequencies in hertz.
 */
export type Hertz = number & { readonly __brand: 'Hertz' };

/**
 * Query timing counters for a reduction engine.
 */
export interface RenderMetrics {
  /** Duration of the most recent query. */
  readonly lastQueryTime: Milliseconds;
  /** Running mean over `totalQueries`. */
  readonly averageQueryTime: Milliseconds;
  readonly totalQueries: number;
  /** Whole-series queries answered from the LOD cache. */
  readonly cacheHits: number;
  /** Whole-series queries that had to compute (and then memoized) a level. */
  readonly cacheMisses: number;
}

export type UpdateFrequencyPreset = 'fps15' | 'fps30' | 'fps60' | 'fps120';

export type UpdateFrequency = UpdateFrequencyPreset | Readonly<{ custom: number }>;

export interface SpatialIndexOptions {
  /** Cells per axis. Defaults to 100. */
  readonly gridSize?: number;
}

export interface SpatialIndexBuildOptions extends SpatialIndexOptions {
  /** Elements inserted per background slice before yielding. */
  readonly chunkSize?: number;
}

export interface ReductionEngineOptions {
  readonly samplingStrategy?: SamplingStrategy;
  /** Detail-level ladder used for cache keys. Sorted ascending on resolve. */
  readonly lodLevels?: ReadonlyArray<number>;
  /** Series longer than this get every ladder level precomputed in the background. */
  readonly eagerThreshold?: number;
  readonly gridSize?: number;
  readonly chunkSize?: number;
}

export interface StreamBufferOptions {
  readonly windowSize?: number;
  readonly updateFrequency?: UpdateFrequency;
  /** Clock used for arrival timestamps (ms). Defaults to `Date.now`. */
  readonly now?: () => number;
}
