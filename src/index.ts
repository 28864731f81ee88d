/**
 * series-lod - level-of-detail reduction, spatial lookup, and live windowing for large series
 */

export const version = '1.0.0';

export type {
  AdaptiveSampling,
  Bounds,
  Hertz,
  IndexRange,
  LttbSampling,
  Milliseconds,
  MinMaxSampling,
  NoSampling,
  Point,
  ReductionEngineOptions,
  RenderMetrics,
  SamplingStrategy,
  SamplingStrategyType,
  Series,
  SpatialIndexBuildOptions,
  SpatialIndexOptions,
  StreamBufferOptions,
  UniformSampling,
  UpdateFrequency,
  UpdateFrequencyPreset,
  XYAccessor,
} from './config/types';

// Options defaults + resolution
export {
  defaultLodLevels,
  defaultSamplingStrategy,
  reductionEngineDefaults,
  spatialIndexDefaults,
  streamBufferDefaults,
  updateFrequencyHz,
  updateFrequencyPresets,
} from './config/defaults';
export { resolveSamplingStrategy, resolveUpdateFrequency } from './config/OptionResolver';

// Sampling
export {
  adaptiveSample,
  lttbMidpointSample,
  minMaxSample,
  reduceSeries,
  uniformSample,
} from './data/sampleSeries';

// Reduction engine
export { createReductionEngine, resolveLodLevel } from './data/createReductionEngine';
export type {
  ReductionEngine,
  ReductionEngineCallback,
  ReductionEngineDeps,
  ReductionEngineEvent,
} from './data/createReductionEngine';

// Streaming
export { createStreamBuffer } from './data/createStreamBuffer';
export type { StreamBuffer, StreamSnapshot, StreamUpdateCallback } from './data/createStreamBuffer';
export { createRateTracker } from './data/createRateTracker';
export type { RateTracker } from './data/createRateTracker';

// Spatial lookup
export { buildSpatialIndex, createSpatialIndex } from './interaction/createSpatialIndex';
export type { SpatialIndex, SpatialIndexBuild } from './interaction/createSpatialIndex';

// Background work
export { createTaskQueue } from './core/createTaskQueue';
export type { BackgroundTask, TaskCallbacks, TaskHandle, TaskQueue } from './core/createTaskQueue';
