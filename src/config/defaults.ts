import type { LttbSampling, UpdateFrequencyPreset } from './types';

export const defaultLodLevels = [100, 500, 1000, 5000, 10000] as const;

export const defaultSamplingStrategy = {
  type: 'lttb',
  buckets: 1000,
} as const satisfies LttbSampling;

export const reductionEngineDefaults = {
  targetPoints: 1000,
  // Series strictly longer than this are precomputed at every ladder level.
  eagerThreshold: 10_000,
} as const;

export const spatialIndexDefaults = {
  gridSize: 100,
  chunkSize: 4096,
} as const;

export const streamBufferDefaults = {
  windowSize: 100,
  updateFrequency: 'fps30',
  rateWindowMs: 1000,
} as const;

export const updateFrequencyHz = {
  fps15: 15,
  fps30: 30,
  fps60: 60,
  fps120: 120,
} as const satisfies Record<UpdateFrequencyPreset, number>;

export const updateFrequencyPresets: ReadonlyArray<UpdateFrequencyPreset> = ['fps15', 'fps30', 'fps60', 'fps120'];

/**
 * Time budget for one cooperative background slice before yielding to the event loop.
 */
export const BACKGROUND_SLICE_BUDGET_MS = 8;
