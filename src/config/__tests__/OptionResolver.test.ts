import { describe, it, expect } from 'vitest';
import {
  assertTargetPoints,
  isSameSamplingStrategy,
  resolveBounds,
  resolveReductionEngineOptions,
  resolveSamplingStrategy,
  resolveSpatialIndexOptions,
  resolveStreamBufferOptions,
  resolveUpdateFrequency,
} from '../OptionResolver';
import { updateFrequencyHz, updateFrequencyPresets } from '../defaults';

describe('OptionResolver - reduction engine', () => {
  it('applies defaults', () => {
    const resolved = resolveReductionEngineOptions();

    expect(resolved.samplingStrategy).toEqual({ type: 'lttb', buckets: 1000 });
    expect(resolved.lodLevels).toEqual([100, 500, 1000, 5000, 10000]);
    expect(resolved.eagerThreshold).toBe(10_000);
    expect(resolved.spatialIndex).toEqual({ gridSize: 100, chunkSize: 4096 });
  });

  it('dedupes and sorts LOD levels', () => {
    const resolved = resolveReductionEngineOptions({ lodLevels: [800, 50, 800, 200] });
    expect(resolved.lodLevels).toEqual([50, 200, 800]);
  });

  it('rejects empty or invalid LOD levels', () => {
    expect(() => resolveReductionEngineOptions({ lodLevels: [] })).toThrow(
      'createReductionEngine(options): lodLevels must contain at least one level.'
    );
    expect(() => resolveReductionEngineOptions({ lodLevels: [100, 1] })).toThrow(
      'createReductionEngine(options): lodLevels entries must be integers >= 2. Received: 1'
    );
  });

  it('rejects a negative eager threshold and bad grid options', () => {
    expect(() => resolveReductionEngineOptions({ eagerThreshold: -1 })).toThrow(
      'createReductionEngine(options): eagerThreshold must be a non-negative integer. Received: -1'
    );
    expect(() => resolveReductionEngineOptions({ chunkSize: 0 })).toThrow(
      'createReductionEngine(options): chunkSize must be a positive integer. Received: 0'
    );
  });
});

describe('OptionResolver - sampling strategies', () => {
  it('strips unknown fields from strategies', () => {
    const withExtra = { type: 'uniform' as const, extra: true };
    expect(resolveSamplingStrategy('test', withExtra)).toEqual({ type: 'uniform' });
  });

  it('compares strategies by value', () => {
    expect(isSameSamplingStrategy({ type: 'lttb', buckets: 10 }, { type: 'lttb', buckets: 10 })).toBe(true);
    expect(isSameSamplingStrategy({ type: 'lttb', buckets: 10 }, { type: 'lttb', buckets: 11 })).toBe(false);
    expect(isSameSamplingStrategy({ type: 'adaptive', threshold: 1 }, { type: 'adaptive', threshold: 2 })).toBe(false);
    expect(isSameSamplingStrategy({ type: 'minmax' }, { type: 'uniform' })).toBe(false);
    expect(isSameSamplingStrategy({ type: 'none' }, { type: 'none' })).toBe(true);
  });

  it('validates target point counts', () => {
    expect(() => assertTargetPoints('ctx', 2)).not.toThrow();
    expect(() => assertTargetPoints('ctx', 0)).toThrow('ctx: targetPoints must be an integer >= 2. Received: 0');
    expect(() => assertTargetPoints('ctx', Number.NaN)).toThrow('ctx: targetPoints must be an integer >= 2. Received: NaN');
  });
});

describe('OptionResolver - geometry', () => {
  it('rejects non-finite origins and empty extents', () => {
    expect(() => resolveBounds('ctx', { x: Number.NaN, y: 0, width: 1, height: 1 })).toThrow(
      'ctx: bounds origin must be finite. Received: (NaN, 0)'
    );
    expect(() => resolveBounds('ctx', { x: 0, y: 0, width: 4, height: -2 })).toThrow(
      'ctx: bounds width and height must be positive. Received: 4x-2'
    );
  });

  it('resolves spatial index defaults', () => {
    expect(resolveSpatialIndexOptions('ctx')).toEqual({ gridSize: 100, chunkSize: 4096 });
    expect(resolveSpatialIndexOptions('ctx', { gridSize: 16 })).toEqual({ gridSize: 16, chunkSize: 4096 });
  });
});

describe('OptionResolver - stream buffer', () => {
  it('maps presets and custom frequencies to hertz', () => {
    expect(resolveUpdateFrequency('ctx', 'fps15')).toBe(15);
    expect(resolveUpdateFrequency('ctx', 'fps120')).toBe(120);
    expect(resolveUpdateFrequency('ctx', { custom: 2.5 })).toBe(2.5);
  });

  it('resolves every listed preset to its rate', () => {
    expect(updateFrequencyPresets).toEqual(['fps15', 'fps30', 'fps60', 'fps120']);
    expect(updateFrequencyPresets.map((preset) => resolveUpdateFrequency('ctx', preset))).toEqual([15, 30, 60, 120]);
    for (const preset of updateFrequencyPresets) {
      expect(resolveUpdateFrequency('ctx', preset)).toBe(updateFrequencyHz[preset]);
    }
  });

  it('rejects non-positive custom frequencies', () => {
    expect(() => resolveUpdateFrequency('ctx', { custom: -5 })).toThrow(
      'ctx: updateFrequency must be a positive number of hertz. Received: {"custom":-5}'
    );
    expect(() => resolveUpdateFrequency('ctx', { custom: Number.POSITIVE_INFINITY })).toThrow(
      /updateFrequency must be a positive number of hertz/
    );
  });

  it('applies defaults', () => {
    const resolved = resolveStreamBufferOptions();
    expect(resolved.windowSize).toBe(100);
    expect(resolved.updateFrequency).toBe(30);
    expect(resolved.now).toBe(Date.now);
  });
});
