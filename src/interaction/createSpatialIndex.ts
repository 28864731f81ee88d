import type { Bounds, Point, Series, SpatialIndexBuildOptions, SpatialIndexOptions, XYAccessor } from '../config/types';
import { resolveBounds, resolveSpatialIndexOptions } from '../config/OptionResolver';
import type { TaskQueue } from '../core/createTaskQueue';

export interface SpatialIndex<T> {
  /**
   * Adds an element at `point`. Points outside the bounds land in the nearest edge cell;
   * points with non-finite coordinates are not indexed.
   */
  insert(element: T, point: Point): void;
  /**
   * Returns every inserted element whose Euclidean distance to `center` is <= `radius`,
   * in row-major cell order, then insertion order within a cell.
   *
   * Throws if `radius` is negative or non-finite.
   */
  query(center: Point, radius: number): T[];
  /** Number of indexed records. */
  size(): number;
  getBounds(): Bounds;
  getGridSize(): number;
}

type SpatialRecord<T> = {
  readonly element: T;
  readonly x: number;
  readonly y: number;
};

/**
 * Uniform grid over a bounding rectangle. Read-only once bulk insertion is done; rebuild by creating a
 * new index.
 */
export function createSpatialIndex<T>(bounds: Bounds, options: SpatialIndexOptions = {}): SpatialIndex<T> {
  const resolvedBounds = resolveBounds('createSpatialIndex(bounds)', bounds);
  const { gridSize } = resolveSpatialIndexOptions('createSpatialIndex(options)', options);

  const records: SpatialRecord<T>[] = [];
  const cells: number[][] = Array.from({ length: gridSize * gridSize }, () => []);

  const clampCell = (v: number): number => Math.min(gridSize - 1, Math.max(0, v));

  const cellX = (x: number): number =>
    clampCell(Math.floor(((x - resolvedBounds.x) / resolvedBounds.width) * gridSize));
  const cellY = (y: number): number =>
    clampCell(Math.floor(((y - resolvedBounds.y) / resolvedBounds.height) * gridSize));

  const insert: SpatialIndex<T>['insert'] = (element, point) => {
    const { x, y } = point;
    if (!Number.isFinite(x) || !Number.isFinite(y)) return;

    const recordIndex = records.length;
    records.push({ element, x, y });
    cells[cellY(y) * gridSize + cellX(x)].push(recordIndex);
  };

  const query: SpatialIndex<T>['query'] = (center, radius) => {
    if (!Number.isFinite(radius) || radius < 0) {
      throw new Error(`SpatialIndex.query: radius must be a non-negative finite number. Received: ${String(radius)}`);
    }
    const { x: cx, y: cy } = center;
    if (!Number.isFinite(cx) || !Number.isFinite(cy)) return [];

    const minX = cellX(cx - radius);
    const maxX = cellX(cx + radius);
    const minY = cellY(cy - radius);
    const maxY = cellY(cy + radius);
    const radiusSquared = radius * radius;

    const out: T[] = [];
    for (let gy = minY; gy <= maxY; gy++) {
      for (let gx = minX; gx <= maxX; gx++) {
        const cell = cells[gy * gridSize + gx];
        for (let i = 0; i < cell.length; i++) {
          const record = records[cell[i]];
          const dx = record.x - cx;
          const dy = record.y - cy;
          if (dx * dx + dy * dy <= radiusSquared) out.push(record.element);
        }
      }
    }
    return out;
  };

  return {
    insert,
    query,
    size: () => records.length,
    getBounds: () => resolvedBounds,
    getGridSize: () => gridSize,
  };
}

export interface SpatialIndexBuild<T> {
  isReady(): boolean;
  /** `null` while construction is still running (or after it failed / was cancelled). */
  query(center: Point, radius: number): T[] | null;
  /** Resolves with the finished index; rejects if construction failed or was cancelled. */
  whenReady(): Promise<SpatialIndex<T>>;
  cancel(): void;
}

/**
 * Builds a spatial index over `data` on the background task queue, `chunkSize` inserts per step.
 * The index becomes queryable only after the last element is inserted.
 */
export function buildSpatialIndex<T>(
  taskQueue: TaskQueue,
  data: Series<T>,
  accessor: XYAccessor<T>,
  bounds: Bounds,
  options: SpatialIndexBuildOptions = {},
  onReady?: (index: SpatialIndex<T>) => void
): SpatialIndexBuild<T> {
  const { gridSize, chunkSize } = resolveSpatialIndexOptions('buildSpatialIndex(options)', options);
  const pending = createSpatialIndex<T>(bounds, { gridSize });

  let ready: SpatialIndex<T> | null = null;
  let failure: unknown = null;
  let settled = false;
  const waiters: Array<{ resolve: (index: SpatialIndex<T>) => void; reject: (error: unknown) => void }> = [];

  const settle = (): void => {
    settled = true;
    for (const waiter of waiters.splice(0)) {
      if (ready) waiter.resolve(ready);
      else waiter.reject(failure);
    }
  };

  let cursor = 0;
  const handle = taskQueue.schedule(
    {
      step: () => {
        const end = Math.min(cursor + chunkSize, data.length);
        for (; cursor < end; cursor++) {
          const element = data[cursor];
          pending.insert(element, accessor(element));
        }
        return cursor >= data.length;
      },
      result: () => pending,
    },
    {
      onComplete: (index) => {
        ready = index;
        settle();
        onReady?.(index);
      },
      onError: (error) => {
        failure = error;
        console.error('buildSpatialIndex: construction failed:', error);
        settle();
      },
    }
  );

  return {
    isReady: () => ready !== null,
    query: (center, radius) => (ready ? ready.query(center, radius) : null),
    whenReady: () => {
      if (ready) return Promise.resolve(ready);
      if (settled) return Promise.reject(failure);
      return new Promise<SpatialIndex<T>>((resolve, reject) => {
        waiters.push({ resolve, reject });
      });
    },
    cancel: () => {
      if (settled) return;
      handle.cancel();
      failure = new Error('buildSpatialIndex: construction was cancelled.');
      settle();
    },
  };
}
