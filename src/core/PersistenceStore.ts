import type { ChunkCoord, ChunkData, ChunkKey, ChunkSnapshot, ObjectPlacement } from './ChunkData';
import type { GridIndexer } from './GridIndexer';

export type PersistedChunkData = Map<ChunkKey, ChunkSnapshot>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function copyPlacement(placement: ObjectPlacement): ObjectPlacement {
  return { offsetX: placement.offsetX, offsetY: placement.offsetY, offsetZ: placement.offsetZ };
}

export function copySnapshot(snapshot: ChunkSnapshot): ChunkSnapshot {
  return {
    coord: { x: snapshot.coord.x, z: snapshot.coord.z },
    height: snapshot.height,
    placements: snapshot.placements.map(copyPlacement)
  };
}

/**
 * Rebuild a snapshot from untrusted data.
 * A missing or non-numeric height falls back to `originHeight`, malformed placements are
 * dropped, and without a usable coordinate (or one outside the key range) the whole
 * entry is rejected (null).
 */
export function sanitizeSnapshot(value: unknown, grid: GridIndexer, originHeight: number): ChunkSnapshot | null {
  if (!isRecord(value) || !isRecord(value.coord)) return null;
  const { x, z } = value.coord;
  if (!isFiniteNumber(x) || !isFiniteNumber(z)) return null;

  const coord: ChunkCoord = grid.snapToGrid(x, z);
  if (!grid.contains(coord)) return null;
  const height = isFiniteNumber(value.height) ? value.height : originHeight;

  const placements: ObjectPlacement[] = [];
  if (Array.isArray(value.placements)) {
    for (const entry of value.placements) {
      if (!isRecord(entry)) continue;
      const { offsetX, offsetY, offsetZ } = entry;
      if (isFiniteNumber(offsetX) && isFiniteNumber(offsetY) && isFiniteNumber(offsetZ)) {
        placements.push({ offsetX, offsetY, offsetZ });
      }
    }
  }

  return { coord, height, placements };
}

/**
 * Snapshots of chunks that are not (or no longer) active.
 * Entries survive revival, so a chunk can be unloaded and reloaded any number of times.
 */
export class PersistenceStore {
  private snapshots: PersistedChunkData = new Map();
  private readonly grid: GridIndexer;
  private readonly originHeight: number;

  constructor(grid: GridIndexer, originHeight: number) {
    this.grid = grid;
    this.originHeight = originHeight;
  }

  get size(): number {
    return this.snapshots.size;
  }

  /**
   * Store the handle-free state of an active chunk, replacing any earlier snapshot
   */
  snapshot<THandle>(chunk: ChunkData<THandle>): ChunkSnapshot {
    const snapshot = copySnapshot(chunk);
    this.snapshots.set(chunk.key, snapshot);
    return copySnapshot(snapshot);
  }

  get(key: ChunkKey): ChunkSnapshot | undefined {
    const snapshot = this.snapshots.get(key);
    return snapshot ? copySnapshot(snapshot) : undefined;
  }

  has(key: ChunkKey): boolean {
    return this.snapshots.has(key);
  }

  /**
   * Deep copy of every stored snapshot
   */
  exportAll(): PersistedChunkData {
    const copy: PersistedChunkData = new Map();
    for (const [key, snapshot] of this.snapshots) {
      copy.set(key, copySnapshot(snapshot));
    }
    return copy;
  }

  /**
   * Replace the store with previously exported data. Anything that is not a Map
   * leaves the store empty; entries are sanitized and re-keyed from their coordinate.
   */
  importAll(data: ReadonlyMap<unknown, unknown> | null | undefined): void {
    this.snapshots = new Map();
    if (!(data instanceof Map)) return;

    for (const value of data.values()) {
      const snapshot = sanitizeSnapshot(value, this.grid, this.originHeight);
      if (snapshot) this.snapshots.set(this.grid.chunkKey(snapshot.coord), snapshot);
    }
  }

  clear(): void {
    this.snapshots.clear();
  }
}
