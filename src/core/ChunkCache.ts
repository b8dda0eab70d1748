import type { ChunkCoord, ChunkData, ChunkKey, ChunkSnapshot, ObjectPlacement } from './ChunkData';
import type { GridIndexer } from './GridIndexer';
import type { HeightField } from './HeightField';
import type { ObjectPlacer } from './ObjectPlacer';
import type { PersistenceStore } from './PersistenceStore';
import type { AssetCatalog, ChunkStreamEvents, ChunkStreamWarning, ChunkWarningCode, WorldComposer } from './types';

export interface ChunkCacheDeps<THandle, TArchetype> {
  grid: GridIndexer;
  heightField: HeightField;
  placer: ObjectPlacer;
  store: PersistenceStore;
  composer: WorldComposer<THandle, TArchetype>;
  events: ChunkStreamEvents;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Active chunks and their Unloaded -> Active -> Unloaded lifecycle.
 * New chunks come from the height field and object placer, returning ones
 * from their stored snapshot.
 */
export class ChunkCache<THandle, TArchetype> {
  private readonly active: Map<ChunkKey, ChunkData<THandle>> = new Map();
  private readonly deps: ChunkCacheDeps<THandle, TArchetype>;
  private archetypes: AssetCatalog<TArchetype> = {};

  constructor(deps: ChunkCacheDeps<THandle, TArchetype>) {
    this.deps = deps;
  }

  get size(): number {
    return this.active.size;
  }

  setArchetypes(archetypes: AssetCatalog<TArchetype>): void {
    this.archetypes = { ...archetypes };
  }

  isActive(coord: ChunkCoord): boolean {
    if (!this.deps.grid.contains(coord)) return false;
    return this.active.has(this.deps.grid.chunkKey(coord));
  }

  get(coord: ChunkCoord): ChunkData<THandle> | undefined {
    if (!this.deps.grid.contains(coord)) return undefined;
    return this.active.get(this.deps.grid.chunkKey(coord));
  }

  activeChunks(): ChunkData<THandle>[] {
    return Array.from(this.active.values());
  }

  /**
   * Bring a chunk into the active set.
   * @returns true if the chunk became active by this call
   * @throws RangeError for a coordinate outside the key range
   */
  materialize(coord: ChunkCoord): boolean {
    const { grid, store, heightField, placer, composer, events } = this.deps;
    const snapped = grid.snapToGrid(coord.x, coord.z);
    const key = grid.chunkKey(snapped);
    if (this.active.has(key)) return false;

    let content: ChunkSnapshot | undefined = store.get(key);
    if (!content) {
      const height = heightField.computeHeight(snapped);
      content = { coord: snapped, height, placements: placer.generatePlacements(snapped, height) };
    }

    const placements: ObjectPlacement[] = content.placements;
    let handle: THandle;
    try {
      handle = composer.spawn({
        key,
        coord: { ...snapped },
        height: content.height,
        placements,
        archetypes: this.archetypes,
        warn: (message) => this.warn('object-skipped', key, snapped, message)
      });
    } catch (error) {
      this.warn('spawn-failed', key, snapped, `Chunk could not be spawned: ${errorMessage(error)}`, error);
      return false;
    }

    this.active.set(key, { key, coord: snapped, height: content.height, placements, handle });
    events.onChunkActivated?.(key, placements.length);
    return true;
  }

  /**
   * Snapshot a chunk, destroy its representation and drop it from the active set.
   * @returns true if an active chunk was evicted
   */
  evict(coord: ChunkCoord): boolean {
    const { grid, store, composer, events } = this.deps;
    if (!grid.contains(coord)) return false;
    const key = grid.chunkKey(coord);
    const chunk = this.active.get(key);
    if (!chunk) return false;

    store.snapshot(chunk);
    try {
      composer.destroy(chunk.handle);
    } catch (error) {
      this.warn('destroy-failed', key, chunk.coord, `Chunk could not be destroyed: ${errorMessage(error)}`, error);
    }
    this.active.delete(key);
    events.onChunkDeactivated?.(key);
    return true;
  }

  /**
   * Write a snapshot of every active chunk into the store
   */
  snapshotAll(): void {
    for (const chunk of this.active.values()) {
      this.deps.store.snapshot(chunk);
    }
  }

  evictAll(): void {
    // Collect first; evict mutates the active set
    for (const chunk of this.activeChunks()) {
      this.evict(chunk.coord);
    }
  }

  private warn(code: ChunkWarningCode, key: ChunkKey, coord: ChunkCoord, message: string, cause?: unknown): void {
    const warning: ChunkStreamWarning = { code, key, coord: { ...coord }, message };
    if (cause !== undefined) warning.cause = cause;

    const handler = this.deps.events.onWarning;
    if (handler) handler(warning);
    else console.warn(`[chunk ${coord.x},${coord.z}] ${message}`);
  }
}
