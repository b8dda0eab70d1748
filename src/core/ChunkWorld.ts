import type * as THREE from 'three';
import type { ChunkCoord } from './ChunkData';
import { ChunkCache } from './ChunkCache';
import { GridIndexer } from './GridIndexer';
import { HeightField } from './HeightField';
import { ObjectPlacer } from './ObjectPlacer';
import { PersistenceStore, type PersistedChunkData } from './PersistenceStore';
import { StreamingScheduler, type TickResult } from './StreamingScheduler';
import {
  resolveConfig,
  type AssetCatalog,
  type ChunkStreamEvents,
  type ChunkStreamStats,
  type ChunkWorldOptions,
  type RequiredChunkStreamConfig
} from './types';

const defaultClock = (): number => performance.now() / 1000;

/**
 * An infinite, streamed world around a moving observer.
 * Owns the active chunks, their snapshots and the scheduler; several worlds
 * can live side by side. Call tick(x, z) or update(camera) from the host loop.
 */
export class ChunkWorld<THandle, TArchetype> {
  readonly config: Readonly<RequiredChunkStreamConfig>;
  readonly grid: GridIndexer;
  readonly heightField: HeightField;
  readonly placer: ObjectPlacer;
  readonly store: PersistenceStore;
  readonly cache: ChunkCache<THandle, TArchetype>;
  readonly scheduler: StreamingScheduler<THandle, TArchetype>;
  private readonly events: ChunkStreamEvents;

  constructor(options: ChunkWorldOptions<THandle, TArchetype>) {
    const config = resolveConfig(options);
    this.config = config;
    this.events = options.events ?? {};

    this.grid = new GridIndexer(config.gridScale);
    this.heightField = new HeightField(config);
    this.placer = new ObjectPlacer(config);
    this.store = new PersistenceStore(this.grid, config.originHeight);
    this.cache = new ChunkCache({
      grid: this.grid,
      heightField: this.heightField,
      placer: this.placer,
      store: this.store,
      composer: options.composer,
      events: this.events
    });
    this.scheduler = new StreamingScheduler({
      grid: this.grid,
      cache: this.cache,
      settings: config,
      clock: options.clock ?? defaultClock,
      selectionRandom: options.selectionRandom
    });
  }

  // ============================================
  // Public API
  // ============================================

  /**
   * Provide the archetypes chunks are built from
   */
  settings(catalog: AssetCatalog<TArchetype>): void {
    this.cache.setArchetypes(catalog);
  }

  /**
   * Stream chunks around an observer position
   */
  tick(observerX: number, observerZ: number): TickResult {
    const result = this.scheduler.tick(observerX, observerZ);
    if (result.materialized.length > 0 || result.evicted.length > 0) {
      this.events.onStatsChanged?.(this.getStats());
    }
    return result;
  }

  /**
   * Stream chunks around a camera. Call this every frame in your render loop.
   */
  update(camera: THREE.Camera): TickResult {
    return this.tick(camera.position.x, camera.position.z);
  }

  snapToGrid(x: number, z: number): ChunkCoord {
    return this.grid.snapToGrid(x, z);
  }

  isActive(coord: ChunkCoord): boolean {
    return this.cache.isActive(coord);
  }

  /**
   * Snapshot every active chunk and return the whole persisted set
   */
  saveAllChunks(): PersistedChunkData {
    this.cache.snapshotAll();
    return this.store.exportAll();
  }

  exportAll(): PersistedChunkData {
    return this.store.exportAll();
  }

  importAll(data: ReadonlyMap<unknown, unknown> | null | undefined): void {
    this.store.importAll(data);
  }

  clearSavedData(): void {
    this.store.clear();
  }

  getStats(): ChunkStreamStats {
    return {
      chunks: { active: this.cache.size, persisted: this.store.size }
    };
  }

  /**
   * Evict every active chunk; their state stays in the persisted set
   */
  dispose(): void {
    this.cache.evictAll();
  }
}
