import type { ChunkCoord } from './ChunkData';
import type { ChunkCache } from './ChunkCache';
import type { GridIndexer } from './GridIndexer';
import type { RequiredChunkStreamConfig } from './types';

type SchedulerSettings = Pick<
  RequiredChunkStreamConfig,
  'gridScale' | 'renderDistance' | 'cooldownSeconds' | 'maxEvictionsPerTick' | 'maxMaterializationsPerTick'
>;

export interface TickResult {
  /** The tick fell inside the cooldown and did nothing */
  throttled: boolean;
  /** Unloaded in-range chunks found this tick */
  queued: number;
  materialized: ChunkCoord[];
  evicted: ChunkCoord[];
}

export interface StreamingSchedulerOptions<THandle, TArchetype> {
  grid: GridIndexer;
  cache: ChunkCache<THandle, TArchetype>;
  settings: SchedulerSettings;
  /** Seconds */
  clock: () => number;
  selectionRandom?: () => number;
}

/**
 * Decides per tick which chunks to load and unload around the observer.
 * Work per tick is capped on both sides so a host loop never stalls on streaming.
 */
export class StreamingScheduler<THandle, TArchetype> {
  private readonly grid: GridIndexer;
  private readonly cache: ChunkCache<THandle, TArchetype>;
  private readonly settings: SchedulerSettings;
  private readonly clock: () => number;
  private readonly selectionRandom?: () => number;
  private lastProcessedTime = Number.NEGATIVE_INFINITY;

  constructor(options: StreamingSchedulerOptions<THandle, TArchetype>) {
    this.grid = options.grid;
    this.cache = options.cache;
    this.settings = options.settings;
    this.clock = options.clock;
    this.selectionRandom = options.selectionRandom;
  }

  private get loadRadius(): number {
    return this.settings.renderDistance * this.settings.gridScale;
  }

  tick(observerX: number, observerZ: number): TickResult {
    const now = this.clock();
    if (now - this.lastProcessedTime < this.settings.cooldownSeconds) {
      return { throttled: true, queued: 0, materialized: [], evicted: [] };
    }
    this.lastProcessedTime = now;

    const queue = this.candidates(observerX, observerZ).filter((coord) => !this.cache.isActive(coord));
    const queued = queue.length;

    // Failed spawns count against the cap too
    const materialized: ChunkCoord[] = [];
    for (let attempt = 0; attempt < this.settings.maxMaterializationsPerTick && queue.length > 0; attempt++) {
      const [coord] = queue.splice(this.pickIndex(queue.length), 1);
      if (this.cache.materialize(coord)) materialized.push(coord);
    }

    const evicted = this.evictOutOfRange(observerX, observerZ);
    return { throttled: false, queued, materialized, evicted };
  }

  /**
   * Grid cells in range of the observer, in scan order.
   * Scans a (renderDistance + 1)^2 lattice around the snapped observer and keeps the
   * cells within renderDistance * gridScale. Cells beyond the key range are never yielded.
   */
  candidates(observerX: number, observerZ: number): ChunkCoord[] {
    const { gridScale, renderDistance } = this.settings;
    const origin = this.grid.snapToGrid(observerX, observerZ);
    const start = -Math.floor(renderDistance / 2);
    const result: ChunkCoord[] = [];

    for (let i = 0; i <= renderDistance; i++) {
      for (let j = 0; j <= renderDistance; j++) {
        const coord = this.grid.snapToGrid(origin.x + (start + i) * gridScale, origin.z + (start + j) * gridScale);
        if (this.grid.contains(coord) && this.grid.distance(coord, observerX, observerZ) <= this.loadRadius) {
          result.push(coord);
        }
      }
    }
    return result;
  }

  /**
   * Evict up to maxEvictionsPerTick active chunks beyond the load radius
   */
  evictOutOfRange(observerX: number, observerZ: number): ChunkCoord[] {
    const selected: ChunkCoord[] = [];
    for (const chunk of this.cache.activeChunks()) {
      if (selected.length >= this.settings.maxEvictionsPerTick) break;
      if (this.grid.distance(chunk.coord, observerX, observerZ) > this.loadRadius) {
        selected.push(chunk.coord);
      }
    }

    return selected.filter((coord) => this.cache.evict(coord));
  }

  private pickIndex(length: number): number {
    if (!this.selectionRandom) return 0;
    const index = Math.floor(this.selectionRandom() * length);
    if (!Number.isFinite(index)) return 0;
    return Math.min(Math.max(index, 0), length - 1);
  }
}
