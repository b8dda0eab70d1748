/**
 * Grid-aligned world coordinates of a chunk (multiples of the grid scale)
 */
export interface ChunkCoord {
  x: number;
  z: number;
}

/**
 * Composite integer identity of a chunk, see GridIndexer.chunkKey
 */
export type ChunkKey = number;

/**
 * Object position relative to the chunk origin (X/Z) and chunk height (Y)
 */
export interface ObjectPlacement {
  offsetX: number;
  offsetY: number;
  offsetZ: number;
}

/**
 * Handle-free chunk state kept while the chunk is unloaded
 */
export interface ChunkSnapshot {
  coord: ChunkCoord;
  height: number;
  placements: ObjectPlacement[];
}

/**
 * Data structure for an active chunk
 */
export interface ChunkData<THandle> extends ChunkSnapshot {
  key: ChunkKey;
  /** Materialized representation, owned by the world composer */
  handle: THandle;
}
