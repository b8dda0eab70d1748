export type {
  AssetCatalog,
  SpawnRequest,
  WorldComposer,
  ChunkWarningCode,
  ChunkStreamWarning,
  ChunkStreamEvents,
  ChunkStreamStats,
  ChunkStreamConfig,
  RequiredChunkStreamConfig,
  ChunkWorldOptions
} from './types';
export { DEFAULT_CHUNK_STREAM_CONFIG, resolveConfig } from './types';
export type { ChunkCoord, ChunkKey, ObjectPlacement, ChunkSnapshot, ChunkData } from './ChunkData';
export { GridIndexer, MAX_CELL_INDEX } from './GridIndexer';
export { HeightField } from './HeightField';
export { ObjectPlacer, chunkPlacementSeed } from './ObjectPlacer';
export { PersistenceStore, copySnapshot, sanitizeSnapshot } from './PersistenceStore';
export type { PersistedChunkData } from './PersistenceStore';
export { ChunkCache } from './ChunkCache';
export type { ChunkCacheDeps } from './ChunkCache';
export { StreamingScheduler } from './StreamingScheduler';
export type { TickResult, StreamingSchedulerOptions } from './StreamingScheduler';
export { ChunkWorld } from './ChunkWorld';
