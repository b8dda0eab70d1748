// Core
export {
  ChunkWorld,
  ChunkCache,
  StreamingScheduler,
  PersistenceStore,
  GridIndexer,
  HeightField,
  ObjectPlacer,
  DEFAULT_CHUNK_STREAM_CONFIG,
  MAX_CELL_INDEX,
  resolveConfig,
  chunkPlacementSeed,
  copySnapshot,
  sanitizeSnapshot
} from './core';
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
  ChunkWorldOptions,
  ChunkCoord,
  ChunkKey,
  ObjectPlacement,
  ChunkSnapshot,
  ChunkData,
  PersistedChunkData,
  ChunkCacheDeps,
  TickResult,
  StreamingSchedulerOptions
} from './core';

// Composer
export { SceneWorldComposer, ChunkSpawnError } from './composer';

// Utils
export {
  SeededRandom,
  PerlinNoise,
  ChunkSerializer,
  CHUNK_SAVE_VERSION
} from './utils';

export type {
  ChunkSaveData,
  SerializedChunk
} from './utils';
