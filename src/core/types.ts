import type { ChunkCoord, ChunkKey, ObjectPlacement } from './ChunkData';

/**
 * Opaque archetypes handed to the world composer. The core never inspects them.
 */
export interface AssetCatalog<TArchetype> {
  /** Ground tile cloned once per chunk */
  floor?: TArchetype | null;
  /** Object cloned once per placement */
  object?: TArchetype | null;
}

/**
 * Everything the composer needs to build one chunk
 */
export interface SpawnRequest<TArchetype> {
  key: ChunkKey;
  coord: ChunkCoord;
  height: number;
  placements: readonly ObjectPlacement[];
  archetypes: AssetCatalog<TArchetype>;
  /** Report a recoverable problem (e.g. one object could not be built) */
  warn: (message: string) => void;
}

/**
 * Builds and tears down the materialized representation of a chunk.
 * spawn must be atomic: either it returns a usable handle or it throws
 * and leaves nothing behind.
 */
export interface WorldComposer<THandle, TArchetype> {
  spawn(request: SpawnRequest<TArchetype>): THandle;
  destroy(handle: THandle): void;
}

export type ChunkWarningCode = 'spawn-failed' | 'object-skipped' | 'destroy-failed';

/**
 * Recoverable failure reported while streaming
 */
export interface ChunkStreamWarning {
  code: ChunkWarningCode;
  key: ChunkKey;
  coord: ChunkCoord;
  message: string;
  cause?: unknown;
}

/**
 * Event callbacks for the chunk lifecycle
 */
export interface ChunkStreamEvents {
  /** Called when a chunk becomes active */
  onChunkActivated?: (key: ChunkKey, objectCount: number) => void;
  /** Called when a chunk is evicted */
  onChunkDeactivated?: (key: ChunkKey) => void;
  /** Called after a tick that changed the active set */
  onStatsChanged?: (stats: ChunkStreamStats) => void;
  /** Called for recoverable failures. Defaults to console.warn */
  onWarning?: (warning: ChunkStreamWarning) => void;
}

export interface ChunkStreamStats {
  chunks: { active: number; persisted: number };
}

/**
 * Terrain and placement settings shared by every component
 */
export interface ChunkStreamConfig {
  /** Side length of a chunk in world units */
  gridScale?: number;
  /** Radius, in chunks, within which chunks stay active */
  renderDistance?: number;
  /** Height the terrain steps are measured from */
  originHeight?: number;
  /** Terrain height quantum */
  heightStep?: number;
  /** Multiplier on the noise value (lower = flatter world) */
  heightVariationScale?: number;
  /** World units per unit of scaled noise */
  heightAmplitude?: number;
  /** Noise domain divisor (higher = smoother terrain) */
  terrainSmoothness?: number;
  /** Seed for terrain noise and object placement */
  worldSeed?: number;
  minTreesPerChunk?: number;
  maxTreesPerChunk?: number;
  /** Minimum planar distance between two objects of a chunk */
  minObjectDistance?: number;
  /** Candidate draws per object slot before the slot is skipped */
  maxPlacementAttempts?: number;
  /** Fraction of the chunk side, centered, that objects are placed in */
  placementSpread?: number;
  /** Vertical offset of objects above the chunk surface */
  groundClearance?: number;
  /** Minimum seconds between two processed ticks (0 = every tick) */
  cooldownSeconds?: number;
  maxEvictionsPerTick?: number;
  maxMaterializationsPerTick?: number;
}

export type RequiredChunkStreamConfig = Required<ChunkStreamConfig>;

/**
 * Settings of a world: terrain config plus its collaborators
 */
export interface ChunkWorldOptions<THandle, TArchetype> extends ChunkStreamConfig {
  composer: WorldComposer<THandle, TArchetype>;
  /** Monotonic clock in seconds, used for the tick cooldown */
  clock?: () => number;
  /** Random source in [0, 1) picking which queued chunk loads first; scan order when omitted */
  selectionRandom?: () => number;
  events?: ChunkStreamEvents;
}

export const DEFAULT_CHUNK_STREAM_CONFIG: RequiredChunkStreamConfig = {
  gridScale: 128,
  renderDistance: 6,
  originHeight: 0,
  heightStep: 4,
  heightVariationScale: 1,
  heightAmplitude: 10,
  terrainSmoothness: 3,
  worldSeed: 300,
  minTreesPerChunk: 2,
  maxTreesPerChunk: 7,
  minObjectDistance: 10,
  maxPlacementAttempts: 20,
  placementSpread: 0.8,
  groundClearance: 78.897,
  cooldownSeconds: 0,
  maxEvictionsPerTick: 3,
  maxMaterializationsPerTick: 1
};

const CONFIG_KEYS: ReadonlyArray<keyof RequiredChunkStreamConfig> = [
  'gridScale',
  'renderDistance',
  'originHeight',
  'heightStep',
  'heightVariationScale',
  'heightAmplitude',
  'terrainSmoothness',
  'worldSeed',
  'minTreesPerChunk',
  'maxTreesPerChunk',
  'minObjectDistance',
  'maxPlacementAttempts',
  'placementSpread',
  'groundClearance',
  'cooldownSeconds',
  'maxEvictionsPerTick',
  'maxMaterializationsPerTick'
];

/**
 * Fill missing settings with defaults and reject values no chunk could be built from
 */
export function resolveConfig(config: ChunkStreamConfig = {}): RequiredChunkStreamConfig {
  const resolved: RequiredChunkStreamConfig = { ...DEFAULT_CHUNK_STREAM_CONFIG };
  for (const key of CONFIG_KEYS) {
    const value = config[key];
    if (value !== undefined) resolved[key] = value;
  }

  for (const key of CONFIG_KEYS) {
    if (!Number.isFinite(resolved[key])) {
      throw new RangeError(`${key} must be a finite number, got ${resolved[key]}`);
    }
  }

  const integral: Array<keyof RequiredChunkStreamConfig> = [
    'renderDistance',
    'minTreesPerChunk',
    'maxTreesPerChunk',
    'maxPlacementAttempts',
    'maxEvictionsPerTick',
    'maxMaterializationsPerTick'
  ];
  for (const key of integral) {
    if (!Number.isInteger(resolved[key])) throw new RangeError(`${key} must be an integer, got ${resolved[key]}`);
  }

  const positive: Array<keyof RequiredChunkStreamConfig> = ['gridScale', 'heightStep', 'terrainSmoothness'];
  for (const key of positive) {
    if (resolved[key] <= 0) throw new RangeError(`${key} must be positive, got ${resolved[key]}`);
  }

  const nonNegative: Array<keyof RequiredChunkStreamConfig> = [
    'renderDistance',
    'minTreesPerChunk',
    'minObjectDistance',
    'maxPlacementAttempts',
    'cooldownSeconds',
    'maxEvictionsPerTick',
    'maxMaterializationsPerTick'
  ];
  for (const key of nonNegative) {
    if (resolved[key] < 0) throw new RangeError(`${key} must not be negative, got ${resolved[key]}`);
  }

  if (resolved.minTreesPerChunk > resolved.maxTreesPerChunk) {
    throw new RangeError(
      `minTreesPerChunk (${resolved.minTreesPerChunk}) exceeds maxTreesPerChunk (${resolved.maxTreesPerChunk})`
    );
  }
  if (resolved.placementSpread < 0 || resolved.placementSpread > 1) {
    throw new RangeError(`placementSpread must be within [0, 1], got ${resolved.placementSpread}`);
  }

  return resolved;
}
