import type { ChunkCoord, ObjectPlacement } from './ChunkData';
import type { RequiredChunkStreamConfig } from './types';
import { SeededRandom } from '../utils/SeededRandom';

type PlacementSettings = Pick<
  RequiredChunkStreamConfig,
  | 'gridScale'
  | 'worldSeed'
  | 'minTreesPerChunk'
  | 'maxTreesPerChunk'
  | 'minObjectDistance'
  | 'maxPlacementAttempts'
  | 'placementSpread'
  | 'groundClearance'
>;

const SEED_X_FACTOR = 1000;
const SEED_Z_FACTOR = 10;

/**
 * Seed of the placement stream of one chunk
 */
export function chunkPlacementSeed(coord: ChunkCoord, worldSeed: number): number {
  return coord.x * SEED_X_FACTOR + coord.z * SEED_Z_FACTOR + worldSeed;
}

/**
 * Scatters non-overlapping objects over a chunk by rejection sampling.
 * Every chunk draws from its own seeded stream, so the same coordinate always
 * yields the same placements. The list can come out shorter than the drawn
 * count when a slot runs out of attempts.
 */
export class ObjectPlacer {
  private readonly settings: PlacementSettings;

  constructor(settings: PlacementSettings) {
    this.settings = settings;
  }

  /**
   * Offsets are relative to the chunk, so the result does not depend on `height`;
   * it is accepted so callers can pass the chunk they are about to build.
   */
  generatePlacements(coord: ChunkCoord, height: number): ObjectPlacement[] {
    const {
      gridScale,
      worldSeed,
      minTreesPerChunk,
      maxTreesPerChunk,
      minObjectDistance,
      maxPlacementAttempts,
      placementSpread,
      groundClearance
    } = this.settings;

    const rng = new SeededRandom(chunkPlacementSeed(coord, worldSeed));
    const count = rng.rangeInt(minTreesPerChunk, maxTreesPerChunk);
    const span = gridScale * placementSpread;
    const minDistanceSq = minObjectDistance * minObjectDistance;
    const placements: ObjectPlacement[] = [];

    for (let slot = 0; slot < count; slot++) {
      for (let attempt = 0; attempt < maxPlacementAttempts; attempt++) {
        const offsetX = (rng.next() - 0.5) * span;
        const offsetZ = (rng.next() - 0.5) * span;
        if (this.isClear(placements, offsetX, offsetZ, minDistanceSq)) {
          placements.push({ offsetX, offsetY: groundClearance, offsetZ });
          break;
        }
      }
    }

    return placements;
  }

  private isClear(placed: readonly ObjectPlacement[], x: number, z: number, minDistanceSq: number): boolean {
    for (const other of placed) {
      const dx = x - other.offsetX;
      const dz = z - other.offsetZ;
      if (dx * dx + dz * dz < minDistanceSq) return false;
    }
    return true;
  }
}
