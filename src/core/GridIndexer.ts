import type { ChunkCoord, ChunkKey } from './ChunkData';

/** Largest absolute cell index (exclusive) on either axis that keeps keys collision-free */
export const MAX_CELL_INDEX = 2 ** 25;

function inKeyRange(index: number): boolean {
  return index >= -MAX_CELL_INDEX && index < MAX_CELL_INDEX;
}

function zigzag(n: number): number {
  return n >= 0 ? n * 2 : -n * 2 - 1;
}

/**
 * Maps world positions onto the chunk grid
 */
export class GridIndexer {
  readonly gridScale: number;

  constructor(gridScale: number) {
    this.gridScale = gridScale;
  }

  /**
   * Round each axis to the nearest grid multiple, halves rounding up
   */
  snapToGrid(x: number, z: number): ChunkCoord {
    const scale = this.gridScale;
    return {
      x: Math.floor(x / scale + 0.5) * scale,
      z: Math.floor(z / scale + 0.5) * scale
    };
  }

  /**
   * Integer cell indices of the cell containing a coordinate
   */
  cellOf(coord: ChunkCoord): { i: number; j: number } {
    return {
      i: Math.floor(coord.x / this.gridScale + 0.5),
      j: Math.floor(coord.z / this.gridScale + 0.5)
    };
  }

  /**
   * Whether a coordinate lies in a cell that has a key
   */
  contains(coord: ChunkCoord): boolean {
    const { i, j } = this.cellOf(coord);
    return inKeyRange(i) && inKeyRange(j);
  }

  /**
   * Composite integer key: zigzag-encoded cell indices combined with Szudzik pairing.
   * Collision-free while both indices lie in [-MAX_CELL_INDEX, MAX_CELL_INDEX).
   * @throws RangeError for a coordinate outside that range
   */
  chunkKey(coord: ChunkCoord): ChunkKey {
    const { i, j } = this.cellOf(coord);
    if (!inKeyRange(i) || !inKeyRange(j)) {
      throw new RangeError(`cell (${i}, ${j}) is outside the key range [-${MAX_CELL_INDEX}, ${MAX_CELL_INDEX})`);
    }
    const a = zigzag(i);
    const b = zigzag(j);
    return a >= b ? a * a + a + b : b * b + a;
  }

  /**
   * Planar distance from a chunk coordinate to a world position
   */
  distance(coord: ChunkCoord, x: number, z: number): number {
    const dx = coord.x - x;
    const dz = coord.z - z;
    return Math.sqrt(dx * dx + dz * dz);
  }
}
