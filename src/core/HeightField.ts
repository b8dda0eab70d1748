import type { ChunkCoord } from './ChunkData';
import type { RequiredChunkStreamConfig } from './types';
import { PerlinNoise } from '../utils/PerlinNoise';

type HeightSettings = Pick<
  RequiredChunkStreamConfig,
  'originHeight' | 'heightStep' | 'heightVariationScale' | 'heightAmplitude' | 'terrainSmoothness' | 'worldSeed'
>;

/**
 * Stepped terrain height per chunk, a pure function of the chunk coordinate
 */
export class HeightField {
  private readonly settings: HeightSettings;
  private readonly noise: PerlinNoise;

  constructor(settings: HeightSettings) {
    this.settings = settings;
    this.noise = new PerlinNoise(settings.worldSeed);
  }

  /**
   * Raw noise in [-1, 1] for a coordinate
   */
  sample(coord: ChunkCoord): number {
    const { terrainSmoothness, worldSeed } = this.settings;
    return this.noise.noise3D(coord.x / terrainSmoothness, coord.z / terrainSmoothness, worldSeed);
  }

  computeHeight(coord: ChunkCoord): number {
    const { originHeight, heightStep, heightVariationScale, heightAmplitude } = this.settings;
    const variation = this.sample(coord) * heightVariationScale * heightAmplitude;
    // + 0 folds -0 into 0
    return originHeight + Math.floor(variation / heightStep) * heightStep + 0;
  }
}
