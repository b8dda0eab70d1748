export { SeededRandom } from './SeededRandom';
export { PerlinNoise } from './PerlinNoise';
export { ChunkSerializer, CHUNK_SAVE_VERSION } from './ChunkSerializer';
export type { ChunkSaveData, SerializedChunk } from './ChunkSerializer';
