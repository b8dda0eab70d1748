export { SceneWorldComposer, ChunkSpawnError } from './SceneWorldComposer';
