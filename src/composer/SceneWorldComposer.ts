import { Group, Object3D } from 'three';
import type { SpawnRequest, WorldComposer } from '../core/types';

/**
 * Thrown when a chunk cannot be built at all (e.g. no usable floor archetype)
 */
export class ChunkSpawnError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChunkSpawnError';
  }
}

/**
 * Builds chunks in a three.js scene graph.
 * Each chunk becomes a Group holding a clone of the floor archetype and one clone
 * of the object archetype per placement. Clones share geometry and materials with
 * their archetype, so destroy only detaches the group.
 */
export class SceneWorldComposer implements WorldComposer<Group, Object3D> {
  private readonly parent: Object3D;

  constructor(parent: Object3D) {
    this.parent = parent;
  }

  spawn(request: SpawnRequest<Object3D>): Group {
    const { key, coord, height, placements, archetypes, warn } = request;
    const floor = archetypes.floor;
    if (!(floor instanceof Object3D)) {
      throw new ChunkSpawnError('floor archetype is missing or not an Object3D');
    }

    const chunk = new Group();
    chunk.name = `chunk:${key}`;
    chunk.position.set(coord.x, height, coord.z);
    chunk.userData.chunkKey = key;
    // Floor sits at the group origin
    chunk.add(floor.clone());

    const object = archetypes.object;
    placements.forEach((placement, index) => {
      if (!(object instanceof Object3D)) {
        warn(`object ${index} skipped: object archetype is missing or not an Object3D`);
        return;
      }
      try {
        const instance = object.clone();
        instance.position.set(placement.offsetX, placement.offsetY, placement.offsetZ);
        chunk.add(instance);
      } catch (error) {
        warn(`object ${index} skipped: ${error instanceof Error ? error.message : String(error)}`);
      }
    });

    this.parent.add(chunk);
    return chunk;
  }

  destroy(handle: Group): void {
    handle.removeFromParent();
  }
}
