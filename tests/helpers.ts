import { ChunkWorld } from '../src/core/ChunkWorld';
import type { ChunkStreamWarning, ChunkWorldOptions, SpawnRequest, WorldComposer } from '../src/core/types';

/**
 * Records spawn/destroy calls; handles are increasing integers
 */
export class FakeComposer implements WorldComposer<number, string> {
  spawned: SpawnRequest<string>[] = [];
  destroyed: number[] = [];
  /** Messages passed to request.warn for every placement */
  objectWarning: string | null = null;
  destroyError: Error | null = null;
  private nextHandle = 1;

  spawn(request: SpawnRequest<string>): number {
    if (!request.archetypes.floor) throw new Error('no floor archetype');
    if (this.objectWarning) {
      for (let i = 0; i < request.placements.length; i++) request.warn(this.objectWarning);
    }
    this.spawned.push(request);
    return this.nextHandle++;
  }

  destroy(handle: number): void {
    if (this.destroyError) throw this.destroyError;
    this.destroyed.push(handle);
  }
}

export interface TestWorld {
  world: ChunkWorld<number, string>;
  composer: FakeComposer;
  warnings: ChunkStreamWarning[];
}

export function createWorld(
  overrides: Partial<Omit<ChunkWorldOptions<number, string>, 'composer'>> = {},
  withArchetypes = true
): TestWorld {
  const composer = new FakeComposer();
  const warnings: ChunkStreamWarning[] = [];
  const world = new ChunkWorld<number, string>({
    renderDistance: 2,
    clock: () => 0,
    events: { onWarning: (warning) => warnings.push(warning) },
    ...overrides,
    composer
  });
  if (withArchetypes) world.settings({ floor: 'plains', object: 'tree' });
  return { world, composer, warnings };
}
