import { describe, expect, it, vi } from 'vitest';

import type { ChunkData } from '../src/core/ChunkData';
import { GridIndexer, MAX_CELL_INDEX } from '../src/core/GridIndexer';
import { PersistenceStore } from '../src/core/PersistenceStore';
import { ChunkSerializer, CHUNK_SAVE_VERSION } from '../src/utils/ChunkSerializer';

const grid = new GridIndexer(128);

function chunk(x: number, z: number, height: number, handle = 'handle'): ChunkData<string> {
  return {
    key: grid.chunkKey({ x, z }),
    coord: { x, z },
    height,
    placements: [
      { offsetX: 1.5, offsetY: 78.897, offsetZ: -20.25 },
      { offsetX: -33.125, offsetY: 78.897, offsetZ: 12 }
    ],
    handle
  };
}

function filledStore(): PersistenceStore {
  const store = new PersistenceStore(grid, 0);
  store.snapshot(chunk(0, 0, 4));
  store.snapshot(chunk(128, -256, -8));
  store.snapshot(chunk(-384, 512, 0));
  return store;
}

describe('PersistenceStore', () => {
  it('stores a handle-free copy of the chunk', () => {
    const store = new PersistenceStore(grid, 0);
    const source = chunk(128, 0, 12);
    const snapshot = store.snapshot(source);

    expect(snapshot).toEqual({ coord: { x: 128, z: 0 }, height: 12, placements: source.placements });
    expect('handle' in snapshot).toBe(false);

    source.placements[0].offsetX = 999;
    expect(store.get(source.key)?.placements[0].offsetX).toBe(1.5);
  });

  it('overwrites the previous snapshot of a key', () => {
    const store = new PersistenceStore(grid, 0);
    store.snapshot(chunk(0, 0, 4));
    store.snapshot({ ...chunk(0, 0, 16), placements: [] });
    expect(store.size).toBe(1);
    expect(store.get(grid.chunkKey({ x: 0, z: 0 }))).toEqual({ coord: { x: 0, z: 0 }, height: 16, placements: [] });
  });

  it('exports a deep copy', () => {
    const store = filledStore();
    const exported = store.exportAll();
    const key = grid.chunkKey({ x: 0, z: 0 });
    const entry = exported.get(key);
    if (!entry) throw new Error('missing entry');
    entry.height = 1000;
    entry.placements.length = 0;
    expect(store.get(key)?.height).toBe(4);
    expect(store.get(key)?.placements).toHaveLength(2);
  });

  it('restores exactly what was exported after a clear', () => {
    const store = filledStore();
    const exported = store.exportAll();

    store.clear();
    expect(store.size).toBe(0);

    store.importAll(exported);
    expect(store.exportAll()).toEqual(exported);
  });

  it('treats absent input as an empty store', () => {
    const store = filledStore();
    store.importAll(undefined);
    expect(store.size).toBe(0);

    const other = filledStore();
    other.importAll(null);
    expect(other.size).toBe(0);
  });

  it('substitutes the origin height for entries without one', () => {
    const store = new PersistenceStore(grid, 8);
    store.importAll(new Map([[1, { coord: { x: 256, z: 0 }, placements: [] }]]));
    expect(store.get(grid.chunkKey({ x: 256, z: 0 }))).toEqual({ coord: { x: 256, z: 0 }, height: 8, placements: [] });
  });

  it('drops unusable entries and malformed placements', () => {
    const store = new PersistenceStore(grid, 0);
    store.importAll(
      new Map<unknown, unknown>([
        ['a', 'junk'],
        ['b', { coord: { x: 'far', z: 0 }, height: 4 }],
        ['c', { height: 4 }],
        [
          'd',
          {
            coord: { x: 0, z: 128 },
            height: 4,
            placements: [{ offsetX: 1, offsetY: 2, offsetZ: 3 }, { offsetX: 1 }, null, 'tree']
          }
        ]
      ])
    );

    expect(store.size).toBe(1);
    expect(store.get(grid.chunkKey({ x: 0, z: 128 }))?.placements).toEqual([{ offsetX: 1, offsetY: 2, offsetZ: 3 }]);
  });

  it('re-keys imported entries from their snapped coordinate', () => {
    const store = new PersistenceStore(grid, 0);
    store.importAll(new Map([[999, { coord: { x: 130, z: -2 }, height: 4, placements: [] }]]));
    expect(store.has(999)).toBe(false);
    expect(store.get(grid.chunkKey({ x: 128, z: 0 }))?.coord).toEqual({ x: 128, z: 0 });
  });

  it('drops entries beyond the key range', () => {
    const store = new PersistenceStore(grid, 0);
    store.importAll(
      new Map([
        [1, { coord: { x: MAX_CELL_INDEX * 128, z: 0 }, height: 4, placements: [] }],
        [2, { coord: { x: 0, z: 128 }, height: 4, placements: [] }]
      ])
    );
    expect(store.size).toBe(1);
    expect(store.has(grid.chunkKey({ x: 0, z: 128 }))).toBe(true);
  });
});

describe('ChunkSerializer', () => {
  it('round-trips a persisted set through JSON', () => {
    const exported = filledStore().exportAll();
    const json = ChunkSerializer.toJSON(exported, 128);
    expect(ChunkSerializer.fromJSON(json, grid, 0)).toEqual(exported);
  });

  it('writes versioned save data', () => {
    const store = new PersistenceStore(grid, 0);
    store.snapshot({ ...chunk(128, 0, 4), placements: [{ offsetX: 1, offsetY: 2, offsetZ: 3 }] });
    expect(ChunkSerializer.serialize(store.exportAll(), 128)).toEqual({
      version: CHUNK_SAVE_VERSION,
      gridScale: 128,
      chunks: [{ x: 128, z: 0, height: 4, placements: [[1, 2, 3]] }]
    });
  });

  it('falls back to the origin height and skips broken entries', () => {
    const data = ChunkSerializer.deserialize(
      { version: 1, gridScale: 128, chunks: [{ x: 0, z: 0, placements: [[1, 2, 3], [1, 2]] }, { z: 5 }, 7] },
      grid,
      -4
    );
    expect(Array.from(data.values())).toEqual([
      { coord: { x: 0, z: 0 }, height: -4, placements: [{ offsetX: 1, offsetY: 2, offsetZ: 3 }] }
    ]);
  });

  it('returns an empty set for unreadable JSON', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    expect(ChunkSerializer.fromJSON('{not json', grid, 0).size).toBe(0);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it('returns an empty set for data without chunks', () => {
    expect(ChunkSerializer.deserialize({ version: 1 }, grid, 0).size).toBe(0);
    expect(ChunkSerializer.deserialize(null, grid, 0).size).toBe(0);
  });
});
