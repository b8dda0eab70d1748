import type { GridIndexer } from '../core/GridIndexer';
import { sanitizeSnapshot, type PersistedChunkData } from '../core/PersistenceStore';

export const CHUNK_SAVE_VERSION = 1;

/**
 * Serialized chunk (JSON-safe version of ChunkSnapshot)
 */
export interface SerializedChunk {
    x: number;
    z: number;
    height: number;
    /** [offsetX, offsetY, offsetZ] per object */
    placements: [number, number, number][];
}

/**
 * Serialized persisted set
 */
export interface ChunkSaveData {
    version: number;
    /** Grid scale the coordinates were written with */
    gridScale: number;
    chunks: SerializedChunk[];
}

function isTriple(value: unknown): value is [number, number, number] {
    return Array.isArray(value) && value.length === 3 && value.every((n) => typeof n === 'number');
}

/**
 * Utility class for moving persisted chunk data to and from JSON
 */
export class ChunkSerializer {
    /**
     * Serialize a persisted set to a JSON-safe object
     */
    static serialize(data: PersistedChunkData, gridScale: number): ChunkSaveData {
        const chunks: SerializedChunk[] = [];
        for (const snapshot of data.values()) {
            chunks.push({
                x: snapshot.coord.x,
                z: snapshot.coord.z,
                height: snapshot.height,
                placements: snapshot.placements.map((p) => [p.offsetX, p.offsetY, p.offsetZ])
            });
        }
        return { version: CHUNK_SAVE_VERSION, gridScale, chunks };
    }

    /**
     * Rebuild a persisted set. Entries go through the same sanitizing as
     * PersistenceStore.importAll; anything unreadable yields an empty map.
     */
    static deserialize(saveData: unknown, grid: GridIndexer, originHeight: number): PersistedChunkData {
        const result: PersistedChunkData = new Map();
        if (typeof saveData !== 'object' || saveData === null || !('chunks' in saveData)) return result;
        const { chunks } = saveData;
        if (!Array.isArray(chunks)) return result;

        for (const entry of chunks) {
            if (typeof entry !== 'object' || entry === null) continue;
            const raw: Record<string, unknown> = { ...entry };
            const placements = Array.isArray(raw.placements)
                ? raw.placements
                      .filter(isTriple)
                      .map(([offsetX, offsetY, offsetZ]) => ({ offsetX, offsetY, offsetZ }))
                : [];
            const snapshot = sanitizeSnapshot(
                { coord: { x: raw.x, z: raw.z }, height: raw.height, placements },
                grid,
                originHeight
            );
            if (snapshot) result.set(grid.chunkKey(snapshot.coord), snapshot);
        }
        return result;
    }

    /**
     * Serialize to JSON string
     */
    static toJSON(data: PersistedChunkData, gridScale: number): string {
        return JSON.stringify(this.serialize(data, gridScale), null, 2);
    }

    /**
     * Deserialize from JSON string
     */
    static fromJSON(json: string, grid: GridIndexer, originHeight: number): PersistedChunkData {
        let parsed: unknown;
        try {
            parsed = JSON.parse(json);
        } catch (error) {
            console.warn(`Ignoring unreadable chunk save data: ${error instanceof Error ? error.message : String(error)}`);
            return new Map();
        }
        return this.deserialize(parsed, grid, originHeight);
    }
}
