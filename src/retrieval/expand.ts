import type { Chunk, ContextWindow } from "../types";
import type { ChunkStore } from "../store/chunk-store";
import { NotFoundError } from "../errors";

export interface ExpandConfig {
    /** Joins chunk texts in fullText */
    separator?: string;
}

const DEFAULT_CONFIG: Required<ExpandConfig> = {
    separator: "\n\n",
};

/**
 * Follow one direction of the link chain for up to `steps` hops.
 * Stops early at a null link or a link whose target is missing from storage.
 */
async function walk(
    store: ChunkStore,
    start: Chunk,
    direction: "prev" | "next",
    steps: number
): Promise<Chunk[]> {
    const collected: Chunk[] = [];
    let current = start;

    for (let i = 0; i < steps; i++) {
        const nextId = direction === "prev" ? current.prevChunkId : current.nextChunkId;
        if (nextId === null) break;

        const neighbor = await store.getChunk(nextId);
        if (neighbor === null) break;

        collected.push(neighbor);
        current = neighbor;
    }

    return collected;
}

function rangeOf(values: number[]): { min: number; max: number } {
    return { min: Math.min(...values), max: Math.max(...values) };
}

/**
 * Assemble a window of up to `window` linked neighbors on each side of a stored chunk.
 * Throws NotFoundError for an unknown chunk id; window 0 yields the chunk alone.
 */
export async function expandContext(
    store: ChunkStore,
    chunkId: string,
    window: number,
    config: ExpandConfig = {}
): Promise<ContextWindow> {
    const { separator } = { ...DEFAULT_CONFIG, ...config };

    if (!Number.isInteger(window) || window < 0) {
        throw new RangeError(`window must be a non-negative integer, got ${window}`);
    }

    const main = await store.getChunk(chunkId);
    if (main === null) {
        throw new NotFoundError("chunk", chunkId);
    }

    const before = await walk(store, main, "prev", window);
    const after = await walk(store, main, "next", window);
    const chunks = [...before.reverse(), main, ...after];

    return {
        mainChunkId: main.id,
        chunks,
        mainChunkIndex: before.length,
        pageRange: rangeOf(chunks.map(c => c.page)),
        globalIndexRange: rangeOf(chunks.map(c => c.chunkIndexGlobal)),
        fullText: chunks.map(c => c.text).join(separator),
        mainText: main.text,
    };
}
