import type { ChunkStore } from "../store/chunk-store";
import { normalizeWhitespace } from "../utils/shared";

export interface LocateConfig {
    /** Leading characters of the sentence that must appear in the chunk */
    prefixLength?: number;
}

export const DEFAULT_LOCATE_CONFIG: Required<LocateConfig> = {
    prefixLength: 50,
};

export interface ChunkLocation {
    found: true;
    chunkId: string;
    page: number;
    chunkIndexInPage: number;
    totalChunksInPage: number;
}

export interface LocationUnknown {
    found: false;
    reason: string;
}

export type LocateResult = ChunkLocation | LocationUnknown;

export const NO_LOCATION_TEXT = "No precise location available";

/**
 * Map a sentence-level hit to the chunk (and page) that contains it.
 *
 * Heuristic: a chunk of the same DOI whose text contains the first
 * `prefixLength` characters of the sentence, whitespace-normalized on both
 * sides. When several chunks match, the lowest chunkIndexGlobal wins. It
 * misses whenever the two indexes were cleaned differently enough to break the
 * prefix, so absence is reported as a result, never thrown.
 */
export async function locateSentence(
    store: ChunkStore,
    sentence: string,
    doi: string,
    config: LocateConfig = {}
): Promise<LocateResult> {
    const { prefixLength } = { ...DEFAULT_LOCATE_CONFIG, ...config };

    const prefix = normalizeWhitespace(sentence).slice(0, prefixLength);
    if (prefix.length === 0) {
        return { found: false, reason: "empty sentence" };
    }

    const chunks = await store.getChunksByDoi(doi);
    if (chunks.length === 0) {
        return { found: false, reason: `no chunks stored for ${doi}` };
    }

    let best: ChunkLocation | null = null;
    let bestIndex = Infinity;

    for (const chunk of chunks) {
        if (chunk.chunkIndexGlobal >= bestIndex) continue;
        if (!normalizeWhitespace(chunk.text).includes(prefix)) continue;

        bestIndex = chunk.chunkIndexGlobal;
        best = {
            found: true,
            chunkId: chunk.id,
            page: chunk.page,
            chunkIndexInPage: chunk.chunkIndexInPage,
            totalChunksInPage: chunk.totalChunksInPage,
        };
    }

    return best ?? { found: false, reason: "no chunk contains the sentence prefix" };
}

/**
 * Citation text shown beside an answer
 */
export function describeLocation(result: LocateResult): string {
    if (!result.found) return NO_LOCATION_TEXT;
    return `Page ${result.page}, paragraph ${result.chunkIndexInPage + 1}`;
}
