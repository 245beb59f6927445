/**
 * Tool bodies for the MCP server, rendering results as Markdown text
 */

import type { ChunkStore } from "../store/chunk-store";
import type { ContextWindow } from "../types";
import { expandContext } from "../retrieval/expand";
import { describeLocation, locateSentence } from "../retrieval/locate";
import { NotFoundError } from "../errors";

function formatRange(min: number, max: number): string {
    return min === max ? `${min}` : `${min}-${max}`;
}

export function formatContextWindow(window: ContextWindow): string {
    const lines: string[] = [
        `## Context for ${window.mainChunkId}`,
        `Pages ${formatRange(window.pageRange.min, window.pageRange.max)}, ` +
        `chunks ${formatRange(window.globalIndexRange.min, window.globalIndexRange.max)}`,
    ];

    window.chunks.forEach((chunk, i) => {
        const marker = i === window.mainChunkIndex ? " (requested)" : "";
        lines.push("", `### Page ${chunk.page}, paragraph ${chunk.chunkIndexInPage + 1}${marker}`, chunk.text);
    });

    return lines.join("\n");
}

export async function expandChunkContextTool(
    store: ChunkStore,
    chunkId: string,
    window: number
): Promise<string> {
    try {
        return formatContextWindow(await expandContext(store, chunkId, window));
    } catch (error) {
        if (error instanceof NotFoundError) {
            return `Chunk not found: ${chunkId}`;
        }
        throw error;
    }
}

export async function locateSentenceTool(
    store: ChunkStore,
    sentence: string,
    doi: string,
    prefixLength: number
): Promise<string> {
    const result = await locateSentence(store, sentence, doi, { prefixLength });
    if (!result.found) {
        return `${describeLocation(result)} (${result.reason})`;
    }
    return `${describeLocation(result)}\nChunk: ${result.chunkId}`;
}
