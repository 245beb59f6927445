import * as fs from "fs";
import { z } from "zod";
import type { Chunk } from "../types";
import { UpstreamUnavailableError, errorMessage } from "../errors";

/**
 * Read side of the chunk-level index. Context expansion and the
 * cross-granularity locator need nothing else from storage.
 */
export interface ChunkStore {
    getChunk(id: string): Promise<Chunk | null>;
    /** Chunks of one document, ordered by chunkIndexGlobal */
    getChunksByDoi(doi: string): Promise<Chunk[]>;
}

function byGlobalIndex(a: Chunk, b: Chunk): number {
    return a.chunkIndexGlobal - b.chunkIndexGlobal;
}

export class InMemoryChunkStore implements ChunkStore {
    private readonly byId = new Map<string, Chunk>();

    constructor(chunks: Chunk[] = []) {
        this.add(chunks);
    }

    /**
     * Insert or replace chunks by id
     */
    add(chunks: Chunk[]): void {
        for (const chunk of chunks) {
            this.byId.set(chunk.id, chunk);
        }
    }

    get size(): number {
        return this.byId.size;
    }

    async getChunk(id: string): Promise<Chunk | null> {
        return this.byId.get(id) ?? null;
    }

    async getChunksByDoi(doi: string): Promise<Chunk[]> {
        return [...this.byId.values()].filter(chunk => chunk.doi === doi).sort(byGlobalIndex);
    }
}

export const chunkSchema = z.object({
    id: z.string().min(1),
    documentId: z.string(),
    text: z.string(),
    doi: z.string(),
    filename: z.string(),
    page: z.number().int().positive(),
    chunkIndexInPage: z.number().int().nonnegative(),
    totalChunksInPage: z.number().int().positive(),
    chunkIndexGlobal: z.number().int().nonnegative(),
    prevChunkId: z.string().nullable(),
    nextChunkId: z.string().nullable(),
    sourceTextSnippet: z.string(),
    charCount: z.number().int().nonnegative(),
    textHash: z.string(),
    year: z.number().int().nullable(),
    journal: z.string().nullable(),
});

const chunkFileSchema = z.array(chunkSchema);

/**
 * Chunk store backed by a JSON array of chunk records on disk.
 * The file is read and validated once, then served from memory.
 */
export class JsonChunkStore implements ChunkStore {
    private constructor(
        readonly path: string,
        private readonly memory: InMemoryChunkStore
    ) {}

    static async load(path: string): Promise<JsonChunkStore> {
        let raw: string;
        try {
            raw = await fs.promises.readFile(path, "utf-8");
        } catch (error) {
            throw new UpstreamUnavailableError("chunk store", `cannot read ${path}: ${errorMessage(error)}`, { cause: error });
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch (error) {
            throw new UpstreamUnavailableError("chunk store", `${path} is not valid JSON: ${errorMessage(error)}`, { cause: error });
        }

        const result = chunkFileSchema.safeParse(parsed);
        if (!result.success) {
            const issue = result.error.issues[0];
            const where = issue !== undefined ? ` at ${issue.path.join(".")}: ${issue.message}` : "";
            throw new UpstreamUnavailableError("chunk store", `${path} does not hold chunk records${where}`);
        }

        return new JsonChunkStore(path, new InMemoryChunkStore(result.data));
    }

    /**
     * Write chunks as a JSON array the store can load back
     */
    static async save(path: string, chunks: Chunk[]): Promise<void> {
        try {
            await fs.promises.writeFile(path, JSON.stringify(chunks, null, 2) + "\n", "utf-8");
        } catch (error) {
            throw new UpstreamUnavailableError("chunk store", `cannot write ${path}: ${errorMessage(error)}`, { cause: error });
        }
    }

    get size(): number {
        return this.memory.size;
    }

    getChunk(id: string): Promise<Chunk | null> {
        return this.memory.getChunk(id);
    }

    getChunksByDoi(doi: string): Promise<Chunk[]> {
        return this.memory.getChunksByDoi(doi);
    }
}
