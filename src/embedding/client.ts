/**
 * Embedding service boundary. Chunk texts go out, one vector per text comes back;
 * vector contents are never inspected here.
 */

import { z } from "zod";
import type { Chunk } from "../types";
import { UpstreamUnavailableError, errorMessage } from "../errors";

export interface EmbeddingClient {
    embed(texts: string[]): Promise<number[][]>;
}

export interface HttpEmbeddingOptions {
    /** Service root; requests go to `<baseUrl>/v1/embeddings` */
    baseUrl: string;
    model?: string;
    timeout?: number;
}

const SERVICE = "embedding service";

const embeddingResponseSchema = z.object({
    data: z.array(z.object({ embedding: z.array(z.number()) })),
});

/**
 * Client for an OpenAI-style `/v1/embeddings` endpoint
 */
export class HttpEmbeddingClient implements EmbeddingClient {
    private readonly endpoint: string;
    private readonly model: string | undefined;
    private readonly timeout: number;

    constructor(options: HttpEmbeddingOptions) {
        this.endpoint = new URL("/v1/embeddings", options.baseUrl).toString();
        this.model = options.model;
        this.timeout = options.timeout ?? 120000;
    }

    async embed(texts: string[]): Promise<number[][]> {
        if (texts.length === 0) return [];

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.timeout);

        try {
            const response = await fetch(this.endpoint, {
                method: "POST",
                signal: controller.signal,
                headers: {
                    "Content-Type": "application/json",
                    "Accept": "application/json",
                },
                body: JSON.stringify(this.model === undefined ? { input: texts } : { input: texts, model: this.model }),
            });

            if (!response.ok) {
                throw new UpstreamUnavailableError(SERVICE, `returned ${response.status}: ${response.statusText}`);
            }

            const parsed = embeddingResponseSchema.safeParse(await response.json());
            if (!parsed.success) {
                throw new UpstreamUnavailableError(SERVICE, "unexpected response shape");
            }

            const vectors = parsed.data.data.map(item => item.embedding);
            if (vectors.length !== texts.length) {
                throw new UpstreamUnavailableError(SERVICE, `expected ${texts.length} vectors, got ${vectors.length}`);
            }

            return vectors;
        } catch (error) {
            if (error instanceof UpstreamUnavailableError) throw error;
            if (error instanceof Error && error.name === "AbortError") {
                throw new UpstreamUnavailableError(SERVICE, `request timed out after ${this.timeout}ms`, { cause: error });
            }
            throw new UpstreamUnavailableError(SERVICE, errorMessage(error), { cause: error });
        } finally {
            clearTimeout(timeoutId);
        }
    }
}

export interface ChunkEmbedding {
    chunkId: string;
    vector: number[];
}

/**
 * Embed chunk texts in batches, pairing each chunk id with its vector
 */
export async function embedChunks(
    client: EmbeddingClient,
    chunks: Chunk[],
    batchSize: number = 128
): Promise<ChunkEmbedding[]> {
    if (!Number.isInteger(batchSize) || batchSize <= 0) {
        throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
    }

    const embeddings: ChunkEmbedding[] = [];

    for (let start = 0; start < chunks.length; start += batchSize) {
        const batch = chunks.slice(start, start + batchSize);
        const vectors = await client.embed(batch.map(chunk => chunk.text));

        if (vectors.length !== batch.length) {
            throw new UpstreamUnavailableError(SERVICE, `expected ${batch.length} vectors, got ${vectors.length}`);
        }

        batch.forEach((chunk, i) => {
            embeddings.push({ chunkId: chunk.id, vector: vectors[i] ?? [] });
        });
    }

    return embeddings;
}
