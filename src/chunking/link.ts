import type { Chunk } from "../types";

/**
 * Set prevChunkId/nextChunkId in one linear pass over chunks in document order.
 * A link never crosses a documentId change, so each document's run of chunks
 * starts and ends with a null link. Returns new chunk objects.
 */
export function linkChunks(chunks: Chunk[]): Chunk[] {
    return chunks.map((chunk, i) => {
        const prev = chunks[i - 1];
        const next = chunks[i + 1];

        return {
            ...chunk,
            prevChunkId: prev !== undefined && prev.documentId === chunk.documentId ? prev.id : null,
            nextChunkId: next !== undefined && next.documentId === chunk.documentId ? next.id : null,
        };
    });
}

function checkLink(
    chunk: Chunk,
    direction: "prev" | "next",
    byId: Map<string, Chunk>,
    violations: string[]
): void {
    const targetId = direction === "prev" ? chunk.prevChunkId : chunk.nextChunkId;
    if (targetId === null) return;

    const target = byId.get(targetId);
    if (target === undefined) {
        violations.push(`${chunk.id}: ${direction} link points to unknown chunk ${targetId}`);
        return;
    }

    if (target.documentId !== chunk.documentId) {
        violations.push(`${chunk.id}: ${direction} link crosses into document ${target.documentId}`);
        return;
    }

    const backLink = direction === "prev" ? target.nextChunkId : target.prevChunkId;
    if (backLink !== chunk.id) {
        violations.push(`${chunk.id}: ${direction} link to ${targetId} is not reciprocated`);
    }
}

/**
 * Link-consistency violations in a set of chunks; empty when the links are sound.
 * Checks that every link resolves, stays inside its document and is mirrored by
 * the target, and that each document has exactly one head and one tail.
 */
export function verifyChunkLinks(chunks: Chunk[]): string[] {
    const violations: string[] = [];
    const byId = new Map(chunks.map(chunk => [chunk.id, chunk]));
    const ends = new Map<string, { heads: number; tails: number }>();

    for (const chunk of chunks) {
        checkLink(chunk, "prev", byId, violations);
        checkLink(chunk, "next", byId, violations);

        const docEnds = ends.get(chunk.documentId) ?? { heads: 0, tails: 0 };
        if (chunk.prevChunkId === null) docEnds.heads++;
        if (chunk.nextChunkId === null) docEnds.tails++;
        ends.set(chunk.documentId, docEnds);
    }

    for (const [documentId, { heads, tails }] of ends) {
        if (heads !== 1) {
            violations.push(`${documentId}: expected 1 chunk without prev link, found ${heads}`);
        }
        if (tails !== 1) {
            violations.push(`${documentId}: expected 1 chunk without next link, found ${tails}`);
        }
    }

    return violations;
}
