import type { Chunk, DocumentSource } from "../types";
import { createDocumentId, md5, truncateText } from "../utils/shared";
import { inferPaperMetadata, type PaperMetadata } from "./metadata";
import { DEFAULT_SPLITTER_CONFIG, splitText, type SplitterConfig } from "./splitter";

export interface ChunkConfig extends SplitterConfig {
    /** Pages whose cleaned text is shorter are skipped as blank */
    minPageLength?: number;
    /** Split fragments shorter than this are discarded */
    minChunkLength?: number;
    /** Length of the display prefix stored on each chunk */
    snippetLength?: number;
    /** Cut the document at its References/Bibliography heading */
    stopAtReferences?: boolean;
}

export const DEFAULT_CHUNK_CONFIG: Required<ChunkConfig> = {
    ...DEFAULT_SPLITTER_CONFIG,
    minPageLength: 50,
    minChunkLength: 30,
    snippetLength: 200,
    stopAtReferences: false,
};

export interface ChunkingResult {
    documentId: string;
    chunks: Chunk[];
    metadata: PaperMetadata;
    /** Blank pages, plus pages after the references cut */
    skippedPages: number;
    /** Fragments below minChunkLength */
    droppedChunks: number;
}

const REFERENCES_HEADING_PATTERN = /^[ \t]*(?:#{1,6}[ \t]*)?(?:\d+\.?[ \t]*)?(?:references?|bibliography)[ \t]*$/im;

/**
 * Normalize raw page text: rejoin words hyphenated across lines, collapse runs
 * of spaces, and cap blank-line runs at one so paragraph breaks survive.
 */
export function cleanPageText(text: string): string {
    return text
        .replace(/\r\n?/g, "\n")
        .replace(/([A-Za-z])-\n([a-z])/g, "$1$2")
        .replace(/[^\S\n]+/g, " ")
        .replace(/ ?\n ?/g, "\n")
        .replace(/\n{3,}/g, "\n\n")
        .trim();
}

/**
 * Text before the references heading, or null when the page has none
 */
export function cutAtReferences(text: string): string | null {
    const match = REFERENCES_HEADING_PATTERN.exec(text);
    return match ? text.slice(0, match.index).trim() : null;
}

/**
 * Split a document's pages into page-anchored chunks.
 *
 * Indices count only kept chunks, so `chunkIndexInPage` runs 0..total-1 on every
 * page and `chunkIndexGlobal` orders chunks by (page, chunkIndexInPage).
 * Chunks come back unlinked; see `linkChunks`.
 */
export function chunkPages(
    pages: string[],
    source: DocumentSource,
    config: ChunkConfig = {}
): ChunkingResult {
    const cfg = { ...DEFAULT_CHUNK_CONFIG, ...config };
    const documentId = createDocumentId(source.doi, source.filename);
    const chunks: Chunk[] = [];
    let metadata: PaperMetadata | null = null;
    let skippedPages = 0;
    let droppedChunks = 0;
    let globalIndex = 0;
    let reachedReferences = false;

    for (const [pageIndex, rawPage] of pages.entries()) {
        if (reachedReferences) {
            skippedPages++;
            continue;
        }

        let text = cleanPageText(rawPage);

        if (cfg.stopAtReferences) {
            const cut = cutAtReferences(text);
            if (cut !== null) {
                text = cut;
                reachedReferences = true;
            }
        }

        if (text.length < cfg.minPageLength) {
            skippedPages++;
            continue;
        }

        metadata ??= inferPaperMetadata(text);
        const paperMetadata = metadata;

        const fragments = splitText(text, cfg);
        const kept = fragments.filter(fragment => fragment.length >= cfg.minChunkLength);
        droppedChunks += fragments.length - kept.length;

        const page = pageIndex + 1;
        kept.forEach((chunkText, chunkIndexInPage) => {
            chunks.push({
                id: `${documentId}_p${page}_c${chunkIndexInPage}`,
                documentId,
                text: chunkText,
                doi: source.doi,
                filename: source.filename,
                page,
                chunkIndexInPage,
                totalChunksInPage: kept.length,
                chunkIndexGlobal: globalIndex++,
                prevChunkId: null,
                nextChunkId: null,
                sourceTextSnippet: truncateText(chunkText, cfg.snippetLength),
                charCount: chunkText.length,
                textHash: md5(chunkText),
                year: paperMetadata.year,
                journal: paperMetadata.journal,
            });
        });
    }

    return {
        documentId,
        chunks,
        metadata: metadata ?? { year: null, journal: null },
        skippedPages,
        droppedChunks,
    };
}

/**
 * Ordered, unlinked chunks for a document's pages
 */
export function buildChunks(
    pages: string[],
    source: DocumentSource,
    config: ChunkConfig = {}
): Chunk[] {
    return chunkPages(pages, source, config).chunks;
}
