import type { Chunk, CleanedDocument, DocumentSource, SectionTree, SentenceRecord } from "./types";
import { cleanMarkdown, type CleanerConfig } from "./preprocessing/clean";
import { segmentDocument, type SentenceConfig } from "./preprocessing/segment";
import { hasNumber, hasUnit } from "./preprocessing/quantities";
import { chunkPages, type ChunkConfig } from "./chunking/chunks";
import type { PaperMetadata } from "./chunking/metadata";
import { linkChunks } from "./chunking/link";
import { createDocumentId } from "./utils/shared";
import Logger from "./utils/logger";

export interface PipelineConfig {
    cleaner?: CleanerConfig;
    sentences?: SentenceConfig;
    chunks?: ChunkConfig;
    debug?: boolean;
    /** Defaults to a private logger per call */
    logger?: Logger;
}

export interface SentenceIndexStats {
    sentenceCount: number;
    tableCount: number;
    sectionCount: number;
    droppedSentences: number;
}

export interface SentenceIndexResult {
    documentId: string;
    cleaned: CleanedDocument;
    tree: SectionTree;
    sentences: SentenceRecord[];
    stats: SentenceIndexStats;
}

export interface ChunkIndexStats {
    pageCount: number;
    chunkCount: number;
    skippedPages: number;
    droppedChunks: number;
}

export interface ChunkIndexResult {
    documentId: string;
    chunks: Chunk[];
    metadata: PaperMetadata;
    stats: ChunkIndexStats;
}

const DEFAULT_CONFIG: PipelineConfig = {
    cleaner: {},
    sentences: {},
    chunks: {},
    debug: false,
};

interface ResolvedConfig {
    cleaner: CleanerConfig;
    sentences: SentenceConfig;
    chunks: ChunkConfig;
    debug: boolean;
    logger: Logger;
}

/**
 * Deep merge configuration objects
 */
function mergeConfig(defaults: PipelineConfig, overrides: PipelineConfig): ResolvedConfig {
    return {
        cleaner: { ...defaults.cleaner, ...overrides.cleaner },
        sentences: { ...defaults.sentences, ...overrides.sentences },
        chunks: { ...defaults.chunks, ...overrides.chunks },
        debug: overrides.debug ?? defaults.debug ?? false,
        logger: overrides.logger ?? defaults.logger ?? new Logger(),
    };
}

/**
 * Sentence record id: document, section, paragraph and sentence position
 */
export function createSentenceId(documentId: string, record: Pick<SentenceRecord, "location">): string {
    const { sectionId, paragraphIndex, sentenceIndex } = record.location;
    return `${documentId}_${sectionId}_p${paragraphIndex}_s${sentenceIndex}`;
}

/**
 * Build the sentence-level index of a Markdown document:
 * clean, build the section tree, extract located sentences and tables.
 */
export function indexMarkdown(
    markdown: string,
    source: DocumentSource,
    config: PipelineConfig = {}
): SentenceIndexResult {
    const cfg = mergeConfig(DEFAULT_CONFIG, config);
    const { logger } = cfg;
    const documentId = createDocumentId(source.doi, source.filename);

    // Step 1: Clean
    const cleaned = logger.time("1. Clean markdown", () => cleanMarkdown(markdown, cfg.cleaner));

    // Step 2-3: Section tree + sentences
    const { tree, sentences, droppedCount } = logger.time(
        "2. Segment sentences",
        () => segmentDocument(cleaned, cfg.sentences)
    );

    const records: SentenceRecord[] = sentences.map(sentence => ({
        ...sentence,
        id: createSentenceId(documentId, sentence),
        documentId,
        doi: source.doi,
        hasNumber: hasNumber(sentence.text),
        hasUnit: hasUnit(sentence.text),
    }));

    const stats: SentenceIndexStats = {
        sentenceCount: records.filter(r => r.sentenceType === "text").length,
        tableCount: records.filter(r => r.sentenceType === "table").length,
        sectionCount: tree.flatList.length,
        droppedSentences: droppedCount,
    };

    logger.debug(
        `${source.filename}: ${stats.sentenceCount} sentences, ${stats.tableCount} tables, ` +
        `${stats.sectionCount} sections, ${stats.droppedSentences} dropped`,
        cfg.debug
    );

    return { documentId, cleaned, tree, sentences: records, stats };
}

/**
 * Build the chunk-level index of a document from its per-page text:
 * split each page into chunks, then link neighbors.
 */
export function indexPages(
    pages: string[],
    source: DocumentSource,
    config: PipelineConfig = {}
): ChunkIndexResult {
    const cfg = mergeConfig(DEFAULT_CONFIG, config);
    const { logger } = cfg;

    // Step 1: Chunk pages
    const result = logger.time("1. Chunk pages", () => chunkPages(pages, source, cfg.chunks));

    // Step 2: Link neighbors
    const chunks = logger.time("2. Link chunks", () => linkChunks(result.chunks));

    const stats: ChunkIndexStats = {
        pageCount: pages.length,
        chunkCount: chunks.length,
        skippedPages: result.skippedPages,
        droppedChunks: result.droppedChunks,
    };

    if (chunks.length === 0) {
        logger.warn(`${source.filename}: no chunks produced from ${stats.pageCount} pages`);
    }

    logger.debug(
        `${source.filename}: ${stats.chunkCount} chunks from ${stats.pageCount} pages, ` +
        `${stats.skippedPages} pages skipped, ${stats.droppedChunks} fragments dropped`,
        cfg.debug
    );

    return {
        documentId: result.documentId,
        chunks,
        metadata: result.metadata,
        stats,
    };
}
