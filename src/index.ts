export type {
    Chunk,
    CleanedDocument,
    ContextWindow,
    DocumentSource,
    LineRange,
    LocationMetadata,
    NumericRange,
    RemovalCounts,
    RemovalKind,
    SectionNode,
    SectionTree,
    Sentence,
    SentenceRecord,
    SentenceType,
    TableBlock,
} from "./types";

export { NotFoundError, UpstreamUnavailableError } from "./errors";

export {
    cleanMarkdown,
    DEFAULT_CLEANER_CONFIG,
    type CleanerConfig,
} from "./preprocessing/clean";
export { identifyTables } from "./preprocessing/tables";
export {
    buildSectionTree,
    findSectionAtLine,
    getChildren,
    getSectionPath,
    ROOT_SECTION_ID,
} from "./preprocessing/sections";
export {
    extractPageReference,
    extractSentences,
    segmentDocument,
    splitIntoSentences,
    DEFAULT_SENTENCE_CONFIG,
    type SegmentationResult,
    type SentenceConfig,
} from "./preprocessing/segment";
export { hasNumber, hasUnit } from "./preprocessing/quantities";

export { splitText, DEFAULT_SPLITTER_CONFIG, type SplitterConfig } from "./chunking/splitter";
export {
    buildChunks,
    chunkPages,
    cleanPageText,
    DEFAULT_CHUNK_CONFIG,
    type ChunkConfig,
    type ChunkingResult,
} from "./chunking/chunks";
export { inferPaperMetadata, type PaperMetadata } from "./chunking/metadata";
export { linkChunks, verifyChunkLinks } from "./chunking/link";

export { expandContext, type ExpandConfig } from "./retrieval/expand";
export {
    describeLocation,
    locateSentence,
    NO_LOCATION_TEXT,
    type ChunkLocation,
    type LocateConfig,
    type LocateResult,
    type LocationUnknown,
} from "./retrieval/locate";

export {
    InMemoryChunkStore,
    JsonChunkStore,
    type ChunkStore,
} from "./store/chunk-store";
export {
    embedChunks,
    HttpEmbeddingClient,
    type ChunkEmbedding,
    type EmbeddingClient,
    type HttpEmbeddingOptions,
} from "./embedding/client";

export {
    createSentenceId,
    indexMarkdown,
    indexPages,
    type ChunkIndexResult,
    type ChunkIndexStats,
    type PipelineConfig,
    type SentenceIndexResult,
    type SentenceIndexStats,
} from "./pipeline";
export { processBatch, type BatchItemResult, type BatchOptions, type BatchOutcome } from "./batch";
export { createDocumentId } from "./utils/shared";
export { default as Logger } from "./utils/logger";
