export type RemovalKind =
    | "images"
    | "htmlTags"
    | "residualHtml"
    | "metadataLines"
    | "dehyphenatedWords"
    | "mergedLines";

export type RemovalCounts = Record<RemovalKind, number>;

export interface TableBlock {
    content: string;
    headers: string[];
    rows: number; // data rows, excluding header and separator
    columns: number;
    startLine: number;
    endLine: number;
}

export interface CleanedDocument {
    text: string;
    tables: TableBlock[];
    removedCounts: RemovalCounts;
    originalLineCount: number;
    cleanedLineCount: number;
}

/**
 * Heading-derived section. Nodes live in a flat arena (`SectionTree.nodes`);
 * `parent` and `children` are indices into that arena.
 */
export interface SectionNode {
    id: string;
    index: number;
    title: string;
    level: number; // 0 = synthetic root
    startLine: number;
    endLine: number;
    parent: number | null;
    children: number[];
}

export interface SectionTree {
    nodes: SectionNode[];
    root: SectionNode;
    flatList: SectionNode[]; // document order, root excluded
}

export interface LineRange {
    start: number;
    end: number;
}

export interface LocationMetadata {
    sectionPath: string[];
    sectionId: string;
    paragraphIndex: number;
    sentenceIndex: number;
    lineRange: LineRange;
    pageReference: string | null;
}

export type SentenceType = "text" | "table";

export interface Sentence {
    text: string;
    sentenceType: SentenceType;
    location: LocationMetadata;
}

export interface SentenceRecord extends Sentence {
    id: string;
    documentId: string;
    doi: string;
    hasNumber: boolean;
    /** A number followed by a measurement unit */
    hasUnit: boolean;
}

export interface Chunk {
    id: string;
    documentId: string;
    text: string;
    doi: string;
    filename: string;
    page: number; // 1-based
    chunkIndexInPage: number;
    totalChunksInPage: number;
    chunkIndexGlobal: number;
    prevChunkId: string | null;
    nextChunkId: string | null;
    sourceTextSnippet: string;
    charCount: number;
    textHash: string;
    year: number | null;
    journal: string | null;
}

export interface NumericRange {
    min: number;
    max: number;
}

export interface ContextWindow {
    mainChunkId: string;
    chunks: Chunk[];
    mainChunkIndex: number;
    pageRange: NumericRange;
    globalIndexRange: NumericRange;
    fullText: string;
    mainText: string;
}

export interface DocumentSource {
    doi: string;
    filename: string;
}
