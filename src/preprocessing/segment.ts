import type {
    CleanedDocument,
    LocationMetadata,
    Sentence,
    SectionNode,
    SectionTree,
    TableBlock,
} from "../types";
import { buildSectionTree, getSectionPath } from "./sections";
import { identifyTables } from "./tables";
import { countWords, normalizeWhitespace, splitLines } from "../utils/shared";

export interface SentenceConfig {
    /** Candidates with fewer words are dropped */
    minWords?: number;
    /** Stop at a References/Bibliography heading */
    stopAtReferences?: boolean;
}

export const DEFAULT_SENTENCE_CONFIG: Required<SentenceConfig> = {
    minWords: 3,
    stopAtReferences: true,
};

// Tokens that end in a period without ending a sentence
const ABBREVIATIONS = new Set([
    "mr", "mrs", "ms", "dr", "prof", "sr", "jr", "vs", "etc", "inc", "ltd",
    "st", "e.g", "i.e", "cf", "al", "fig", "figs", "eq", "eqs", "ref", "refs",
    "no", "vol", "pp", "approx", "ca", "resp", "tab", "sec", "ch", "dept", "univ",
]);

const TERMINATORS = new Set([".", "!", "?"]);
const CLOSERS = new Set(["\"", "'", "”", "’", ")"]);

/** `[12]`, `[3-7]`, `[1, 4]` directly after sentence-ending punctuation */
const TRAILING_CITATION_PATTERN = /^ ?\[\d+(?:\s*[-–,]\s*\d+)*\]/;
const NEXT_SENTENCE_PATTERN = /^ \p{Lu}/u;
const WORD_BEFORE_PERIOD_PATTERN = /([A-Za-z]+(?:\.[A-Za-z]+)*)\.$/;
const PAGE_MARKER_PATTERN = /page_(\d+)/;
const REFERENCES_TITLE_PATTERN = /^(?:\d+\.?\s*)?(?:references?|bibliography)$/i;

function endsWithAbbreviation(text: string): boolean {
    const word = WORD_BEFORE_PERIOD_PATTERN.exec(text)?.[1]?.toLowerCase();
    return word !== undefined && ABBREVIATIONS.has(word);
}

/**
 * Split a paragraph into sentences.
 *
 * A terminator ends a sentence only when followed by whitespace and an uppercase
 * letter, or by the end of the text. Periods after known abbreviations never end
 * one, and decimals never do since they are not followed by whitespace. A citation
 * marker right after the terminator stays with the sentence it follows.
 */
export function splitIntoSentences(text: string): string[] {
    const normalized = normalizeWhitespace(text);
    if (normalized.length === 0) return [];

    const sentences: string[] = [];
    let start = 0;
    let i = 0;

    while (i < normalized.length) {
        const char = normalized[i];

        if (char !== undefined && TERMINATORS.has(char)) {
            let end = i + 1;
            while (end < normalized.length && CLOSERS.has(normalized[end] ?? "")) {
                end++;
            }

            const citation = TRAILING_CITATION_PATTERN.exec(normalized.slice(end));
            if (citation) {
                end += citation[0].length;
            }

            const atEnd = end >= normalized.length;
            const boundary = atEnd || NEXT_SENTENCE_PATTERN.test(normalized.slice(end));
            const abbreviated = char === "." && endsWithAbbreviation(normalized.slice(start, i + 1));

            if (boundary && !abbreviated) {
                const sentence = normalized.slice(start, end).trim();
                if (sentence.length > 0) {
                    sentences.push(sentence);
                }
                start = end;
                i = end;
                continue;
            }
        }

        i++;
    }

    const rest = normalized.slice(start).trim();
    if (rest.length > 0) {
        sentences.push(rest);
    }

    return sentences;
}

/**
 * Page marker embedded in the text (`_page_4_...`), normalized to `page_4`
 */
export function extractPageReference(text: string): string | null {
    const match = PAGE_MARKER_PATTERN.exec(text);
    return match?.[1] !== undefined ? `page_${match[1]}` : null;
}

export interface SegmentationResult {
    tree: SectionTree;
    sentences: Sentence[];
    /** Candidates below the word-count threshold */
    droppedCount: number;
}

/**
 * Last entry emitted in the section, if any
 */
function lastEntryInSection(sentences: Sentence[], sectionId: string): Sentence | undefined {
    const last = sentences[sentences.length - 1];
    return last !== undefined && last.location.sectionId === sectionId ? last : undefined;
}

interface ActiveSection {
    node: SectionNode;
    path: string[];
}

/**
 * Walk the cleaned document line by line, tracking the active section and
 * paragraph, and emit located sentences in document order. Tables are emitted
 * whole as `table` entries and never sentence-split; a table takes the location
 * of the entry before it in its section, as that paragraph's next sentence.
 */
export function segmentDocument(
    doc: CleanedDocument,
    config: SentenceConfig = {}
): SegmentationResult {
    const { minWords, stopAtReferences } = { ...DEFAULT_SENTENCE_CONFIG, ...config };
    const tree = buildSectionTree(doc.text);
    const sentences: Sentence[] = [];

    if (doc.text.length === 0) {
        return { tree, sentences, droppedCount: 0 };
    }

    const lines = splitLines(doc.text);
    // Found here as well, so table rows stay out of the sentences when the cleaner skipped tables
    const tablesByStart = new Map<number, TableBlock>(identifyTables(doc.text).map(t => [t.startLine, t]));
    const sectionsByStart = new Map<number, SectionNode>(tree.flatList.map(node => [node.startLine, node]));

    let active: ActiveSection = { node: tree.root, path: [] };
    let paragraphIndex = 0;
    let droppedCount = 0;
    let buffer: string[] = [];
    let bufferStart = 0;

    const flushParagraph = (endLine: number): void => {
        if (buffer.length === 0) return;

        const candidates = splitIntoSentences(buffer.join(" "));
        let sentenceIndex = 0;

        for (const text of candidates) {
            if (countWords(text) < minWords) {
                droppedCount++;
                continue;
            }

            const location: LocationMetadata = {
                sectionPath: active.path,
                sectionId: active.node.id,
                paragraphIndex,
                sentenceIndex,
                lineRange: { start: bufferStart, end: endLine },
                pageReference: extractPageReference(text),
            };
            sentences.push({ text, sentenceType: "text", location });
            sentenceIndex++;
        }

        buffer = [];
        paragraphIndex++;
    };

    let lineIndex = 0;
    while (lineIndex < lines.length) {
        const line = lines[lineIndex] ?? "";

        const table = tablesByStart.get(lineIndex);
        if (table !== undefined) {
            flushParagraph(lineIndex - 1);
            const anchor = lastEntryInSection(sentences, active.node.id);
            const ownReference = extractPageReference(table.content);
            const location: LocationMetadata = anchor !== undefined
                ? {
                    ...anchor.location,
                    sentenceIndex: anchor.location.sentenceIndex + 1,
                    pageReference: ownReference ?? anchor.location.pageReference,
                }
                : {
                    sectionPath: active.path,
                    sectionId: active.node.id,
                    paragraphIndex: paragraphIndex++,
                    sentenceIndex: 0,
                    lineRange: { start: table.startLine, end: table.endLine },
                    pageReference: ownReference,
                };
            sentences.push({ text: table.content, sentenceType: "table", location });
            lineIndex = table.endLine + 1;
            continue;
        }

        const node = sectionsByStart.get(lineIndex);
        if (node !== undefined) {
            flushParagraph(lineIndex - 1);
            if (stopAtReferences && REFERENCES_TITLE_PATTERN.test(node.title)) {
                return { tree, sentences, droppedCount };
            }
            active = { node, path: getSectionPath(tree, node) };
            paragraphIndex = 0;
            lineIndex++;
            continue;
        }

        if (line.trim().length === 0) {
            flushParagraph(lineIndex - 1);
        } else {
            if (buffer.length === 0) {
                bufferStart = lineIndex;
            }
            buffer.push(line.trim());
        }
        lineIndex++;
    }

    flushParagraph(lines.length - 1);

    return { tree, sentences, droppedCount };
}

/**
 * Ordered, located sentences of a cleaned document
 */
export function extractSentences(doc: CleanedDocument, config: SentenceConfig = {}): Sentence[] {
    return segmentDocument(doc, config).sentences;
}
