import * as cheerio from "cheerio";
import type { CleanedDocument, RemovalCounts } from "../types";
import { countMatches, matchesPatterns, parseHeading, splitLines } from "../utils/shared";
import { findTableRegions, identifyTables, linesInRegions } from "./tables";

export interface CleanerConfig {
    removeImages?: boolean;
    convertHtml?: boolean;
    removeMetadata?: boolean;
    identifyTables?: boolean;
    /** Residual HTML strip, dehyphenation and hard-wrap merging */
    deepClean?: boolean;
}

export const DEFAULT_CLEANER_CONFIG: Required<CleanerConfig> = {
    removeImages: true,
    convertHtml: true,
    removeMetadata: true,
    identifyTables: true,
    deepClean: true,
};

export interface StepResult {
    text: string;
    count: number;
}

// Marker figure placeholders: ![](_page_3_Figure_1.jpeg)
const IMAGE_PLACEHOLDER_PATTERN = /!\[[^\]]*\]\(_page_\d+_[A-Za-z]+_\d+\.[A-Za-z0-9]+\)/g;

const HTML_CONVERSIONS: Array<{ pattern: RegExp; replacement: string }> = [
    { pattern: /<sub>(.*?)<\/sub>/gi, replacement: "_{$1}" },
    { pattern: /<sup>(.*?)<\/sup>/gi, replacement: "^{$1}" },
    { pattern: /<(b|strong)>(.*?)<\/\1>/gi, replacement: "**$2**" },
    { pattern: /<(i|em)>(.*?)<\/\1>/gi, replacement: "*$2*" },
];

// Any tag the conversion step does not own (spans, anchors, breaks, divs)
const RESIDUAL_TAG_PATTERN = /<\/?(?!(?:sub|sup|b|strong|i|em)>)[A-Za-z][A-Za-z0-9-]*(?:\s[^<>]*)?\/?>/gi;
const CONVERTIBLE_TAG_PATTERN = /(<\/?(?:sub|sup|b|strong|i|em)>)/i;
const BREAK_TAG_PATTERN = /<br\s*\/?>/gi;

// A heading that is only a metadata label (optionally `Label: value`) opens a block
// running to the next heading. Body titles that merely start with a label word stay.
const METADATA_HEADING_PATTERN =
    /^(abstract|keywords?|key\s+words|authors?|affiliations?|correspondence|corresponding\s+authors?|article\s+info(rmation)?|received|accepted|published|copyright|licen[cs]e|citation)\s*(?::.*|\.)?$/i;

const SECTION_NUMBER_PATTERN = /^(\d+(\.\d+)*\.?|[IVX]+\.)\s+/;

// Standalone labelled metadata lines
const METADATA_LINE_PATTERNS = [
    /^[*_]*\s*(authors?|affiliations?|e-?mail|correspondence|corresponding\s+author|tel|fax|address|received|accepted|published\s+online|doi|keywords?)\s*[*_]*\s*:/i,
    /^©\s*\d{4}/,
    /^copyright\s+(©\s*)?\d{4}/i,
    /^published\s+by\b/i,
    /^e?-?issn\b/i,
];

const LIST_ITEM_PATTERN = /^\s*([-*+]|\d+[.)])\s+/;
const FENCE_PATTERN = /^\s*(```|~~~)/;
const HYPHEN_WRAP_PATTERN = /[A-Za-z]-$/;

/**
 * Remove page-scoped figure placeholders
 */
export function removeImagePlaceholders(text: string): StepResult {
    const count = countMatches(text, IMAGE_PLACEHOLDER_PATTERN);
    return {
        text: count > 0 ? text.replace(IMAGE_PLACEHOLDER_PATTERN, "") : text,
        count,
    };
}

/**
 * Convert sub/sup and emphasis tags into math notation and Markdown emphasis
 */
export function convertHtmlTags(text: string): StepResult {
    let converted = text;
    let count = 0;

    for (const { pattern, replacement } of HTML_CONVERSIONS) {
        const matches = countMatches(converted, pattern);
        if (matches > 0) {
            count += matches;
            converted = converted.replace(pattern, replacement);
        }
    }

    return { text: converted, count };
}

function htmlToText(fragment: string): string {
    if (fragment.length === 0) return fragment;
    const $ = cheerio.load(fragment.replace(BREAK_TAG_PATTERN, " "), null, false);
    return $.root().text();
}

/**
 * Replace residual HTML (page anchors, spans, breaks) with its text content.
 * Tags owned by the conversion step are left in place.
 */
export function stripResidualHtml(text: string): StepResult {
    let count = 0;

    const lines = splitLines(text).map(line => {
        const tags = countMatches(line, RESIDUAL_TAG_PATTERN);
        if (tags === 0) return line;

        count += tags;
        // split() with a capture group keeps the convertible tags at odd indices
        return line
            .split(CONVERTIBLE_TAG_PATTERN)
            .map((part, index) => (index % 2 === 1 ? part : htmlToText(part)))
            .join("");
    });

    return { text: lines.join("\n"), count };
}

function isMetadataHeading(title: string): boolean {
    return METADATA_HEADING_PATTERN.test(title.replace(SECTION_NUMBER_PATTERN, ""));
}

/**
 * Remove abstract/author/affiliation blocks and labelled metadata lines.
 * Lines inside pipe-tables are never touched.
 */
export function removeMetadata(text: string): StepResult {
    const lines = splitLines(text);
    const tableLines = linesInRegions(findTableRegions(lines));
    const kept: string[] = [];
    let inBlock = false;
    let count = 0;

    lines.forEach((line, index) => {
        if (tableLines.has(index)) {
            kept.push(line);
            return;
        }

        const heading = parseHeading(line);
        if (heading !== null) {
            inBlock = isMetadataHeading(heading.title);
            if (inBlock) {
                count++;
            } else {
                kept.push(line);
            }
            return;
        }

        if (line.trim().length === 0) {
            kept.push(line);
            return;
        }

        if (inBlock || matchesPatterns(line.trim(), METADATA_LINE_PATTERNS)) {
            count++;
            return;
        }

        kept.push(line);
    });

    return { text: kept.join("\n"), count };
}

export interface JoinResult {
    text: string;
    dehyphenated: number;
    merged: number;
}

/**
 * Merge hard-wrapped lines into paragraphs, rejoining words split by a trailing hyphen.
 * Headings, blank lines, list starts, fences and table rows are never merged into the line above.
 */
export function joinWrappedLines(text: string): JoinResult {
    const lines = splitLines(text);
    const tableLines = linesInRegions(findTableRegions(lines));
    const out: string[] = [];
    let dehyphenated = 0;
    let merged = 0;
    let previousAcceptsContinuation = false;
    let inFence = false;

    lines.forEach((line, index) => {
        const trimmed = line.trim();

        if (FENCE_PATTERN.test(line)) {
            inFence = !inFence;
            out.push(line);
            previousAcceptsContinuation = false;
            return;
        }

        const isBlank = trimmed.length === 0;
        const isHeading = parseHeading(line) !== null;
        const isFixed = inFence || tableLines.has(index) || isHeading || isBlank;
        const startsBlock = isFixed || LIST_ITEM_PATTERN.test(line);

        const last = out[out.length - 1];
        if (!startsBlock && previousAcceptsContinuation && last !== undefined) {
            const previous = last.trimEnd();
            if (HYPHEN_WRAP_PATTERN.test(previous) && /^[a-z]/.test(trimmed)) {
                out[out.length - 1] = previous.slice(0, -1) + trimmed;
                dehyphenated++;
            } else {
                out[out.length - 1] = `${previous} ${trimmed}`;
                merged++;
            }
            return;
        }

        out.push(line);
        previousAcceptsContinuation = !isFixed;
    });

    return { text: out.join("\n"), dehyphenated, merged };
}

/**
 * Trim trailing whitespace, collapse blank-line runs to one, drop leading/trailing blank lines
 */
export function normalizeBlankLines(text: string): string {
    const out: string[] = [];

    for (const line of splitLines(text)) {
        const trimmed = line.trimEnd();
        if (trimmed.trim().length === 0) {
            if (out.length > 0 && out[out.length - 1] !== "") {
                out.push("");
            }
        } else {
            out.push(trimmed);
        }
    }

    while (out.length > 0 && out[out.length - 1] === "") {
        out.pop();
    }

    return out.join("\n");
}

function emptyCounts(): RemovalCounts {
    return {
        images: 0,
        htmlTags: 0,
        residualHtml: 0,
        metadataLines: 0,
        dehyphenatedWords: 0,
        mergedLines: 0,
    };
}

function lineCount(text: string): number {
    return text.length === 0 ? 0 : splitLines(text).length;
}

/**
 * Full cleaning pass over a marker-annotated Markdown document.
 * Total over any string input; the empty string yields an empty document.
 */
export function cleanMarkdown(markdown: string, config: CleanerConfig = {}): CleanedDocument {
    const cfg = { ...DEFAULT_CLEANER_CONFIG, ...config };
    const removedCounts = emptyCounts();
    let text = markdown;

    if (cfg.removeImages) {
        const result = removeImagePlaceholders(text);
        text = result.text;
        removedCounts.images = result.count;
    }

    if (cfg.convertHtml) {
        const result = convertHtmlTags(text);
        text = result.text;
        removedCounts.htmlTags = result.count;
    }

    if (cfg.deepClean) {
        const result = stripResidualHtml(text);
        text = result.text;
        removedCounts.residualHtml = result.count;
    }

    if (cfg.removeMetadata) {
        const result = removeMetadata(text);
        text = result.text;
        removedCounts.metadataLines = result.count;
    }

    if (cfg.deepClean) {
        const result = joinWrappedLines(text);
        text = result.text;
        removedCounts.dehyphenatedWords = result.dehyphenated;
        removedCounts.mergedLines = result.merged;
    }

    text = normalizeBlankLines(text);

    return {
        text,
        tables: cfg.identifyTables ? identifyTables(text) : [],
        removedCounts,
        originalLineCount: lineCount(markdown),
        cleanedLineCount: lineCount(text),
    };
}
