/**
 * Shared utility functions used across the codebase
 */

import { createHash } from "crypto";

// =============================================================================
// Heading utilities
// =============================================================================

/** Markdown ATX heading: 1-6 leading `#`, whitespace, title */
export const HEADING_PATTERN = /^(#{1,6})\s+(.+)$/;

export interface Heading {
    level: number;
    title: string;
}

/**
 * Parse a Markdown heading line, returns null if the line is not a heading.
 * Closing hashes and wrapping emphasis (`## **1. Introduction**`) are dropped from the title.
 */
export function parseHeading(line: string): Heading | null {
    const match = HEADING_PATTERN.exec(line.trim());
    const hashes = match?.[1];
    const rawTitle = match?.[2];
    if (hashes === undefined || rawTitle === undefined) return null;

    const withoutClosing = rawTitle.replace(/\s+#+$/, "").trim();
    const unwrapped = withoutClosing.replace(/^[*_]+|[*_]+$/g, "").trim();

    return {
        level: hashes.length,
        title: unwrapped.length > 0 ? unwrapped : withoutClosing,
    };
}

// =============================================================================
// String utilities
// =============================================================================

/**
 * Normalize whitespace in text: collapse multiple spaces to single, trim
 */
export function normalizeWhitespace(text: string): string {
    return text.replace(/\s+/g, " ").trim();
}

/**
 * Truncate text to maxLen characters, adding ellipsis if truncated
 */
export function truncateText(text: string, maxLen: number = 100): string {
    if (text.length <= maxLen) return text;
    return text.slice(0, maxLen) + "...";
}

/** Count whitespace-separated words */
export function countWords(text: string): number {
    const trimmed = text.trim();
    if (trimmed.length === 0) return 0;
    return trimmed.split(/\s+/).length;
}

/**
 * Split text into lines, accepting any newline convention
 */
export function splitLines(text: string): string[] {
    return text.replace(/\r\n?/g, "\n").split("\n");
}

// =============================================================================
// Pattern matching utilities
// =============================================================================

/**
 * Check if a string matches any of the provided patterns
 */
export function matchesPatterns(text: string, patterns: RegExp[]): boolean {
    return patterns.some(pattern => pattern.test(text));
}

/**
 * Count matches of a global pattern
 */
export function countMatches(text: string, pattern: RegExp): number {
    return text.match(pattern)?.length ?? 0;
}

// =============================================================================
// Identity utilities
// =============================================================================

/**
 * Deterministic document id from DOI + filename.
 * Re-ingesting the same document always yields the same id.
 */
export function createDocumentId(doi: string, filename: string): string {
    const digest = createHash("sha256").update(`${doi}\n${filename}`).digest("hex");
    return `doc_${digest.slice(0, 16)}`;
}

export function md5(text: string): string {
    return createHash("md5").update(text).digest("hex");
}
