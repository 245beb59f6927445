export interface PaperMetadata {
    year: number | null;
    journal: string | null;
}

// Only the head of the first page carries the masthead
const SCAN_LENGTH = 2000;

const YEAR_PATTERN = /\b(19\d{2}|20\d{2})\b/g;

// Runs of capitalized words around the venue keyword
const JOURNAL_PATTERNS = [
    /Journal of(?: [A-Z][A-Za-z]*)+/,
    /(?:[A-Z][A-Za-z]* )+Journal/,
    /Proceedings of(?: [A-Z][A-Za-z]*)+/,
];

/**
 * Most frequent 19xx/20xx year near the top of the text. Ties go to the year seen first.
 */
export function inferYear(text: string): number | null {
    const counts = new Map<string, number>();
    for (const match of text.slice(0, SCAN_LENGTH).matchAll(YEAR_PATTERN)) {
        const year = match[1];
        if (year !== undefined) {
            counts.set(year, (counts.get(year) ?? 0) + 1);
        }
    }

    let best: string | null = null;
    let bestCount = 0;
    for (const [year, count] of counts) {
        if (count > bestCount) {
            best = year;
            bestCount = count;
        }
    }

    return best === null ? null : Number(best);
}

export function inferJournal(text: string): string | null {
    const head = text.slice(0, SCAN_LENGTH);
    for (const pattern of JOURNAL_PATTERNS) {
        const match = pattern.exec(head);
        if (match) {
            return match[0];
        }
    }
    return null;
}

/**
 * Best-effort paper metadata from the text of the first page
 */
export function inferPaperMetadata(firstPageText: string): PaperMetadata {
    return {
        year: inferYear(firstPageText),
        journal: inferJournal(firstPageText),
    };
}
