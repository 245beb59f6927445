export interface SplitterConfig {
    /** Target maximum characters per chunk */
    chunkSize?: number;
    /** Characters carried over from the end of one chunk into the next */
    chunkOverlap?: number;
    /** Boundaries tried in order; "" means split between characters */
    separators?: string[];
}

export const DEFAULT_SPLITTER_CONFIG: Required<SplitterConfig> = {
    chunkSize: 600,
    chunkOverlap: 100,
    separators: ["\n\n", "\n", ". ", " ", ""],
};

/**
 * Split on a separator, leaving the separator at the end of the piece it closes
 */
function splitKeepingSeparator(text: string, separator: string): string[] {
    if (separator === "") return Array.from(text);

    const pieces: string[] = [];
    let start = 0;
    let index = text.indexOf(separator);

    while (index !== -1) {
        const end = index + separator.length;
        pieces.push(text.slice(start, end));
        start = end;
        index = text.indexOf(separator, start);
    }

    if (start < text.length) {
        pieces.push(text.slice(start));
    }

    return pieces;
}

/**
 * Greedily pack pieces into windows of at most chunkSize characters.
 * When a window is emitted, pieces are dropped from its front until what
 * remains fits within the overlap, and that remainder opens the next window.
 */
function mergePieces(pieces: string[], chunkSize: number, chunkOverlap: number): string[] {
    const chunks: string[] = [];
    let window: string[] = [];
    let total = 0;

    for (const piece of pieces) {
        if (window.length > 0 && total + piece.length > chunkSize) {
            const chunk = window.join("").trim();
            if (chunk.length > 0) {
                chunks.push(chunk);
            }

            while (window.length > 0 && (total > chunkOverlap || total + piece.length > chunkSize)) {
                total -= window[0]?.length ?? 0;
                window = window.slice(1);
            }
        }

        window.push(piece);
        total += piece.length;
    }

    const last = window.join("").trim();
    if (last.length > 0) {
        chunks.push(last);
    }

    return chunks;
}

function splitRecursive(
    text: string,
    separators: string[],
    chunkSize: number,
    chunkOverlap: number
): string[] {
    let separator = separators[separators.length - 1] ?? "";
    let remaining: string[] = [];

    for (let i = 0; i < separators.length; i++) {
        const candidate = separators[i];
        if (candidate === undefined) continue;
        if (candidate === "" || text.includes(candidate)) {
            separator = candidate;
            remaining = separators.slice(i + 1);
            break;
        }
    }

    const chunks: string[] = [];
    let pending: string[] = [];

    for (const piece of splitKeepingSeparator(text, separator)) {
        if (piece.length < chunkSize) {
            pending.push(piece);
            continue;
        }

        if (pending.length > 0) {
            chunks.push(...mergePieces(pending, chunkSize, chunkOverlap));
            pending = [];
        }

        if (remaining.length === 0) {
            const trimmed = piece.trim();
            if (trimmed.length > 0) {
                chunks.push(trimmed);
            }
        } else {
            chunks.push(...splitRecursive(piece, remaining, chunkSize, chunkOverlap));
        }
    }

    if (pending.length > 0) {
        chunks.push(...mergePieces(pending, chunkSize, chunkOverlap));
    }

    return chunks;
}

/**
 * Recursive, overlap-preserving text splitter.
 * Prefers paragraph breaks, then line breaks, then sentence ends, then spaces,
 * and cuts between characters only when nothing coarser fits.
 */
export function splitText(text: string, config: SplitterConfig = {}): string[] {
    const { chunkSize, chunkOverlap, separators } = { ...DEFAULT_SPLITTER_CONFIG, ...config };

    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
        throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
        throw new RangeError(`chunkOverlap must be an integer in [0, ${chunkSize}), got ${chunkOverlap}`);
    }

    if (text.trim().length === 0) return [];

    return splitRecursive(text, separators, chunkSize, chunkOverlap);
}
