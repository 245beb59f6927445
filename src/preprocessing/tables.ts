import type { LineRange, TableBlock } from "../types";
import { splitLines } from "../utils/shared";

/** Separator row: `|---|:--:|`, `--- | ---` */
const SEPARATOR_PATTERN = /^\|?\s*:?-+:?\s*(\|\s*:?-+:?\s*)*\|?$/;

function isSeparatorRow(line: string): boolean {
    const trimmed = line.trim();
    return trimmed.includes("|") && SEPARATOR_PATTERN.test(trimmed);
}

function isTableRow(line: string | undefined): line is string {
    return line !== undefined && line.trim().length > 0 && line.includes("|");
}

/**
 * Split a pipe-table row into trimmed cells, dropping the outer pipes
 */
export function splitTableRow(line: string): string[] {
    let row = line.trim();
    if (row.startsWith("|")) row = row.slice(1);
    if (row.endsWith("|")) row = row.slice(0, -1);
    return row.split("|").map(cell => cell.trim());
}

/**
 * Find pipe-table line spans: header row + separator row + any data rows
 */
export function findTableRegions(lines: string[]): LineRange[] {
    const regions: LineRange[] = [];

    let i = 1;
    while (i < lines.length) {
        const header = lines[i - 1];
        const separator = lines[i];

        if (
            separator !== undefined &&
            isSeparatorRow(separator) &&
            isTableRow(header) &&
            !isSeparatorRow(header)
        ) {
            let end = i;
            while (isTableRow(lines[end + 1])) {
                end++;
            }
            regions.push({ start: i - 1, end });
            i = end + 2;
            continue;
        }

        i++;
    }

    return regions;
}

/**
 * Identify Markdown pipe-tables as TableBlocks. Line numbers index `text`.
 */
export function identifyTables(text: string): TableBlock[] {
    if (text.length === 0) return [];

    const lines = splitLines(text);

    return findTableRegions(lines).map(region => {
        const headers = splitTableRow(lines[region.start] ?? "");
        return {
            content: lines.slice(region.start, region.end + 1).join("\n"),
            headers,
            rows: region.end - (region.start + 1),
            columns: headers.length,
            startLine: region.start,
            endLine: region.end,
        };
    });
}

/**
 * Every line number covered by the given regions
 */
export function linesInRegions(regions: LineRange[]): Set<number> {
    const covered = new Set<number>();
    for (const region of regions) {
        for (let line = region.start; line <= region.end; line++) {
            covered.add(line);
        }
    }
    return covered;
}
