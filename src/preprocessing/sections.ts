import type { SectionNode, SectionTree } from "../types";
import { parseHeading, splitLines } from "../utils/shared";
import { findTableRegions, linesInRegions } from "./tables";

export const ROOT_SECTION_ID = "root";
export const ROOT_SECTION_TITLE = "Document Root";

/**
 * Build the heading hierarchy of a cleaned document.
 *
 * A heading of depth d closes every open section at depth >= d and attaches to
 * the nearest open section strictly shallower than d (or the root). Depths may
 * skip levels. Lines inside pipe-tables are never headings. Any string is valid input.
 */
export function buildSectionTree(text: string): SectionTree {
    const lines = splitLines(text);
    const lastLine = Math.max(lines.length - 1, 0);
    const tableLines = linesInRegions(findTableRegions(lines));

    const root: SectionNode = {
        id: ROOT_SECTION_ID,
        index: 0,
        title: ROOT_SECTION_TITLE,
        level: 0,
        startLine: 0,
        endLine: lastLine,
        parent: null,
        children: [],
    };

    const nodes: SectionNode[] = [root];
    const stack: SectionNode[] = [root];

    lines.forEach((line, lineIndex) => {
        if (tableLines.has(lineIndex)) return;
        const heading = parseHeading(line);
        if (heading === null) return;

        let top = stack[stack.length - 1] ?? root;
        while (top.level >= heading.level && top !== root) {
            top.endLine = lineIndex - 1;
            stack.pop();
            top = stack[stack.length - 1] ?? root;
        }

        const ordinal = top.children.length + 1;
        const node: SectionNode = {
            id: top === root ? `section_${ordinal}` : `${top.id}_${ordinal}`,
            index: nodes.length,
            title: heading.title,
            level: heading.level,
            startLine: lineIndex,
            endLine: lastLine,
            parent: top.index,
            children: [],
        };

        top.children.push(node.index);
        nodes.push(node);
        stack.push(node);
    });

    // Sections still open run to the end of the document (endLine already lastLine)

    return {
        nodes,
        root,
        flatList: nodes.slice(1),
    };
}

export function getChildren(tree: SectionTree, node: SectionNode): SectionNode[] {
    return node.children
        .map(index => tree.nodes[index])
        .filter((child): child is SectionNode => child !== undefined);
}

/**
 * Titles from the root (excluded) down to the node
 */
export function getSectionPath(tree: SectionTree, node: SectionNode): string[] {
    const path: string[] = [];
    let current: SectionNode | undefined = node;

    while (current !== undefined && current.parent !== null) {
        path.push(current.title);
        current = tree.nodes[current.parent];
    }

    return path.reverse();
}

/**
 * Deepest section whose line range contains the line; the root when none does
 */
export function findSectionAtLine(tree: SectionTree, line: number): SectionNode {
    let found = tree.root;
    for (const node of tree.flatList) {
        if (node.startLine > line) break;
        if (node.endLine >= line) {
            found = node;
        }
    }
    return found;
}
