import { describe, it, expect } from "vitest";
import {
    cleanMarkdown,
    convertHtmlTags,
    joinWrappedLines,
    normalizeBlankLines,
    removeImagePlaceholders,
    removeMetadata,
    stripResidualHtml,
} from "../clean";

describe("removeImagePlaceholders", () => {
    it("removes page-scoped figure placeholders and counts them", () => {
        const result = removeImagePlaceholders("Before ![](_page_3_Figure_1.jpeg) after");

        expect(result.text).toBe("Before  after");
        expect(result.count).toBe(1);
    });

    it("leaves ordinary images alone", () => {
        const text = "See ![diagram](figures/cell.png) here";

        const result = removeImagePlaceholders(text);

        expect(result.text).toBe(text);
        expect(result.count).toBe(0);
    });
});

describe("convertHtmlTags", () => {
    it("converts sub/sup to math notation and b/em to emphasis", () => {
        const result = convertHtmlTags("LiFePO<sub>4</sub> and x<sup>2</sup> with <b>bold</b> and <EM>it</EM>");

        expect(result.text).toBe("LiFePO_{4} and x^{2} with **bold** and *it*");
        expect(result.count).toBe(4);
    });

    it("matches tags case-insensitively", () => {
        const result = convertHtmlTags("H<SUB>2</SUB>O");

        expect(result.text).toBe("H_{2}O");
        expect(result.count).toBe(1);
    });
});

describe("stripResidualHtml", () => {
    it("replaces anchors with their text content", () => {
        const result = stripResidualHtml('<span id="page-3-0"></span>Results improved.');

        expect(result.text).toBe("Results improved.");
        expect(result.count).toBe(2);
    });

    it("keeps tags owned by the conversion step", () => {
        const result = stripResidualHtml("<span>x</span> <b>bold</b>");

        expect(result.text).toBe("x <b>bold</b>");
        expect(result.count).toBe(2);
    });
});

describe("removeMetadata", () => {
    it("removes an abstract block up to the next heading and labelled lines", () => {
        const text = [
            "# Title",
            "## Abstract",
            "This is the abstract text.",
            "More abstract.",
            "## 1. Introduction",
            "Body text here.",
            "Email: someone@example.com",
        ].join("\n");

        const result = removeMetadata(text);

        expect(result.text).toBe("# Title\n## 1. Introduction\nBody text here.");
        expect(result.count).toBe(4);
    });

    it("keeps body sections whose titles start with a label word", () => {
        const text = [
            "# Paper",
            "## 2. Citation analysis",
            "We counted citations across many venues.",
            "## Published datasets compared",
            "We compare three published datasets here.",
        ].join("\n");

        const result = removeMetadata(text);

        expect(result.text).toBe(text);
        expect(result.count).toBe(0);
    });

    it("removes a labelled keyword heading with its block", () => {
        const result = removeMetadata("## Keywords: cathode, olivine\ncathode; olivine\n## 1. Introduction\nBody text here.");

        expect(result.text).toBe("## 1. Introduction\nBody text here.");
        expect(result.count).toBe(2);
    });

    it("never touches table rows", () => {
        const text = "| Keywords: | Value |\n|---|---|\n| Author: | X |";

        const result = removeMetadata(text);

        expect(result.text).toBe(text);
        expect(result.count).toBe(0);
    });
});

describe("joinWrappedLines", () => {
    it("dehyphenates and merges hard-wrapped lines", () => {
        const result = joinWrappedLines("The electro-\nchemical cell was\nassembled carefully.\n\n## Methods");

        expect(result.text).toBe("The electrochemical cell was assembled carefully.\n\n## Methods");
        expect(result.dehyphenated).toBe(1);
        expect(result.merged).toBe(1);
    });

    it("keeps a hyphen when the next line starts uppercase", () => {
        const result = joinWrappedLines("Charge-\nDischarge cycles");

        expect(result.text).toBe("Charge- Discharge cycles");
        expect(result.dehyphenated).toBe(0);
        expect(result.merged).toBe(1);
    });

    it("never merges table rows or headings", () => {
        const text = "Intro line\n| A | B |\n|---|---|\n| 1 | 2 |\n## Next";

        const result = joinWrappedLines(text);

        expect(result.text).toBe(text);
        expect(result.merged).toBe(0);
    });
});

describe("normalizeBlankLines", () => {
    it("collapses blank runs and trims the ends", () => {
        expect(normalizeBlankLines("\n\nA  \n\n\n\nB\n\n")).toBe("A\n\nB");
    });
});

describe("cleanMarkdown", () => {
    it("returns an empty document for empty input", () => {
        const doc = cleanMarkdown("");

        expect(doc.text).toBe("");
        expect(doc.tables).toEqual([]);
        expect(Object.values(doc.removedCounts).every(count => count === 0)).toBe(true);
        expect(doc.originalLineCount).toBe(0);
        expect(doc.cleanedLineCount).toBe(0);
    });

    it("returns empty text with counts when input is only artifacts", () => {
        const doc = cleanMarkdown("![](_page_1_Figure_0.jpeg)\n![](_page_2_Picture_3.png)");

        expect(doc.text).toBe("");
        expect(doc.removedCounts.images).toBe(2);
        expect(doc.originalLineCount).toBe(2);
        expect(doc.cleanedLineCount).toBe(0);
    });

    it("leaves a category untouched when its toggle is off", () => {
        const images = cleanMarkdown("See ![](_page_1_Figure_0.jpeg) here.", { removeImages: false });
        const html = cleanMarkdown("Fe<sub>2</sub>O<sub>3</sub> forms.", { convertHtml: false });

        expect(images.text).toBe("See ![](_page_1_Figure_0.jpeg) here.");
        expect(images.removedCounts.images).toBe(0);
        expect(html.text).toBe("Fe<sub>2</sub>O<sub>3</sub> forms.");
        expect(html.removedCounts.htmlTags).toBe(0);
        expect(html.removedCounts.residualHtml).toBe(0);
    });

    it("keeps wrapped lines apart when deepClean is off", () => {
        const doc = cleanMarkdown("First half of a\nwrapped sentence.", { deepClean: false });

        expect(doc.text).toBe("First half of a\nwrapped sentence.");
        expect(doc.removedCounts.mergedLines).toBe(0);
    });

    it("keeps a body section named like metadata", () => {
        const doc = cleanMarkdown("# Paper\n\n## 2. Citation analysis\n\nWe counted citations across many venues.");

        expect(doc.text).toBe("# Paper\n\n## 2. Citation analysis\n\nWe counted citations across many venues.");
        expect(doc.removedCounts.metadataLines).toBe(0);
    });

    it("preserves citation markers verbatim", () => {
        const doc = cleanMarkdown("Prior work [12] and [3-7] agrees.");

        expect(doc.text).toBe("Prior work [12] and [3-7] agrees.");
    });

    it("identifies tables on the cleaned text", () => {
        const doc = cleanMarkdown("Intro.\n\n\n\n| A | B | C |\n|---|---|---|\n| 1 | 2 | 3 |\n| 4 | 5 | 6 |");

        expect(doc.tables).toHaveLength(1);
        expect(doc.tables[0]?.startLine).toBe(2);
        expect(doc.tables[0]?.endLine).toBe(5);
        expect(doc.tables[0]?.columns).toBe(3);
        expect(doc.tables[0]?.rows).toBe(2);
    });

    it("skips table identification when its toggle is off", () => {
        const doc = cleanMarkdown("| A | B |\n|---|---|\n| 1 | 2 |", { identifyTables: false });

        expect(doc.tables).toEqual([]);
    });

    it("is idempotent on its own output", () => {
        const markdown = [
            "# Paper",
            "",
            "## Abstract",
            "Front matter.",
            "",
            "## 1. Introduction",
            "",
            "Cobalt-free cath-",
            "odes need H<sub>2</sub> free handling [3].",
            '<span id="page-1-0"></span>![](_page_1_Figure_2.jpeg)',
            "",
            "| X | Y |",
            "|---|---|",
            "| 1 | 2 |",
        ].join("\n");

        const once = cleanMarkdown(markdown);
        const twice = cleanMarkdown(once.text);

        expect(twice.text).toBe(once.text);
        expect(twice.removedCounts).toEqual({
            images: 0,
            htmlTags: 0,
            residualHtml: 0,
            metadataLines: 0,
            dehyphenatedWords: 0,
            mergedLines: 0,
        });
    });
});
