import { describe, it, expect, beforeAll, vi } from "vitest";
import { readFileSync } from "fs";
import { join } from "path";
import { z } from "zod";
import { indexMarkdown, indexPages } from "../pipeline";
import { verifyChunkLinks } from "../chunking/link";
import { InMemoryChunkStore } from "../store/chunk-store";
import { expandContext } from "../retrieval/expand";
import { describeLocation, locateSentence } from "../retrieval/locate";
import { processBatch } from "../batch";
import { createDocumentId } from "../utils/shared";
import Logger from "../utils/logger";

const fixturesDir = join(process.cwd(), "test-fixtures");

const SOURCE = { doi: "10.1000/test.0001", filename: "olivine-paper.pdf" };

let paperMarkdown: string;
let paperPages: string[];

beforeAll(() => {
    paperMarkdown = readFileSync(join(fixturesDir, "sample-paper.md"), "utf-8");
    paperPages = z.array(z.string()).parse(JSON.parse(readFileSync(join(fixturesDir, "sample-pages.json"), "utf-8")));
});

describe("Sentence index", () => {
    it("cleans, sections and segments the paper", () => {
        const result = indexMarkdown(paperMarkdown, SOURCE);

        expect(result.documentId).toBe(createDocumentId(SOURCE.doi, SOURCE.filename));
        expect(result.stats).toEqual({
            sentenceCount: 7,
            tableCount: 1,
            sectionCount: 5,
            droppedSentences: 1,
        });
        expect(result.cleaned.removedCounts).toEqual({
            images: 1,
            htmlTags: 1,
            residualHtml: 2,
            metadataLines: 5,
            dehyphenatedWords: 1,
            mergedLines: 1,
        });
    });

    it("gives each sentence its section, paragraph and id", () => {
        const { documentId, sentences } = indexMarkdown(paperMarkdown, SOURCE);
        const first = sentences[0];

        expect(first?.id).toBe(`${documentId}_section_1_1_p0_s0`);
        expect(first?.text).toBe("Lithium iron phosphate (LiFePO_{4}) is a widely used cathode material.");
        expect(first?.doi).toBe(SOURCE.doi);
        expect(first?.location.sectionPath).toEqual([
            "Olivine Cathode Stability Under Fast Charging",
            "1. Introduction",
        ]);
        expect(sentences.filter(s => s.location.sectionId === "section_1_1").map(s => s.text)).toEqual([
            "Lithium iron phosphate (LiFePO_{4}) is a widely used cathode material.",
            "Its capacity retention is high [1].",
            "Dr. Smith et al. reported a fade rate of 0.5 percent per cycle [2-4].",
        ]);

        const cycled = sentences.find(s => s.text === "Cells were cycled at 1C between 2.5 and 4.2 V.");
        expect(cycled?.location.sectionId).toBe("section_1_2_1");
        expect(cycled?.location.paragraphIndex).toBe(1);
    });

    it("flags sentences that state numbers and units", () => {
        const { sentences } = indexMarkdown(paperMarkdown, SOURCE);
        const flags = (text: string) => {
            const record = sentences.find(s => s.text === text);
            return record === undefined ? undefined : [record.hasNumber, record.hasUnit];
        };

        expect(flags("Lithium iron phosphate (LiFePO_{4}) is a widely used cathode material.")).toEqual([false, false]);
        expect(flags("Its capacity retention is high [1].")).toEqual([false, false]);
        expect(flags("Capacity retention exceeded 95 percent after 500 cycles.")).toEqual([true, false]);
        expect(flags("Cells were cycled at 1C between 2.5 and 4.2 V.")).toEqual([true, true]);
    });

    it("places the table at the end of the paragraph before it", () => {
        const { documentId, sentences } = indexMarkdown(paperMarkdown, SOURCE);
        const table = sentences.find(s => s.sentenceType === "table");

        expect(table?.id).toBe(`${documentId}_section_1_2_1_p0_s2`);
        expect(table?.location.lineRange).toEqual({ start: 12, end: 12 });
    });

    it("keeps sentence ids unique", () => {
        const { sentences } = indexMarkdown(paperMarkdown, SOURCE);

        expect(new Set(sentences.map(s => s.id)).size).toBe(sentences.length);
    });

    it("records stage timings on the injected logger", () => {
        const logger = new Logger();
        logger.setTimingEnabled(true);

        indexMarkdown(paperMarkdown, SOURCE, { logger });
        indexPages(paperPages, SOURCE, { logger });

        expect(logger.getTimings().map(t => t.label)).toEqual([
            "1. Clean markdown",
            "2. Segment sentences",
            "1. Chunk pages",
            "2. Link chunks",
        ]);
    });
});

describe("Chunk index", () => {
    it("warns when a document yields no chunks", () => {
        const logger = new Logger();
        const warn = vi.spyOn(logger, "warn").mockImplementation(() => undefined);

        const result = indexPages(["  \n 12 \n"], SOURCE, { logger });

        expect(result.chunks).toEqual([]);
        expect(warn).toHaveBeenCalledWith("olivine-paper.pdf: no chunks produced from 1 pages");
    });

    it("chunks and links the pages", () => {
        const result = indexPages(paperPages, SOURCE);

        expect(result.stats).toEqual({ pageCount: 4, chunkCount: 3, skippedPages: 1, droppedChunks: 0 });
        expect(result.metadata).toEqual({ year: 2021, journal: "Journal of Power Sources" });
        expect(verifyChunkLinks(result.chunks)).toEqual([]);
        expect(result.chunks.map(c => [c.prevChunkId, c.nextChunkId])).toEqual([
            [null, result.chunks[1]?.id],
            [result.chunks[0]?.id, result.chunks[2]?.id],
            [result.chunks[1]?.id, null],
        ]);
    });

    it("expands a chunk across its neighbors", async () => {
        const { chunks } = indexPages(paperPages, SOURCE);
        const store = new InMemoryChunkStore(chunks);
        const middle = chunks[1];
        if (middle === undefined) throw new Error("expected three chunks");

        const window = await expandContext(store, middle.id, 1);

        expect(window.chunks.map(c => c.page)).toEqual([1, 3, 4]);
        expect(window.mainChunkIndex).toBe(1);
        expect(window.pageRange).toEqual({ min: 1, max: 4 });
        expect(window.globalIndexRange).toEqual({ min: 0, max: 2 });
    });
});

describe("Sentence to chunk location", () => {
    it("places a sentence from the Markdown index on its page", async () => {
        const { sentences } = indexMarkdown(paperMarkdown, SOURCE);
        const { chunks } = indexPages(paperPages, SOURCE);
        const store = new InMemoryChunkStore(chunks);
        const sentence = sentences.find(s => s.location.sectionId === "section_1_3");
        if (sentence === undefined) throw new Error("expected a Results sentence");

        const result = await locateSentence(store, sentence.text, sentence.doi);

        expect(result.found).toBe(true);
        expect(describeLocation(result)).toBe("Page 3, paragraph 1");
    });

    it("reports no location for text only in the Markdown", async () => {
        const store = new InMemoryChunkStore(indexPages(paperPages, SOURCE).chunks);

        const result = await locateSentence(store, "Samples were annealed at 700 degrees for 10 h.", SOURCE.doi);

        expect(describeLocation(result)).toBe("No precise location available");
    });
});

describe("Batch indexing", () => {
    it("indexes several documents independently", async () => {
        const sources = [
            { doi: "10.1000/test.0001", filename: "first.pdf" },
            { doi: "10.1000/test.0002", filename: "second.pdf" },
        ];

        const results = await processBatch(sources, async (source) => indexPages(paperPages, source), { maxConcurrent: 2 });
        const chunks = results.flatMap(r => (r.status === "done" ? r.result.chunks : []));

        expect(results.map(r => r.status)).toEqual(["done", "done"]);
        expect(chunks).toHaveLength(6);
        expect(verifyChunkLinks(chunks)).toEqual([]);
    });
});
