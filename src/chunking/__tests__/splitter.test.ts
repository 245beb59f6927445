import { describe, it, expect } from "vitest";
import { splitText } from "../splitter";

describe("splitText", () => {
    it("returns short text as a single trimmed chunk", () => {
        expect(splitText("  Short text here.  ")).toEqual(["Short text here."]);
    });

    it("returns nothing for blank text", () => {
        expect(splitText(" \n\n ")).toEqual([]);
    });

    it("prefers paragraph boundaries", () => {
        const chunks = splitText("First paragraph text.\n\nSecond paragraph text.", {
            chunkSize: 30,
            chunkOverlap: 0,
        });

        expect(chunks).toEqual(["First paragraph text.", "Second paragraph text."]);
    });

    it("carries trailing pieces into the next chunk as overlap", () => {
        const chunks = splitText("aaaa bbbb cccc dddd eeee ffff", { chunkSize: 20, chunkOverlap: 5 });

        expect(chunks).toEqual(["aaaa bbbb cccc dddd", "dddd eeee ffff"]);
    });

    it("falls back to finer separators for oversized pieces", () => {
        const chunks = splitText("Sentence one is here. Sentence two is here.\n\nShort.", {
            chunkSize: 30,
            chunkOverlap: 0,
        });

        expect(chunks).toEqual(["Sentence one is here.", "Sentence two is here.", "Short."]);
    });

    it("cuts between characters as a last resort", () => {
        const chunks = splitText("abcdefghij", { chunkSize: 4, chunkOverlap: 1 });

        expect(chunks).toEqual(["abcd", "defg", "ghij"]);
    });

    it("never exceeds the chunk size", () => {
        const text = Array.from({ length: 40 }, (_, i) => `Sentence number ${i} talks about electrodes.`).join(" ");

        const chunks = splitText(text, { chunkSize: 120, chunkOverlap: 30 });

        expect(chunks.length).toBeGreaterThan(1);
        for (const chunk of chunks) {
            expect(chunk.length).toBeLessThanOrEqual(120);
        }
    });

    it("rejects an overlap that is not smaller than the chunk size", () => {
        expect(() => splitText("text", { chunkSize: 10, chunkOverlap: 10 })).toThrow(RangeError);
        expect(() => splitText("text", { chunkSize: 0 })).toThrow(RangeError);
    });
});
