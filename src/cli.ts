#!/usr/bin/env node

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { cleanMarkdown } from "./preprocessing/clean";
import { indexMarkdown, indexPages } from "./pipeline";
import { JsonChunkStore } from "./store/chunk-store";
import { expandContext } from "./retrieval/expand";
import { describeLocation, locateSentence } from "./retrieval/locate";
import { errorMessage } from "./errors";
import Logger from "./utils/logger";

const logger = Logger.getInstance();

const HELP_TEXT = `
paperseg - Segment scientific papers into located sentences and page-anchored chunks

Reads Markdown renderings of papers (for the sentence index) and per-page text
(for the chunk index), and resolves stored chunks back to context windows and
page locations. Results are printed as JSON on stdout; logs go to stderr.

COMMANDS:
  clean <file.md>                     Clean a Markdown document
  sentences <file.md>                 Extract located sentences and tables
    --doi <doi>                         Document DOI (required)
    --filename <name>                   Source filename (default: file basename)

  chunks <pages.json>                 Build linked chunks from a JSON array of page texts
    --doi <doi>                         Document DOI (required)
    --filename <name>                   Source filename (default: file basename)
    --out <store.json>                  Also write the chunks as a chunk store file
    --stop-at-references                Drop text from the References heading on

  expand <store.json> <chunkId>       Show a chunk with its linked neighbors
    --window <n>                        Neighbors on each side (default: 2)

  locate <store.json>                 Find the chunk and page holding a sentence
    --doi <doi>                         Document DOI (required)
    --sentence <text>                   Sentence text (required)

  mcp                                 Start the MCP server (called by MCP clients)
  help, --help                        Show this help message

OPTIONS:
  --timing, -t                        Print stage timings to stderr
  --debug                             Log stage statistics

EXAMPLES:
  paperseg sentences paper.md --doi 10.1000/example
  paperseg chunks pages.json --doi 10.1000/example --out store.json
  paperseg expand store.json doc_0123456789abcdef_p2_c0 --window 1
  paperseg locate store.json --doi 10.1000/example --sentence "The cathode retained 95% capacity."
`;

const pagesSchema = z.array(z.string());

interface CliOptions {
    positional: string[];
    doi?: string;
    filename?: string;
    out?: string;
    sentence?: string;
    window?: number;
    stopAtReferences: boolean;
    timing: boolean;
    debug: boolean;
}

function parseArgs(args: string[]): CliOptions {
    const options: CliOptions = { positional: [], stopAtReferences: false, timing: false, debug: false };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        const nextArg = args[i + 1];

        if (arg === "--doi" && nextArg !== undefined) {
            options.doi = nextArg;
            i++;
        } else if (arg === "--filename" && nextArg !== undefined) {
            options.filename = nextArg;
            i++;
        } else if (arg === "--out" && nextArg !== undefined) {
            options.out = nextArg;
            i++;
        } else if (arg === "--sentence" && nextArg !== undefined) {
            options.sentence = nextArg;
            i++;
        } else if (arg === "--window" && nextArg !== undefined) {
            options.window = parseInt(nextArg, 10);
            i++;
        } else if (arg === "--stop-at-references") {
            options.stopAtReferences = true;
        } else if (arg === "--timing" || arg === "-t") {
            options.timing = true;
        } else if (arg === "--debug") {
            options.debug = true;
        } else if (arg !== undefined) {
            options.positional.push(arg);
        }
    }

    return options;
}

function fail(message: string): never {
    logger.error(message);
    process.exit(1);
}

function requireFile(filePath: string | undefined, what: string): string {
    if (filePath === undefined) {
        fail(`Missing ${what}. Run 'paperseg --help' for usage.`);
    }
    if (!fs.existsSync(filePath)) {
        fail(`File not found: ${filePath}`);
    }
    return filePath;
}

function requireOption(value: string | undefined, flag: string): string {
    if (value === undefined || value.length === 0) {
        fail(`${flag} is required`);
    }
    return value;
}

function printJson(value: unknown): void {
    console.log(JSON.stringify(value, null, 2));
}

function readPages(filePath: string): string[] {
    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(filePath, "utf8"));
    } catch (error) {
        fail(`${filePath} is not valid JSON: ${errorMessage(error)}`);
    }

    const result = pagesSchema.safeParse(parsed);
    if (!result.success) {
        fail(`${filePath} must hold a JSON array of page text strings`);
    }
    return result.data;
}

async function main(): Promise<void> {
    // Filter out standalone "--" which npm passes through
    const args = process.argv.slice(2).filter((a) => a !== "--");
    const command = args[0];
    const options = parseArgs(args.slice(1));

    if (options.timing) {
        logger.setTimingEnabled(true);
    }

    switch (command) {
        case "clean": {
            const filePath = requireFile(options.positional[0], "Markdown file");
            const markdown = fs.readFileSync(filePath, "utf8");
            printJson(logger.time("1. Clean markdown", () => cleanMarkdown(markdown)));
            break;
        }

        case "sentences": {
            const filePath = requireFile(options.positional[0], "Markdown file");
            const doi = requireOption(options.doi, "--doi");
            const filename = options.filename ?? path.basename(filePath);
            const markdown = fs.readFileSync(filePath, "utf8");

            const result = indexMarkdown(markdown, { doi, filename }, { logger, debug: options.debug });
            printJson({
                documentId: result.documentId,
                stats: result.stats,
                sentences: result.sentences,
            });
            break;
        }

        case "chunks": {
            const filePath = requireFile(options.positional[0], "pages JSON file");
            const doi = requireOption(options.doi, "--doi");
            const filename = options.filename ?? path.basename(filePath, path.extname(filePath));
            const pages = readPages(filePath);

            const result = indexPages(pages, { doi, filename }, {
                logger,
                debug: options.debug,
                chunks: { stopAtReferences: options.stopAtReferences },
            });

            if (options.out !== undefined) {
                await JsonChunkStore.save(options.out, result.chunks);
                logger.log(`Wrote ${result.chunks.length} chunks to ${options.out}`);
            }

            printJson(result);
            break;
        }

        case "expand": {
            const storePath = requireFile(options.positional[0], "chunk store file");
            const chunkId = requireOption(options.positional[1], "<chunkId>");
            const store = await JsonChunkStore.load(storePath);

            const window = await logger.timeAsync("1. Expand context", () =>
                expandContext(store, chunkId, options.window ?? 2)
            );
            printJson(window);
            break;
        }

        case "locate": {
            const storePath = requireFile(options.positional[0], "chunk store file");
            const doi = requireOption(options.doi, "--doi");
            const sentence = requireOption(options.sentence, "--sentence");
            const store = await JsonChunkStore.load(storePath);

            const result = await logger.timeAsync("1. Locate sentence", () => locateSentence(store, sentence, doi));
            printJson({ ...result, display: describeLocation(result) });
            break;
        }

        case "mcp": {
            await import("./mcp/server");
            return;
        }

        case "--help":
        case "-h":
        case "help":
        case undefined: {
            console.log(HELP_TEXT);
            return;
        }

        default: {
            console.log(`Unknown command: ${command}`);
            console.log("Run 'paperseg --help' for usage.\n");
            process.exit(1);
        }
    }

    if (options.timing) {
        logger.printTimings();
    }
}

main().catch((err) => {
    logger.error(`Unexpected error: ${errorMessage(err)}`);
    process.exit(1);
});
