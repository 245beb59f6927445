/**
 * MCP Server entry point
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { JsonChunkStore } from "../store/chunk-store";
import { expandChunkContextTool, locateSentenceTool } from "./tools";
import { loadServerConfig } from "./types";
import { errorMessage } from "../errors";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

async function main() {
    const config = loadServerConfig();
    const store = await JsonChunkStore.load(config.chunkStorePath);
    logger.log(`Loaded ${store.size} chunks from ${config.chunkStorePath}`);

    const server = new McpServer({
        name: "paper_segmenter",
        version: "1.0.0",
    });

    server.tool(
        "expand_chunk_context",
        `Show a stored paper chunk together with its neighboring chunks, in reading order.

WHEN TO USE:
- A retrieved chunk is cut off mid-argument and you need the surrounding text
- You want to quote a passage with what comes before and after it

RETURNS: The chunks of the window with their page and paragraph positions. The requested chunk is marked.`,
        {
            chunkId: z.string().describe("Id of a stored chunk"),
            window: z.number().int().min(0).optional().describe(`Neighbors on each side (default: ${config.contextWindow})`),
        },
        async ({ chunkId, window }) => {
            const text = await expandChunkContextTool(store, chunkId, window ?? config.contextWindow);

            return {
                content: [
                    {
                        type: "text",
                        text,
                    },
                ],
            };
        }
    );

    server.tool(
        "locate_sentence",
        `Find the page and paragraph of a paper that hold a sentence, for citing it.

Matches the start of the sentence against the stored chunks of the same DOI. A miss means the location is unknown, not that the sentence is wrong.

RETURNS: "Page N, paragraph M" with the chunk id, or "No precise location available".`,
        {
            sentence: z.string().describe("Sentence text as found in the sentence index"),
            doi: z.string().describe("DOI of the paper the sentence belongs to"),
        },
        async ({ sentence, doi }) => {
            const text = await locateSentenceTool(store, sentence, doi, config.locatePrefixLength);

            return {
                content: [
                    {
                        type: "text",
                        text,
                    },
                ],
            };
        }
    );

    const transport = new StdioServerTransport();
    await server.connect(transport);
}

main().catch((error) => {
    logger.error(`Fatal error: ${errorMessage(error)}`);
    process.exit(1);
});
