/**
 * MCP server configuration, read from the environment
 */

import { z } from "zod";

export const serverEnvSchema = z.object({
    /** JSON file holding the chunk records to serve */
    CHUNK_STORE_PATH: z.string().min(1),
    /** Default neighbors on each side for expand_chunk_context */
    CONTEXT_WINDOW: z.coerce.number().int().nonnegative().default(2),
    /** Sentence prefix length for locate_sentence */
    LOCATE_PREFIX_LENGTH: z.coerce.number().int().positive().default(50),
});

export interface ServerConfig {
    chunkStorePath: string;
    contextWindow: number;
    locatePrefixLength: number;
}

/**
 * Validate the environment into a ServerConfig, or throw with every problem listed
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
    const result = serverEnvSchema.safeParse(env);
    if (!result.success) {
        const problems = result.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`);
        throw new Error(`Invalid MCP server configuration (${problems.join("; ")})`);
    }

    return {
        chunkStorePath: result.data.CHUNK_STORE_PATH,
        contextWindow: result.data.CONTEXT_WINDOW,
        locatePrefixLength: result.data.LOCATE_PREFIX_LENGTH,
    };
}
