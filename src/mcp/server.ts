/**
 * MCP Server entry point
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { runSpaceSearch, listExamples } from "./tools";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

// stdout carries JSON-RPC
logger.setInfoStream("stderr");

const server = new McpServer({
    name: "space_search",
    version: "1.0.0",
});

server.tool(
    "space_search",
    `Search live space and astronomy sources (Wikipedia, NASA, Space.com, Google and topic-specific sites) for a free-text question.

The query is classified into a topic (mars, moon, iss, spacex, hubble, solar, galaxy, ...), which decides the extra sources consulted. Results are scored by keyword overlap, deduplicated by title, and capped at 10. When every live source comes back empty, canned articles from a small offline knowledge base are returned instead.

RETURNS: Ranked articles with title, link, source and a short description.`,
    {
        query: z.string().describe("Free-text space question, e.g. \"Mars rover mission\""),
        format: z.enum(["markdown", "json"]).optional().describe("Output format (default: markdown)"),
        diagnostics: z.boolean().optional().describe("Append keywords and per-source result counts (markdown only)"),
    },
    async ({ query, format, diagnostics }) => runSpaceSearch({
        query,
        ...(format !== undefined && { format }),
        ...(diagnostics !== undefined && { diagnostics }),
    })
);

server.tool(
    "space_examples",
    "List example queries that work well with space_search.",
    async () => listExamples()
);

async function main() {
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.log("space_search MCP server running on stdio");
}

main().catch((error) => {
    logger.error(`Fatal error: ${error}`);
    process.exit(1);
});
