#!/usr/bin/env node

import { parseCliArgs, type SearchCommand } from "./arg-parser";
import { handleQuery, QueryValidationError } from "./search/engine";
import { formatResponse } from "./output/format";
import { EXAMPLE_QUERIES } from "./examples";
import Logger from "./utils/logger";

const logger = Logger.getInstance();

const HELP_TEXT = `
space-search - Search live space and astronomy sources from the terminal

Queries Wikipedia, Google, NASA and Space.com, plus topic-specific sources
(NASA Science, Space Facts, USGS Astrogeology, SpaceX) chosen from the
question's intent. Results are ranked by keyword relevance and deduplicated.

COMMANDS:
  search <query>      Search for a query (also: --query "<text>")
    --json              Print the raw JSON response
    --diagnostics       Show keywords and per-source result counts
    --debug             Log fetches and extraction steps to stderr
    --timing, -t        Show per-source timing breakdown

  examples            List example queries
  mcp                 Start the MCP server (called by MCP clients)
  help, --help        Show this help message

ENVIRONMENT:
  SPACE_SEARCH_REQUEST_TIMEOUT_MS   Per-request timeout (default: 15000)
  SPACE_SEARCH_MAX_ATTEMPTS         Attempts per URL (default: 3)
  SPACE_SEARCH_QUERY_TIMEOUT_MS     Whole-query budget (default: 45000)
  SPACE_SEARCH_MAX_RESULTS          Results returned (default: 10)
  SPACE_SEARCH_FALLBACK_GATE        dynamic | scheduled (default: dynamic)
  SPACE_SEARCH_DEBUG                true | false

EXAMPLES:
  space-search search "Mars rover mission"
  space-search --query "Hubble telescope images" --json
  space-search search black holes --diagnostics --timing
`;

async function runSearch(options: SearchCommand): Promise<void> {
    if (options.timing) {
        logger.setTimingEnabled(true);
    }

    logger.log(`Searching: "${options.query}"`);

    try {
        const response = await handleQuery(options.query, {
            ...(options.debug && { config: { debug: true } }),
        });
        logger.printTimings();
        console.log("\n" + formatResponse(response, options.json ? "json" : "markdown", {
            diagnostics: options.diagnostics,
        }));
    } catch (error) {
        if (error instanceof QueryValidationError) {
            logger.error(error.message);
            process.exit(1);
        }
        throw error;
    }
}

async function main(): Promise<void> {
    const parsed = parseCliArgs(process.argv.slice(2));

    switch (parsed.command) {
        case "search": {
            await runSearch(parsed);
            break;
        }

        case "examples": {
            console.log("\nExample queries:");
            for (const example of EXAMPLE_QUERIES) {
                console.log(`  - ${example}`);
            }
            console.log("");
            break;
        }

        case "mcp": {
            // Dynamically import and run MCP server
            await import("./mcp/server");
            break;
        }

        case "help": {
            console.log(HELP_TEXT);
            break;
        }

        case "unknown": {
            console.log(`Unknown command: ${parsed.value}`);
            console.log("Run 'space-search --help' for usage.\n");
            process.exit(1);
        }
    }
}

// Run main
main().catch((err) => {
    console.error(`Unexpected error: ${err}`);
    process.exit(1);
});
