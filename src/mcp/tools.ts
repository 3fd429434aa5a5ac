/**
 * MCP tool handlers, kept apart from the stdio wiring so they can be tested
 */

import { handleQuery, QueryValidationError, type HandleQueryOptions } from "../search/engine";
import { formatResponse, type OutputFormat } from "../output/format";
import { EXAMPLE_QUERIES } from "../examples";

export type ToolResponse = {
    content: Array<{ type: "text"; text: string }>;
    isError?: boolean;
};

export interface SpaceSearchArgs {
    query: string;
    format?: OutputFormat;
    diagnostics?: boolean;
}

function text(value: string, isError: boolean = false): ToolResponse {
    return {
        content: [{ type: "text", text: value }],
        ...(isError && { isError }),
    };
}

export async function runSpaceSearch(
    args: SpaceSearchArgs,
    options: HandleQueryOptions = {}
): Promise<ToolResponse> {
    try {
        const response = await handleQuery(args.query, options);
        return text(formatResponse(response, args.format ?? "markdown", {
            ...(args.diagnostics !== undefined && { diagnostics: args.diagnostics }),
        }));
    } catch (error) {
        if (error instanceof QueryValidationError) {
            return text(`Invalid query: ${error.message}`, true);
        }
        throw error;
    }
}

export function listExamples(): ToolResponse {
    return text(EXAMPLE_QUERIES.map(q => `- ${q}`).join("\n"));
}
