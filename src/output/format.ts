import type { AggregatedResponse } from "../types";

export type OutputFormat = "markdown" | "json";

export interface FormatOptions {
    /** Append keywords and per-source counts */
    diagnostics?: boolean;
}

/**
 * One status line per queried source: "+" produced results, "-" did not
 */
function formatSourceLines(response: AggregatedResponse): string[] {
    const { sources_queried, result_counts } = response.sources_info;
    return sources_queried.map(name => {
        const count = result_counts[name] ?? 0;
        return count > 0
            ? `+ [${name}] ${count} result${count === 1 ? "" : "s"}`
            : `- [${name}] no results`;
    });
}

/**
 * Render a response as markdown for terminals and MCP clients
 */
export function formatMarkdown(response: AggregatedResponse, options: FormatOptions = {}): string {
    const lines: string[] = [];
    const { query_info: info, results, total_found: totalFound } = response;

    lines.push(`${results.length}/${totalFound} results for "${info.original_text}" (intent: ${info.intent})`);

    results.forEach((article, i) => {
        lines.push(`\n---\n\n## ${i + 1}. [${article.title}](${article.link})`);
        lines.push(`> ${article.source} | relevance ${article.relevance}`);
        lines.push(article.description);
    });

    if (options.diagnostics === true) {
        lines.push("\n---\n\n## Diagnostics");
        lines.push(`Keywords: [${info.normalized_keywords.join(", ")}]\n`);
        lines.push(...formatSourceLines(response));
    }

    return lines.join("\n");
}

export function formatJson(response: AggregatedResponse): string {
    return JSON.stringify(response, null, 2);
}

export function formatResponse(
    response: AggregatedResponse,
    format: OutputFormat,
    options: FormatOptions = {}
): string {
    return format === "json" ? formatJson(response) : formatMarkdown(response, options);
}
