import type { Intent } from "./query/intents";

export type { Intent } from "./query/intents";

/**
 * Normalized, intent-tagged form of a raw query. Built once per request.
 */
export interface AnalyzedQuery {
    readonly originalText: string;
    /** Lemmatized keywords in extraction order (may repeat) */
    readonly keywords: readonly string[];
    readonly intent: Intent;
}

export interface Article {
    readonly title: string;
    /** Absolute URL */
    readonly link: string;
    readonly description: string;
    /** Origin label, e.g. "NASA" or "Google (space.com)" */
    readonly source: string;
    readonly relevance: number;
}

export interface SourceInvocationRecord {
    source_name: string;
    attempted: boolean;
    result_count: number;
}

export interface QueryInfo {
    original_text: string;
    normalized_keywords: string[];
    intent: Intent;
}

export interface SourcesInfo {
    sources_queried: string[];
    sources_with_results: string[];
    result_counts: Record<string, number>;
}

/**
 * JSON wire shape returned to HTTP/MCP/CLI callers
 */
export interface AggregatedResponse {
    query_info: QueryInfo;
    results: Article[];
    total_found: number;
    sources_info: SourcesInfo;
}
