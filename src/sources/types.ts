import type { AnalyzedQuery, Article, Intent } from "../types";
import type { PageFetcher } from "./http";

export interface SourceContext {
    fetchPage: PageFetcher;
    /** Aborted when the query-level timeout fires */
    signal?: AbortSignal;
    debug: boolean;
}

/**
 * One external content source. search() resolves to [] on failure.
 */
export interface SearchSource {
    readonly name: string;
    search(query: AnalyzedQuery, context: SourceContext): Promise<Article[]>;
}

/**
 * When a scheduled source is invoked
 * - always: every query
 * - intent: the query's intent is in the set
 * - fewerThan: fewer than `count` results gathered so far
 */
export type SourceCondition =
    | { kind: "always" }
    | { kind: "intent"; intents: readonly Intent[] }
    | { kind: "fewerThan"; count: number };

export interface ScheduledSource {
    source: SearchSource;
    when: SourceCondition;
}
