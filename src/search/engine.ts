/**
 * Query orchestration: analyze, fan out to sources, merge and rank
 */

import type { AggregatedResponse, AnalyzedQuery, Article, SourceInvocationRecord, SourcesInfo } from "../types";
import type { ScheduledSource, SourceContext } from "../sources/types";
import { resolveConfig, type SearchConfig } from "../config";
import { analyzeQuery, naiveAnalysis, toQueryInfo } from "../query/analyzer";
import { createPageFetcher, type PageFetcher } from "../sources/http";
import { DEFAULT_SOURCES } from "../sources";
import { createKnowledgeBase, type KnowledgeBase } from "../knowledge/fallback";
import { KNOWLEDGE_SOURCE } from "../knowledge/topics";
import { rankArticles } from "../scoring/ranker";
import { runWithConcurrency } from "../utils/shared";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

export class QueryValidationError extends Error {
    constructor(message: string = "Please provide a query") {
        super(message);
        this.name = "QueryValidationError";
    }
}

export const SYSTEM_SOURCE = "System";

/** Single article returned when the pipeline itself fails */
export const DEGRADED_ARTICLE: Article = Object.freeze({
    title: "Space Search Information",
    link: "https://www.nasa.gov/",
    description: "We're having trouble processing your query right now. In the meantime, try one of the example queries.",
    source: SYSTEM_SOURCE,
    relevance: 1,
});

export interface HandleQueryOptions {
    config?: Partial<SearchConfig>;
    /** Scheduled sources; defaults to the live sources */
    sources?: readonly ScheduledSource[];
    fetchPage?: PageFetcher;
    knowledgeBase?: KnowledgeBase;
    analyze?: (raw: string) => AnalyzedQuery;
    env?: NodeJS.ProcessEnv;
}

interface SourceOutcome {
    index: number;
    name: string;
    articles: Article[];
}

/**
 * Whether a scheduled source runs in the first, concurrent phase.
 * Count-gated sources join it only when gates are evaluated up front
 * (against zero results).
 */
function runsInFirstPhase(entry: ScheduledSource, query: AnalyzedQuery, config: SearchConfig): boolean {
    switch (entry.when.kind) {
        case "always":
            return true;
        case "intent":
            return entry.when.intents.includes(query.intent);
        case "fewerThan":
            return config.fallbackGate === "scheduled" && entry.when.count > 0;
    }
}

/**
 * Resolves to null once the signal aborts
 */
function abortion(signal: AbortSignal): Promise<null> {
    return new Promise(resolve => {
        if (signal.aborted) {
            resolve(null);
            return;
        }
        signal.addEventListener("abort", () => resolve(null), { once: true });
    });
}

/**
 * Run one source. Rejections and the query timeout both count as no results.
 */
async function invoke(
    entry: ScheduledSource,
    index: number,
    query: AnalyzedQuery,
    context: SourceContext,
    aborted: Promise<null>
): Promise<SourceOutcome> {
    const name = entry.source.name;
    logger.debug(`Querying ${name}`, context.debug);

    try {
        const articles = await logger.timeAsync(`Source: ${name}`, async () =>
            Promise.race([entry.source.search(query, context), aborted])
        );
        if (articles === null) {
            logger.warn(`${name} aborted by query timeout`);
            return { index, name, articles: [] };
        }
        return { index, name, articles };
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn(`${name} failed: ${message}`);
        return { index, name, articles: [] };
    }
}

function buildSourcesInfo(records: readonly SourceInvocationRecord[]): SourcesInfo {
    const withResults = records.filter(r => r.result_count > 0);
    return {
        sources_queried: records.map(r => r.source_name),
        sources_with_results: withResults.map(r => r.source_name),
        result_counts: Object.fromEntries(withResults.map(r => [r.source_name, r.result_count])),
    };
}

/**
 * Response used when aggregation fails unexpectedly. Reports the
 * analyzed query when analysis got that far.
 */
export function degradedResponse(text: string, query?: AnalyzedQuery): AggregatedResponse {
    return {
        query_info: toQueryInfo(query ?? naiveAnalysis(text)),
        results: [DEGRADED_ARTICLE],
        total_found: 1,
        sources_info: { sources_queried: [], sources_with_results: [], result_counts: {} },
    };
}

function analyzeTimed(text: string, config: SearchConfig, options: HandleQueryOptions): AnalyzedQuery {
    const analyze = options.analyze ?? analyzeQuery;
    const analyzeStart = performance.now();
    const query = analyze(text);
    logger.recordTiming("Query analysis", performance.now() - analyzeStart);
    logger.debug(`Query "${text}" -> intent: ${query.intent}, keywords: [${query.keywords.join(", ")}]`, config.debug);
    return query;
}

async function aggregate(
    text: string,
    query: AnalyzedQuery,
    config: SearchConfig,
    options: HandleQueryOptions
): Promise<AggregatedResponse> {
    const schedule = options.sources ?? DEFAULT_SOURCES;
    const fetchPage = options.fetchPage ?? createPageFetcher({ config });
    const knowledgeBase = options.knowledgeBase ?? createKnowledgeBase();

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), config.queryTimeoutMs);
    const aborted = abortion(controller.signal);
    const context: SourceContext = { fetchPage, signal: controller.signal, debug: config.debug };

    const outcomes: SourceOutcome[] = [];
    try {
        const firstPhase = schedule
            .map((entry, index) => ({ entry, index }))
            .filter(({ entry }) => runsInFirstPhase(entry, query, config));

        const phaseOne = await runWithConcurrency(
            firstPhase,
            async ({ entry, index }) => invoke(entry, index, query, context, aborted),
            Math.min(config.maxConcurrentSources, Math.max(1, firstPhase.length))
        );
        outcomes.push(...phaseOne);

        if (config.fallbackGate === "dynamic") {
            let gathered = outcomes.reduce((sum, o) => sum + o.articles.length, 0);

            for (const [index, entry] of schedule.entries()) {
                if (entry.when.kind !== "fewerThan" || gathered >= entry.when.count) continue;
                if (controller.signal.aborted) break;

                const outcome = await invoke(entry, index, query, context, aborted);
                outcomes.push(outcome);
                gathered += outcome.articles.length;
            }
        }
    } finally {
        clearTimeout(timeoutId);
    }

    outcomes.sort((a, b) => a.index - b.index);

    const records: SourceInvocationRecord[] = outcomes.map(o => ({
        source_name: o.name,
        attempted: true,
        result_count: o.articles.length,
    }));
    const merged = outcomes.flatMap(o => o.articles);

    if (merged.length === 0) {
        logger.warn(`No results found for query: ${text}, using fallback data`);
        const fallback = knowledgeBase.lookup(query);
        merged.push(...fallback);
        records.push({ source_name: KNOWLEDGE_SOURCE, attempted: true, result_count: fallback.length });
    }

    const { results, totalFound } = rankArticles(merged, config.maxResults);
    const sourcesInfo = buildSourcesInfo(records);

    logger.debug(`Returning ${results.length} of ${totalFound} unique results from ${sourcesInfo.sources_with_results.length} sources`, config.debug);

    return {
        query_info: toQueryInfo(query),
        results,
        total_found: totalFound,
        sources_info: sourcesInfo,
    };
}

/**
 * Answer a free-text space query.
 * Throws QueryValidationError for empty input; every other failure
 * yields a degraded response.
 */
export async function handleQuery(text: string, options: HandleQueryOptions = {}): Promise<AggregatedResponse> {
    if (text.trim().length === 0) {
        throw new QueryValidationError();
    }

    const config = resolveConfig(options.config, options.env);

    let query: AnalyzedQuery | undefined;
    try {
        query = analyzeTimed(text, config, options);
        return await aggregate(text, query, config, options);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(`Error processing query '${text}': ${message}`);
        return degradedResponse(text, query);
    }
}
