/**
 * Library entry point
 */

export { handleQuery, QueryValidationError, degradedResponse, type HandleQueryOptions } from "./search/engine";
export { analyzeQuery, naiveAnalysis, toQueryInfo, PROTECTED_TERMS } from "./query/analyzer";
export { classifyIntent, INTENTS, INTENT_TRIGGERS } from "./query/intents";
export { scoreRelevance } from "./scoring/relevance";
export { rankArticles, sortByRelevance, dedupeByTitle } from "./scoring/ranker";
export { createKnowledgeBase, type KnowledgeBase, type KnowledgeBaseOptions } from "./knowledge/fallback";
export { KNOWLEDGE_TOPICS, GENERAL_TOPIC, type KnowledgeTopic } from "./knowledge/topics";
export {
    DEFAULT_SOURCES,
    createPageFetcher,
    createSourceAdapter,
    defineSource,
    type FetchedPage,
    type PageFetcher,
    type ScheduledSource,
    type SearchSource,
    type SourceCondition,
    type SourceContext,
} from "./sources";
export { bySelector, headingContainers, selectCandidates, type ExtractionStrategy } from "./extraction/strategies";
export { formatMarkdown, formatJson, formatResponse, type OutputFormat } from "./output/format";
export { resolveConfig, loadEnvOverrides, DEFAULT_CONFIG, type SearchConfig, type FallbackGateMode } from "./config";
export { EXAMPLE_QUERIES } from "./examples";
export type {
    AggregatedResponse,
    AnalyzedQuery,
    Article,
    Intent,
    QueryInfo,
    SourceInvocationRecord,
    SourcesInfo,
} from "./types";
