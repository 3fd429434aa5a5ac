/**
 * Query understanding: keywords + intent
 */

import type { AnalyzedQuery, QueryInfo } from "../types";
import { INTENT_TRIGGERS, classifyIntent } from "./intents";
import { tokenize, naiveSplit, lemmatizeTokens, type Lemmatize } from "../preprocessing/tokenize";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

const CELESTIAL_NAMES = [
    "mercury", "venus", "earth", "jupiter", "saturn", "uranus", "neptune",
    "pluto", "ceres", "titan", "europa", "ganymede", "callisto", "enceladus",
];

/**
 * Terms the lemmatizer must not touch. Trigger words are already in base
 * form, and several are proper nouns that look plural ("mars", "iss").
 */
export const PROTECTED_TERMS: ReadonlySet<string> = new Set([
    ...INTENT_TRIGGERS.flatMap(([, triggers]) => [...triggers]),
    ...CELESTIAL_NAMES,
]);

export interface AnalyzerOptions {
    tokenize?: (text: string) => string[];
    lemmatize?: Lemmatize;
}

/**
 * Tokenize, filter, lemmatize and classify a raw query.
 * Never throws: tokenizer failures fall back to a naive split.
 */
export function analyzeQuery(raw: string, options: AnalyzerOptions = {}): AnalyzedQuery {
    const split = options.tokenize ?? tokenize;

    let tokens: string[];
    try {
        tokens = split(raw);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn(`Tokenizer failed (${message}), using naive split`);
        tokens = naiveSplit(raw).filter(t => /^[a-z]+$/.test(t));
    }

    const keywords = lemmatizeTokens(tokens, PROTECTED_TERMS, options.lemmatize);

    return Object.freeze({
        originalText: raw,
        keywords: Object.freeze(keywords),
        intent: classifyIntent(keywords),
    });
}

/**
 * Best-effort analysis used when the pipeline itself has failed
 */
export function naiveAnalysis(raw: string): AnalyzedQuery {
    return Object.freeze({
        originalText: raw,
        keywords: Object.freeze(naiveSplit(raw)),
        intent: "general",
    });
}

export function toQueryInfo(query: AnalyzedQuery): QueryInfo {
    return {
        original_text: query.originalText,
        normalized_keywords: [...query.keywords],
        intent: query.intent,
    };
}
