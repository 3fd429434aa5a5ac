/**
 * Offline answers used when every live source comes back empty
 */

import type { AnalyzedQuery, Article } from "../types";
import { GENERAL_TOPIC, KNOWLEDGE_SOURCE, KNOWLEDGE_TOPICS, type KnowledgeTopic } from "./topics";

export const MATCH_RELEVANCE = 3;
export const GENERAL_RELEVANCE = 2;

export interface KnowledgeBase {
    /** Never returns an empty list */
    lookup(query: AnalyzedQuery): Article[];
}

export interface KnowledgeBaseOptions {
    topics?: readonly KnowledgeTopic[];
    general?: KnowledgeTopic;
}

function toArticle(topic: KnowledgeTopic, relevance: number): Article {
    return {
        title: topic.title,
        link: topic.link,
        description: topic.description,
        source: KNOWLEDGE_SOURCE,
        relevance,
    };
}

/**
 * A topic matches when its key occurs anywhere in the raw query text
 * (case-insensitive, so "iss" matches "mission"), equals the intent,
 * or shares a word with the keywords
 */
export function topicMatches(topic: KnowledgeTopic, query: AnalyzedQuery): boolean {
    if (query.originalText.toLowerCase().includes(topic.key)) return true;
    if (topic.key === query.intent) return true;
    return topic.key.split(" ").some(word => query.keywords.includes(word));
}

export function createKnowledgeBase(options: KnowledgeBaseOptions = {}): KnowledgeBase {
    const topics = options.topics ?? KNOWLEDGE_TOPICS;
    const general = options.general ?? GENERAL_TOPIC;

    return {
        lookup(query) {
            const matches = topics
                .filter(topic => topicMatches(topic, query))
                .map(topic => toArticle(topic, MATCH_RELEVANCE));

            return matches.length > 0 ? matches : [toArticle(general, GENERAL_RELEVANCE)];
        },
    };
}
