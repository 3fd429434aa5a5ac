import type { Article } from "../types";

export interface RankingResult {
    /** Ranked, title-unique articles truncated to the limit */
    results: Article[];
    /** Unique count before truncation */
    totalFound: number;
}

/**
 * Sort by relevance descending. Stable: equal scores keep input order.
 */
export function sortByRelevance<T extends { relevance: number }>(items: readonly T[]): T[] {
    return [...items].sort((a, b) => b.relevance - a.relevance);
}

/**
 * Keep the first occurrence of each exact title.
 * Run after sortByRelevance so the highest-scoring copy survives.
 */
export function dedupeByTitle<T extends { title: string }>(items: readonly T[]): T[] {
    const seen = new Set<string>();
    const unique: T[] = [];

    for (const item of items) {
        if (seen.has(item.title)) continue;
        seen.add(item.title);
        unique.push(item);
    }

    return unique;
}

/**
 * Sort, dedupe and truncate a merged article list
 */
export function rankArticles(articles: readonly Article[], maxResults: number): RankingResult {
    const unique = dedupeByTitle(sortByRelevance(articles));
    return {
        results: unique.slice(0, Math.max(0, maxResults)),
        totalFound: unique.length,
    };
}
