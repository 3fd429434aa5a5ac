import type { AnalyzedQuery, Intent } from "../../types";
import type { FetchedPage, PageFetcher } from "../http";
import type { SourceContext } from "../types";

export interface FakePage {
    html: string;
    /** Simulates a redirect */
    finalUrl?: string;
}

export interface FakeFetcher {
    fetchPage: PageFetcher;
    /** Every URL requested, in order */
    calls: string[];
}

/**
 * In-memory PageFetcher: known URLs return their HTML, anything else a 404
 */
export function fakeFetcher(pages: Record<string, string | FakePage>): FakeFetcher {
    const calls: string[] = [];

    const fetchPage: PageFetcher = async (url) => {
        calls.push(url);
        const page = pages[url];
        if (page === undefined) {
            return { url, finalUrl: url, status: 404, html: null, error: "HTTP 404: Not Found" };
        }
        const entry: FakePage = typeof page === "string" ? { html: page } : page;
        const result: FetchedPage = { url, finalUrl: entry.finalUrl ?? url, status: 200, html: entry.html };
        return result;
    };

    return { fetchPage, calls };
}

export function contextFor(fetcher: FakeFetcher): SourceContext {
    return { fetchPage: fetcher.fetchPage, debug: false };
}

export function query(originalText: string, keywords: string[], intent: Intent = "general"): AnalyzedQuery {
    return { originalText, keywords, intent };
}
