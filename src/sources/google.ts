import type { AnalyzedQuery } from "../types";
import { bySelector } from "../extraction/strategies";
import { getDomain, resolveLink } from "../utils/shared";
import { createSourceAdapter, searchUrl } from "./base";

const BASE_URL = "https://www.google.com/";

const SPACE_CONTEXT_TERMS = ["space", "nasa", "astronomy", "cosmos", "universe"];

/**
 * Append "space astronomy" unless the query already has space context
 */
export function googleSearchTerms(query: AnalyzedQuery): string {
    const lower = query.originalText.toLowerCase();
    return SPACE_CONTEXT_TERMS.some(term => lower.includes(term))
        ? query.originalText
        : `${query.originalText} space astronomy`;
}

/**
 * Unwrap /url?q= redirects and drop links into Google's own services
 * (Scholar and Books are kept)
 */
export function cleanGoogleLink(link: string): string | null {
    let target = link;
    try {
        const url = new URL(link);
        const wrapped = url.searchParams.get("q");
        if (url.hostname.endsWith("google.com") && url.pathname === "/url" && wrapped !== null) {
            target = wrapped;
        }
    } catch {
        return null;
    }

    // Redirect targets may be relative or non-http
    const absolute = resolveLink(target, BASE_URL);
    if (absolute === null) return null;

    if (absolute.includes("google.com") && !/scholar|books/.test(absolute)) {
        return null;
    }
    return absolute;
}

export const googleSource = createSourceAdapter({
    name: "Google",
    baseUrl: BASE_URL,
    referer: BASE_URL,
    targets: (query) => [searchUrl(`${BASE_URL}search`, "q", googleSearchTerms(query))],
    strategies: [
        bySelector("div.g"),
        bySelector(".rc"),
        bySelector(".yuRUbf"),
        bySelector(".jtfYYd"),
    ],
    fields: { descriptionSelectors: [".VwiC3b", ".st", ".aCOpRe"] },
    defaultDescription: "Find more information on Google.",
    mapLink: cleanGoogleLink,
    labelFor: (link) => `Google (${getDomain(link)})`,
});
