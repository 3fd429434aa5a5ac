import { bySelector } from "../extraction/strategies";
import { createSourceAdapter, searchUrl } from "./base";

const BASE_URL = "https://www.nasa.gov/";

/**
 * NASA news search. The site layout changes often, so this source carries
 * the widest selector list and falls back to the homepage as a target.
 */
export const nasaSource = createSourceAdapter({
    name: "NASA",
    baseUrl: BASE_URL,
    referer: BASE_URL,
    targets: (query) => [
        `${BASE_URL}search/${encodeURIComponent(query.originalText)}/`,
        searchUrl(`${BASE_URL}search/`, "q", query.originalText),
        searchUrl(BASE_URL, "s", query.originalText),
        BASE_URL,
    ],
    strategies: [
        bySelector("article"),
        bySelector("div.search-result, div.search-item, div.news-item, div.article-card"),
        bySelector(".news-content"),
        bySelector(".search-results .item"),
        bySelector(".list-items .item"),
        bySelector(".articles-listing article"),
        bySelector(".grid-item"),
    ],
    defaultDescription: "View this NASA article for more information.",
});
