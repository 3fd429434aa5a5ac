import { bySelector } from "../extraction/strategies";
import { createSourceAdapter, searchUrl } from "./base";

const BASE_URL = "https://science.nasa.gov/";

export const nasaScienceSource = createSourceAdapter({
    name: "NASA Science",
    baseUrl: BASE_URL,
    referer: "https://www.nasa.gov/",
    targets: (query) => [
        `${BASE_URL}search/${encodeURIComponent(query.originalText)}/`,
        searchUrl(BASE_URL, "s", query.originalText),
    ],
    strategies: [
        bySelector("article"),
        bySelector(".search-result"),
        bySelector(".result-item"),
    ],
    defaultDescription: "Visit NASA Science for more information on this space-related topic.",
    homepage: {
        url: BASE_URL,
        strategies: [bySelector(".featured-content"), bySelector(".nasa-card")],
        relevance: 2,
        defaultDescription: "Latest featured content from NASA Science.",
    },
});
