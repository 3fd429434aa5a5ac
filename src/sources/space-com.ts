import { bySelector } from "../extraction/strategies";
import { createSourceAdapter, searchUrl } from "./base";

const BASE_URL = "https://www.space.com/";

export const spaceComSource = createSourceAdapter({
    name: "Space.com",
    baseUrl: BASE_URL,
    referer: BASE_URL,
    targets: (query) => [searchUrl(`${BASE_URL}search`, "q", query.originalText)],
    strategies: [
        bySelector("article"),
        bySelector(".search-result"),
        bySelector(".result-item"),
        bySelector(".listingResult"),
    ],
    defaultDescription: "Visit Space.com for more information on this space-related topic.",
    // The search form itself renders as a block titled "Search"
    rejectTitle: (title) => title.toLowerCase() === "search",
    boilerplateDescription: /enter your search term/i,
    dropZeroRelevance: true,
    homepage: {
        url: BASE_URL,
        strategies: [bySelector("article")],
        relevance: 1,
        defaultDescription: "Latest space news from Space.com",
    },
});
