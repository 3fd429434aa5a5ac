import { bySelector } from "../extraction/strategies";
import { createSourceAdapter, searchUrl } from "./base";

const BASE_URL = "https://www.universetoday.com/";

export const universeTodaySource = createSourceAdapter({
    name: "Universe Today",
    baseUrl: BASE_URL,
    referer: BASE_URL,
    targets: (query) => [searchUrl(BASE_URL, "s", query.originalText)],
    strategies: [bySelector("article.post"), bySelector("article")],
    fields: { descriptionSelectors: ["p.excerpt"] },
    defaultDescription: "Visit Universe Today for more information on this space-related topic.",
});
