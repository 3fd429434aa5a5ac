import { bySelector } from "../extraction/strategies";
import { createSourceAdapter, searchUrl } from "./base";

const BASE_URL = "https://astrogeology.usgs.gov/";

/**
 * USGS Astrogeology Science Center: planetary maps and geology products
 */
export const usgsSource = createSourceAdapter({
    name: "USGS Astrogeology",
    baseUrl: BASE_URL,
    referer: BASE_URL,
    targets: (query) => [searchUrl(`${BASE_URL}search/results`, "q", query.originalText)],
    strategies: [
        bySelector(".item"),
        bySelector(".product-item"),
        bySelector(".result-item"),
    ],
    fields: {
        titleSelectors: ["h5", ".title"],
        descriptionSelectors: ["p", ".description"],
    },
    defaultDescription: "Planetary geology resource from USGS Astrogeology Science Center.",
    homepage: {
        url: BASE_URL,
        strategies: [bySelector(".featured"), bySelector(".highlight"), bySelector(".carousel-item")],
        relevance: 2,
        defaultDescription: "Featured content from USGS Astrogeology Science Center.",
    },
});
