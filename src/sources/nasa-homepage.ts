import { bySelector } from "../extraction/strategies";
import { createSourceAdapter } from "./base";

const BASE_URL = "https://www.nasa.gov/";

export const nasaHomepageSource = createSourceAdapter({
    name: "NASA Homepage",
    label: "NASA",
    baseUrl: BASE_URL,
    referer: BASE_URL,
    targets: () => [BASE_URL],
    strategies: [bySelector("article"), bySelector(".ubernode"), bySelector(".grid-item")],
    structuralFallback: false,
    candidateLimit: 3,
    linkOptional: true,
    defaultDescription: "Visit NASA for the latest space news and information.",
});
