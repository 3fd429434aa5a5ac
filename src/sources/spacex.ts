import { bySelector } from "../extraction/strategies";
import { createSourceAdapter } from "./base";

const BASE_URL = "https://www.spacex.com/";

/**
 * SpaceX has no search; the homepage sections describe current missions.
 * Every article links back to the homepage.
 */
export const spacexSource = createSourceAdapter({
    name: "SpaceX",
    baseUrl: BASE_URL,
    targets: () => [BASE_URL],
    strategies: [bySelector("section")],
    structuralFallback: false,
    candidateLimit: 3,
    minTitleLength: 6,
    mapLink: () => BASE_URL,
    linkOptional: true,
    defaultDescription: "Visit SpaceX for the latest on its launches and missions.",
});
