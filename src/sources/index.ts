import type { ScheduledSource } from "./types";
import { wikipediaSource } from "./wikipedia";
import { googleSource } from "./google";
import { nasaSource } from "./nasa";
import { spaceComSource } from "./space-com";
import { nasaScienceSource } from "./nasa-science";
import { spaceFactsSource } from "./space-facts";
import { usgsSource } from "./usgs";
import { spacexSource } from "./spacex";
import { nasaHomepageSource } from "./nasa-homepage";
import { universeTodaySource } from "./universe-today";

export type { SearchSource, SourceContext, SourceCondition, ScheduledSource } from "./types";
export { createPageFetcher, type PageFetcher, type FetchedPage } from "./http";
export { defineSource, createSourceAdapter } from "./base";

/**
 * Invocation order and gating for every live source.
 * General sources first, then intent-specific ones, then
 * homepage fallbacks gated on how many results exist so far.
 */
export const DEFAULT_SOURCES: readonly ScheduledSource[] = [
    { source: wikipediaSource, when: { kind: "always" } },
    { source: googleSource, when: { kind: "always" } },
    { source: nasaSource, when: { kind: "always" } },
    { source: spaceComSource, when: { kind: "always" } },
    { source: nasaScienceSource, when: { kind: "intent", intents: ["solar", "galaxy", "universe", "asteroid"] } },
    { source: spaceFactsSource, when: { kind: "intent", intents: ["solar", "mars", "moon", "asteroid"] } },
    { source: usgsSource, when: { kind: "intent", intents: ["mars", "moon", "asteroid"] } },
    { source: spacexSource, when: { kind: "intent", intents: ["spacex", "launch"] } },
    { source: nasaHomepageSource, when: { kind: "fewerThan", count: 3 } },
    { source: universeTodaySource, when: { kind: "fewerThan", count: 5 } },
];
