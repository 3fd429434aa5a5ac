import { describe, it, expect } from "vitest";
import { handleQuery, QueryValidationError, DEGRADED_ARTICLE } from "../engine";
import type { ScheduledSource, SearchSource } from "../../sources/types";
import type { Article } from "../../types";
import { fakeFetcher } from "../../sources/__tests__/helpers";

function article(title: string, relevance: number, source: string = "Stub"): Article {
    return { title, link: `https://example.test/${encodeURIComponent(title)}`, description: `${title} text`, source, relevance };
}

interface StubSource extends SearchSource {
    calls: number;
}

function stub(name: string, articles: Article[], delayMs: number = 0): StubSource {
    const source: StubSource = {
        name,
        calls: 0,
        async search() {
            source.calls++;
            if (delayMs > 0) {
                await new Promise(resolve => setTimeout(resolve, delayMs));
            }
            return articles;
        },
    };
    return source;
}

function always(source: SearchSource): ScheduledSource {
    return { source, when: { kind: "always" } };
}

function fewerThan(source: SearchSource, count: number): ScheduledSource {
    return { source, when: { kind: "fewerThan", count } };
}

describe("handleQuery", () => {
    it("rejects empty input before doing any work", async () => {
        const source = stub("A", [article("x", 1)]);

        await expect(handleQuery("   ", { sources: [always(source)], env: {} }))
            .rejects.toBeInstanceOf(QueryValidationError);
        expect(source.calls).toBe(0);
    });

    it("queries general, intent and fallback sources when the live web is empty", async () => {
        const fetcher = fakeFetcher({});

        const response = await handleQuery("Mars rover mission", { fetchPage: fetcher.fetchPage, env: {} });

        expect(response.query_info).toEqual({
            original_text: "Mars rover mission",
            normalized_keywords: ["mars", "rover", "mission"],
            intent: "mars",
        });
        expect(response.sources_info).toEqual({
            sources_queried: [
                "Wikipedia",
                "Google",
                "NASA",
                "Space.com",
                "Space Facts",
                "USGS Astrogeology",
                "NASA Homepage",
                "Universe Today",
                "Static Knowledge",
            ],
            sources_with_results: ["Static Knowledge"],
            result_counts: { "Static Knowledge": 2 },
        });
        // "iss" occurs inside "mission"
        expect(response.results.map(r => [r.title, r.relevance])).toEqual([
            ["Mars - The Red Planet", 3],
            ["International Space Station", 3],
        ]);
        expect(response.total_found).toBe(2);
    });

    it("falls back to the general knowledge article for unknown topics", async () => {
        const response = await handleQuery("asdkjasd qweqwe", {
            sources: [always(stub("A", []))],
            env: {},
        });

        expect(response.results.map(r => r.title)).toEqual(["Space Exploration"]);
        expect(response.results[0]?.source).toBe("Static Knowledge");
        expect(response.total_found).toBe(1);
    });

    it("keeps the highest-scoring copy of a duplicated title", async () => {
        const response = await handleQuery("james webb", {
            sources: [
                always(stub("A", [article("James Webb Space Telescope", 4, "A")])),
                always(stub("B", [article("James Webb Space Telescope", 7, "B")])),
            ],
            env: {},
        });

        expect(response.results).toHaveLength(1);
        expect(response.results[0]?.relevance).toBe(7);
        expect(response.results[0]?.source).toBe("B");
        expect(response.sources_info.result_counts).toEqual({ A: 1, B: 1 });
    });

    it("records sources in schedule order regardless of completion order", async () => {
        const response = await handleQuery("mars", {
            sources: [
                always(stub("Slow", [article("Slow result", 1)], 10)),
                always(stub("Fast", [article("Fast result", 1)])),
            ],
            env: {},
        });

        expect(response.sources_info.sources_queried).toEqual(["Slow", "Fast"]);
        expect(response.results.map(r => r.title)).toEqual(["Slow result", "Fast result"]);
    });

    it("skips sources whose intent does not match", async () => {
        const gated = stub("Gated", [article("never", 1)]);

        const response = await handleQuery("pulsar timing", {
            sources: [
                always(stub("A", [article("Pulsar", 1)])),
                { source: gated, when: { kind: "intent", intents: ["mars"] } },
            ],
            env: {},
        });

        expect(gated.calls).toBe(0);
        expect(response.sources_info.sources_queried).toEqual(["A"]);
    });

    it("counts a rejecting source as zero results", async () => {
        const broken: SearchSource = {
            name: "Broken",
            search: async () => {
                throw new Error("boom");
            },
        };

        const response = await handleQuery("mars", {
            sources: [always(broken), always(stub("A", [article("Mars", 1)]))],
            env: {},
        });

        expect(response.sources_info.sources_queried).toEqual(["Broken", "A"]);
        expect(response.sources_info.sources_with_results).toEqual(["A"]);
        expect(response.results.map(r => r.title)).toEqual(["Mars"]);
    });

    describe("fallback gates", () => {
        const three = [article("a", 1), article("b", 1), article("c", 1)];

        it("evaluates each gate against the results gathered so far", async () => {
            const homepage = stub("Homepage", [article("h", 1)]);
            const extra = stub("Extra", [article("e", 1)]);

            const response = await handleQuery("mars", {
                sources: [always(stub("A", three)), fewerThan(homepage, 3), fewerThan(extra, 5)],
                env: {},
            });

            expect(homepage.calls).toBe(0);
            expect(extra.calls).toBe(1);
            expect(response.sources_info.sources_queried).toEqual(["A", "Extra"]);
        });

        it("counts results from earlier fallback sources", async () => {
            const extra = stub("Extra", [article("e", 1)]);

            const response = await handleQuery("mars", {
                sources: [
                    always(stub("A", [article("a", 1), article("b", 1)])),
                    fewerThan(stub("Homepage", three.map(a => article(`home ${a.title}`, 1))), 3),
                    fewerThan(extra, 5),
                ],
                env: {},
            });

            expect(extra.calls).toBe(0);
            expect(response.sources_info.sources_queried).toEqual(["A", "Homepage"]);
        });

        it("runs every gated source in scheduled mode", async () => {
            const homepage = stub("Homepage", []);
            const extra = stub("Extra", []);

            await handleQuery("mars", {
                sources: [always(stub("A", three)), fewerThan(homepage, 3), fewerThan(extra, 5)],
                config: { fallbackGate: "scheduled" },
                env: {},
            });

            expect(homepage.calls).toBe(1);
            expect(extra.calls).toBe(1);
        });
    });

    it("returns at most maxResults but reports the unique total", async () => {
        const many = Array.from({ length: 12 }, (_, i) => article(`Result ${i}`, 1));

        const response = await handleQuery("mars", { sources: [always(stub("A", many))], env: {} });

        expect(response.results).toHaveLength(10);
        expect(response.total_found).toBe(12);
    });

    it("abandons sources that outlive the query timeout", async () => {
        const hanging: SearchSource = {
            name: "Hanging",
            search: () => new Promise<Article[]>(() => undefined),
        };

        const response = await handleQuery("mars", {
            sources: [always(hanging)],
            config: { queryTimeoutMs: 20 },
            env: {},
        });

        expect(response.sources_info.sources_queried).toEqual(["Hanging", "Static Knowledge"]);
        expect(response.results.map(r => r.title)).toEqual(["Mars - The Red Planet"]);
    });

    it("degrades to a system notice when the pipeline fails", async () => {
        const response = await handleQuery("mars", {
            analyze: () => {
                throw new Error("analyzer exploded");
            },
            env: {},
        });

        expect(response).toEqual({
            query_info: { original_text: "mars", normalized_keywords: ["mars"], intent: "general" },
            results: [DEGRADED_ARTICLE],
            total_found: 1,
            sources_info: { sources_queried: [], sources_with_results: [], result_counts: {} },
        });
    });

    it("keeps the analyzed query when a later step fails", async () => {
        const response = await handleQuery("Mars rover", {
            sources: [always(stub("A", []))],
            knowledgeBase: {
                lookup: () => {
                    throw new Error("knowledge base unavailable");
                },
            },
            env: {},
        });

        expect(response.query_info).toEqual({
            original_text: "Mars rover",
            normalized_keywords: ["mars", "rover"],
            intent: "mars",
        });
        expect(response.results).toEqual([DEGRADED_ARTICLE]);
        expect(response.total_found).toBe(1);
    });
});
