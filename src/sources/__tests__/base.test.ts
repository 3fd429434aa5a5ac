import { describe, it, expect } from "vitest";
import { defineSource, fetchFirst, searchUrl } from "../base";
import { contextFor, fakeFetcher, query } from "./helpers";

describe("defineSource", () => {
    it("passes articles through", async () => {
        const source = defineSource("Stub", async () => [
            { title: "A", link: "https://example.test/a", description: "d", source: "Stub", relevance: 1 },
        ]);

        const articles = await source.search(query("a", ["a"]), contextFor(fakeFetcher({})));

        expect(source.name).toBe("Stub");
        expect(articles).toHaveLength(1);
    });

    it("turns a failure into an empty result", async () => {
        const source = defineSource("Broken", async () => {
            throw new Error("layout changed");
        });

        expect(await source.search(query("a", ["a"]), contextFor(fakeFetcher({})))).toEqual([]);
    });
});

describe("searchUrl", () => {
    it("encodes spaces as plus signs", () => {
        expect(searchUrl("https://example.test/search", "q", "mars rover")).toBe("https://example.test/search?q=mars+rover");
    });
});

describe("fetchFirst", () => {
    it("returns the first usable page and stops", async () => {
        const fetcher = fakeFetcher({
            "https://example.test/b": "<p>b</p>",
            "https://example.test/c": "<p>c</p>",
        });

        const page = await fetchFirst(contextFor(fetcher), [
            "https://example.test/a",
            "https://example.test/b",
            "https://example.test/c",
        ]);

        expect(page?.html).toBe("<p>b</p>");
        expect(fetcher.calls).toEqual(["https://example.test/a", "https://example.test/b"]);
    });

    it("returns null when no target is usable", async () => {
        const fetcher = fakeFetcher({});
        expect(await fetchFirst(contextFor(fetcher), ["https://example.test/a"])).toBeNull();
    });

    it("stops once the query has been aborted", async () => {
        const fetcher = fakeFetcher({ "https://example.test/a": "<p>a</p>" });
        const controller = new AbortController();
        controller.abort();

        const page = await fetchFirst(
            { ...contextFor(fetcher), signal: controller.signal },
            ["https://example.test/a"]
        );

        expect(page).toBeNull();
        expect(fetcher.calls).toEqual([]);
    });
});
