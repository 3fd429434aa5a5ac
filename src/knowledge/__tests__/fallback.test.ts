import { describe, it, expect } from "vitest";
import { createKnowledgeBase, topicMatches, GENERAL_RELEVANCE, MATCH_RELEVANCE } from "../fallback";
import { KNOWLEDGE_TOPICS, type KnowledgeTopic } from "../topics";
import type { AnalyzedQuery, Intent } from "../../types";

function query(originalText: string, keywords: string[], intent: Intent = "general"): AnalyzedQuery {
    return { originalText, keywords, intent };
}

const ISS: KnowledgeTopic = {
    key: "iss",
    title: "International Space Station",
    link: "https://example.test/iss",
    description: "Station.",
};

describe("topicMatches", () => {
    it("matches the key anywhere in the raw text, ignoring case", () => {
        expect(topicMatches(ISS, query("When does the ISS pass over?", ["pass"]))).toBe(true);
    });

    it("matches the key inside longer words", () => {
        expect(topicMatches(ISS, query("commission report", ["commission", "report"]))).toBe(true);
    });

    it("rejects a query that shares nothing with the key", () => {
        expect(topicMatches(ISS, query("pulsar timing", ["pulsar", "timing"]))).toBe(false);
    });

    it("matches a key equal to the intent", () => {
        expect(topicMatches(ISS, query("space station crew", ["space", "station", "crew"], "iss"))).toBe(true);
    });

    it("matches when any key word is a keyword", () => {
        const blackHole: KnowledgeTopic = { ...ISS, key: "black hole" };
        expect(topicMatches(blackHole, query("black holes", ["black", "hole"], "universe"))).toBe(true);
    });
});

describe("createKnowledgeBase", () => {
    const kb = createKnowledgeBase();

    it("returns every matching topic in table order", () => {
        const articles = kb.lookup(query("James Webb pictures", ["james", "webb", "picture"], "hubble"));

        expect(articles.map(a => a.title)).toEqual(["Hubble Space Telescope", "James Webb Space Telescope"]);
        expect(articles.every(a => a.relevance === MATCH_RELEVANCE && a.source === "Static Knowledge")).toBe(true);
    });

    it("matches a topic key embedded in a longer word", () => {
        const articles = kb.lookup(query("first moonwalk", ["first", "moonwalk"]));

        expect(articles.map(a => a.title)).toEqual(["Earth's Moon"]);
    });

    it("returns the general article when nothing matches", () => {
        const articles = kb.lookup(query("pulsar timing", ["pulsar", "timing"]));

        expect(articles).toEqual([{
            title: "Space Exploration",
            link: "https://www.nasa.gov/",
            description: expect.stringContaining("Space exploration involves"),
            source: "Static Knowledge",
            relevance: GENERAL_RELEVANCE,
        }]);
    });

    it("accepts a custom topic table", () => {
        const custom = createKnowledgeBase({ topics: [ISS], general: { ...ISS, key: "general", title: "Fallback" } });

        expect(custom.lookup(query("iss", ["iss"], "iss")).map(a => a.link)).toEqual(["https://example.test/iss"]);
        expect(custom.lookup(query("mars", ["mars"], "mars")).map(a => a.title)).toEqual(["Fallback"]);
    });

    it("ships the built-in topics with absolute links", () => {
        expect(KNOWLEDGE_TOPICS.map(t => t.key)).toEqual(["mars", "moon", "black hole", "spacex", "iss", "hubble", "james webb"]);
        expect(KNOWLEDGE_TOPICS.every(t => t.link.startsWith("https://"))).toBe(true);
    });
});
