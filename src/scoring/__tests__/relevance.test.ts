import { describe, it, expect } from "vitest";
import { scoreRelevance } from "../relevance";

describe("scoreRelevance", () => {
    it("counts each keyword found in the text once", () => {
        expect(scoreRelevance("Mars rover lands on Mars", ["mars", "rover", "moon"])).toBe(2);
    });

    it("matches case-insensitively and inside longer words", () => {
        expect(scoreRelevance("GALAXY clusters", ["galaxy", "cluster"])).toBe(2);
    });

    it("returns 0 for empty text or no keywords", () => {
        expect(scoreRelevance("", ["mars"])).toBe(0);
        expect(scoreRelevance("Mars", [])).toBe(0);
    });

    it("ignores empty keywords", () => {
        expect(scoreRelevance("Mars", ["", "mars"])).toBe(1);
    });
});
