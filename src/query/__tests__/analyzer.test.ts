import { describe, it, expect } from "vitest";
import { analyzeQuery, naiveAnalysis, toQueryInfo, PROTECTED_TERMS } from "../analyzer";

describe("analyzeQuery", () => {
    it("drops stop words and reduces plurals", () => {
        const query = analyzeQuery("What are Black Holes?");

        expect(query.originalText).toBe("What are Black Holes?");
        expect(query.keywords).toEqual(["black", "hole"]);
        expect(query.intent).toBe("universe");
    });

    it("leaves protected terms to the lemmatizer untouched", () => {
        const seen: string[] = [];
        const query = analyzeQuery("mars rovers", {
            lemmatize: (token) => {
                seen.push(token);
                return token.replace(/s$/, "");
            },
        });

        expect(seen).toEqual(["rovers"]);
        expect(query.keywords).toEqual(["mars", "rover"]);
        expect(query.intent).toBe("mars");
    });

    it("falls back to a naive split when the tokenizer throws", () => {
        const query = analyzeQuery("Hubble, 2024 images", {
            tokenize: () => {
                throw new Error("tokenizer unavailable");
            },
            lemmatize: (token) => token,
        });

        expect(query.keywords).toEqual(["hubble", "images"]);
        expect(query.intent).toBe("hubble");
    });

    it("keeps tokens unreduced when the lemmatizer throws", () => {
        const query = analyzeQuery("saturn rings", {
            lemmatize: () => {
                throw new Error("no dictionary");
            },
        });

        expect(query.keywords).toEqual(["saturn", "rings"]);
        expect(query.intent).toBe("general");
    });

    it("protects trigger words and planet names", () => {
        expect(PROTECTED_TERMS.has("iss")).toBe(true);
        expect(PROTECTED_TERMS.has("jupiter")).toBe(true);
        expect(PROTECTED_TERMS.has("galaxies")).toBe(false);
    });
});

describe("naiveAnalysis", () => {
    it("splits without filtering and classifies nothing", () => {
        expect(naiveAnalysis("The Moon!")).toEqual({
            originalText: "The Moon!",
            keywords: ["the", "moon"],
            intent: "general",
        });
    });
});

describe("toQueryInfo", () => {
    it("uses the wire field names", () => {
        expect(toQueryInfo({ originalText: "Mars", keywords: ["mars"], intent: "mars" })).toEqual({
            original_text: "Mars",
            normalized_keywords: ["mars"],
            intent: "mars",
        });
    });
});
