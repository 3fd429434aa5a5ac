import { describe, it, expect } from "vitest";
import * as cheerio from "cheerio";
import type { Element } from "domhandler";
import { extractDescription, extractLink, extractTitle } from "../fields";

const BASE = "https://www.space.com/";

function block(html: string): { $: cheerio.CheerioAPI; el: Element } {
    const $ = cheerio.load(`<div id="block">${html}</div>`);
    const el = $("#block").get(0);
    if (el === undefined) throw new Error("fixture has no block");
    return { $, el };
}

describe("extractTitle", () => {
    it("prefers higher-level headings over document order", () => {
        const { $, el } = block(`<h2>Second</h2><h1>First</h1>`);
        expect(extractTitle($, el)).toBe("First");
    });

    it("normalizes whitespace", () => {
        const { $, el } = block(`<h3>  Europa
            Clipper </h3>`);
        expect(extractTitle($, el)).toBe("Europa Clipper");
    });

    it("skips empty headings", () => {
        const { $, el } = block(`<h2> </h2><h2>Real title</h2>`);
        expect(extractTitle($, el)).toBe("Real title");
    });

    it("uses extra selectors after headings", () => {
        const { $, el } = block(`<h5>Crater map</h5>`);
        expect(extractTitle($, el)).toBeNull();
        expect(extractTitle($, el, { titleSelectors: ["h5"] })).toBe("Crater map");
    });

    it("falls back to title-like class names", () => {
        const { $, el } = block(`<span class="card-title">Hinted title</span>`);
        expect(extractTitle($, el)).toBe("Hinted title");
    });
});

describe("extractLink", () => {
    it("prefers an anchor that wraps a heading", () => {
        const { $, el } = block(`<a href="/tag/mars">Mars</a><a href="/story"><h3>Story</h3></a>`);
        expect(extractLink($, el, BASE)).toBe("https://www.space.com/story");
    });

    it("uses the first anchor otherwise", () => {
        const { $, el } = block(`<h3>Story</h3><a href="/one">1</a><a href="/two">2</a>`);
        expect(extractLink($, el, BASE)).toBe("https://www.space.com/one");
    });

    it("skips javascript, mailto and fragment links", () => {
        const { $, el } = block(`
            <a href="javascript:void(0)">x</a>
            <a href="mailto:news@example.test">mail</a>
            <a href="#top">top</a>
            <a href="https://example.test/ok">ok</a>
        `);
        expect(extractLink($, el, BASE)).toBe("https://example.test/ok");
    });

    it("returns null when there is no usable anchor", () => {
        const { $, el } = block(`<h3>No link</h3><a>bare</a>`);
        expect(extractLink($, el, BASE)).toBeNull();
    });
});

describe("extractDescription", () => {
    it("tries source selectors first", () => {
        const { $, el } = block(`<p>Generic</p><div class="VwiC3b">Snippet text</div>`);
        expect(extractDescription($, el, { descriptionSelectors: [".VwiC3b"] })).toBe("Snippet text");
    });

    it("uses the first non-empty paragraph", () => {
        const { $, el } = block(`<p>  </p><p>Real   text</p>`);
        expect(extractDescription($, el)).toBe("Real text");
    });

    it("falls back to description-like class names", () => {
        const { $, el } = block(`<div class="entry-summary">Summary here</div>`);
        expect(extractDescription($, el)).toBe("Summary here");
    });

    it("returns null when nothing fits", () => {
        const { $, el } = block(`<h2>Only a title</h2>`);
        expect(extractDescription($, el)).toBeNull();
    });
});
