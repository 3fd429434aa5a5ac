import * as cheerio from "cheerio";
import type { AnalyzedQuery, Article } from "../types";
import { scoreRelevance } from "../scoring/relevance";
import { sortByRelevance } from "../scoring/ranker";
import { normalizeWhitespace, slugify, titleCase } from "../utils/shared";
import { defineSource, fetchFirst } from "./base";

const BASE_URL = "https://space-facts.com/";
const NAME = "Space Facts";

const MAX_FACTS = 5;
const MAX_SECTIONS = 2;
/** List items at or below this length are navigation, not facts */
const MIN_FACT_LENGTH = 10;

/** Topic (space-separated words) -> page path; earlier topics win ties */
const TOPIC_PAGES: ReadonlyArray<readonly [string, string]> = [
    ["mars", "mars/"],
    ["earth", "earth/"],
    ["moon", "moon/"],
    ["sun", "sun/"],
    ["mercury", "mercury/"],
    ["venus", "venus/"],
    ["jupiter", "jupiter/"],
    ["saturn", "saturn/"],
    ["uranus", "uranus/"],
    ["neptune", "neptune/"],
    ["pluto", "pluto/"],
    ["planet", "planets/"],
    ["solar system", "solar-system/"],
    ["space", ""],
];

const SECTION_SELECTOR = ["section", "article", "div"]
    .flatMap(tag => ["post", "entry", "content"].map(cls => `${tag}.${cls}`))
    .join(", ");

export interface TopicPage {
    topic: string;
    url: string;
}

/**
 * Pick the page whose topic words overlap the keywords most.
 * No overlap selects the site root.
 */
export function chooseTopicPage(keywords: readonly string[]): TopicPage {
    let best: TopicPage = { topic: "space", url: BASE_URL };
    let bestMatches = 0;

    for (const [topic, path] of TOPIC_PAGES) {
        const words = topic.split(" ");
        const matches = keywords.filter(keyword => words.includes(keyword)).length;
        if (matches > bestMatches) {
            bestMatches = matches;
            best = { topic, url: BASE_URL + path };
        }
    }

    return best;
}

/**
 * Facts from two-column table rows ("Name: value") and longer list items
 */
function collectFacts($: cheerio.CheerioAPI): string[] {
    const facts: string[] = [];

    $("table tr").each((_, row) => {
        const cells = $(row).find("th, td");
        if (cells.length >= 2) {
            const name = normalizeWhitespace(cells.eq(0).text());
            const value = normalizeWhitespace(cells.eq(1).text());
            facts.push(`${name}: ${value}`);
        }
    });

    $("ul li").each((_, item) => {
        const text = normalizeWhitespace($(item).text());
        if (text.length > MIN_FACT_LENGTH) {
            facts.push(text);
        }
    });

    return facts;
}

function score(text: string, query: AnalyzedQuery): number {
    return scoreRelevance(text, query.keywords);
}

/**
 * Space Facts has no search. Map the query to a topic page and turn its
 * fact tables into one summary article plus a few content sections.
 */
export const spaceFactsSource = defineSource(NAME, async (query, context) => {
    const { topic, url } = chooseTopicPage(query.keywords);
    const page = await fetchFirst(context, [url]);
    if (page === null || page.html === null) return [];

    const $ = cheerio.load(page.html);
    const heading = normalizeWhitespace($("h1").first().text());
    const pageTitle = heading !== "" ? heading : titleCase(topic);

    const articles: Article[] = [];

    const facts = collectFacts($).slice(0, MAX_FACTS);
    if (facts.length > 0) {
        const description = `Facts: ${facts.join(" | ")}`;
        articles.push({
            title: `${pageTitle} Facts`,
            link: url,
            description,
            source: NAME,
            relevance: score(`${pageTitle} ${description}`, query),
        });
    }

    for (const section of $(SECTION_SELECTOR).toArray().slice(0, MAX_SECTIONS)) {
        const title = normalizeWhitespace($(section).find("h2, h3, h4").first().text());
        const description = normalizeWhitespace($(section).find("p").first().text());
        if (title === "" || description === "") continue;

        articles.push({
            title,
            link: `${url}#${slugify(title)}`,
            description,
            source: NAME,
            relevance: score(`${title} ${description}`, query),
        });
    }

    return sortByRelevance(articles);
});
