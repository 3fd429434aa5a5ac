import * as cheerio from "cheerio";
import type { Element } from "domhandler";
import type { AnalyzedQuery, Article, Intent } from "../types";
import type { SourceContext } from "./types";
import { scoreRelevance } from "../scoring/relevance";
import { sortByRelevance } from "../scoring/ranker";
import { normalizeWhitespace, resolveLink, truncateText } from "../utils/shared";
import { defineSource, fetchFirst, searchUrl } from "./base";

const BASE_URL = "https://en.wikipedia.org/";
const REFERER = "https://www.wikipedia.org/";

const NAME = "Wikipedia";
const DIRECT_ARTICLE_RELEVANCE = 9;
const UNREACHABLE_ARTICLE_RELEVANCE = 5;
const TITLE_BONUS = 3;
const MAX_SEARCH_HITS = 3;
const DIRECT_ARTICLE_PARAGRAPHS = 3;
const MAX_DESCRIPTION_LENGTH = 500;
/** Lead paragraphs shorter than this are captions or coordinates */
const MIN_PARAGRAPH_LENGTH = 50;
/** Stop collecting lead paragraphs once the description is this long */
const LEAD_TARGET_LENGTH = 200;

const GENERIC_DESCRIPTION = "Visit Wikipedia for detailed information on this topic.";

const BONUS_TITLE_TERMS = ["black hole", "mars rover", "quasar", "galaxy"];
const CELESTIAL_TERMS = ["galaxy", "universe", "star", "nebula"];
const SPACE_CONTEXT_INTENTS: readonly Intent[] = ["solar", "galaxy", "universe", "nasa", "mars"];

/**
 * Rewrite the query so that ambiguous words land on astronomy articles
 */
export function wikipediaSearchTerms(query: AnalyzedQuery): string {
    const original = query.originalText;
    const lower = original.toLowerCase();

    if (lower.includes("black hole")) return "black hole astronomy";
    if (lower.includes("mars rover")) return "mars rover perseverance curiosity opportunity";
    if (lower.includes("quasar")) return "quasar astronomy";
    if (CELESTIAL_TERMS.some(term => lower.includes(term))) return `${original} astronomy astrophysics`;

    if (lower.includes("space") || SPACE_CONTEXT_INTENTS.includes(query.intent)) {
        return original;
    }
    return `${original} space astronomy`;
}

function clip(description: string): string {
    return truncateText(description, MAX_DESCRIPTION_LENGTH);
}

/**
 * Join substantial paragraphs, stopping once `target` characters are reached
 */
function collectParagraphs($: cheerio.CheerioAPI, paragraphs: readonly Element[], target: number): string {
    let description = "";
    for (const p of paragraphs) {
        const text = normalizeWhitespace($(p).text());
        if (text.length <= MIN_PARAGRAPH_LENGTH) continue;
        description += text + " ";
        if (description.length > target) break;
    }
    return description.trim();
}

/**
 * True when the search redirected to an article page
 */
function isArticleUrl(url: string): boolean {
    try {
        const { pathname } = new URL(url);
        return pathname.startsWith("/wiki/") && !pathname.startsWith("/wiki/Special:");
    } catch {
        return false;
    }
}

async function describeHit(
    title: string,
    link: string,
    query: AnalyzedQuery,
    context: SourceContext
): Promise<Article> {
    const page = await fetchFirst(context, [link], REFERER);
    if (page === null || page.html === null) {
        return { title, link, description: GENERIC_DESCRIPTION, source: NAME, relevance: UNREACHABLE_ARTICLE_RELEVANCE };
    }

    const $ = cheerio.load(page.html);
    const lead = collectParagraphs($, $("#mw-content-text .mw-parser-output > p").toArray(), LEAD_TARGET_LENGTH);
    const description = lead.length > 0 ? lead : GENERIC_DESCRIPTION;

    const lowerTitle = title.toLowerCase();
    const bonus = BONUS_TITLE_TERMS.some(term => lowerTitle.includes(term)) ? TITLE_BONUS : 0;

    return {
        title,
        link,
        description: clip(description),
        source: NAME,
        relevance: scoreRelevance(`${title} ${description}`, query.keywords) + bonus,
    };
}

/**
 * Wikipedia full-text search. A unique match redirects straight to the
 * article, which is returned alone with a high relevance; otherwise the
 * top hits are each fetched for their lead section.
 */
export const wikipediaSource = defineSource(NAME, async (query, context) => {
    const url = searchUrl(`${BASE_URL}w/index.php`, "search", wikipediaSearchTerms(query));
    const page = await fetchFirst(context, [url], REFERER);
    if (page === null || page.html === null) return [];

    const $ = cheerio.load(page.html);

    if (isArticleUrl(page.finalUrl)) {
        const title = normalizeWhitespace($("h1#firstHeading").first().text());
        const description = collectParagraphs(
            $,
            $("#mw-content-text p").toArray().slice(0, DIRECT_ARTICLE_PARAGRAPHS),
            Number.POSITIVE_INFINITY
        );
        if (title === "" || description === "") return [];

        return [{
            title,
            link: page.finalUrl,
            description: clip(description),
            source: NAME,
            relevance: DIRECT_ARTICLE_RELEVANCE,
        }];
    }

    const hits: Array<{ title: string; link: string }> = [];
    for (const heading of $("div.mw-search-result-heading").toArray().slice(0, MAX_SEARCH_HITS)) {
        const anchor = $(heading).find("a").first();
        const title = normalizeWhitespace(anchor.text());
        const link = resolveLink(anchor.attr("href"), BASE_URL);
        if (title !== "" && link !== null) {
            hits.push({ title, link });
        }
    }

    const articles = await Promise.all(hits.map(hit => describeHit(hit.title, hit.link, query, context)));
    return sortByRelevance(articles);
});
