import type * as cheerio from "cheerio";
import type { Element } from "domhandler";
import { TITLE_HEADINGS, normalizeWhitespace, resolveLink } from "../utils/shared";

export interface FieldOptions {
    /** Tried after the heading tags, e.g. ".title" or "h5" */
    titleSelectors?: readonly string[];
    /** Tried before the generic paragraph lookup, e.g. ".VwiC3b" */
    descriptionSelectors?: readonly string[];
}

const TITLE_CLASS_HINTS = ["title", "heading", "header"];
const DESCRIPTION_CLASS_HINTS = ["desc", "summary", "content", "excerpt"];

/**
 * Text of the first matching descendant with non-empty content
 */
function firstText($: cheerio.CheerioAPI, $block: cheerio.Cheerio<Element>, selector: string): string | null {
    for (const el of $block.find(selector).toArray()) {
        const text = normalizeWhitespace($(el).text());
        if (text.length > 0) return text;
    }
    return null;
}

/**
 * Text of the first div/span whose class contains one of the hints
 */
function firstByClassHint(
    $: cheerio.CheerioAPI,
    $block: cheerio.Cheerio<Element>,
    hints: readonly string[]
): string | null {
    for (const el of $block.find("div, span").toArray()) {
        const className = ($(el).attr("class") ?? "").toLowerCase();
        if (className === "" || !hints.some(hint => className.includes(hint))) continue;

        const text = normalizeWhitespace($(el).text());
        if (text.length > 0) return text;
    }
    return null;
}

/**
 * Title: first heading by tag priority, then extra selectors, then class hints
 */
export function extractTitle($: cheerio.CheerioAPI, block: Element, options: FieldOptions = {}): string | null {
    const $block = $(block);

    for (const tag of TITLE_HEADINGS) {
        const text = firstText($, $block, tag);
        if (text !== null) return text;
    }

    for (const selector of options.titleSelectors ?? []) {
        const text = firstText($, $block, selector);
        if (text !== null) return text;
    }

    return firstByClassHint($, $block, TITLE_CLASS_HINTS);
}

/**
 * Link: an anchor wrapping a heading wins, otherwise the first anchor.
 * Resolved against baseUrl; anchors that do not resolve are skipped.
 */
export function extractLink($: cheerio.CheerioAPI, block: Element, baseUrl: string): string | null {
    const $block = $(block);
    const anchors = $block.is("a[href]") ? [block] : $block.find("a[href]").toArray();

    const wrapsHeading = anchors.filter(a => $(a).find("h1, h2, h3").length > 0);

    for (const anchor of [...wrapsHeading, ...anchors]) {
        const link = resolveLink($(anchor).attr("href"), baseUrl);
        if (link !== null) return link;
    }
    return null;
}

/**
 * Description: source selectors, first non-empty paragraph, then class hints
 */
export function extractDescription($: cheerio.CheerioAPI, block: Element, options: FieldOptions = {}): string | null {
    const $block = $(block);

    for (const selector of options.descriptionSelectors ?? []) {
        const text = firstText($, $block, selector);
        if (text !== null) return text;
    }

    return firstText($, $block, "p") ?? firstByClassHint($, $block, DESCRIPTION_CLASS_HINTS);
}
