import type * as cheerio from "cheerio";
import { isTag, type Element } from "domhandler";
import { TITLE_HEADINGS } from "../utils/shared";

/**
 * One way of locating candidate article blocks in a parsed page
 */
export interface ExtractionStrategy {
    readonly name: string;
    extract($: cheerio.CheerioAPI): Element[];
}

const CONTAINER_TAGS = new Set(["div", "article", "section"]);

/** Ancestor levels searched above a heading */
const MAX_CONTAINER_DEPTH = 3;

/**
 * Match blocks with a CSS selector
 */
export function bySelector(selector: string): ExtractionStrategy {
    return {
        name: selector,
        extract: ($) => $<Element, string>(selector).toArray(),
    };
}

/**
 * Generic last resort: for every h1-h4, walk up to the nearest
 * div/article/section (at most 3 levels) that contains a link.
 */
export function headingContainers(): ExtractionStrategy {
    return {
        name: "heading-containers",
        extract: ($) => {
            const seen = new Set<Element>();
            const blocks: Element[] = [];

            for (const tag of TITLE_HEADINGS) {
                for (const heading of $(tag).toArray()) {
                    let parent = heading.parent;
                    for (let depth = 0; depth < MAX_CONTAINER_DEPTH && parent !== null; depth++) {
                        if (isTag(parent) && CONTAINER_TAGS.has(parent.name) && $(parent).find("a").length > 0) {
                            if (!seen.has(parent)) {
                                seen.add(parent);
                                blocks.push(parent);
                            }
                            break;
                        }
                        parent = parent.parent;
                    }
                }
            }

            return blocks;
        },
    };
}

export interface SelectionResult {
    blocks: Element[];
    /** Name of the strategy that matched, null when none did */
    strategy: string | null;
}

/**
 * Apply strategies in order and stop at the first that finds anything
 */
export function selectCandidates(
    $: cheerio.CheerioAPI,
    strategies: readonly ExtractionStrategy[],
    limit: number
): SelectionResult {
    for (const strategy of strategies) {
        const blocks = strategy.extract($);
        if (blocks.length > 0) {
            return { blocks: blocks.slice(0, limit), strategy: strategy.name };
        }
    }
    return { blocks: [], strategy: null };
}
