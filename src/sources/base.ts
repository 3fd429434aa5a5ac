/**
 * Shared adapter machinery: the failure guard, multi-target fetching and
 * a profile-driven adapter for sources that only differ in URLs and selectors
 */

import * as cheerio from "cheerio";
import type { Element } from "domhandler";
import type { AnalyzedQuery, Article } from "../types";
import type { FetchedPage } from "./http";
import type { SearchSource, SourceContext } from "./types";
import { headingContainers, selectCandidates, type ExtractionStrategy } from "../extraction/strategies";
import { extractDescription, extractLink, extractTitle, type FieldOptions } from "../extraction/fields";
import { scoreRelevance } from "../scoring/relevance";
import { sortByRelevance } from "../scoring/ranker";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

export const DEFAULT_CANDIDATE_LIMIT = 5;
export const DEFAULT_FILLER_LIMIT = 3;

/**
 * Wrap a search function so that it never rejects
 */
export function defineSource(
    name: string,
    run: (query: AnalyzedQuery, context: SourceContext) => Promise<Article[]>
): SearchSource {
    return {
        name,
        async search(query, context) {
            try {
                const articles = await run(query, context);
                logger.debug(`${name}: ${articles.length} results`, context.debug);
                return articles;
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                logger.warn(`${name} failed: ${message}`);
                return [];
            }
        },
    };
}

/**
 * Build a URL with one query parameter set (spaces encode as "+")
 */
export function searchUrl(base: string, param: string, value: string): string {
    const url = new URL(base);
    url.searchParams.set(param, value);
    return url.toString();
}

/**
 * Try targets in order; return the first page that came back usable
 */
export async function fetchFirst(
    context: SourceContext,
    targets: readonly string[],
    referer?: string
): Promise<FetchedPage | null> {
    for (const url of targets) {
        if (context.signal?.aborted === true) return null;

        const page = await context.fetchPage(url, {
            ...(referer !== undefined && { referer }),
            ...(context.signal !== undefined && { signal: context.signal }),
        });
        if (page.html !== null) {
            logger.debug(`Fetched ${url}`, context.debug);
            return page;
        }
        logger.debug(`${url} unusable: ${page.error ?? `HTTP ${page.status}`}`, context.debug);
    }
    return null;
}

/**
 * Featured-content fallback fetched when a search page yields nothing
 */
export interface HomepageFiller {
    url: string;
    strategies: readonly ExtractionStrategy[];
    /** Fixed relevance given to every filler article */
    relevance: number;
    limit?: number;
    defaultDescription: string;
}

export interface SourceProfile {
    /** Name used in scheduling and source bookkeeping */
    name: string;
    /** Article source label; defaults to name */
    label?: string;
    /** Base for resolving relative links */
    baseUrl: string;
    referer?: string;
    /** URLs to try in order */
    targets(query: AnalyzedQuery): string[];
    strategies: readonly ExtractionStrategy[];
    /** Append the generic heading-container strategy (default true) */
    structuralFallback?: boolean;
    candidateLimit?: number;
    fields?: FieldOptions;
    defaultDescription: string;
    /** Use the fetched page URL when a block has no link */
    linkOptional?: boolean;
    minTitleLength?: number;
    rejectTitle?(title: string): boolean;
    /** Descriptions matching this are replaced by the default */
    boilerplateDescription?: RegExp;
    /** Rewrite or reject (null) a resolved link */
    mapLink?(link: string): string | null;
    labelFor?(link: string): string;
    /** Drop zero-relevance articles when a positive one exists */
    dropZeroRelevance?: boolean;
    homepage?: HomepageFiller;
}

interface BuildOptions {
    baseUrl: string;
    fallbackLink: string | null;
    fields: FieldOptions;
    defaultDescription: string;
    minTitleLength: number;
}

type Candidate = Omit<Article, "relevance" | "source">;

function buildCandidate(
    $: cheerio.CheerioAPI,
    block: Element,
    profile: SourceProfile,
    options: BuildOptions
): Candidate | null {
    const title = extractTitle($, block, options.fields);
    if (title === null || title.length < options.minTitleLength) return null;
    if (profile.rejectTitle?.(title) === true) return null;

    let link = extractLink($, block, options.baseUrl) ?? options.fallbackLink;
    if (link !== null && profile.mapLink !== undefined) {
        link = profile.mapLink(link);
    }
    if (link === null) return null;

    let description = extractDescription($, block, options.fields) ?? options.defaultDescription;
    if (profile.boilerplateDescription?.test(description) === true) {
        description = options.defaultDescription;
    }

    return { title, link, description };
}

/**
 * Build an adapter from a declarative profile
 */
export function createSourceAdapter(profile: SourceProfile): SearchSource {
    const label = profile.label ?? profile.name;
    const strategies = profile.structuralFallback === false
        ? profile.strategies
        : [...profile.strategies, headingContainers()];

    const toArticle = (candidate: Candidate, relevance: number): Article => ({
        ...candidate,
        source: profile.labelFor?.(candidate.link) ?? label,
        relevance,
    });

    async function searchPages(query: AnalyzedQuery, context: SourceContext): Promise<Article[]> {
        const page = await fetchFirst(context, profile.targets(query), profile.referer);
        if (page === null || page.html === null) return [];

        const $ = cheerio.load(page.html);
        const { blocks, strategy } = selectCandidates($, strategies, profile.candidateLimit ?? DEFAULT_CANDIDATE_LIMIT);
        logger.debug(`${profile.name}: ${blocks.length} blocks via ${strategy ?? "none"}`, context.debug);

        const articles: Article[] = [];
        for (const block of blocks) {
            const candidate = buildCandidate($, block, profile, {
                baseUrl: profile.baseUrl,
                fallbackLink: profile.linkOptional === true ? page.finalUrl : null,
                fields: profile.fields ?? {},
                defaultDescription: profile.defaultDescription,
                minTitleLength: profile.minTitleLength ?? 1,
            });
            if (candidate === null) continue;

            articles.push(toArticle(candidate, scoreRelevance(`${candidate.title} ${candidate.description}`, query.keywords)));
        }

        if (profile.dropZeroRelevance === true && articles.some(a => a.relevance > 0)) {
            return articles.filter(a => a.relevance > 0);
        }
        return articles;
    }

    async function searchHomepage(filler: HomepageFiller, context: SourceContext): Promise<Article[]> {
        const page = await fetchFirst(context, [filler.url], profile.referer);
        if (page === null || page.html === null) return [];

        const $ = cheerio.load(page.html);
        const { blocks } = selectCandidates($, filler.strategies, filler.limit ?? DEFAULT_FILLER_LIMIT);

        const articles: Article[] = [];
        for (const block of blocks) {
            const candidate = buildCandidate($, block, profile, {
                baseUrl: profile.baseUrl,
                fallbackLink: null,
                fields: profile.fields ?? {},
                defaultDescription: filler.defaultDescription,
                minTitleLength: 1,
            });
            if (candidate !== null) {
                articles.push(toArticle(candidate, filler.relevance));
            }
        }
        return articles;
    }

    return defineSource(profile.name, async (query, context) => {
        let articles = await searchPages(query, context);

        if (articles.length === 0 && profile.homepage !== undefined) {
            logger.debug(`${profile.name}: no search results, trying homepage`, context.debug);
            articles = await searchHomepage(profile.homepage, context);
        }

        return sortByRelevance(articles);
    });
}
