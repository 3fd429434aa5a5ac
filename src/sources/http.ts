/**
 * Page fetcher with per-attempt timeouts, retries and block detection
 */

import type { SearchConfig } from "../config";
import Logger from "../utils/logger";
import { sleep as defaultSleep } from "../utils/shared";

const logger = Logger.getInstance();

export interface FetchedPage {
    /** Requested URL */
    url: string;
    /** URL after redirects */
    finalUrl: string;
    /** Last HTTP status seen, 0 when no response arrived */
    status: number;
    /** Body of a usable 200 response, null otherwise */
    html: string | null;
    error?: string;
}

export interface FetchPageOptions {
    referer?: string;
    signal?: AbortSignal;
}

export type PageFetcher = (url: string, options?: FetchPageOptions) => Promise<FetchedPage>;

/** The subset of the fetch Response the fetcher reads */
export interface TransportResponse {
    status: number;
    statusText: string;
    url: string;
    text(): Promise<string>;
}

export type Transport = (url: string, init: RequestInit) => Promise<TransportResponse>;

export interface PageFetcherOptions {
    config: Pick<SearchConfig, "requestTimeoutMs" | "maxAttempts" | "retryDelayMinMs" | "retryDelayMaxMs" | "debug">;
    transport?: Transport;
    /** Must resolve early when the signal aborts */
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
    /** Uniform [0, 1) source for UA choice and retry delay */
    random?: () => number;
}

export const USER_AGENTS: readonly string[] = [
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.0 Safari/605.1.15",
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:120.0) Gecko/20100101 Firefox/120.0",
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/119.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Edge/120.0.0.0 Safari/537.36",
];

/** Shorter 200 bodies are treated as interstitials */
export const MIN_PAGE_LENGTH = 1000;

const BLOCK_MARKERS = /captcha|unusual traffic/i;

/**
 * Heuristic check for a CAPTCHA wall or an empty placeholder page
 */
export function isBlocked(status: number, body: string): boolean {
    if (BLOCK_MARKERS.test(body)) return true;
    return status === 200 && body.length < MIN_PAGE_LENGTH;
}

function isRetryableStatus(status: number): boolean {
    return status === 429 || status >= 500;
}

type AttemptOutcome =
    | { kind: "done"; page: FetchedPage }
    | { kind: "retry"; status: number; finalUrl: string; error: string };

/**
 * Create a fetcher bound to a configuration. The transport defaults to
 * global fetch; tests pass an in-memory one.
 */
export function createPageFetcher(options: PageFetcherOptions): PageFetcher {
    const {
        config,
        transport = fetch,
        sleep = defaultSleep,
        random = Math.random,
    } = options;

    const pickUserAgent = (): string =>
        USER_AGENTS[Math.floor(random() * USER_AGENTS.length)] ?? USER_AGENTS[0] ?? "Mozilla/5.0";

    const retryDelay = (): number =>
        config.retryDelayMinMs + random() * (config.retryDelayMaxMs - config.retryDelayMinMs);

    async function attempt(url: string, fetchOptions: FetchPageOptions): Promise<AttemptOutcome> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), config.requestTimeoutMs);
        const onAbort = (): void => controller.abort();
        // A listener added to an already-aborted signal never fires
        if (fetchOptions.signal?.aborted === true) {
            controller.abort();
        } else {
            fetchOptions.signal?.addEventListener("abort", onAbort, { once: true });
        }

        const headers: Record<string, string> = {
            "User-Agent": pickUserAgent(),
            "Accept": "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
            "Accept-Language": "en-US,en;q=0.5",
        };
        if (fetchOptions.referer !== undefined) {
            headers["Referer"] = fetchOptions.referer;
        }

        try {
            const response = await transport(url, {
                signal: controller.signal,
                headers,
                redirect: "follow",
            });
            const finalUrl = response.url !== "" ? response.url : url;
            const body = await response.text();

            if (isBlocked(response.status, body)) {
                return { kind: "retry", status: response.status, finalUrl, error: "Possible blocking detected" };
            }
            if (isRetryableStatus(response.status)) {
                return { kind: "retry", status: response.status, finalUrl, error: `HTTP ${response.status}: ${response.statusText}` };
            }
            if (response.status !== 200) {
                return {
                    kind: "done",
                    page: { url, finalUrl, status: response.status, html: null, error: `HTTP ${response.status}: ${response.statusText}` },
                };
            }
            return { kind: "done", page: { url, finalUrl, status: 200, html: body } };
        } catch (error) {
            if (fetchOptions.signal?.aborted === true) {
                return { kind: "done", page: { url, finalUrl: url, status: 0, html: null, error: "Aborted" } };
            }
            if (error instanceof Error && error.name === "AbortError") {
                return { kind: "retry", status: 0, finalUrl: url, error: `Timeout after ${config.requestTimeoutMs}ms` };
            }
            return { kind: "retry", status: 0, finalUrl: url, error: error instanceof Error ? error.message : "Unknown error" };
        } finally {
            clearTimeout(timeoutId);
            fetchOptions.signal?.removeEventListener("abort", onAbort);
        }
    }

    return async (url, fetchOptions = {}) => {
        const maxAttempts = Math.max(1, config.maxAttempts);
        let last: FetchedPage = { url, finalUrl: url, status: 0, html: null, error: "Not attempted" };

        for (let attemptNo = 1; attemptNo <= maxAttempts; attemptNo++) {
            if (fetchOptions.signal?.aborted === true) {
                return { url, finalUrl: url, status: 0, html: null, error: "Aborted" };
            }

            if (attemptNo > 1) {
                const delay = retryDelay();
                logger.debug(`Retry ${attemptNo - 1}/${maxAttempts - 1} for ${url}, waiting ${(delay / 1000).toFixed(1)}s`, config.debug);
                await sleep(delay, fetchOptions.signal);
                if (fetchOptions.signal?.aborted) {
                    return { url, finalUrl: url, status: 0, html: null, error: "Aborted" };
                }
            }

            const outcome = await attempt(url, fetchOptions);
            if (outcome.kind === "done") {
                return outcome.page;
            }

            logger.debug(`${url}: ${outcome.error}`, config.debug);
            last = { url, finalUrl: outcome.finalUrl, status: outcome.status, html: null, error: outcome.error };
        }

        logger.debug(`Failed to get ${url} after ${maxAttempts} attempts`, config.debug);
        return last;
    };
}
