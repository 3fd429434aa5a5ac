/**
 * Shared utility functions used across the codebase
 */

// =============================================================================
// Heading utilities
// =============================================================================

/** Headings probed for article titles, in priority order */
export const TITLE_HEADINGS = ["h1", "h2", "h3", "h4"] as const;

// =============================================================================
// String utilities
// =============================================================================

/**
 * Normalize whitespace in text: collapse multiple spaces to single, trim
 */
export function normalizeWhitespace(text: string): string {
    return text.replace(/\s+/g, " ").trim();
}

/**
 * Truncate text to maxLen characters, adding ellipsis if truncated
 */
export function truncateText(text: string, maxLen: number = 100): string {
    if (text.length <= maxLen) return text;
    return text.slice(0, maxLen) + "...";
}

/**
 * Lowercase, hyphen-separated fragment id ("Quick Facts" -> "quick-facts")
 */
export function slugify(text: string): string {
    return text.toLowerCase().trim().replace(/\s+/g, "-");
}

/**
 * Title-case each word ("solar system" -> "Solar System")
 */
export function titleCase(text: string): string {
    return text.replace(/\b\p{L}/gu, c => c.toUpperCase());
}

// =============================================================================
// URL utilities
// =============================================================================

/**
 * Extract domain from URL for display ("https://www.space.com/x" -> "space.com")
 */
export function getDomain(url: string): string {
    try {
        return new URL(url).hostname.replace(/^www\./, "");
    } catch {
        return "website";
    }
}

/**
 * Resolve an href against a base URL. Returns null for links that do not
 * point at a page (empty, fragment-only, javascript:, mailto:, tel:).
 */
export function resolveLink(href: string | undefined, baseUrl: string): string | null {
    const trimmed = href?.trim() ?? "";
    if (trimmed === "" || trimmed.startsWith("#")) return null;
    if (/^(javascript|mailto|tel|data):/i.test(trimmed)) return null;

    try {
        const resolved = new URL(trimmed, baseUrl);
        if (resolved.protocol !== "http:" && resolved.protocol !== "https:") return null;
        return resolved.toString();
    } catch {
        return null;
    }
}

// =============================================================================
// Async utilities
// =============================================================================

/**
 * Resolve after ms, or as soon as the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise(resolve => {
        if (signal?.aborted === true) {
            resolve();
            return;
        }

        const onAbort = (): void => {
            clearTimeout(timeoutId);
            resolve();
        };
        const timeoutId = setTimeout(() => {
            signal?.removeEventListener("abort", onAbort);
            resolve();
        }, ms);
        signal?.addEventListener("abort", onAbort, { once: true });
    });
}

/**
 * Run async tasks with limited concurrency. Results keep input order.
 */
export async function runWithConcurrency<T, R>(
    items: readonly T[],
    fn: (item: T, index: number) => Promise<R>,
    maxConcurrent: number
): Promise<R[]> {
    const results = new Array<R>(items.length);
    let next = 0;

    const worker = async (): Promise<void> => {
        while (next < items.length) {
            const index = next++;
            const item = items[index];
            if (item !== undefined) {
                results[index] = await fn(item, index);
            }
        }
    };

    const workers: Promise<void>[] = [];
    for (let i = 0; i < Math.min(Math.max(1, maxConcurrent), items.length); i++) {
        workers.push(worker());
    }
    await Promise.all(workers);

    return results;
}
