/**
 * Count how many keywords occur in the text (case-insensitive substring match).
 * Each keyword counts at most once. Returns 0 for empty text or no keywords.
 */
export function scoreRelevance(text: string, keywords: readonly string[]): number {
    if (text.length === 0 || keywords.length === 0) return 0;

    const haystack = text.toLowerCase();
    let score = 0;

    for (const keyword of keywords) {
        const needle = keyword.toLowerCase();
        if (needle.length > 0 && haystack.includes(needle)) {
            score++;
        }
    }

    return score;
}
