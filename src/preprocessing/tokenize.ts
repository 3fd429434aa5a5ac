import lemmatizer from "wink-lemmatizer";
import stopWordList from "./stopwords.json";

// English stop words (NLTK list plus a few query fillers like "please")
const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

const ALPHABETIC = /^\p{L}+$/u;

export type Lemmatize = (token: string) => string;

/** Reduce a token to its noun lemma ("galaxies" -> "galaxy") */
export const lemmatizeNoun: Lemmatize = (token) => lemmatizer.noun(token);

/**
 * Normalize text: lowercase, replace punctuation with spaces, collapse whitespace
 */
export function normalizeText(text: string): string {
    return text
        .toLowerCase()
        .replace(/[^\p{L}\p{N}\s]/gu, " ") // Remove non-alphanumeric (Unicode-aware)
        .replace(/\s+/g, " ")
        .trim();
}

/**
 * Split on anything that is not an ASCII letter or digit.
 * Used when the Unicode-aware path is unavailable.
 */
export function naiveSplit(text: string): string[] {
    return text
        .toLowerCase()
        .split(/[^a-z0-9]+/)
        .filter(t => t.length > 0);
}

export interface TokenizeOptions {
    removeStopWords?: boolean;
    /** Drop tokens containing digits or other non-letters */
    alphabeticOnly?: boolean;
    minLength?: number;
}

/**
 * Tokenize text into lowercase word tokens
 */
export function tokenize(text: string, options: TokenizeOptions = {}): string[] {
    const {
        removeStopWords = true,
        alphabeticOnly = true,
        minLength = 1,
    } = options;

    const normalized = normalizeText(text);
    let tokens = normalized.split(" ").filter(t => t.length >= minLength);

    if (removeStopWords) {
        tokens = tokens.filter(t => !STOP_WORDS.has(t));
    }

    if (alphabeticOnly) {
        tokens = tokens.filter(t => ALPHABETIC.test(t));
    }

    return tokens;
}

/**
 * Lemmatize tokens, leaving protected terms untouched.
 * If the lemmatizer throws, the unreduced tokens are returned.
 */
export function lemmatizeTokens(
    tokens: readonly string[],
    protectedTerms: ReadonlySet<string> = new Set(),
    lemmatize: Lemmatize = lemmatizeNoun
): string[] {
    try {
        return tokens.map(token => {
            if (protectedTerms.has(token)) return token;
            const lemma = lemmatize(token);
            return lemma.length > 0 ? lemma : token;
        });
    } catch {
        return [...tokens];
    }
}
