/**
 * Intent categories and their trigger keywords.
 *
 * Order matters: classification is first-match-wins, so narrower topics
 * (a company, a planet, a station) come before the broad "nasa" and
 * "launch" buckets that share words like "mission" and "rocket".
 */
export const INTENT_TRIGGERS = [
    ["spacex", ["spacex", "falcon", "dragon", "elon", "musk", "starship"]],
    ["mars", ["mars", "martian", "red", "rover", "perseverance", "curiosity"]],
    ["moon", ["moon", "lunar", "apollo", "artemis"]],
    ["iss", ["iss", "international", "station"]],
    ["hubble", ["hubble", "telescope", "image", "webb", "james"]],
    ["asteroid", ["asteroid", "meteor", "comet"]],
    ["satellite", ["satellite", "orbit", "gps"]],
    ["solar", ["solar", "sun", "system", "planet"]],
    ["galaxy", ["galaxy", "milky", "way", "star"]],
    ["universe", ["universe", "cosmos", "big", "bang", "black", "hole", "quasar"]],
    ["nasa", ["nasa", "space", "mission", "astronaut"]],
    ["launch", ["launch", "rocket"]],
] as const satisfies ReadonlyArray<readonly [string, readonly string[]]>;

export type Intent = (typeof INTENT_TRIGGERS)[number][0] | "general";

export const INTENTS: readonly Intent[] = [...INTENT_TRIGGERS.map(([intent]) => intent), "general"];

/**
 * Return the first intent whose trigger set intersects the keywords
 */
export function classifyIntent(keywords: readonly string[]): Intent {
    const keywordSet = new Set(keywords);
    for (const [intent, triggers] of INTENT_TRIGGERS) {
        const triggerList: readonly string[] = triggers;
        if (triggerList.some(trigger => keywordSet.has(trigger))) {
            return intent;
        }
    }
    return "general";
}
