/**
 * Search configuration: defaults, per-call overrides and environment variables
 */

import { z } from "zod";
import Logger from "./utils/logger";

const logger = Logger.getInstance();

/**
 * How the "fewer than N results so far" gate on homepage fallback sources
 * is evaluated.
 * - dynamic: after the earlier sources have finished
 * - scheduled: once, against the empty accumulator at planning time,
 *   so the gated sources effectively always run
 */
export type FallbackGateMode = "dynamic" | "scheduled";

export interface SearchConfig {
    /** Hard timeout per HTTP attempt (ms) */
    requestTimeoutMs: number;
    /** Attempt ceiling per URL, including the first try */
    maxAttempts: number;
    /** Random delay between attempts is drawn from [min, max] ms */
    retryDelayMinMs: number;
    retryDelayMaxMs: number;
    /** Whole-query budget; in-flight sources are aborted when it runs out */
    queryTimeoutMs: number;
    /** Size of the returned result list */
    maxResults: number;
    /** Upper bound on concurrently running sources */
    maxConcurrentSources: number;
    fallbackGate: FallbackGateMode;
    debug: boolean;
}

export const DEFAULT_CONFIG: Readonly<SearchConfig> = Object.freeze({
    requestTimeoutMs: 15000,
    maxAttempts: 3,
    retryDelayMinMs: 1000,
    retryDelayMaxMs: 3000,
    queryTimeoutMs: 45000,
    maxResults: 10,
    maxConcurrentSources: 10,
    fallbackGate: "dynamic",
    debug: false,
});

const positiveInt = z.coerce.number().int().positive();

/**
 * Parse one environment variable, dropping invalid values with a warning
 * instead of failing startup
 */
function readEnv<T>(env: NodeJS.ProcessEnv, key: string, schema: z.ZodType<T>): T | undefined {
    const raw = env[key];
    if (raw === undefined || raw === "") return undefined;

    const result = schema.safeParse(raw);
    if (result.success) return result.data;

    logger.warn(`Ignoring invalid ${key}=${JSON.stringify(raw)}: ${result.error.issues[0]?.message ?? "invalid value"}`);
    return undefined;
}

/**
 * Read overrides from SPACE_SEARCH_* environment variables
 */
export function loadEnvOverrides(env: NodeJS.ProcessEnv = process.env): Partial<SearchConfig> {
    const overrides: Partial<SearchConfig> = {};

    const requestTimeoutMs = readEnv(env, "SPACE_SEARCH_REQUEST_TIMEOUT_MS", positiveInt);
    if (requestTimeoutMs !== undefined) overrides.requestTimeoutMs = requestTimeoutMs;

    const maxAttempts = readEnv(env, "SPACE_SEARCH_MAX_ATTEMPTS", positiveInt.max(10));
    if (maxAttempts !== undefined) overrides.maxAttempts = maxAttempts;

    const queryTimeoutMs = readEnv(env, "SPACE_SEARCH_QUERY_TIMEOUT_MS", positiveInt);
    if (queryTimeoutMs !== undefined) overrides.queryTimeoutMs = queryTimeoutMs;

    const maxResults = readEnv(env, "SPACE_SEARCH_MAX_RESULTS", positiveInt.max(50));
    if (maxResults !== undefined) overrides.maxResults = maxResults;

    const fallbackGate = readEnv(env, "SPACE_SEARCH_FALLBACK_GATE", z.enum(["dynamic", "scheduled"]));
    if (fallbackGate !== undefined) overrides.fallbackGate = fallbackGate;

    const debug = readEnv(env, "SPACE_SEARCH_DEBUG", z.enum(["true", "false", "1", "0"]));
    if (debug !== undefined) overrides.debug = debug === "true" || debug === "1";

    return overrides;
}

/**
 * Merge defaults, environment and explicit overrides (later wins)
 */
export function resolveConfig(
    overrides: Partial<SearchConfig> = {},
    env: NodeJS.ProcessEnv = process.env
): SearchConfig {
    return {
        ...DEFAULT_CONFIG,
        ...loadEnvOverrides(env),
        ...overrides,
    };
}
