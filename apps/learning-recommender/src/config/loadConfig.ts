/**
 * @fileoverview Recommender Configuration Loader
 *
 * Loads the recommender configuration from YAML, validates it field by
 * field and applies environment overrides.
 *
 * @module config/loadConfig
 */

import { readFileSync, existsSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { parse as parseYaml } from "yaml";
import {
    DEFAULT_PEER_LIMIT,
    DEFAULT_POPULARITY_PER_EVENT,
    describeError,
    isLogFailurePolicy,
    type LogFailurePolicy,
    type ScoringWeights,
} from "@studyrank/engine";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/** config/ directory of this app */
export const CONFIG_DIR = join(__dirname, "..", "..", "config");

export const DEFAULT_CONFIG_PATH = join(CONFIG_DIR, "recommender.yml");

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: unknown): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

/**
 * Fully resolved application configuration.
 */
export interface RecommenderConfig {
    database: {
        path: string;
    };

    recommendations: {
        logPolicy: LogFailurePolicy;
        peerLimit: number;
        popularityPerEvent: number;
        weights: Partial<ScoringWeights>;
    };

    logging: {
        level: LogLevel;
    };

    seed: {
        users: number;
        content: number;
        events: number;
        randomSeed: number;
    };
}

interface NumberRule {
    integer?: boolean;
    min?: number;
    max?: number;

    /** Reject 0 as well as negatives */
    positive?: boolean;
}

/**
 * Bounds per scoring weight. Served items carry 1 to 3 reason tags, and a
 * zero horizon would divide the recency factor by zero.
 */
const kWEIGHT_RULES: Readonly<Record<keyof ScoringWeights, NumberRule>> = {
    tagOverlap        : {},
    maxTagOverlap     : { integer: true },
    maxTagReasons     : { integer: true },
    difficulty        : {},
    popularity        : {},
    peerAffinity      : {},
    recencyHorizonDays: { positive: true },
    recencyFloor      : { max: 1 },
    jitter            : {},
    maxReasonTags     : { integer: true, min: 1, max: 3 },
};

function isWeightKey(key: string): key is keyof ScoringWeights {
    return Object.hasOwn(kWEIGHT_RULES, key);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read an optional sub-section; absent sections become empty.
 */
function section(parent: Record<string, unknown>, key: string, path: string): Record<string, unknown> {
    const value = parent[key];
    if (value === undefined || value === null) {
        return {};
    }
    if (!isRecord(value)) {
        throw new Error(`Invalid config: '${path}' must be a mapping`);
    }
    return value;
}

function readNumber(
    parent: Record<string, unknown>,
    key: string,
    path: string,
    fallback: number,
    { integer = false, min = 0, max, positive = false }: NumberRule = {}
): number {
    const value = parent[key];
    if (value === undefined) {
        return fallback;
    }
    if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new Error(`Invalid config: '${path}' must be a number`);
    }
    if (integer && !Number.isInteger(value)) {
        throw new Error(`Invalid config: '${path}' must be an integer`);
    }
    if (positive && value <= 0) {
        throw new Error(`Invalid config: '${path}' must be greater than 0`);
    }
    if (value < min) {
        throw new Error(`Invalid config: '${path}' must be at least ${min}`);
    }
    if (max !== undefined && value > max) {
        throw new Error(`Invalid config: '${path}' must be at most ${max}`);
    }
    return value;
}

function readString(parent: Record<string, unknown>, key: string, path: string, fallback: string): string {
    const value = parent[key];
    if (value === undefined) {
        return fallback;
    }
    if (typeof value !== "string" || value.length === 0) {
        throw new Error(`Invalid config: '${path}' must be a non-empty string`);
    }
    return value;
}

function readWeights(raw: Record<string, unknown>): Partial<ScoringWeights> {
    const weights: Partial<Record<keyof ScoringWeights, number>> = {};

    for (const key of Object.keys(raw)) {
        if (!isWeightKey(key)) {
            throw new Error(`Invalid config: unknown scoring weight 'recommendations.weights.${key}'`);
        }
        weights[key] = readNumber(raw, key, `recommendations.weights.${key}`, 0, kWEIGHT_RULES[key]);
    }

    return weights;
}

/**
 * Default configuration, used when no file can be loaded.
 */
export function getDefaultConfig(): RecommenderConfig {
    return {
        database: {
            path: "./data/learning.db",
        },
        recommendations: {
            logPolicy         : "strict",
            peerLimit         : DEFAULT_PEER_LIMIT,
            popularityPerEvent: DEFAULT_POPULARITY_PER_EVENT,
            weights           : {},
        },
        logging: {
            level: "info",
        },
        seed: {
            users     : 100,
            content   : 200,
            events    : 5000,
            randomSeed: 42,
        },
    };
}

/**
 * Validate a parsed YAML document, filling absent fields with defaults.
 *
 * @throws Error naming the first invalid field
 */
export function parseConfig(document: unknown): RecommenderConfig {
    const defaults = getDefaultConfig();

    if (document === null || document === undefined) {
        return defaults;
    }
    if (!isRecord(document)) {
        throw new Error("Invalid config file format: expected a mapping at the top level");
    }

    const database = section(document, "database", "database");
    const recommendations = section(document, "recommendations", "recommendations");
    const logging = section(document, "logging", "logging");
    const seed = section(document, "seed", "seed");

    const logPolicy = recommendations.logPolicy ?? defaults.recommendations.logPolicy;
    if (!isLogFailurePolicy(logPolicy)) {
        throw new Error(`Invalid config: 'recommendations.logPolicy' must be strict or lenient, got ${String(logPolicy)}`);
    }

    const level = logging.level ?? defaults.logging.level;
    if (!isLogLevel(level)) {
        throw new Error(`Invalid config: 'logging.level' must be one of ${LOG_LEVELS.join(", ")}, got ${String(level)}`);
    }

    return {
        database: {
            path: readString(database, "path", "database.path", defaults.database.path),
        },
        recommendations: {
            logPolicy,
            peerLimit: readNumber(
                recommendations, "peerLimit", "recommendations.peerLimit",
                defaults.recommendations.peerLimit, { integer: true, min: 1 }
            ),
            popularityPerEvent: readNumber(
                recommendations, "popularityPerEvent", "recommendations.popularityPerEvent",
                defaults.recommendations.popularityPerEvent
            ),
            weights: readWeights(section(recommendations, "weights", "recommendations.weights")),
        },
        logging: {
            level,
        },
        seed: {
            users     : readNumber(seed, "users", "seed.users", defaults.seed.users, { integer: true, min: 1 }),
            content   : readNumber(seed, "content", "seed.content", defaults.seed.content, { integer: true, min: 1 }),
            events    : readNumber(seed, "events", "seed.events", defaults.seed.events, { integer: true }),
            randomSeed: readNumber(seed, "randomSeed", "seed.randomSeed", defaults.seed.randomSeed, { integer: true }),
        },
    };
}

/**
 * Apply RECOMMENDER_* environment overrides.
 *
 * @throws Error when an override holds an unsupported value
 */
export function applyEnvOverrides(config: RecommenderConfig, env: NodeJS.ProcessEnv = process.env): RecommenderConfig {
    const dbPath = env.RECOMMENDER_DB_PATH;
    const logPolicy = env.RECOMMENDER_LOG_POLICY;
    const logLevel = env.RECOMMENDER_LOG_LEVEL;

    if (logPolicy !== undefined && !isLogFailurePolicy(logPolicy)) {
        throw new Error(`RECOMMENDER_LOG_POLICY must be strict or lenient, got ${logPolicy}`);
    }
    if (logLevel !== undefined && !isLogLevel(logLevel)) {
        throw new Error(`RECOMMENDER_LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got ${logLevel}`);
    }

    return {
        ...config,
        database: {
            path: dbPath || config.database.path,
        },
        recommendations: {
            ...config.recommendations,
            logPolicy: logPolicy ?? config.recommendations.logPolicy,
        },
        logging: {
            level: logLevel ?? config.logging.level,
        },
    };
}

/**
 * Load the configuration from a YAML file.
 *
 * @param filePath - Path to recommender.yml
 * @throws Error if the file doesn't exist or is invalid
 *
 * @example
 * ```typescript
 * const config = loadConfig("./config/recommender.yml");
 * console.log(config.recommendations.logPolicy);
 * // "strict"
 * ```
 */
export function loadConfig(filePath: string = DEFAULT_CONFIG_PATH): RecommenderConfig {
    if (!existsSync(filePath)) {
        throw new Error(`Config file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    return parseConfig(parseYaml(content));
}

/**
 * Load the configuration, falling back to the defaults on any failure.
 */
export function loadConfigWithFallback(filePath: string = DEFAULT_CONFIG_PATH): RecommenderConfig {
    try {
        return loadConfig(filePath);
    }
    catch (error) {
        console.warn(`Failed to load config from ${filePath}: ${describeError(error)}`);
        return getDefaultConfig();
    }
}
