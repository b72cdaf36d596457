/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    CONFIG_DIR,
    DEFAULT_CONFIG_PATH,
    LOG_LEVELS,
    isLogLevel,
    getDefaultConfig,
    parseConfig,
    applyEnvOverrides,
    loadConfig,
    loadConfigWithFallback,
    type LogLevel,
    type RecommenderConfig,
} from "./loadConfig.js";
export {
    DEFAULT_SEED_DATA_PATH,
    parseSeedData,
    loadSeedData,
    type SeedData,
} from "./loadSeedData.js";
