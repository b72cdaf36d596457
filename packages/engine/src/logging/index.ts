/**
 * @fileoverview Recommendation logger barrel exports
 *
 * @module @studyrank/engine/logging
 */

export {
    RecommendationLogger,
    LOG_FAILURE_POLICIES,
    isLogFailurePolicy,
    generateLogId,
    buildLogEntries,
    type LogFailurePolicy,
    type LogOutcome,
    type RecommendationLoggerConfig,
} from "./RecommendationLogger.js";
