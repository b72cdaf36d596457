/**
 * @fileoverview Engine barrel exports
 *
 * @module @studyrank/engine/engine
 */

export {
    RecommendationEngine,
    DEFAULT_POPULARITY_PER_EVENT,
    type EngineConfig,
} from "./RecommendationEngine.js";
