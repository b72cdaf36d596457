/**
 * @fileoverview Feature extractor barrel exports
 *
 * @module @studyrank/engine/features
 */

export {
    DIFFICULTY_MATCH,
    NEUTRAL_DIFFICULTY_MATCH,
    buildInteractionHistory,
    isCompleted,
    difficultyMatch,
    overlappingTags,
    contentAgeDays,
    extractFeatures,
    type InteractionHistory,
    type CandidateFeatures,
} from "./FeatureExtractor.js";
