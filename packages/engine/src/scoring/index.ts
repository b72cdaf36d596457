/**
 * @fileoverview Scoring engine barrel exports
 *
 * @module @studyrank/engine/scoring
 */

export {
    DEFAULT_SCORING_WEIGHTS,
    resolveScoringWeights,
    usesPeerSignal,
    recencyFactor,
    scoreCandidate,
    type ScoringWeights,
    type ScoringContext,
} from "./ScoringEngine.js";
