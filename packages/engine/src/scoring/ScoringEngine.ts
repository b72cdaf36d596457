/**
 * @fileoverview Scoring Engine
 *
 * Combines the extracted signals of one candidate into a single score
 * with reason tags.
 *
 * Steps, in order (the trailing decay and clamp make the order matter):
 * 1. Tag overlap        min(overlap, maxTagOverlap) × tagOverlap
 * 2. Difficulty match   lookup(skill, difficulty) × difficulty
 * 3. Popularity         popularityScore × popularity
 * 4. Peer affinity      + peerAffinity when a peer endorsed the content
 *                       (collaborative and hybrid strategies only)
 * 5. Recency decay      × max(recencyFloor, 1 − ageDays / recencyHorizonDays)
 * 6. Exploration jitter + random() × jitter, drawn fresh per call
 * 7. Clamp              min(total, 1.0); no lower clamp
 *
 * @module @studyrank/engine/scoring/ScoringEngine
 */

import type { Strategy, ScoredCandidate } from "../contracts/Recommendation.js";
import { FALLBACK_REASON_TAG, PEER_REASON_TAG } from "../contracts/Recommendation.js";
import type { RandomSource } from "../contracts/RandomSource.js";
import type { CandidateFeatures } from "../features/FeatureExtractor.js";
import type { PeerSignal } from "../peers/PeerFinder.js";
import { EMPTY_PEER_SIGNAL, firstEngagedPeer } from "../peers/PeerFinder.js";

/**
 * Weights and bounds of the scoring formula.
 */
export interface ScoringWeights {
    /** Per overlapping interest tag */
    readonly tagOverlap: number;

    /** Overlapping tags counted at most this many times */
    readonly maxTagOverlap: number;

    /** Overlapping tags recorded as reasons at most this many times */
    readonly maxTagReasons: number;

    readonly difficulty: number;
    readonly popularity: number;

    /** Flat bonus when a peer endorsed the content */
    readonly peerAffinity: number;

    /** Age at which the linear decay would reach zero */
    readonly recencyHorizonDays: number;

    /** Decay never goes below this factor */
    readonly recencyFloor: number;

    /** Upper bound (exclusive) of the exploration noise */
    readonly jitter: number;

    readonly maxReasonTags: number;
}

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = Object.freeze({
    tagOverlap        : 0.3,
    maxTagOverlap     : 3,
    maxTagReasons     : 2,
    difficulty        : 0.2,
    popularity        : 0.15,
    peerAffinity      : 0.2,
    recencyHorizonDays: 365,
    recencyFloor      : 0.5,
    jitter            : 0.1,
    maxReasonTags     : 3,
});

/**
 * Merge partial overrides onto the defaults.
 */
export function resolveScoringWeights(overrides: Partial<ScoringWeights> = {}): ScoringWeights {
    return Object.freeze({ ...DEFAULT_SCORING_WEIGHTS, ...overrides });
}

/**
 * Whether the strategy includes the peer-affinity step.
 *
 * "collaborative" still runs every content signal as well; only this
 * step is gated.
 */
export function usesPeerSignal(strategy: Strategy): boolean {
    return strategy === "collaborative" || strategy === "hybrid";
}

/**
 * max(floor, 1 − ageDays / horizon)
 */
export function recencyFactor(ageDays: number, weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS): number {
    return Math.max(weights.recencyFloor, 1.0 - ageDays / weights.recencyHorizonDays);
}

/**
 * Inputs shared by every candidate of one request.
 */
export interface ScoringContext {
    readonly strategy: Strategy;

    /** Ignored unless the strategy uses the peer signal */
    readonly peerSignal?: PeerSignal;

    readonly random: RandomSource;

    readonly weights?: ScoringWeights;
}

/**
 * Score one candidate.
 *
 * @example
 * ```typescript
 * const scored = scoreCandidate(extractFeatures(user, content, now), {
 *     strategy: "content_based",
 *     random  : createSeededRandom(7),
 * });
 * ```
 */
export function scoreCandidate(features: CandidateFeatures, context: ScoringContext): ScoredCandidate {
    const weights = context.weights ?? DEFAULT_SCORING_WEIGHTS;
    const reasonTags: string[] = [];

    // 1. Tag overlap
    const tagOverlap = Math.min(features.overlapCount, weights.maxTagOverlap) * weights.tagOverlap;
    if (features.overlapCount > 0) {
        reasonTags.push(...features.overlappingTags.slice(0, weights.maxTagReasons));
    }

    // 2. Difficulty
    const difficulty = features.difficultyMatch * weights.difficulty;

    // 3. Popularity
    const popularity = features.popularity * weights.popularity;

    // 4. Peer affinity
    let peerAffinity = 0;
    if (usesPeerSignal(context.strategy)) {
        const signal = context.peerSignal ?? EMPTY_PEER_SIGNAL;
        if (firstEngagedPeer(signal, features.content.contentId)) {
            peerAffinity = weights.peerAffinity;
            reasonTags.push(PEER_REASON_TAG);
        }
    }

    // 5. Recency decay
    const decay = recencyFactor(features.ageDays, weights);
    let total = (tagOverlap + difficulty + popularity + peerAffinity) * decay;

    // 6. Exploration jitter
    const jitter = context.random() * weights.jitter;
    total += jitter;

    if (reasonTags.length === 0) {
        reasonTags.push(FALLBACK_REASON_TAG);
    }

    return {
        content   : features.content,
        score     : Math.min(total, 1.0),
        reasonTags: reasonTags.slice(0, weights.maxReasonTags),
        breakdown : {
            tagOverlap,
            difficulty,
            popularity,
            peerAffinity,
            recencyFactor: decay,
            jitter,
        },
    };
}
