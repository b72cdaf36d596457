/**
 * Recommendation Contract
 *
 * Request and response shapes exchanged between the serving facade
 * and the engine, plus the intermediate scored-candidate shape passed
 * from the scoring engine to the ranker and the recommendation logger.
 */

import type { Content, EventType } from "./Catalog.js";

/**
 * Revision tag of the scoring logic.
 * Written verbatim into every response and every log entry.
 */
export const MODEL_VERSION = "v2.0.0";

/**
 * Signal groups selectable per request.
 *
 * Note that `collaborative` still runs the content signals; only the
 * peer-affinity step is gated on the strategy.
 */
export const STRATEGIES = ["collaborative", "content_based", "hybrid"] as const;

export type Strategy = (typeof STRATEGIES)[number];

export const DEFAULT_STRATEGY: Strategy = "hybrid";

export const DEFAULT_K = 10;
export const MIN_K = 1;
export const MAX_K = 50;

/** Reason tag used when no signal produced one */
export const FALLBACK_REASON_TAG = "recommended_for_you";

/** Reason tag appended by the peer-affinity signal */
export const PEER_REASON_TAG = "popular_with_similar_users";

export function isStrategy(value: unknown): value is Strategy {
    return STRATEGIES.some((candidate) => candidate === value);
}

/**
 * Recommendation request from the serving facade.
 */
export interface RecommendationRequest {
    readonly userId: string;

    /** Number of items to return, 1..50 (default 10) */
    readonly k?: number;

    /** Default "hybrid"; raw strings from the facade are validated */
    readonly strategy?: Strategy | string;
}

/**
 * One recommended item as returned to the caller.
 */
export interface RecommendationItem {
    readonly contentId: string;
    readonly title: string;
    readonly score: number;
    readonly reasonTags: readonly string[];
    readonly difficulty: string;
    readonly contentType: string;
}

export interface RecommendationResponse {
    readonly userId: string;
    readonly recommendations: readonly RecommendationItem[];
    readonly modelVersion: string;
    readonly latencyMs: number;
    readonly strategy: Strategy;
}

/**
 * Per-signal contributions behind a score, kept for explainability.
 * Contributions are pre-decay, already weighted.
 */
export interface ScoreBreakdown {
    readonly tagOverlap: number;
    readonly difficulty: number;
    readonly popularity: number;
    readonly peerAffinity: number;
    readonly recencyFactor: number;
    readonly jitter: number;
}

/**
 * A candidate after scoring, before ranking.
 */
export interface ScoredCandidate {
    readonly content: Content;

    /** Final score, at most 1.0 */
    readonly score: number;

    /** One to three tags */
    readonly reasonTags: readonly string[];

    readonly breakdown: ScoreBreakdown;
}

/**
 * Event ingestion request from the serving facade.
 */
export interface EventInput {
    readonly userId: string;
    readonly contentId: string;
    readonly eventType: EventType | string;
    readonly value?: number | null;
    readonly sessionId?: string | null;
}

export interface EventReceipt {
    readonly eventId: string;
    readonly status: "success";

    /** ISO timestamp the event was recorded with */
    readonly timestamp: string;
}

/**
 * Project a scored candidate onto the response item shape.
 */
export function toRecommendationItem(candidate: ScoredCandidate): RecommendationItem {
    return {
        contentId  : candidate.content.contentId,
        title      : candidate.content.title,
        score      : candidate.score,
        reasonTags : candidate.reasonTags,
        difficulty : candidate.content.difficulty,
        contentType: candidate.content.contentType,
    };
}
