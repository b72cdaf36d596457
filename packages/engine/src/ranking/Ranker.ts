/**
 * @fileoverview Ranker
 *
 * Orders scored candidates and cuts the list to the requested size.
 *
 * Ties are not broken explicitly: Array.prototype.sort is stable, so tied
 * candidates keep their enumeration order from the catalog.
 *
 * @module @studyrank/engine/ranking/Ranker
 */

import type { ScoredCandidate } from "../contracts/Recommendation.js";
import { DEFAULT_K, MAX_K, MIN_K } from "../contracts/Recommendation.js";
import { InvalidRequestError } from "../errors/RecommenderError.js";

/**
 * Validate a requested list size.
 *
 * @param k - Requested size; undefined means the default (10)
 * @returns The size to use
 * @throws InvalidRequestError when k is not an integer in [1, 50]
 */
export function validateK(k: number | undefined): number {
    if (k === undefined) {
        return DEFAULT_K;
    }
    if (!Number.isInteger(k) || k < MIN_K || k > MAX_K) {
        throw new InvalidRequestError("k", `k must be an integer between ${MIN_K} and ${MAX_K}, got ${k}`);
    }
    return k;
}

/**
 * Stable sort by score descending, then keep the first `k`.
 *
 * @returns A new array of length min(k, candidates.length)
 */
export function rankCandidates(candidates: readonly ScoredCandidate[], k: number): ScoredCandidate[] {
    const size = validateK(k);
    return [...candidates]
        .sort((a, b) => b.score - a.score)
        .slice(0, size);
}
