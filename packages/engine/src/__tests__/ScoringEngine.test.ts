/**
 * @fileoverview Unit tests for the scoring engine
 *
 * Tests cover:
 * - Each weighted signal and its reason tags
 * - Strategy gating of the peer signal
 * - Recency decay, jitter bounds and the upper clamp
 *
 * @module @studyrank/engine/__tests__/ScoringEngine
 */

import { describe, it, expect, vi } from "vitest";
import type { CandidateFeatures } from "../features/FeatureExtractor.js";
import { extractFeatures } from "../features/FeatureExtractor.js";
import type { PeerSignal } from "../peers/PeerFinder.js";
import {
    DEFAULT_SCORING_WEIGHTS,
    recencyFactor,
    resolveScoringWeights,
    scoreCandidate,
    usesPeerSignal,
} from "../scoring/ScoringEngine.js";
import { constantRandom, kNOW, makeContent, makeUser } from "./fixtures.js";

function makeFeatures(overrides: Partial<CandidateFeatures> = {}): CandidateFeatures {
    return {
        content        : makeContent(),
        overlappingTags: [],
        overlapCount   : 0,
        difficultyMatch: 0,
        popularity     : 0,
        ageDays        : 0,
        ...overrides,
    };
}

function peerSignalFor(contentId: string): PeerSignal {
    return {
        peers       : [{ userId: "user_2", sharedInteractions: 4 }],
        endorsements: new Map([["user_2", new Set([contentId])]]),
    };
}

describe("ScoringEngine", () => {
    describe("scoreCandidate", () => {
        // Scenario: Novice python learner, fresh beginner python video at popularity 0.4
        it("should add tag, difficulty and popularity contributions", () => {
            const user = makeUser({ interests: ["python", "ai"], skillLevel: "novice" });
            const content = makeContent({ tags: ["python"], difficulty: "beginner", popularityScore: 0.4 });

            const scored = scoreCandidate(extractFeatures(user, content, kNOW), {
                strategy: "content_based",
                random  : constantRandom(0),
            });

            expect(scored.score).toBeCloseTo(0.56, 10);
            expect(scored.reasonTags).toEqual(["python"]);
            expect(scored.breakdown.tagOverlap).toBeCloseTo(0.3, 10);
            expect(scored.breakdown.difficulty).toBeCloseTo(0.2, 10);
            expect(scored.breakdown.popularity).toBeCloseTo(0.06, 10);
            expect(scored.breakdown.recencyFactor).toBe(1);
        });

        // Scenario: Exploration jitter stays below its weight
        it("should keep the jittered score within [base, base + 0.1)", () => {
            const features = makeFeatures({ overlappingTags: ["python"], overlapCount: 1, difficultyMatch: 1, popularity: 0.4 });

            const scored = scoreCandidate(features, { strategy: "content_based", random: constantRandom(0.999999) });

            expect(scored.score).toBeGreaterThanOrEqual(0.56);
            expect(scored.score).toBeLessThan(0.66);
        });

        // Scenario: Tag overlap counts at most three tags, reasons at most two
        it("should cap the overlap contribution and the tag reasons", () => {
            const features = makeFeatures({
                overlappingTags: ["python", "ai", "cloud", "devops"],
                overlapCount   : 4,
            });

            const scored = scoreCandidate(features, { strategy: "content_based", random: constantRandom(0) });

            expect(scored.breakdown.tagOverlap).toBeCloseTo(0.9, 10);
            expect(scored.reasonTags).toEqual(["python", "ai"]);
        });

        // Scenario: Nothing produced a reason
        it("should fall back to recommended_for_you", () => {
            const scored = scoreCandidate(makeFeatures({ difficultyMatch: 0.5 }), {
                strategy: "hybrid",
                random  : constantRandom(0),
            });

            expect(scored.reasonTags).toEqual(["recommended_for_you"]);
            expect(scored.score).toBeCloseTo(0.1, 10);
        });

        // Scenario: A peer endorsed the candidate under hybrid
        it("should add the peer bonus and its reason tag after the tag reasons", () => {
            const features = makeFeatures({ overlappingTags: ["python", "ai"], overlapCount: 2 });

            const scored = scoreCandidate(features, {
                strategy  : "hybrid",
                peerSignal: peerSignalFor("content_1"),
                random    : constantRandom(0),
            });

            expect(scored.breakdown.peerAffinity).toBe(0.2);
            expect(scored.score).toBeCloseTo(0.8, 10);
            expect(scored.reasonTags).toEqual(["python", "ai", "popular_with_similar_users"]);
        });

        // Scenario: content_based never looks at the peer signal
        it("should ignore the peer signal under content_based", () => {
            const scored = scoreCandidate(makeFeatures(), {
                strategy  : "content_based",
                peerSignal: peerSignalFor("content_1"),
                random    : constantRandom(0),
            });

            expect(scored.breakdown.peerAffinity).toBe(0);
            expect(scored.reasonTags).toEqual(["recommended_for_you"]);
        });

        // Scenario: A peer endorsed some other content
        it("should not add the bonus when no peer endorsed this content", () => {
            const scored = scoreCandidate(makeFeatures(), {
                strategy  : "collaborative",
                peerSignal: peerSignalFor("content_9"),
                random    : constantRandom(0),
            });

            expect(scored.breakdown.peerAffinity).toBe(0);
        });

        // Scenario: Every signal maxed out
        it("should clamp the score to 1.0", () => {
            const features = makeFeatures({
                overlappingTags: ["python", "ai", "cloud"],
                overlapCount   : 3,
                difficultyMatch: 1,
                popularity     : 1,
            });

            const scored = scoreCandidate(features, {
                strategy  : "hybrid",
                peerSignal: peerSignalFor("content_1"),
                random    : constantRandom(0.5),
            });

            expect(scored.score).toBe(1.0);
            expect(scored.reasonTags).toHaveLength(3);
        });

        // Scenario: Old content is decayed before jitter is added
        it("should apply recency decay to the signal sum only", () => {
            const features = makeFeatures({ difficultyMatch: 1, popularity: 0, ageDays: 73 });

            const scored = scoreCandidate(features, { strategy: "content_based", random: constantRandom(0.5) });

            expect(scored.breakdown.recencyFactor).toBeCloseTo(0.8, 10);
            expect(scored.score).toBeCloseTo(0.2 * 0.8 + 0.05, 10);
        });

        it("should draw jitter exactly once per call", () => {
            const random = vi.fn(() => 0.25);

            const scored = scoreCandidate(makeFeatures(), { strategy: "hybrid", random });

            expect(random).toHaveBeenCalledTimes(1);
            expect(scored.breakdown.jitter).toBeCloseTo(0.025, 10);
        });

        it("should honour overridden weights", () => {
            const weights = resolveScoringWeights({ jitter: 0, difficulty: 0.5 });

            const scored = scoreCandidate(makeFeatures({ difficultyMatch: 1 }), {
                strategy: "content_based",
                random  : constantRandom(0.9),
                weights,
            });

            expect(scored.score).toBe(0.5);
        });
    });

    describe("recencyFactor", () => {
        it("should decay linearly and stop at the floor", () => {
            expect(recencyFactor(0)).toBe(1);
            expect(recencyFactor(182.5)).toBe(0.5);
            expect(recencyFactor(730)).toBe(0.5);
        });
    });

    describe("usesPeerSignal", () => {
        it("should gate only the peer step on the strategy", () => {
            expect(usesPeerSignal("hybrid")).toBe(true);
            expect(usesPeerSignal("collaborative")).toBe(true);
            expect(usesPeerSignal("content_based")).toBe(false);
        });
    });

    describe("resolveScoringWeights", () => {
        it("should keep defaults for fields not overridden", () => {
            const weights = resolveScoringWeights({ peerAffinity: 0.3 });

            expect(weights.peerAffinity).toBe(0.3);
            expect(weights.tagOverlap).toBe(DEFAULT_SCORING_WEIGHTS.tagOverlap);
            expect(Object.isFrozen(weights)).toBe(true);
        });
    });
});
