/**
 * @fileoverview Unit tests for the recommendation logger
 *
 * Tests cover:
 * - One entry per served item, in rank order
 * - Batch writes
 * - Strict and lenient failure policies
 *
 * @module @studyrank/engine/__tests__/RecommendationLogger
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import type { ScoredCandidate } from "../contracts/Recommendation.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { LoggingFailureError } from "../errors/RecommenderError.js";
import { InMemoryCatalogStore } from "../impl/InMemoryCatalogStore.js";
import {
    RecommendationLogger,
    buildLogEntries,
    generateLogId,
    isLogFailurePolicy,
} from "../logging/RecommendationLogger.js";
import { kNOW, makeContent, sequentialIds } from "./fixtures.js";

function scored(contentId: string, score: number, reasonTags: string[]): ScoredCandidate {
    return {
        content  : makeContent({ contentId }),
        score,
        reasonTags,
        breakdown: {
            tagOverlap   : 0,
            difficulty   : 0,
            popularity   : 0,
            peerAffinity : 0,
            recencyFactor: 1,
            jitter       : 0,
        },
    };
}

describe("RecommendationLogger", () => {
    let store: InMemoryCatalogStore;
    let logger: EngineLogger;

    beforeEach(() => {
        store = new InMemoryCatalogStore();
        logger = {
            debug: vi.fn(),
            info : vi.fn(),
            warn : vi.fn(),
            error: vi.fn(),
        };
    });

    describe("generateLogId", () => {
        it("should produce 16 lowercase alphanumerics", () => {
            expect(generateLogId()).toMatch(/^[a-z0-9]{16}$/);
        });
    });

    describe("buildLogEntries", () => {
        it("should build one entry per item in rank order", () => {
            const entries = buildLogEntries(
                "user_1",
                [scored("content_2", 0.8, ["python"]), scored("content_1", 0.4, ["recommended_for_you"])],
                kNOW,
                "v2.0.0",
                sequentialIds("log")
            );

            expect(entries).toEqual([
                {
                    logId       : "log_1",
                    userId      : "user_1",
                    contentId   : "content_2",
                    score       : 0.8,
                    modelVersion: "v2.0.0",
                    reasonTags  : ["python"],
                    timestamp   : kNOW,
                    clicked     : false,
                },
                {
                    logId       : "log_2",
                    userId      : "user_1",
                    contentId   : "content_1",
                    score       : 0.4,
                    modelVersion: "v2.0.0",
                    reasonTags  : ["recommended_for_you"],
                    timestamp   : kNOW,
                    clicked     : false,
                },
            ]);
        });
    });

    describe("logServed", () => {
        // Scenario: A served list lands in the store in one write
        it("should persist the whole list in a single batch", async () => {
            const insertSpy = vi.spyOn(store, "insertRecommendationLogs");
            const recLogger = new RecommendationLogger({ store, idGenerator: sequentialIds("log") });

            const outcome = await recLogger.logServed(
                "user_1",
                [scored("content_1", 0.5, ["ai"]), scored("content_2", 0.3, ["python"])],
                kNOW
            );

            expect(insertSpy).toHaveBeenCalledTimes(1);
            expect(outcome.persisted).toBe(true);
            expect(store.recommendationLogs.map((entry) => entry.contentId)).toEqual(["content_1", "content_2"]);
            expect(store.recommendationLogs.every((entry) => entry.modelVersion === "v2.0.0")).toBe(true);
        });

        it("should skip the store for an empty list", async () => {
            const insertSpy = vi.spyOn(store, "insertRecommendationLogs");
            const recLogger = new RecommendationLogger({ store });

            const outcome = await recLogger.logServed("user_1", [], kNOW);

            expect(outcome).toEqual({ entries: [], persisted: true });
            expect(insertSpy).not.toHaveBeenCalled();
        });

        // Scenario: Storage rejects the batch under the default policy
        it("should throw LoggingFailureError under the strict policy", async () => {
            vi.spyOn(store, "insertRecommendationLogs").mockRejectedValue(new Error("disk full"));
            const recLogger = new RecommendationLogger({ store });

            await expect(recLogger.logServed("user_1", [scored("content_1", 0.5, ["ai"])], kNOW))
                .rejects.toThrow("Failed to log 1 recommendation(s) for user user_1: disk full");
            await expect(recLogger.logServed("user_1", [scored("content_1", 0.5, ["ai"])], kNOW))
                .rejects.toBeInstanceOf(LoggingFailureError);
        });

        // Scenario: Storage rejects the batch under the lenient policy
        it("should report and continue under the lenient policy", async () => {
            vi.spyOn(store, "insertRecommendationLogs").mockRejectedValue(new Error("disk full"));
            const recLogger = new RecommendationLogger({ store, policy: "lenient", logger });

            const outcome = await recLogger.logServed("user_1", [scored("content_1", 0.5, ["ai"])], kNOW);

            expect(outcome).toEqual({ entries: [], persisted: false, error: "disk full" });
            expect(logger.error).toHaveBeenCalledWith(
                "Recommendation log write failed, serving unaudited response",
                { userId: "user_1", entries: 1, error: "disk full" }
            );
        });

        // Scenario: One invalid entry rejects the whole batch
        it("should leave no partial log when the store refuses an entry", async () => {
            const recLogger = new RecommendationLogger({ store });

            await expect(recLogger.logServed(
                "user_1",
                [scored("content_1", 0.5, ["ai"]), scored("content_2", 1.5, ["ai"])],
                kNOW
            )).rejects.toBeInstanceOf(LoggingFailureError);

            expect(store.recommendationLogs).toEqual([]);
        });
    });

    describe("isLogFailurePolicy", () => {
        it("should accept only the known policies", () => {
            expect(isLogFailurePolicy("strict")).toBe(true);
            expect(isLogFailurePolicy("lenient")).toBe(true);
            expect(isLogFailurePolicy("loose")).toBe(false);
        });
    });
});
