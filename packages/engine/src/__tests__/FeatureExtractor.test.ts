/**
 * @fileoverview Unit tests for the feature extractor
 *
 * @module @studyrank/engine/__tests__/FeatureExtractor
 */

import { describe, it, expect } from "vitest";
import {
    buildInteractionHistory,
    contentAgeDays,
    difficultyMatch,
    extractFeatures,
    isCompleted,
    overlappingTags,
} from "../features/FeatureExtractor.js";
import { isDifficulty, isSkillLevel } from "../contracts/Catalog.js";
import { kNOW, makeContent, makeUser } from "./fixtures.js";

describe("FeatureExtractor", () => {
    describe("difficultyMatch", () => {
        it.each([
            ["novice", "beginner", 1.0],
            ["novice", "intermediate", 0.5],
            ["novice", "advanced", 0.2],
            ["intermediate", "beginner", 0.5],
            ["intermediate", "intermediate", 1.0],
            ["intermediate", "advanced", 0.7],
            ["expert", "beginner", 0.3],
            ["expert", "intermediate", 0.7],
            ["expert", "advanced", 1.0],
        ])("should map %s / %s to %d", (skill, difficulty, expected) => {
            expect(difficultyMatch(skill, difficulty)).toBe(expected);
        });

        // Scenario: Values outside the table are neutral
        it("should return 0.5 for an unknown skill level or difficulty", () => {
            expect(difficultyMatch("guru", "beginner")).toBe(0.5);
            expect(difficultyMatch("novice", "legendary")).toBe(0.5);
            expect(difficultyMatch("constructor", "beginner")).toBe(0.5);
            expect(difficultyMatch("novice", "toString")).toBe(0.5);
        });

        // Scenario: Arguments given in the wrong order
        it("should return 0.5 when skill level and difficulty are swapped", () => {
            expect(difficultyMatch("beginner", "novice")).toBe(0.5);
            expect(difficultyMatch("advanced", "expert")).toBe(0.5);
        });

        // Scenario: The guards that gate the table lookup
        it("should recognise only the declared skill levels and difficulties", () => {
            expect(["novice", "intermediate", "expert", "beginner", "constructor", 1].map(isSkillLevel))
                .toEqual([true, true, true, false, false, false]);
            expect(["beginner", "intermediate", "advanced", "expert", "toString", null].map(isDifficulty))
                .toEqual([true, true, true, false, false, false]);
        });
    });

    describe("overlappingTags", () => {
        // Scenario: Overlap follows the learner's interest order
        it("should list shared tags in interest order without duplicates", () => {
            expect(overlappingTags(["ai", "python", "ai", "cloud"], ["cloud", "python", "ai"]))
                .toEqual(["ai", "python", "cloud"]);
        });

        it("should return an empty list when nothing overlaps", () => {
            expect(overlappingTags(["devops"], ["python"])).toEqual([]);
            expect(overlappingTags([], ["python"])).toEqual([]);
        });
    });

    describe("contentAgeDays", () => {
        it("should floor to whole days", () => {
            const createdAt = new Date("2025-02-27T18:00:00.000Z");
            expect(contentAgeDays(createdAt, kNOW)).toBe(1);
        });

        // Scenario: Content created after "now" is treated as brand new
        it("should clamp future creation times to zero", () => {
            const createdAt = new Date("2025-03-05T00:00:00.000Z");
            expect(contentAgeDays(createdAt, kNOW)).toBe(0);
        });
    });

    describe("buildInteractionHistory / isCompleted", () => {
        it("should sum repeated rows and detect completion", () => {
            const history = buildInteractionHistory([
                { contentId: "content_1", eventType: "view", count: 2 },
                { contentId: "content_1", eventType: "view", count: 3 },
                { contentId: "content_2", eventType: "complete", count: 1 },
            ]);

            expect(history.get("content_1")?.get("view")).toBe(5);
            expect(isCompleted(history, "content_1")).toBe(false);
            expect(isCompleted(history, "content_2")).toBe(true);
            expect(isCompleted(history, "content_3")).toBe(false);
        });
    });

    describe("extractFeatures", () => {
        it("should collect every signal for one candidate", () => {
            const user = makeUser({ interests: ["ai", "python"], skillLevel: "expert" });
            const content = makeContent({
                tags           : ["python", "ai", "ml"],
                difficulty     : "intermediate",
                popularityScore: 0.4,
                createdAt      : new Date("2025-01-30T12:00:00.000Z"),
            });

            const features = extractFeatures(user, content, kNOW);

            expect(features).toEqual({
                content,
                overlappingTags: ["ai", "python"],
                overlapCount   : 2,
                difficultyMatch: 0.7,
                popularity     : 0.4,
                ageDays        : 30,
            });
        });
    });
});
