/**
 * @fileoverview Feature Extractor
 *
 * Derives the per-candidate signals the scoring engine combines:
 * tag overlap with the learner's interests, difficulty compatibility,
 * popularity and content age. Also folds the learner's raw interaction
 * counts into a history that answers "already completed?".
 *
 * Everything here is a pure function of its inputs.
 *
 * @module @studyrank/engine/features/FeatureExtractor
 */

import {
    isDifficulty,
    isSkillLevel,
    type Content,
    type Difficulty,
    type SkillLevel,
    type User,
} from "../contracts/Catalog.js";
import type { InteractionCountRow } from "../contracts/CatalogStore.js";

const kMS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Multiplier used when either side of the difficulty lookup is unknown.
 */
export const NEUTRAL_DIFFICULTY_MATCH = 0.5;

/**
 * Skill level → content difficulty → compatibility, before weighting.
 */
export const DIFFICULTY_MATCH: Readonly<Record<SkillLevel, Readonly<Record<Difficulty, number>>>> = {
    novice: {
        beginner    : 1.0,
        intermediate: 0.5,
        advanced    : 0.2,
    },
    intermediate: {
        beginner    : 0.5,
        intermediate: 1.0,
        advanced    : 0.7,
    },
    expert: {
        beginner    : 0.3,
        intermediate: 0.7,
        advanced    : 1.0,
    },
};

/**
 * Content id → event type → number of events.
 */
export type InteractionHistory = ReadonlyMap<string, ReadonlyMap<string, number>>;

/**
 * Signals extracted for one (user, content) pair.
 */
export interface CandidateFeatures {
    readonly content: Content;

    /** Interests also tagged on the content, in the learner's interest order */
    readonly overlappingTags: readonly string[];

    readonly overlapCount: number;

    /** Lookup-table value in [0, 1], before the difficulty weight */
    readonly difficultyMatch: number;

    readonly popularity: number;

    /** Whole days since the content was created; never negative */
    readonly ageDays: number;
}

/**
 * Fold grouped interaction counts into a history map.
 * Repeated (content, type) rows are summed.
 */
export function buildInteractionHistory(rows: readonly InteractionCountRow[]): InteractionHistory {
    const history = new Map<string, Map<string, number>>();

    for (const row of rows) {
        let byType = history.get(row.contentId);
        if (!byType) {
            byType = new Map();
            history.set(row.contentId, byType);
        }
        byType.set(row.eventType, (byType.get(row.eventType) ?? 0) + row.count);
    }

    return history;
}

/**
 * True iff the history holds a `complete` event for the content.
 */
export function isCompleted(history: InteractionHistory, contentId: string): boolean {
    return (history.get(contentId)?.get("complete") ?? 0) > 0;
}

/**
 * Look up the difficulty compatibility for a skill level.
 * Unknown skill levels and unknown difficulties map to 0.5.
 */
export function difficultyMatch(skillLevel: string, difficulty: string): number {
    if (!isSkillLevel(skillLevel) || !isDifficulty(difficulty)) {
        return NEUTRAL_DIFFICULTY_MATCH;
    }
    return DIFFICULTY_MATCH[skillLevel][difficulty];
}

/**
 * Interests that are also content tags, deduplicated, in interest order.
 */
export function overlappingTags(interests: readonly string[], tags: readonly string[]): string[] {
    const tagSet = new Set(tags);
    const seen = new Set<string>();
    const overlap: string[] = [];

    for (const interest of interests) {
        if (tagSet.has(interest) && !seen.has(interest)) {
            seen.add(interest);
            overlap.push(interest);
        }
    }

    return overlap;
}

/**
 * Whole days between creation and `now`, floored, clamped at zero.
 */
export function contentAgeDays(createdAt: Date, now: Date): number {
    const days = Math.floor((now.getTime() - createdAt.getTime()) / kMS_PER_DAY);
    return Math.max(0, days);
}

/**
 * Extract the scoring signals for one candidate.
 *
 * @example
 * ```typescript
 * const features = extractFeatures(user, content, new Date());
 * // { overlappingTags: ["python"], overlapCount: 1, difficultyMatch: 1, popularity: 0.4, ageDays: 0, ... }
 * ```
 */
export function extractFeatures(user: User, content: Content, now: Date): CandidateFeatures {
    const overlap = overlappingTags(user.interests, content.tags);

    return {
        content,
        overlappingTags: overlap,
        overlapCount   : overlap.length,
        difficultyMatch: difficultyMatch(user.skillLevel, content.difficulty),
        popularity     : content.popularityScore,
        ageDays        : contentAgeDays(content.createdAt, now),
    };
}
