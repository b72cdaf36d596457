/**
 * Catalog Contract
 *
 * The records held by the catalog store: learners, learning content,
 * the append-only interaction log and the log of served recommendations.
 *
 * Records are plain read-only data. Only the store mutates them
 * (`lastActive` on ingestion, `popularityScore` on recompute).
 */

/**
 * Learner skill levels understood by the difficulty lookup.
 */
export const SKILL_LEVELS = ["novice", "intermediate", "expert"] as const;

export type SkillLevel = (typeof SKILL_LEVELS)[number];

/**
 * Content difficulty levels.
 */
export const DIFFICULTIES = ["beginner", "intermediate", "advanced"] as const;

export type Difficulty = (typeof DIFFICULTIES)[number];

/**
 * Content formats.
 */
export const CONTENT_TYPES = ["video", "article", "course", "tutorial", "quiz", "project"] as const;

export type ContentType = (typeof CONTENT_TYPES)[number];

/**
 * Interaction kinds recorded in the event log.
 */
export const EVENT_TYPES = ["view", "complete", "like", "quiz_score", "bookmark", "share"] as const;

export type EventType = (typeof EVENT_TYPES)[number];

/**
 * A learner profile.
 *
 * `skillLevel` is kept as a raw string: rows written by other tools may
 * carry values outside {@link SKILL_LEVELS}, and scoring treats those as
 * neutral rather than rejecting the user.
 */
export interface User {
    readonly userId: string;
    readonly name: string;
    readonly email: string;

    /** Categorical segment, e.g. "beginner" or "premium" */
    readonly cohortTag: string;

    readonly skillLevel: string;

    /** Interest tags in the order the learner declared them */
    readonly interests: readonly string[];

    readonly createdAt: Date;

    /** Time of the most recent ingested event, null before the first one */
    readonly lastActive: Date | null;
}

/**
 * A piece of learning content.
 */
export interface Content {
    readonly contentId: string;
    readonly title: string;
    readonly description: string;
    readonly contentType: string;
    readonly difficulty: string;
    readonly tags: readonly string[];
    readonly durationMinutes: number;

    /**
     * Derived from the total number of events on this content.
     * Recomputed from the full count on every ingested event.
     */
    readonly popularityScore: number;

    /** Immutable; drives recency decay */
    readonly createdAt: Date;
}

/**
 * One row of the append-only interaction log.
 */
export interface LearningEvent {
    readonly eventId: string;
    readonly userId: string;
    readonly contentId: string;
    readonly eventType: EventType;

    /** Only meaningful for quiz_score */
    readonly value: number | null;

    readonly sessionId: string | null;
    readonly timestamp: Date;
}

/**
 * One served recommendation, persisted for offline evaluation.
 */
export interface RecommendationLogEntry {
    readonly logId: string;
    readonly userId: string;
    readonly contentId: string;

    /** Always within [0, 1] */
    readonly score: number;

    readonly modelVersion: string;

    /** One to three tags, in discovery order */
    readonly reasonTags: readonly string[];

    readonly timestamp: Date;

    /** Set by later click correlation, never by the engine */
    readonly clicked: boolean;
}

export function isSkillLevel(value: unknown): value is SkillLevel {
    return SKILL_LEVELS.some((candidate) => candidate === value);
}

export function isDifficulty(value: unknown): value is Difficulty {
    return DIFFICULTIES.some((candidate) => candidate === value);
}

export function isContentType(value: unknown): value is ContentType {
    return CONTENT_TYPES.some((candidate) => candidate === value);
}

export function isEventType(value: unknown): value is EventType {
    return EVENT_TYPES.some((candidate) => candidate === value);
}
