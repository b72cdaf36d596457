/**
 * Test record builders shared by the engine suites.
 */

import type { Content, LearningEvent, User } from "../contracts/Catalog.js";
import type { RandomSource } from "../contracts/RandomSource.js";

export const kNOW = new Date("2025-03-01T12:00:00.000Z");

export function makeUser(overrides: Partial<User> = {}): User {
    return {
        userId    : "user_1",
        name      : "Test Learner",
        email     : "learner@example.com",
        cohortTag : "beginner",
        skillLevel: "novice",
        interests : ["python", "ai"],
        createdAt : new Date("2024-01-01T00:00:00.000Z"),
        lastActive: null,
        ...overrides,
    };
}

export function makeContent(overrides: Partial<Content> = {}): Content {
    return {
        contentId      : "content_1",
        title          : "Intro to Python",
        description    : "First steps",
        contentType    : "video",
        difficulty     : "beginner",
        tags           : ["python"],
        durationMinutes: 30,
        popularityScore: 0,
        createdAt      : kNOW,
        ...overrides,
    };
}

let eventCounter = 0;

export function makeEvent(overrides: Partial<LearningEvent> = {}): LearningEvent {
    eventCounter += 1;
    return {
        eventId  : `evt_${eventCounter}`,
        userId   : "user_1",
        contentId: "content_1",
        eventType: "view",
        value    : null,
        sessionId: null,
        timestamp: new Date("2025-02-01T00:00:00.000Z"),
        ...overrides,
    };
}

/**
 * Random source returning the given value on every call.
 */
export function constantRandom(value: number): RandomSource {
    return () => value;
}

/**
 * Id generator yielding prefix_1, prefix_2, ...
 */
export function sequentialIds(prefix: string): () => string {
    let next = 0;
    return () => {
        next += 1;
        return `${prefix}_${next}`;
    };
}
