/**
 * Test record builders and an in-memory catalog database.
 */

import type { Content, LearningEvent, User } from "@studyrank/engine";
import { CatalogDatabase } from "../adapters/sqlite/index.js";

export const kNOW = new Date("2025-03-01T12:00:00.000Z");

export function hoursBefore(hours: number): Date {
    return new Date(kNOW.getTime() - hours * 60 * 60 * 1000);
}

export function makeUser(userId: string, overrides: Partial<User> = {}): User {
    return {
        userId,
        name      : `Learner ${userId}`,
        email     : `${userId}@example.com`,
        cohortTag : "beginner",
        skillLevel: "novice",
        interests : ["python", "ai"],
        createdAt : new Date("2024-01-01T00:00:00.000Z"),
        lastActive: null,
        ...overrides,
    };
}

export function makeContent(contentId: string, overrides: Partial<Content> = {}): Content {
    return {
        contentId,
        title          : `Title ${contentId}`,
        description    : "",
        contentType    : "video",
        difficulty     : "beginner",
        tags           : ["python"],
        durationMinutes: 30,
        popularityScore: 0,
        createdAt      : new Date("2025-01-01T00:00:00.000Z"),
        ...overrides,
    };
}

let eventCounter = 0;

export function makeEvent(
    userId: string,
    contentId: string,
    overrides: Partial<LearningEvent> = {}
): LearningEvent {
    eventCounter += 1;
    return {
        eventId  : `evt_${eventCounter}`,
        userId,
        contentId,
        eventType: "view",
        value    : null,
        sessionId: null,
        timestamp: hoursBefore(48),
        ...overrides,
    };
}

export function openMemoryDatabase(): CatalogDatabase {
    const database = new CatalogDatabase(":memory:");
    database.open();
    return database;
}
