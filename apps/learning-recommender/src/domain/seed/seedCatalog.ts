/**
 * @fileoverview Catalog Seeding
 *
 * Fills an empty catalog database with generated learners, content and
 * interaction events. Generation draws from an injected random source,
 * so the same seed and clock produce the same catalog.
 *
 * @module domain/seed/seedCatalog
 */

import {
    DIFFICULTIES,
    EVENT_TYPES,
    SKILL_LEVELS,
    randomChoice,
    randomInt,
    randomSample,
    type Content,
    type LearningEvent,
    type RandomSource,
    type User,
} from "@studyrank/engine";
import type { CatalogDatabase } from "../../adapters/sqlite/index.js";
import type { SeedData } from "../../config/index.js";

const kMS_PER_HOUR = 60 * 60 * 1000;
const kMS_PER_DAY = 24 * kMS_PER_HOUR;

export interface SeedOptions {
    users: number;
    content: number;
    events: number;
    random: RandomSource;
    now: Date;
}

export interface SeedResult {
    /** False when the database already held users */
    seeded: boolean;
    users: number;
    content: number;
    events: number;
}

function generateUser(index: number, seedData: SeedData, options: SeedOptions): User {
    const { random, now } = options;

    return {
        userId    : `user_${index}`,
        name      : `User ${index}`,
        email     : `user${index}@example.com`,
        cohortTag : randomChoice(random, seedData.cohorts),
        skillLevel: randomChoice(random, SKILL_LEVELS),
        interests : randomSample(random, seedData.interests, randomInt(random, 2, 4)),
        createdAt : new Date(now.getTime() - randomInt(random, 1, 365) * kMS_PER_DAY),
        lastActive: null,
    };
}

function generateContent(index: number, seedData: SeedData, options: SeedOptions): Content {
    const { random, now } = options;

    // Catalog opens with every title once, in order
    const title = index <= seedData.titles.length
        ? seedData.titles[index - 1]
        : randomChoice(random, seedData.titles);

    return {
        contentId      : `content_${index}`,
        title,
        description    : `Comprehensive guide to ${title.toLowerCase()}`,
        contentType    : randomChoice(random, seedData.contentTypes),
        difficulty     : randomChoice(random, DIFFICULTIES),
        tags           : randomSample(random, seedData.interests, randomInt(random, 1, 3)),
        durationMinutes: randomInt(random, 10, 240),
        popularityScore: random(),
        createdAt      : new Date(now.getTime() - randomInt(random, 0, 730) * kMS_PER_DAY),
    };
}

function generateEvent(index: number, options: SeedOptions): LearningEvent {
    const { random, now } = options;
    const eventType = randomChoice(random, EVENT_TYPES);

    return {
        eventId  : `event_${index}`,
        userId   : `user_${randomInt(random, 1, options.users)}`,
        contentId: `content_${randomInt(random, 1, options.content)}`,
        eventType,
        value    : eventType === "quiz_score" ? randomInt(random, 60, 100) : null,
        sessionId: `session_${randomInt(random, 1, 1000)}`,
        timestamp: new Date(now.getTime() - randomInt(random, 1, 720) * kMS_PER_HOUR),
    };
}

function assertCount(name: string, value: number, min: number): void {
    if (!Number.isInteger(value) || value < min) {
        throw new Error(`seed ${name} must be an integer of at least ${min}, got ${value}`);
    }
}

/**
 * Seed an empty catalog in one transaction. No-op when users exist.
 *
 * @example
 * ```typescript
 * const result = seedCatalog(database, loadSeedData(), {
 *     users  : 100,
 *     content: 200,
 *     events : 5000,
 *     random : createSeededRandom(42),
 *     now    : new Date(),
 * });
 * ```
 */
export function seedCatalog(database: CatalogDatabase, seedData: SeedData, options: SeedOptions): SeedResult {
    // Events need at least one learner and one content item to point at
    assertCount("users", options.users, 1);
    assertCount("content", options.content, 1);
    assertCount("events", options.events, 0);

    if (database.countUsers() > 0) {
        return { seeded: false, users: 0, content: 0, events: 0 };
    }

    database.transaction(() => {
        for (let i = 1; i <= options.users; i++) {
            database.insertUser(generateUser(i, seedData, options));
        }

        for (let i = 1; i <= options.content; i++) {
            database.insertContent(generateContent(i, seedData, options));
        }

        for (let i = 1; i <= options.events; i++) {
            database.insertEvent(generateEvent(i, options));
        }

        database.connection.exec(`
            UPDATE users
            SET last_active = (SELECT MAX(timestamp) FROM events WHERE events.user_id = users.user_id)
        `);
    });

    return {
        seeded : true,
        users  : options.users,
        content: options.content,
        events : options.events,
    };
}
