/**
 * @fileoverview In-Memory CatalogStore Implementation
 *
 * A catalog store held in plain maps and arrays. Every method runs to
 * completion synchronously before its promise settles, so each write is
 * atomic with respect to other requests.
 *
 * Used by tests and by hosts that load a catalog snapshot into memory.
 *
 * @module @studyrank/engine/impl/InMemoryCatalogStore
 */

import type {
    Content,
    EventType,
    LearningEvent,
    RecommendationLogEntry,
    User,
} from "../contracts/Catalog.js";
import type {
    CatalogStore,
    EngagementRow,
    InteractionCountRow,
    Peer,
    RecordEventOptions,
} from "../contracts/CatalogStore.js";

/**
 * Initial contents of the store.
 */
export interface InMemoryCatalogSnapshot {
    readonly users?: readonly User[];
    readonly content?: readonly Content[];
    readonly events?: readonly LearningEvent[];
}

/**
 * Binary string order, matching SQL's default collation.
 */
function compareIds(a: string, b: string): number {
    if (a < b) {
        return -1;
    }
    return a > b ? 1 : 0;
}

/**
 * Check the log entry invariants a database would enforce with constraints.
 *
 * @throws Error naming the first offending entry
 */
export function assertValidLogEntry(entry: RecommendationLogEntry): void {
    if (!(entry.score >= 0 && entry.score <= 1)) {
        throw new Error(`Log entry ${entry.logId}: score ${entry.score} is outside [0, 1]`);
    }
    if (entry.reasonTags.length === 0 || entry.reasonTags.length > 3) {
        throw new Error(`Log entry ${entry.logId}: expected 1-3 reason tags, got ${entry.reasonTags.length}`);
    }
}

/**
 * In-memory CatalogStore.
 *
 * @example
 * ```typescript
 * const store = new InMemoryCatalogStore({ users, content, events });
 * const engine = new RecommendationEngine({ store });
 * ```
 */
export class InMemoryCatalogStore implements CatalogStore {
    private readonly users: Map<string, User> = new Map();
    private readonly content: Map<string, Content> = new Map();
    private readonly eventLog: LearningEvent[] = [];
    private readonly logEntries: RecommendationLogEntry[] = [];

    constructor(snapshot: InMemoryCatalogSnapshot = {}) {
        for (const user of snapshot.users ?? []) {
            this.users.set(user.userId, user);
        }
        for (const item of snapshot.content ?? []) {
            this.content.set(item.contentId, item);
        }
        this.eventLog.push(...(snapshot.events ?? []));
    }

    /** Every recorded event, oldest first */
    get events(): readonly LearningEvent[] {
        return this.eventLog;
    }

    /** Every persisted recommendation log entry, oldest first */
    get recommendationLogs(): readonly RecommendationLogEntry[] {
        return this.logEntries;
    }

    async getUser(userId: string): Promise<User | null> {
        return this.users.get(userId) ?? null;
    }

    async getContent(contentId: string): Promise<Content | null> {
        return this.content.get(contentId) ?? null;
    }

    async listContent(): Promise<readonly Content[]> {
        return Array.from(this.content.values());
    }

    async getInteractionCounts(userId: string): Promise<readonly InteractionCountRow[]> {
        const counts = new Map<string, { contentId: string; eventType: string; count: number }>();

        for (const event of this.eventLog) {
            if (event.userId !== userId) {
                continue;
            }
            const key = `${event.contentId}\u0000${event.eventType}`;
            const row = counts.get(key);
            if (row) {
                row.count += 1;
            }
            else {
                counts.set(key, { contentId: event.contentId, eventType: event.eventType, count: 1 });
            }
        }

        return Array.from(counts.values());
    }

    async findPeers(userId: string, limit: number): Promise<readonly Peer[]> {
        // Events of the query user per content id
        const ownCounts = new Map<string, number>();
        for (const event of this.eventLog) {
            if (event.userId === userId) {
                ownCounts.set(event.contentId, (ownCounts.get(event.contentId) ?? 0) + 1);
            }
        }

        if (ownCounts.size === 0) {
            return [];
        }

        // Each peer event pairs with every own event on the same content
        const shared = new Map<string, number>();
        for (const event of this.eventLog) {
            if (event.userId === userId) {
                continue;
            }
            const own = ownCounts.get(event.contentId);
            if (own !== undefined) {
                shared.set(event.userId, (shared.get(event.userId) ?? 0) + own);
            }
        }

        return Array.from(shared, ([peerId, sharedInteractions]) => ({ userId: peerId, sharedInteractions }))
            .sort((a, b) => b.sharedInteractions - a.sharedInteractions || compareIds(a.userId, b.userId))
            .slice(0, limit);
    }

    async getEngagements(
        userIds: readonly string[],
        eventTypes: readonly EventType[]
    ): Promise<readonly EngagementRow[]> {
        const wantedUsers = new Set(userIds);
        const wantedTypes = new Set<string>(eventTypes);
        const seen = new Set<string>();
        const rows: EngagementRow[] = [];

        for (const event of this.eventLog) {
            if (!wantedUsers.has(event.userId) || !wantedTypes.has(event.eventType)) {
                continue;
            }
            const key = `${event.userId}\u0000${event.contentId}`;
            if (!seen.has(key)) {
                seen.add(key);
                rows.push({ userId: event.userId, contentId: event.contentId });
            }
        }

        return rows;
    }

    async recordEvent(event: LearningEvent, options: RecordEventOptions): Promise<void> {
        const user = this.users.get(event.userId);
        const item = this.content.get(event.contentId);
        if (!user || !item) {
            throw new Error(`Event ${event.eventId} references a missing user or content`);
        }

        this.eventLog.push(event);
        this.users.set(user.userId, { ...user, lastActive: event.timestamp });

        const total = this.eventLog.filter((logged) => logged.contentId === item.contentId).length;
        this.content.set(item.contentId, { ...item, popularityScore: total * options.popularityPerEvent });
    }

    async insertRecommendationLogs(entries: readonly RecommendationLogEntry[]): Promise<void> {
        // Validate the whole batch before writing any of it
        entries.forEach(assertValidLogEntry);
        this.logEntries.push(...entries);
    }
}
