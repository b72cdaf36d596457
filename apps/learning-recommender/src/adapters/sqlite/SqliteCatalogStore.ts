/**
 * @fileoverview SQLite CatalogStore
 *
 * CatalogStore over the catalog database. better-sqlite3 is synchronous,
 * so every method completes before its promise settles; the two writes
 * that must be atomic each run in a single transaction.
 *
 * @module adapters/sqlite/SqliteCatalogStore
 */

import {
    assertValidLogEntry,
    type CatalogStore,
    type Content,
    type EngagementRow,
    type EventType,
    type InteractionCountRow,
    type LearningEvent,
    type Peer,
    type RecommendationLogEntry,
    type RecordEventOptions,
    type User,
} from "@studyrank/engine";
import { joinList, type CatalogDatabase } from "./catalog-db.js";

interface InteractionCountDbRow {
    content_id: string;
    event_type: string;
    count: number;
}

interface PeerDbRow {
    user_id: string;
    shared: number;
}

interface EngagementDbRow {
    user_id: string;
    content_id: string;
}

function placeholders(count: number): string {
    return new Array<string>(count).fill("?").join(", ");
}

/**
 * SQLite-backed CatalogStore.
 *
 * @example
 * ```typescript
 * const database = new CatalogDatabase("./data/learning.db");
 * const engine = new RecommendationEngine({ store: new SqliteCatalogStore(database) });
 * ```
 */
export class SqliteCatalogStore implements CatalogStore {
    constructor(private readonly database: CatalogDatabase) {}

    async getUser(userId: string): Promise<User | null> {
        return this.database.getUser(userId);
    }

    async getContent(contentId: string): Promise<Content | null> {
        return this.database.getContent(contentId);
    }

    async listContent(): Promise<readonly Content[]> {
        return this.database.listContent();
    }

    async getInteractionCounts(userId: string): Promise<readonly InteractionCountRow[]> {
        const rows = this.database.connection.prepare<[string], InteractionCountDbRow>(`
            SELECT content_id, event_type, COUNT(*) AS count
            FROM events
            WHERE user_id = ?
            GROUP BY content_id, event_type
        `).all(userId);

        return rows.map((row) => ({
            contentId: row.content_id,
            eventType: row.event_type,
            count    : row.count,
        }));
    }

    async findPeers(userId: string, limit: number): Promise<readonly Peer[]> {
        // One row per (own event, peer event) pair on the same content
        const rows = this.database.connection.prepare<[string, string, number], PeerDbRow>(`
            SELECT e2.user_id AS user_id, COUNT(*) AS shared
            FROM events e1
            JOIN events e2 ON e1.content_id = e2.content_id
            WHERE e1.user_id = ? AND e2.user_id != ?
            GROUP BY e2.user_id
            ORDER BY shared DESC, e2.user_id ASC
            LIMIT ?
        `).all(userId, userId, limit);

        return rows.map((row) => ({
            userId            : row.user_id,
            sharedInteractions: row.shared,
        }));
    }

    async getEngagements(
        userIds: readonly string[],
        eventTypes: readonly EventType[]
    ): Promise<readonly EngagementRow[]> {
        if (userIds.length === 0 || eventTypes.length === 0) {
            return [];
        }

        const rows = this.database.connection.prepare<string[], EngagementDbRow>(`
            SELECT DISTINCT user_id, content_id
            FROM events
            WHERE user_id IN (${placeholders(userIds.length)})
                AND event_type IN (${placeholders(eventTypes.length)})
            ORDER BY user_id, content_id
        `).all(...userIds, ...eventTypes);

        return rows.map((row) => ({
            userId   : row.user_id,
            contentId: row.content_id,
        }));
    }

    async recordEvent(event: LearningEvent, options: RecordEventOptions): Promise<void> {
        const db = this.database.connection;

        this.database.transaction(() => {
            this.database.insertEvent(event);

            db.prepare("UPDATE users SET last_active = ? WHERE user_id = ?")
                .run(event.timestamp.toISOString(), event.userId);

            db.prepare(`
                UPDATE content
                SET popularity_score = (SELECT COUNT(*) FROM events WHERE content_id = ?) * ?
                WHERE content_id = ?
            `).run(event.contentId, options.popularityPerEvent, event.contentId);
        });
    }

    async insertRecommendationLogs(entries: readonly RecommendationLogEntry[]): Promise<void> {
        const insert = this.database.connection.prepare(`
            INSERT INTO recommendation_logs (
                log_id, user_id, content_id, score, model_version, reason_tags, timestamp, clicked
            )
            VALUES (?, ?, ?, ?, ?, ?, ?, ?)
        `);

        this.database.transaction(() => {
            for (const entry of entries) {
                assertValidLogEntry(entry);
                insert.run(
                    entry.logId,
                    entry.userId,
                    entry.contentId,
                    entry.score,
                    entry.modelVersion,
                    joinList(entry.reasonTags),
                    entry.timestamp.toISOString(),
                    entry.clicked ? 1 : 0
                );
            }
        });
    }
}
