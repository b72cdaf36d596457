/**
 * CatalogStore Contract
 *
 * The catalog store is the engine's only I/O boundary. It holds users,
 * content, the event log and the recommendation log, and answers the
 * point lookups and aggregate queries the engine needs.
 *
 * Design principles:
 * - Every call may suspend; scoring itself never does
 * - Writes that must be atomic are single calls (recordEvent,
 *   insertRecommendationLogs), so an implementation can wrap each in
 *   one transaction
 * - Aggregates come back already ordered where order matters (findPeers)
 */

import type {
    Content,
    EventType,
    LearningEvent,
    RecommendationLogEntry,
    User,
} from "./Catalog.js";

/**
 * Count of one user's events on one content item, grouped by type.
 */
export interface InteractionCountRow {
    readonly contentId: string;
    readonly eventType: string;
    readonly count: number;
}

/**
 * Another user who shares interaction history with the query user.
 */
export interface Peer {
    readonly userId: string;

    /**
     * Number of (query-user event, peer event) pairs on the same content,
     * any event type.
     */
    readonly sharedInteractions: number;
}

/**
 * A (user, content) pair on which the user has an event of a given type.
 */
export interface EngagementRow {
    readonly userId: string;
    readonly contentId: string;
}

/**
 * Options for recording an event.
 */
export interface RecordEventOptions {
    /** Popularity added per event when recomputing the content's score */
    readonly popularityPerEvent: number;
}

/**
 * CatalogStore interface.
 *
 * @example
 * ```typescript
 * const store: CatalogStore = new InMemoryCatalogStore({ users, content });
 *
 * const user = await store.getUser("user_1");
 * const peers = await store.findPeers("user_1", 10);
 * ```
 */
export interface CatalogStore {
    /** Point lookup; null when absent */
    getUser(userId: string): Promise<User | null>;

    /** Point lookup; null when absent */
    getContent(contentId: string): Promise<Content | null>;

    /** Every content item, in the store's natural enumeration order */
    listContent(): Promise<readonly Content[]>;

    /**
     * The user's events grouped by (content, event type).
     * Rows may reference content that no longer exists.
     */
    getInteractionCounts(userId: string): Promise<readonly InteractionCountRow[]>;

    /**
     * Up to `limit` other users ordered by shared interactions descending,
     * ties by user id ascending. Empty when the user has no events.
     */
    findPeers(userId: string, limit: number): Promise<readonly Peer[]>;

    /**
     * Distinct (user, content) pairs where one of `userIds` has an event
     * of one of `eventTypes`.
     */
    getEngagements(
        userIds: readonly string[],
        eventTypes: readonly EventType[]
    ): Promise<readonly EngagementRow[]>;

    /**
     * Append an event, set the user's lastActive to the event timestamp and
     * recompute the content's popularity from its full event count, as one
     * atomic write. The caller has already checked both references exist.
     */
    recordEvent(event: LearningEvent, options: RecordEventOptions): Promise<void>;

    /**
     * Persist a batch of log entries all-or-nothing.
     */
    insertRecommendationLogs(entries: readonly RecommendationLogEntry[]): Promise<void>;
}
