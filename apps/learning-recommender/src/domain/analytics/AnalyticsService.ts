/**
 * @fileoverview Analytics Service
 *
 * Read-only projections over the catalog database: system-wide and
 * per-learner engagement figures, health counts and paged listings.
 * Time windows are computed against a caller-supplied `now`.
 *
 * @module domain/analytics/AnalyticsService
 */

import {
    MODEL_VERSION,
    NotFoundError,
    type Content,
    type LearningEvent,
} from "@studyrank/engine";
import {
    rowToContent,
    rowToEvent,
    rowToUser,
    splitList,
    type CatalogDatabase,
    type ContentRow,
    type EventRow,
    type UserRow,
} from "../../adapters/sqlite/index.js";

const kMS_PER_HOUR = 60 * 60 * 1000;
const kMS_PER_DAY = 24 * kMS_PER_HOUR;

const kPOPULAR_CONTENT_LIMIT = 10;
const kPREFERRED_TOPIC_LIMIT = 5;
const kTREND_DAYS = 7;

export interface PopularContent {
    contentId: string;
    title: string;
    contentType: string;
    interactionCount: number;
}

export interface SystemAnalytics {
    totalUsers: number;
    totalContent: number;
    totalEvents: number;

    /** Distinct users with an event in the last 24 hours */
    activeUsers24h: number;

    /** Most interacted content over the last 7 days */
    popularContent: PopularContent[];

    /** Event type → count, over all time */
    eventDistribution: Record<string, number>;

    /** Distinct completers ÷ distinct active users; 0 without events */
    engagementRate: number;
}

export interface ActivityPoint {
    /** UTC calendar day, YYYY-MM-DD */
    date: string;
    count: number;
}

export interface UserAnalytics {
    userId: string;
    totalEvents: number;
    contentViewed: number;
    contentCompleted: number;

    /** Mean quiz_score value; 0 when the user took no quiz */
    avgQuizScore: number;

    preferredTopics: string[];
    activityTrend: ActivityPoint[];
}

export interface HealthReport {
    status: "healthy";
    modelVersion: string;
    users: number;
    content: number;
    events: number;
}

export interface UserSummary {
    userId: string;
    name: string;
    email: string;
    cohortTag: string;
    skillLevel: string;
    interests: string[];
    eventCount: number;
}

export interface RecentEvent extends LearningEvent {
    userName: string;
    contentTitle: string;
}

export interface PageOptions {
    limit?: number;
    offset?: number;
}

export interface ContentFilter extends PageOptions {
    difficulty?: string;
    contentType?: string;
}

const kDEFAULT_PAGE_SIZE = 100;

function pageOf(options: PageOptions): { limit: number; offset: number } {
    const limit = options.limit ?? kDEFAULT_PAGE_SIZE;
    const offset = options.offset ?? 0;

    if (!Number.isInteger(limit) || limit < 1) {
        throw new Error(`limit must be a positive integer, got ${limit}`);
    }
    if (!Number.isInteger(offset) || offset < 0) {
        throw new Error(`offset must be a non-negative integer, got ${offset}`);
    }
    return { limit, offset };
}

function isoBefore(now: Date, ms: number): string {
    return new Date(now.getTime() - ms).toISOString();
}

/**
 * Analytics read projections.
 *
 * @example
 * ```typescript
 * const analytics = new AnalyticsService(database);
 * const summary = analytics.getSystemAnalytics(new Date());
 * console.log(summary.engagementRate);
 * ```
 */
export class AnalyticsService {
    constructor(private readonly database: CatalogDatabase) {}

    getSystemAnalytics(now: Date): SystemAnalytics {
        const db = this.database.connection;
        const lastDay = isoBefore(now, kMS_PER_DAY);
        const lastWeek = isoBefore(now, kTREND_DAYS * kMS_PER_DAY);

        const active = db.prepare<[string], { count: number }>(`
            SELECT COUNT(DISTINCT user_id) AS count
            FROM events
            WHERE timestamp > ?
        `).get(lastDay);

        const popularContent = db.prepare<[string, number], PopularContent>(`
            SELECT
                c.content_id AS contentId,
                c.title AS title,
                c.content_type AS contentType,
                COUNT(*) AS interactionCount
            FROM events e
            JOIN content c ON e.content_id = c.content_id
            WHERE e.timestamp > ?
            GROUP BY c.content_id
            ORDER BY interactionCount DESC, c.content_id ASC
            LIMIT ?
        `).all(lastWeek, kPOPULAR_CONTENT_LIMIT);

        const eventDistribution: Record<string, number> = {};
        const distribution = db.prepare<[], { event_type: string; count: number }>(`
            SELECT event_type, COUNT(*) AS count
            FROM events
            GROUP BY event_type
            ORDER BY event_type
        `).all();
        for (const row of distribution) {
            eventDistribution[row.event_type] = row.count;
        }

        const engagement = db.prepare<[], { completers: number; actives: number }>(`
            SELECT
                COUNT(DISTINCT CASE WHEN event_type = 'complete' THEN user_id END) AS completers,
                COUNT(DISTINCT user_id) AS actives
            FROM events
        `).get();

        const actives = engagement?.actives ?? 0;

        return {
            totalUsers    : this.database.countUsers(),
            totalContent  : this.database.countContent(),
            totalEvents   : this.database.countEvents(),
            activeUsers24h: active?.count ?? 0,
            popularContent,
            eventDistribution,
            engagementRate: actives > 0 ? (engagement?.completers ?? 0) / actives : 0,
        };
    }

    /**
     * @throws NotFoundError when the user does not exist
     */
    getUserAnalytics(userId: string, now: Date): UserAnalytics {
        if (!this.database.getUser(userId)) {
            throw new NotFoundError("user", userId);
        }

        const db = this.database.connection;

        const totals = db.prepare<[string], {
            total: number;
            viewed: number;
            completed: number;
            avg_quiz: number | null;
        }>(`
            SELECT
                COUNT(*) AS total,
                COUNT(DISTINCT CASE WHEN event_type = 'view' THEN content_id END) AS viewed,
                COUNT(DISTINCT CASE WHEN event_type = 'complete' THEN content_id END) AS completed,
                AVG(CASE WHEN event_type = 'quiz_score' THEN value END) AS avg_quiz
            FROM events
            WHERE user_id = ?
        `).get(userId);

        const activityTrend = db.prepare<[string, string], ActivityPoint>(`
            SELECT substr(timestamp, 1, 10) AS date, COUNT(*) AS count
            FROM events
            WHERE user_id = ? AND timestamp > ?
            GROUP BY date
            ORDER BY date
        `).all(userId, isoBefore(now, kTREND_DAYS * kMS_PER_DAY));

        return {
            userId,
            totalEvents     : totals?.total ?? 0,
            contentViewed   : totals?.viewed ?? 0,
            contentCompleted: totals?.completed ?? 0,
            avgQuizScore    : totals?.avg_quiz ?? 0,
            preferredTopics : this.preferredTopics(userId),
            activityTrend,
        };
    }

    getHealth(): HealthReport {
        return {
            status      : "healthy",
            modelVersion: MODEL_VERSION,
            users       : this.database.countUsers(),
            content     : this.database.countContent(),
            events      : this.database.countEvents(),
        };
    }

    /**
     * Users ordered by event count descending, then user id.
     */
    listUsers(options: PageOptions = {}): UserSummary[] {
        const { limit, offset } = pageOf(options);

        const rows = this.database.connection.prepare<[number, number], UserRow & { event_count: number }>(`
            SELECT u.*, COUNT(e.event_id) AS event_count
            FROM users u
            LEFT JOIN events e ON u.user_id = e.user_id
            GROUP BY u.user_id
            ORDER BY event_count DESC, u.user_id ASC
            LIMIT ? OFFSET ?
        `).all(limit, offset);

        return rows.map((row) => {
            const user = rowToUser(row);
            return {
                userId    : user.userId,
                name      : user.name,
                email     : user.email,
                cohortTag : user.cohortTag,
                skillLevel: user.skillLevel,
                interests : [...user.interests],
                eventCount: row.event_count,
            };
        });
    }

    /**
     * Content ordered by popularity descending, then content id.
     */
    listContent(filter: ContentFilter = {}): Content[] {
        const { limit, offset } = pageOf(filter);
        const conditions: string[] = [];
        const params: (string | number)[] = [];

        if (filter.difficulty) {
            conditions.push("difficulty = ?");
            params.push(filter.difficulty);
        }

        if (filter.contentType) {
            conditions.push("content_type = ?");
            params.push(filter.contentType);
        }

        const whereClause = conditions.length > 0
            ? `WHERE ${conditions.join(" AND ")}`
            : "";

        const rows = this.database.connection.prepare<(string | number)[], ContentRow>(`
            SELECT *
            FROM content
            ${whereClause}
            ORDER BY popularity_score DESC, content_id ASC
            LIMIT ? OFFSET ?
        `).all(...params, limit, offset);

        return rows.map(rowToContent);
    }

    /**
     * Most recent events with the learner's name and the content title.
     */
    recentEvents(limit: number = kDEFAULT_PAGE_SIZE): RecentEvent[] {
        const page = pageOf({ limit });

        const rows = this.database.connection.prepare<[number], EventRow & { user_name: string; content_title: string }>(`
            SELECT e.*, u.name AS user_name, c.title AS content_title
            FROM events e
            JOIN users u ON e.user_id = u.user_id
            JOIN content c ON e.content_id = c.content_id
            ORDER BY e.timestamp DESC, e.rowid DESC
            LIMIT ?
        `).all(page.limit);

        return rows.map((row) => ({
            ...rowToEvent(row),
            userName    : row.user_name,
            contentTitle: row.content_title,
        }));
    }

    /**
     * Tags of the content the user interacted with, weighted by event count.
     */
    private preferredTopics(userId: string): string[] {
        const rows = this.database.connection.prepare<[string], { tags: string; count: number }>(`
            SELECT c.tags AS tags, COUNT(*) AS count
            FROM events e
            JOIN content c ON e.content_id = c.content_id
            WHERE e.user_id = ?
            GROUP BY c.tags
        `).all(userId);

        const tagCounts = new Map<string, number>();
        for (const row of rows) {
            for (const tag of splitList(row.tags)) {
                tagCounts.set(tag, (tagCounts.get(tag) ?? 0) + row.count);
            }
        }

        return Array.from(tagCounts)
            .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
            .slice(0, kPREFERRED_TOPIC_LIMIT)
            .map(([tag]) => tag);
    }
}
