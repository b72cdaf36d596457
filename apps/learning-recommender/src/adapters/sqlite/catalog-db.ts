/**
 * Learning Catalog SQLite Database
 *
 * Owns the connection and schema of the catalog database and maps rows
 * to and from the engine's records.
 *
 * Storage conventions:
 * - Timestamps are ISO-8601 UTC strings, so text order is time order
 * - Interests, tags and reason tags are comma-joined lists
 * - Booleans are 0/1 integers
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import {
    isEventType,
    type Content,
    type LearningEvent,
    type User,
} from "@studyrank/engine";

const kMEMORY_PATH = ":memory:";

const kSCHEMA = `
    CREATE TABLE IF NOT EXISTS users (
        user_id     TEXT PRIMARY KEY,
        name        TEXT NOT NULL,
        email       TEXT NOT NULL,
        cohort_tag  TEXT NOT NULL,
        skill_level TEXT NOT NULL,
        interests   TEXT NOT NULL DEFAULT '',
        created_at  TEXT NOT NULL,
        last_active TEXT
    );

    CREATE TABLE IF NOT EXISTS content (
        content_id       TEXT PRIMARY KEY,
        title            TEXT NOT NULL,
        description      TEXT NOT NULL DEFAULT '',
        content_type     TEXT NOT NULL,
        difficulty       TEXT NOT NULL,
        tags             TEXT NOT NULL DEFAULT '',
        duration_minutes INTEGER NOT NULL DEFAULT 0,
        popularity_score REAL NOT NULL DEFAULT 0,
        created_at       TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS events (
        event_id   TEXT PRIMARY KEY,
        user_id    TEXT NOT NULL REFERENCES users(user_id),
        content_id TEXT NOT NULL REFERENCES content(content_id),
        event_type TEXT NOT NULL,
        value      REAL,
        session_id TEXT,
        timestamp  TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS recommendation_logs (
        log_id        TEXT PRIMARY KEY,
        user_id       TEXT NOT NULL,
        content_id    TEXT NOT NULL,
        score         REAL NOT NULL CHECK (score >= 0 AND score <= 1),
        model_version TEXT NOT NULL,
        reason_tags   TEXT NOT NULL CHECK (reason_tags <> ''),
        timestamp     TEXT NOT NULL,
        clicked       INTEGER NOT NULL DEFAULT 0
    );

    CREATE INDEX IF NOT EXISTS idx_events_user ON events(user_id);
    CREATE INDEX IF NOT EXISTS idx_events_content ON events(content_id);
    CREATE INDEX IF NOT EXISTS idx_events_timestamp ON events(timestamp);
    CREATE INDEX IF NOT EXISTS idx_recs_user ON recommendation_logs(user_id);
`;

/**
 * Raw user row from the database
 */
export interface UserRow {
    user_id: string;
    name: string;
    email: string;
    cohort_tag: string;
    skill_level: string;
    interests: string;
    created_at: string;
    last_active: string | null;
}

/**
 * Raw content row from the database
 */
export interface ContentRow {
    content_id: string;
    title: string;
    description: string;
    content_type: string;
    difficulty: string;
    tags: string;
    duration_minutes: number;
    popularity_score: number;
    created_at: string;
}

/**
 * Raw event row from the database
 */
export interface EventRow {
    event_id: string;
    user_id: string;
    content_id: string;
    event_type: string;
    value: number | null;
    session_id: string | null;
    timestamp: string;
}

export function splitList(value: string | null): string[] {
    return value ? value.split(",").filter((item) => item.length > 0) : [];
}

export function joinList(items: readonly string[]): string {
    return items.join(",");
}

export function rowToUser(row: UserRow): User {
    return {
        userId    : row.user_id,
        name      : row.name,
        email     : row.email,
        cohortTag : row.cohort_tag,
        skillLevel: row.skill_level,
        interests : splitList(row.interests),
        createdAt : new Date(row.created_at),
        lastActive: row.last_active ? new Date(row.last_active) : null,
    };
}

export function rowToContent(row: ContentRow): Content {
    return {
        contentId      : row.content_id,
        title          : row.title,
        description    : row.description,
        contentType    : row.content_type,
        difficulty     : row.difficulty,
        tags           : splitList(row.tags),
        durationMinutes: row.duration_minutes,
        popularityScore: row.popularity_score,
        createdAt      : new Date(row.created_at),
    };
}

/**
 * Convert an event row; rows with a type outside the known set are rejected.
 */
export function rowToEvent(row: EventRow): LearningEvent {
    const eventType = row.event_type;
    if (!isEventType(eventType)) {
        throw new Error(`Event ${row.event_id} has unknown type ${eventType}`);
    }

    return {
        eventId  : row.event_id,
        userId   : row.user_id,
        contentId: row.content_id,
        eventType,
        value    : row.value,
        sessionId: row.session_id,
        timestamp: new Date(row.timestamp),
    };
}

/**
 * Learning catalog database
 */
export class CatalogDatabase {
    private db: Database.Database | null = null;
    readonly dbPath: string;

    constructor(dbPath: string = kMEMORY_PATH) {
        this.dbPath = dbPath;
    }

    /**
     * Open the database connection and create missing tables
     */
    open(): Database.Database {
        if (this.db) {
            return this.db;
        }

        if (this.dbPath !== kMEMORY_PATH) {
            mkdirSync(dirname(this.dbPath), { recursive: true });
        }

        let db: Database.Database;
        try {
            db = new Database(this.dbPath);
        }
        catch (error) {
            if (error instanceof Error && error.message.includes("SQLITE_CANTOPEN")) {
                throw new Error(`Cannot open catalog database at ${this.dbPath}`, { cause: error });
            }
            throw error;
        }

        db.pragma("journal_mode = WAL");
        db.exec(kSCHEMA);

        this.db = db;
        return db;
    }

    /**
     * Close the database connection
     */
    close(): void {
        if (this.db) {
            this.db.close();
            this.db = null;
        }
    }

    /**
     * Open connection, opening it on first use
     */
    get connection(): Database.Database {
        return this.open();
    }

    /**
     * Run `fn` inside one transaction; any throw rolls everything back
     */
    transaction<T>(fn: () => T): T {
        return this.connection.transaction(fn)();
    }

    getUser(userId: string): User | null {
        const row = this.connection
            .prepare<[string], UserRow>("SELECT * FROM users WHERE user_id = ?")
            .get(userId);
        return row ? rowToUser(row) : null;
    }

    getContent(contentId: string): Content | null {
        const row = this.connection
            .prepare<[string], ContentRow>("SELECT * FROM content WHERE content_id = ?")
            .get(contentId);
        return row ? rowToContent(row) : null;
    }

    /**
     * Every content item in insertion order
     */
    listContent(): Content[] {
        return this.connection
            .prepare<[], ContentRow>("SELECT * FROM content ORDER BY rowid")
            .all()
            .map(rowToContent);
    }

    countUsers(): number {
        return this.count("users");
    }

    countContent(): number {
        return this.count("content");
    }

    countEvents(): number {
        return this.count("events");
    }

    insertUser(user: User): void {
        this.connection.prepare(`
            INSERT INTO users (user_id, name, email, cohort_tag, skill_level, interests, created_at, last_active)
            VALUES (?, ?, ?, ?, ?, ?, ?, ?)
        `).run(
            user.userId,
            user.name,
            user.email,
            user.cohortTag,
            user.skillLevel,
            joinList(user.interests),
            user.createdAt.toISOString(),
            user.lastActive ? user.lastActive.toISOString() : null
        );
    }

    insertContent(content: Content): void {
        this.connection.prepare(`
            INSERT INTO content (
                content_id, title, description, content_type, difficulty,
                tags, duration_minutes, popularity_score, created_at
            )
            VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
        `).run(
            content.contentId,
            content.title,
            content.description,
            content.contentType,
            content.difficulty,
            joinList(content.tags),
            content.durationMinutes,
            content.popularityScore,
            content.createdAt.toISOString()
        );
    }

    insertEvent(event: LearningEvent): void {
        this.connection.prepare(`
            INSERT INTO events (event_id, user_id, content_id, event_type, value, session_id, timestamp)
            VALUES (?, ?, ?, ?, ?, ?, ?)
        `).run(
            event.eventId,
            event.userId,
            event.contentId,
            event.eventType,
            event.value,
            event.sessionId,
            event.timestamp.toISOString()
        );
    }

    private count(table: "users" | "content" | "events"): number {
        const row = this.connection
            .prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`)
            .get();
        return row?.count ?? 0;
    }
}
