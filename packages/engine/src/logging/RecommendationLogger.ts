/**
 * @fileoverview Recommendation Logger
 *
 * Persists every served recommendation, with its score, reason tags and
 * the model version, for offline evaluation. The whole top-K list goes to
 * the store as one batch so a failure never leaves a partial log.
 *
 * Failure policy:
 * - strict (default): the failure propagates as LoggingFailureError and the
 *   request fails
 * - lenient: the failure is logged and reported, the response still goes out
 *
 * @module @studyrank/engine/logging/RecommendationLogger
 */

import { customAlphabet } from "nanoid";
import type { RecommendationLogEntry } from "../contracts/Catalog.js";
import type { CatalogStore } from "../contracts/CatalogStore.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { describeError, silentLogger } from "../contracts/Logger.js";
import type { ScoredCandidate } from "../contracts/Recommendation.js";
import { MODEL_VERSION } from "../contracts/Recommendation.js";
import { LoggingFailureError } from "../errors/RecommenderError.js";

export type LogFailurePolicy = "strict" | "lenient";

export const LOG_FAILURE_POLICIES: readonly LogFailurePolicy[] = ["strict", "lenient"];

export function isLogFailurePolicy(value: unknown): value is LogFailurePolicy {
    return LOG_FAILURE_POLICIES.some((policy) => policy === value);
}

/**
 * 16 characters of [a-z0-9].
 */
export const generateLogId: () => string = customAlphabet("abcdefghijklmnopqrstuvwxyz0123456789", 16);

/**
 * Outcome of logging one served list.
 */
export interface LogOutcome {
    /** Entries that were persisted (empty when a lenient failure occurred) */
    readonly entries: readonly RecommendationLogEntry[];

    readonly persisted: boolean;

    /** Failure message under the lenient policy */
    readonly error?: string;
}

/**
 * Recommendation logger configuration.
 */
export interface RecommendationLoggerConfig {
    readonly store: CatalogStore;

    /** Default "strict" */
    readonly policy?: LogFailurePolicy;

    readonly modelVersion?: string;

    readonly idGenerator?: () => string;

    readonly logger?: EngineLogger;
}

/**
 * Build the log entries for a ranked list, in rank order.
 */
export function buildLogEntries(
    userId: string,
    ranked: readonly ScoredCandidate[],
    timestamp: Date,
    modelVersion: string = MODEL_VERSION,
    idGenerator: () => string = generateLogId
): RecommendationLogEntry[] {
    return ranked.map((candidate) => ({
        logId     : idGenerator(),
        userId,
        contentId : candidate.content.contentId,
        score     : candidate.score,
        modelVersion,
        reasonTags: candidate.reasonTags,
        timestamp,
        clicked   : false,
    }));
}

/**
 * Recommendation logger.
 *
 * @example
 * ```typescript
 * const recLogger = new RecommendationLogger({ store, policy: "strict" });
 * await recLogger.logServed("user_1", ranked, new Date());
 * ```
 */
export class RecommendationLogger {
    private readonly store: CatalogStore;
    private readonly modelVersion: string;
    private readonly idGenerator: () => string;
    private readonly logger: EngineLogger;

    readonly policy: LogFailurePolicy;

    constructor(config: RecommendationLoggerConfig) {
        this.store        = config.store;
        this.policy       = config.policy ?? "strict";
        this.modelVersion = config.modelVersion ?? MODEL_VERSION;
        this.idGenerator  = config.idGenerator ?? generateLogId;
        this.logger       = config.logger ?? silentLogger;
    }

    /**
     * Persist one entry per ranked item in a single batch.
     *
     * @throws LoggingFailureError under the strict policy when the write fails
     */
    async logServed(
        userId: string,
        ranked: readonly ScoredCandidate[],
        timestamp: Date
    ): Promise<LogOutcome> {
        if (ranked.length === 0) {
            return { entries: [], persisted: true };
        }

        const entries = buildLogEntries(userId, ranked, timestamp, this.modelVersion, this.idGenerator);

        try {
            await this.store.insertRecommendationLogs(entries);
        }
        catch (error) {
            if (this.policy === "strict") {
                throw new LoggingFailureError(userId, entries.length, error);
            }

            const message = describeError(error);
            this.logger.error("Recommendation log write failed, serving unaudited response", {
                userId,
                entries: entries.length,
                error  : message,
            });
            return { entries: [], persisted: false, error: message };
        }

        this.logger.debug("Recommendations logged", {
            userId,
            entries: entries.length,
        });

        return { entries, persisted: true };
    }
}
