/**
 * @fileoverview RecommendationEngine
 *
 * The orchestration engine behind the serving facade.
 *
 * Recommendation pipeline:
 * 1. Validate the request, load the user (NotFound otherwise)
 * 2. Load the user's interaction history and the catalog
 * 3. Load the peer signal (collaborative and hybrid strategies)
 * 4. Extract features and score every candidate not yet completed
 * 5. Rank and cut to top-K
 * 6. Log the served list in one batch, before returning
 * 7. Emit recommendation:served
 *
 * Event ingestion:
 * 1. Validate, check both references exist (NotFound otherwise)
 * 2. Record the event, touch lastActive and recompute popularity atomically
 * 3. Emit event:ingested
 *
 * Design principles:
 * - Suspends only on catalog store calls; scoring and ranking are synchronous
 * - No shared mutable state across requests besides the store
 * - Randomness, time and ids are injected so tests can pin them
 * - Observable: emits events for the facade to relay
 *
 * @module @studyrank/engine/engine/RecommendationEngine
 */

import type { Content, LearningEvent, User } from "../contracts/Catalog.js";
import { isEventType } from "../contracts/Catalog.js";
import type { CatalogStore, InteractionCountRow } from "../contracts/CatalogStore.js";
import type { EngineEvent, EngineEventType, EventBus } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { consoleLogger, createScopedLogger } from "../contracts/Logger.js";
import type { RandomSource } from "../contracts/RandomSource.js";
import { systemRandom } from "../contracts/RandomSource.js";
import type {
    EventInput,
    EventReceipt,
    RecommendationRequest,
    RecommendationResponse,
    ScoredCandidate,
    Strategy,
} from "../contracts/Recommendation.js";
import {
    DEFAULT_STRATEGY,
    MODEL_VERSION,
    isStrategy,
    toRecommendationItem,
} from "../contracts/Recommendation.js";
import {
    DataIntegrityError,
    InvalidRequestError,
    NotFoundError,
} from "../errors/RecommenderError.js";
import type { InteractionHistory } from "../features/FeatureExtractor.js";
import {
    buildInteractionHistory,
    extractFeatures,
    isCompleted,
} from "../features/FeatureExtractor.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import type { LogFailurePolicy } from "../logging/RecommendationLogger.js";
import { RecommendationLogger, generateLogId } from "../logging/RecommendationLogger.js";
import { DEFAULT_PEER_LIMIT, EMPTY_PEER_SIGNAL, PeerFinder } from "../peers/PeerFinder.js";
import type { PeerSignal } from "../peers/PeerFinder.js";
import { rankCandidates, validateK } from "../ranking/Ranker.js";
import type { ScoringWeights } from "../scoring/ScoringEngine.js";
import { resolveScoringWeights, scoreCandidate, usesPeerSignal } from "../scoring/ScoringEngine.js";

/** Popularity added per event on recompute */
export const DEFAULT_POPULARITY_PER_EVENT = 0.01;

/**
 * Engine configuration options.
 */
export interface EngineConfig {
    /** Catalog store (required) */
    readonly store: CatalogStore;

    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Logger for engine operations */
    readonly logger?: EngineLogger;

    /** Exploration jitter source (default: Math.random) */
    readonly random?: RandomSource;

    /** Current time (default: new Date()) */
    readonly clock?: () => Date;

    /** Event and log entry ids (default: 16 chars of [a-z0-9]) */
    readonly idGenerator?: () => string;

    /** Overrides of the scoring weights */
    readonly weights?: Partial<ScoringWeights>;

    /** Recommendation log failure policy (default: strict) */
    readonly logPolicy?: LogFailurePolicy;

    /** Maximum peers considered (default: 10) */
    readonly peerLimit?: number;

    /** Popularity added per event (default: 0.01) */
    readonly popularityPerEvent?: number;
}

/**
 * Generate a unique trace ID for one request.
 */
function generateTraceId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `tr_${timestamp}_${random}`;
}

/**
 * RecommendationEngine - scores, ranks and logs recommendations and
 * ingests interaction events.
 *
 * @example
 * ```typescript
 * const engine = new RecommendationEngine({ store });
 *
 * engine.eventBus.subscribe("recommendation:served", (event) => {
 *     relay.broadcast({ type: "recommendation", ...event.data });
 * });
 *
 * const response = await engine.recommend({ userId: "user_1", k: 5, strategy: "hybrid" });
 * ```
 */
export class RecommendationEngine {
    private readonly config: {
        store: CatalogStore;
        logger: EngineLogger;
        random: RandomSource;
        clock: () => Date;
        idGenerator: () => string;
        weights: ScoringWeights;
        logPolicy: LogFailurePolicy;
        peerLimit: number;
        popularityPerEvent: number;
    };

    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    constructor(config: EngineConfig) {
        this.eventBus = config.eventBus ?? new InMemoryEventBus();

        this.config = {
            store             : config.store,
            logger            : config.logger ?? consoleLogger,
            random            : config.random ?? systemRandom,
            clock             : config.clock ?? (() => new Date()),
            idGenerator       : config.idGenerator ?? generateLogId,
            weights           : resolveScoringWeights(config.weights),
            logPolicy         : config.logPolicy ?? "strict",
            peerLimit         : config.peerLimit ?? DEFAULT_PEER_LIMIT,
            popularityPerEvent: config.popularityPerEvent ?? DEFAULT_POPULARITY_PER_EVENT,
        };
    }

    /**
     * Effective scoring weights.
     */
    get weights(): ScoringWeights {
        return this.config.weights;
    }

    /**
     * Produce a ranked, logged top-K list for a user.
     *
     * @throws InvalidRequestError for a bad k or strategy
     * @throws NotFoundError when the user does not exist
     * @throws LoggingFailureError when logging fails under the strict policy
     */
    async recommend(request: RecommendationRequest): Promise<RecommendationResponse> {
        const startTime = Date.now();
        const traceId = generateTraceId();
        const logger = createScopedLogger(this.config.logger, "recommend", traceId);

        const k = validateK(request.k);
        const strategy = this.resolveStrategy(request.strategy);

        const user = await this.config.store.getUser(request.userId);
        if (!user) {
            throw new NotFoundError("user", request.userId);
        }

        const now = this.config.clock();
        const historyRows = await this.config.store.getInteractionCounts(user.userId);
        const catalog = await this.config.store.listContent();

        const contentIds = new Set(catalog.map((content) => content.contentId));
        const history = buildInteractionHistory(this.dropDanglingRows(user, historyRows, contentIds, traceId));

        const peerSignal = usesPeerSignal(strategy)
            ? await this.loadPeerSignal(user.userId, logger, traceId)
            : EMPTY_PEER_SIGNAL;

        const scored = this.scoreCatalog(user, catalog, history, strategy, peerSignal, now);
        const ranked = rankCandidates(scored, k);

        logger.debug("Candidates ranked", {
            userId    : user.userId,
            catalog   : catalog.length,
            candidates: scored.length,
            returned  : ranked.length,
            strategy,
        });

        const recLogger = new RecommendationLogger({
            store       : this.config.store,
            policy      : this.config.logPolicy,
            modelVersion: MODEL_VERSION,
            idGenerator : this.config.idGenerator,
            logger      : createScopedLogger(this.config.logger, "recommendation-log", traceId),
        });
        const outcome = await recLogger.logServed(user.userId, ranked, now);

        if (!outcome.persisted) {
            this.emit(createEvent("recommendation:logFailed", {
                userId: user.userId,
                count : ranked.length,
                error : outcome.error,
            }, traceId, now));
        }

        const latencyMs = Date.now() - startTime;

        this.emit(createEvent("recommendation:served", {
            userId      : user.userId,
            count       : ranked.length,
            strategy,
            modelVersion: MODEL_VERSION,
        }, traceId, now));

        logger.info("Recommendations served", {
            userId: user.userId,
            count : ranked.length,
            strategy,
            latencyMs,
        });

        return {
            userId         : user.userId,
            recommendations: ranked.map(toRecommendationItem),
            modelVersion   : MODEL_VERSION,
            latencyMs,
            strategy,
        };
    }

    /**
     * Record an interaction event.
     *
     * @throws InvalidRequestError for an unknown event type or non-finite value
     * @throws NotFoundError when the user or the content does not exist
     */
    async ingestEvent(input: EventInput): Promise<EventReceipt> {
        const traceId = generateTraceId();
        const logger = createScopedLogger(this.config.logger, "ingest", traceId);

        const eventType = input.eventType;
        if (!isEventType(eventType)) {
            throw new InvalidRequestError("eventType", `Unknown event type: ${eventType}`);
        }

        const value = input.value ?? null;
        if (value !== null && !Number.isFinite(value)) {
            throw new InvalidRequestError("value", `Event value must be a finite number, got ${value}`);
        }

        const user = await this.config.store.getUser(input.userId);
        if (!user) {
            throw new NotFoundError("user", input.userId);
        }

        const content = await this.config.store.getContent(input.contentId);
        if (!content) {
            throw new NotFoundError("content", input.contentId);
        }

        const event: LearningEvent = {
            eventId  : this.config.idGenerator(),
            userId   : user.userId,
            contentId: content.contentId,
            eventType,
            value,
            sessionId: input.sessionId ?? null,
            timestamp: this.config.clock(),
        };

        await this.config.store.recordEvent(event, {
            popularityPerEvent: this.config.popularityPerEvent,
        });

        this.emit(createEvent("event:ingested", {
            eventId  : event.eventId,
            eventType: event.eventType,
            userId   : event.userId,
            contentId: event.contentId,
        }, traceId, event.timestamp));

        logger.debug("Event recorded", {
            eventId  : event.eventId,
            eventType: event.eventType,
            userId   : event.userId,
            contentId: event.contentId,
        });

        return {
            eventId  : event.eventId,
            status   : "success",
            timestamp: event.timestamp.toISOString(),
        };
    }

    /**
     * Score every catalog item the user has not completed, in catalog order.
     */
    private scoreCatalog(
        user: User,
        catalog: readonly Content[],
        history: InteractionHistory,
        strategy: Strategy,
        peerSignal: PeerSignal,
        now: Date
    ): ScoredCandidate[] {
        const scored: ScoredCandidate[] = [];

        for (const content of catalog) {
            if (isCompleted(history, content.contentId)) {
                continue;
            }

            scored.push(scoreCandidate(extractFeatures(user, content, now), {
                strategy,
                peerSignal,
                random : this.config.random,
                weights: this.config.weights,
            }));
        }

        return scored;
    }

    /**
     * Drop history rows whose content no longer exists, reporting each.
     */
    private dropDanglingRows(
        user: User,
        rows: readonly InteractionCountRow[],
        contentIds: ReadonlySet<string>,
        traceId: string
    ): InteractionCountRow[] {
        const kept: InteractionCountRow[] = [];

        for (const row of rows) {
            if (contentIds.has(row.contentId)) {
                kept.push(row);
                continue;
            }

            const integrityError = new DataIntegrityError(
                `History of user ${user.userId} references missing content ${row.contentId}`,
                { userId: user.userId, contentId: row.contentId, eventType: row.eventType }
            );

            this.config.logger.warn(integrityError.message, {
                code: integrityError.code,
                ...integrityError.details,
                traceId,
            });

            this.emit(createEvent("catalog:dataIntegrity", {
                code     : integrityError.code,
                userId   : user.userId,
                contentId: row.contentId,
                eventType: row.eventType,
            }, traceId));
        }

        return kept;
    }

    private async loadPeerSignal(userId: string, logger: EngineLogger, traceId: string): Promise<PeerSignal> {
        const finder = new PeerFinder({
            store : this.config.store,
            limit : this.config.peerLimit,
            logger,
        });

        return finder.loadPeerSignal(userId, (reason) => {
            this.emit(createEvent("peers:degraded", { userId, error: reason }, traceId));
        });
    }

    private resolveStrategy(strategy: unknown): Strategy {
        if (strategy === undefined) {
            return DEFAULT_STRATEGY;
        }
        if (!isStrategy(strategy)) {
            throw new InvalidRequestError(
                "strategy",
                `strategy must be one of collaborative, content_based, hybrid, got ${String(strategy)}`
            );
        }
        return strategy;
    }

    /**
     * Emit an event to the event bus.
     */
    private emit<K extends EngineEventType>(event: EngineEvent<K>): void {
        this.eventBus.emit(event);
    }
}
