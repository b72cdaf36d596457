/**
 * @fileoverview Application wiring
 *
 * Builds the engine over the SQLite catalog and relays engine
 * notifications to the application log.
 *
 * @module app
 */

import {
    InMemoryEventBus,
    RecommendationEngine,
    createSeededRandom,
    systemRandom,
    type EngineLogger,
    type EventBus,
} from "@studyrank/engine";
import { CatalogDatabase, SqliteCatalogStore } from "./adapters/sqlite/index.js";
import type { RecommenderConfig } from "./config/index.js";
import { AnalyticsService } from "./domain/index.js";

/**
 * Everything a command needs, opened once per invocation.
 */
export interface AppContext {
    config: RecommenderConfig;
    logger: EngineLogger;
    database: CatalogDatabase;
    engine: RecommendationEngine;
    analytics: AnalyticsService;
    close(): void;
}

export interface AppContextOptions {
    /** Pins exploration jitter for reproducible runs */
    randomSeed?: number;
}

/**
 * Log every engine notification.
 */
export function attachNotificationLog(eventBus: EventBus, logger: EngineLogger): void {
    eventBus.subscribe("recommendation:served", (event) => {
        logger.info("[RECOMMENDATION] Served", { ...event.data, traceId: event.traceId });
    });

    eventBus.subscribe("event:ingested", (event) => {
        logger.info("[EVENT] Ingested", { ...event.data, traceId: event.traceId });
    });

    eventBus.subscribe("recommendation:logFailed", (event) => {
        logger.warn("[RECOMMENDATION] Served without audit log", { ...event.data, traceId: event.traceId });
    });

    eventBus.subscribe("peers:degraded", (event) => {
        logger.warn("[PEERS] Degraded to content signals", { ...event.data, traceId: event.traceId });
    });

    eventBus.subscribe("catalog:dataIntegrity", (event) => {
        logger.warn("[CATALOG] Integrity problem", { ...event.data, traceId: event.traceId });
    });
}

/**
 * Open the catalog database and build the engine around it.
 */
export function createAppContext(
    config: RecommenderConfig,
    logger: EngineLogger,
    options: AppContextOptions = {}
): AppContext {
    const database = new CatalogDatabase(config.database.path);
    database.open();

    const engine = new RecommendationEngine({
        store             : new SqliteCatalogStore(database),
        eventBus          : new InMemoryEventBus(logger),
        logger,
        random            : options.randomSeed === undefined ? systemRandom : createSeededRandom(options.randomSeed),
        weights           : config.recommendations.weights,
        logPolicy         : config.recommendations.logPolicy,
        peerLimit         : config.recommendations.peerLimit,
        popularityPerEvent: config.recommendations.popularityPerEvent,
    });

    attachNotificationLog(engine.eventBus, logger);

    return {
        config,
        logger,
        database,
        engine,
        analytics: new AnalyticsService(database),
        close    : () => database.close(),
    };
}
