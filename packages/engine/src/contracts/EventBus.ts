/**
 * @fileoverview EventBus Contract
 *
 * Notifications the engine publishes for the serving facade. Each
 * notification type carries its own payload shape, declared once in
 * {@link EngineEventMap}; emitters and typed subscribers share it.
 *
 * Dispatch is synchronous and the engine never awaits a subscriber.
 *
 * @module @studyrank/engine/contracts/EventBus
 */

import type { EventType } from "./Catalog.js";
import type { Strategy } from "./Recommendation.js";

/**
 * Payload per notification type.
 */
export interface EngineEventMap {
    "recommendation:served": {
        userId: string;
        count: number;
        strategy: Strategy;
        modelVersion: string;
    };

    /** Lenient policy only; the response went out without its log rows */
    "recommendation:logFailed": {
        userId: string;
        count: number;
        error?: string;
    };

    "event:ingested": {
        eventId: string;
        eventType: EventType;
        userId: string;
        contentId: string;
    };

    /** A history row pointed at content the catalog no longer has */
    "catalog:dataIntegrity": {
        code: string;
        userId: string;
        contentId: string;
        eventType: string;
    };

    "peers:degraded": {
        userId: string;
        error: string;
    };
}

export type EngineEventType = keyof EngineEventMap;

export interface EngineEvent<K extends EngineEventType = EngineEventType> {
    readonly type: K;

    /** ISO emission time */
    readonly timestamp: string;

    /** Request trace the notification belongs to */
    readonly traceId?: string;

    readonly data: EngineEventMap[K];
}

export type EngineEventHandler<K extends EngineEventType = EngineEventType> =
    (event: EngineEvent<K>) => void | Promise<void>;

export interface Subscription {
    unsubscribe(): void;
}

/**
 * Notification channel between the engine and its host.
 *
 * @example
 * ```typescript
 * const sub = engine.eventBus.subscribe("recommendation:served", (event) => {
 *     relay.send({ type: "recommendation", userId: event.data.userId });
 * });
 *
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    emit<K extends EngineEventType>(event: EngineEvent<K>): void;

    /** Handlers of one type run in subscription order */
    subscribe<K extends EngineEventType>(eventType: K, handler: EngineEventHandler<K>): Subscription;

    /** Receives every notification, after the typed handlers */
    subscribeAll(handler: EngineEventHandler): Subscription;

    /** Unsubscribes itself after the first delivery */
    once<K extends EngineEventType>(eventType: K, handler: EngineEventHandler<K>): Subscription;

    /** Drop one type's handlers, or every handler when called without a type */
    clear(eventType?: EngineEventType): void;
}

/**
 * Build a notification stamped with its emission time.
 */
export function createEvent<K extends EngineEventType>(
    type: K,
    data: EngineEventMap[K],
    traceId?: string,
    now: Date = new Date()
): EngineEvent<K> {
    return {
        type,
        timestamp: now.toISOString(),
        traceId,
        data,
    };
}

export function isEventOf<K extends EngineEventType>(type: K, event: EngineEvent): event is EngineEvent<K> {
    return event.type === type;
}
