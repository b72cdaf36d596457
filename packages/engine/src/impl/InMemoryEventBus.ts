/**
 * @fileoverview In-Memory EventBus
 *
 * @module @studyrank/engine/impl/InMemoryEventBus
 */

import {
    isEventOf,
    type EngineEvent,
    type EngineEventHandler,
    type EngineEventType,
    type EventBus,
    type Subscription,
} from "../contracts/EventBus.js";
import { consoleLogger, describeError, type EngineLogger } from "../contracts/Logger.js";

const kALL = "*";

type HandlerKey = EngineEventType | typeof kALL;

/**
 * Synchronous EventBus held in process memory.
 *
 * A handler that throws, or returns a promise that rejects, is reported
 * through the logger; the emitter and the remaining handlers carry on.
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus(logger);
 *
 * bus.subscribe("event:ingested", (event) => {
 *     console.log(event.data.eventType);
 * });
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private readonly handlers = new Map<HandlerKey, Set<EngineEventHandler>>();

    constructor(private readonly logger: EngineLogger = consoleLogger) {}

    emit<K extends EngineEventType>(event: EngineEvent<K>): void {
        for (const key of [event.type, kALL] as const) {
            const registered = this.handlers.get(key);
            if (!registered) {
                continue;
            }
            // Snapshot: once() handlers remove themselves mid-dispatch
            for (const handler of [...registered]) {
                this.dispatch(handler, event, key);
            }
        }
    }

    subscribe<K extends EngineEventType>(eventType: K, handler: EngineEventHandler<K>): Subscription {
        return this.register(eventType, (event) => {
            if (isEventOf(eventType, event)) {
                return handler(event);
            }
        });
    }

    subscribeAll(handler: EngineEventHandler): Subscription {
        return this.register(kALL, handler);
    }

    once<K extends EngineEventType>(eventType: K, handler: EngineEventHandler<K>): Subscription {
        const subscription = this.subscribe(eventType, (event) => {
            subscription.unsubscribe();
            return handler(event);
        });
        return subscription;
    }

    clear(eventType?: EngineEventType): void {
        if (eventType === undefined) {
            this.handlers.clear();
        }
        else {
            this.handlers.delete(eventType);
        }
    }

    /**
     * Handlers currently registered for a type, or for every type with "*".
     */
    handlerCount(key: HandlerKey): number {
        return this.handlers.get(key)?.size ?? 0;
    }

    private register(key: HandlerKey, handler: EngineEventHandler): Subscription {
        const registered = this.handlers.get(key) ?? new Set<EngineEventHandler>();
        registered.add(handler);
        this.handlers.set(key, registered);

        return {
            unsubscribe: () => {
                const current = this.handlers.get(key);
                current?.delete(handler);
                if (current?.size === 0) {
                    this.handlers.delete(key);
                }
            },
        };
    }

    private dispatch(handler: EngineEventHandler, event: EngineEvent, subscribedTo: HandlerKey): void {
        const report = (error: unknown): void => {
            this.logger.error("EventBus handler error", {
                eventType: event.type,
                subscribedTo,
                error    : describeError(error),
            });
        };

        try {
            const result = handler(event);
            if (result instanceof Promise) {
                result.catch(report);
            }
        }
        catch (error) {
            report(error);
        }
    }
}
