/**
 * Logger Contract
 *
 * Every engine component logs through this interface. Hosts pass their
 * own implementation; the console-backed default is used otherwise.
 */

/**
 * Logger interface for the engine and its components.
 */
export interface EngineLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Default console logger.
 */
export const consoleLogger: EngineLogger = {
    debug: (msg, data) => console.debug(`[DEBUG] ${msg}`, data ?? ""),
    info : (msg, data) => console.info(`[INFO] ${msg}`, data ?? ""),
    warn : (msg, data) => console.warn(`[WARN] ${msg}`, data ?? ""),
    error: (msg, data) => console.error(`[ERROR] ${msg}`, data ?? ""),
};

/**
 * Logger that discards everything.
 */
export const silentLogger: EngineLogger = {
    debug: () => undefined,
    info : () => undefined,
    warn : () => undefined,
    error: () => undefined,
};

/**
 * Wrap a logger so every message carries a component prefix and,
 * when given, the request trace ID.
 *
 * @example
 * ```typescript
 * const log = createScopedLogger(consoleLogger, "ranker", "tr_abc_123");
 * log.debug("Ranked", { count: 10 });
 * // [DEBUG] [ranker] Ranked { count: 10, traceId: "tr_abc_123" }
 * ```
 */
export function createScopedLogger(base: EngineLogger, scope: string, traceId?: string): EngineLogger {
    const withTrace = (data?: Record<string, unknown>): Record<string, unknown> | undefined => {
        if (traceId === undefined) {
            return data;
        }
        return { ...data, traceId };
    };

    return {
        debug: (msg, data) => base.debug(`[${scope}] ${msg}`, withTrace(data)),
        info : (msg, data) => base.info(`[${scope}] ${msg}`, withTrace(data)),
        warn : (msg, data) => base.warn(`[${scope}] ${msg}`, withTrace(data)),
        error: (msg, data) => base.error(`[${scope}] ${msg}`, withTrace(data)),
    };
}

/**
 * Render an unknown thrown value for a log record.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
