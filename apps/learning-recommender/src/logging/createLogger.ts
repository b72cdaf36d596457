/**
 * @fileoverview Application logger
 *
 * Writes engine and app log records to stderr so that stdout carries
 * only command output.
 *
 * @module logging/createLogger
 */

import type { EngineLogger } from "@studyrank/engine";
import type { LogLevel } from "../config/index.js";

const kLEVEL_RANK: Readonly<Record<LogLevel, number>> = {
    debug: 10,
    info : 20,
    warn : 30,
    error: 40,
};

export interface LoggerOptions {
    /** Lowest level written (default: info) */
    level?: LogLevel;

    /** Line sink (default: stderr) */
    write?: (line: string) => void;
}

function formatRecord(level: LogLevel, message: string, data?: Record<string, unknown>): string {
    const prefix = `[${level.toUpperCase()}] ${message}`;
    if (data === undefined || Object.keys(data).length === 0) {
        return prefix;
    }
    return `${prefix} ${JSON.stringify(data)}`;
}

/**
 * Create a leveled logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: "debug" });
 * logger.info("Seeded catalog", { users: 100 });
 * // [INFO] Seeded catalog {"users":100}
 * ```
 */
export function createLogger(options: LoggerOptions = {}): EngineLogger {
    const threshold = kLEVEL_RANK[options.level ?? "info"];
    const write = options.write ?? ((line: string) => {
        process.stderr.write(`${line}\n`);
    });

    const at = (level: LogLevel) => (message: string, data?: Record<string, unknown>): void => {
        if (kLEVEL_RANK[level] >= threshold) {
            write(formatRecord(level, message, data));
        }
    };

    return {
        debug: at("debug"),
        info : at("info"),
        warn : at("warn"),
        error: at("error"),
    };
}
