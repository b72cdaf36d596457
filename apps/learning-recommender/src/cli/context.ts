/**
 * Shared CLI plumbing: global options, per-command app context and
 * JSON output.
 */

import { InvalidArgumentError, type Command } from "commander";
import { createAppContext, type AppContext } from "../app.js";
import {
    applyEnvOverrides,
    loadConfig,
    loadConfigWithFallback,
    type RecommenderConfig,
} from "../config/index.js";
import { createLogger } from "../logging/createLogger.js";

/**
 * Options accepted by every command.
 */
export interface GlobalOptions {
    config?: string;
    db?: string;
    verbose?: boolean;
    randomSeed?: number;
}

export interface CliDeps {
    /** Open the database and engine for one command */
    openContext(globals: GlobalOptions): AppContext;

    /** Command output sink */
    write(text: string): void;

    now(): Date;
}

export function parseInteger(value: string): number {
    const parsed = Number(value);
    if (value.trim() === "" || !Number.isInteger(parsed)) {
        throw new InvalidArgumentError("Not an integer.");
    }
    return parsed;
}

export function parsePositiveInteger(value: string): number {
    const parsed = parseInteger(value);
    if (parsed < 1) {
        throw new InvalidArgumentError("Must be at least 1.");
    }
    return parsed;
}

export function parseNonNegativeInteger(value: string): number {
    const parsed = parseInteger(value);
    if (parsed < 0) {
        throw new InvalidArgumentError("Must not be negative.");
    }
    return parsed;
}

export function parseNumber(value: string): number {
    const parsed = Number(value);
    if (value.trim() === "" || !Number.isFinite(parsed)) {
        throw new InvalidArgumentError("Not a number.");
    }
    return parsed;
}

/**
 * Read the program-level options as seen from a subcommand.
 */
export function readGlobals(command: Command): GlobalOptions {
    const raw: Record<string, unknown> = command.optsWithGlobals();

    return {
        config    : typeof raw.config === "string" ? raw.config : undefined,
        db        : typeof raw.db === "string" ? raw.db : undefined,
        verbose   : raw.verbose === true,
        randomSeed: typeof raw.randomSeed === "number" ? raw.randomSeed : undefined,
    };
}

/**
 * Config file (or defaults), then environment, then command-line flags.
 */
export function resolveConfig(globals: GlobalOptions, env: NodeJS.ProcessEnv = process.env): RecommenderConfig {
    const fileConfig = globals.config ? loadConfig(globals.config) : loadConfigWithFallback();
    const config = applyEnvOverrides(fileConfig, env);

    return {
        ...config,
        database: { path: globals.db ?? config.database.path },
        logging : { level: globals.verbose ? "debug" : config.logging.level },
    };
}

export function openDefaultContext(globals: GlobalOptions): AppContext {
    const config = resolveConfig(globals);
    const logger = createLogger({ level: config.logging.level });
    return createAppContext(config, logger, { randomSeed: globals.randomSeed });
}

export const defaultDeps: CliDeps = {
    openContext: openDefaultContext,
    write      : (text) => {
        process.stdout.write(`${text}\n`);
    },
    now: () => new Date(),
};

/**
 * Run a command body against a freshly opened context and print its
 * result as JSON. The context is closed whatever the outcome.
 */
export async function runWithContext<T>(
    deps: CliDeps,
    command: Command,
    body: (context: AppContext) => T | Promise<T>
): Promise<void> {
    const context = deps.openContext(readGlobals(command));
    try {
        const result = await body(context);
        deps.write(JSON.stringify(result, null, 2));
    }
    finally {
        context.close();
    }
}
