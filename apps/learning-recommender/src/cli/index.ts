/**
 * @fileoverview Command-line front end
 *
 * Every command opens the catalog database, runs against the engine or
 * the analytics service and prints its result as JSON.
 *
 * @module cli
 */

import { Command } from "commander";
import { MODEL_VERSION } from "@studyrank/engine";
import { createAnalyticsCommand } from "./commands/analytics.js";
import { createContentCommand, createEventsCommand, createUsersCommand } from "./commands/browse.js";
import { createEventCommand } from "./commands/event.js";
import { createHealthCommand } from "./commands/health.js";
import { createRecommendCommand } from "./commands/recommend.js";
import { createSeedCommand } from "./commands/seed.js";
import { defaultDeps, parseInteger, type CliDeps } from "./context.js";

export { defaultDeps, resolveConfig, type CliDeps, type GlobalOptions } from "./context.js";

export function createCLI(deps: CliDeps = defaultDeps): Command {
    const program = new Command();

    program
        .name("learning-recommender")
        .description("Personalized learning-content recommendations over a SQLite catalog")
        .version(MODEL_VERSION)
        .option("-c, --config <path>", "Config file (YAML)")
        .option("--db <path>", "Catalog database path")
        .option("-v, --verbose", "Log at debug level")
        .option("--random-seed <n>", "Seed exploration jitter for reproducible output", parseInteger);

    program.addCommand(createRecommendCommand(deps));
    program.addCommand(createEventCommand(deps));
    program.addCommand(createAnalyticsCommand(deps));
    program.addCommand(createHealthCommand(deps));
    program.addCommand(createSeedCommand(deps));
    program.addCommand(createUsersCommand(deps));
    program.addCommand(createContentCommand(deps));
    program.addCommand(createEventsCommand(deps));

    return program;
}
