/**
 * `learning-recommender seed`: fill an empty database with a generated catalog.
 */

import { Command } from "commander";
import { createSeededRandom } from "@studyrank/engine";
import { DEFAULT_SEED_DATA_PATH, loadSeedData } from "../../config/index.js";
import { seedCatalog } from "../../domain/index.js";
import {
    parseInteger,
    parseNonNegativeInteger,
    parsePositiveInteger,
    runWithContext,
    type CliDeps,
} from "../context.js";

interface SeedCommandOptions {
    users?: number;
    content?: number;
    events?: number;
    seed?: number;
    data: string;
}

export function createSeedCommand(deps: CliDeps): Command {
    const cmd = new Command("seed");

    cmd
        .description("Generate learners, content and events into an empty database")
        .option("--users <n>", "Learners to create", parsePositiveInteger)
        .option("--content <n>", "Content items to create", parsePositiveInteger)
        .option("--events <n>", "Events to create", parseNonNegativeInteger)
        .option("--seed <n>", "Random seed for generation", parseInteger)
        .option("--data <path>", "Seed vocabulary file", DEFAULT_SEED_DATA_PATH)
        .action(async (options: SeedCommandOptions, command: Command) => {
            await runWithContext(deps, command, (context) => {
                const defaults = context.config.seed;
                const result = seedCatalog(context.database, loadSeedData(options.data), {
                    users  : options.users ?? defaults.users,
                    content: options.content ?? defaults.content,
                    events : options.events ?? defaults.events,
                    random : createSeededRandom(options.seed ?? defaults.randomSeed),
                    now    : deps.now(),
                });

                if (result.seeded) {
                    context.logger.info("Catalog seeded", { ...result });
                }
                else {
                    context.logger.info("Catalog already populated, nothing seeded");
                }
                return result;
            });
        });

    return cmd;
}
