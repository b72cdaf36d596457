/**
 * `learning-recommender recommend`: top-K recommendations for a learner.
 */

import { Command, Option } from "commander";
import { DEFAULT_K, DEFAULT_STRATEGY, STRATEGIES } from "@studyrank/engine";
import { parseInteger, runWithContext, type CliDeps } from "../context.js";

interface RecommendCommandOptions {
    topK: number;
    strategy: string;
}

export function createRecommendCommand(deps: CliDeps): Command {
    const cmd = new Command("recommend");

    cmd
        .description("Score, rank and log recommendations for a learner")
        .argument("<userId>", "Learner to recommend for")
        .option("-k, --top-k <n>", "Number of items to return (1-50)", parseInteger, DEFAULT_K)
        .addOption(
            new Option("-s, --strategy <strategy>", "Signal groups to use")
                .choices(STRATEGIES)
                .default(DEFAULT_STRATEGY)
        )
        .action(async (userId: string, options: RecommendCommandOptions, command: Command) => {
            await runWithContext(deps, command, (context) => context.engine.recommend({
                userId,
                k       : options.topK,
                strategy: options.strategy,
            }));
        });

    return cmd;
}
