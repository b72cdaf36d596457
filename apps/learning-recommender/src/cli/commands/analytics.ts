/**
 * `learning-recommender analytics`: engagement figures, system-wide or per learner.
 */

import { Command } from "commander";
import { runWithContext, type CliDeps } from "../context.js";

interface AnalyticsCommandOptions {
    user?: string;
}

export function createAnalyticsCommand(deps: CliDeps): Command {
    const cmd = new Command("analytics");

    cmd
        .description("Show system analytics, or one learner's with --user")
        .option("--user <userId>", "Learner to report on")
        .action(async (options: AnalyticsCommandOptions, command: Command) => {
            await runWithContext(deps, command, (context) => options.user
                ? context.analytics.getUserAnalytics(options.user, deps.now())
                : context.analytics.getSystemAnalytics(deps.now()));
        });

    return cmd;
}
