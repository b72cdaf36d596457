/**
 * `learning-recommender health`: catalog row counts.
 */

import { Command } from "commander";
import { runWithContext, type CliDeps } from "../context.js";

export function createHealthCommand(deps: CliDeps): Command {
    const cmd = new Command("health");

    cmd
        .description("Report catalog row counts and the model version")
        .action(async (_options: Record<string, never>, command: Command) => {
            await runWithContext(deps, command, (context) => context.analytics.getHealth());
        });

    return cmd;
}
