/**
 * `learning-recommender event`: record one learner interaction.
 */

import { Argument, Command } from "commander";
import { EVENT_TYPES } from "@studyrank/engine";
import { parseNumber, runWithContext, type CliDeps } from "../context.js";

interface EventCommandOptions {
    value?: number;
    session?: string;
}

export function createEventCommand(deps: CliDeps): Command {
    const cmd = new Command("event");

    cmd
        .description("Record an interaction event")
        .argument("<userId>", "Learner who interacted")
        .argument("<contentId>", "Content interacted with")
        .addArgument(new Argument("<eventType>", "Interaction kind").choices(EVENT_TYPES))
        .option("--value <n>", "Numeric payload, e.g. a quiz score", parseNumber)
        .option("--session <id>", "Session identifier")
        .action(async (
            userId: string,
            contentId: string,
            eventType: string,
            options: EventCommandOptions,
            command: Command
        ) => {
            await runWithContext(deps, command, (context) => context.engine.ingestEvent({
                userId,
                contentId,
                eventType,
                value    : options.value ?? null,
                sessionId: options.session ?? null,
            }));
        });

    return cmd;
}
