/**
 * Listing commands: `users`, `content` and `events`.
 */

import { Command } from "commander";
import { parseInteger, runWithContext, type CliDeps } from "../context.js";

interface PageCommandOptions {
    limit: number;
    offset: number;
}

interface ContentCommandOptions extends PageCommandOptions {
    difficulty?: string;
    type?: string;
}

export function createUsersCommand(deps: CliDeps): Command {
    const cmd = new Command("users");

    cmd
        .description("List learners by activity")
        .option("--limit <n>", "Page size", parseInteger, 100)
        .option("--offset <n>", "Rows to skip", parseInteger, 0)
        .action(async (options: PageCommandOptions, command: Command) => {
            await runWithContext(deps, command, (context) => {
                const users = context.analytics.listUsers(options);
                return { users, count: users.length };
            });
        });

    return cmd;
}

export function createContentCommand(deps: CliDeps): Command {
    const cmd = new Command("content");

    cmd
        .description("List content by popularity")
        .option("--limit <n>", "Page size", parseInteger, 100)
        .option("--offset <n>", "Rows to skip", parseInteger, 0)
        .option("--difficulty <level>", "Only this difficulty")
        .option("--type <contentType>", "Only this content type")
        .action(async (options: ContentCommandOptions, command: Command) => {
            await runWithContext(deps, command, (context) => {
                const content = context.analytics.listContent({
                    limit      : options.limit,
                    offset     : options.offset,
                    difficulty : options.difficulty,
                    contentType: options.type,
                });
                return { content, count: content.length };
            });
        });

    return cmd;
}

export function createEventsCommand(deps: CliDeps): Command {
    const cmd = new Command("events");

    cmd
        .description("List the most recent events")
        .option("--limit <n>", "Number of events", parseInteger, 100)
        .action(async (options: { limit: number }, command: Command) => {
            await runWithContext(deps, command, (context) => {
                const events = context.analytics.recentEvents(options.limit);
                return { events, count: events.length };
            });
        });

    return cmd;
}
