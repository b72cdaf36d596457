/**
 * @fileoverview Learning Recommender - Main Entry Point
 *
 * @module learning-recommender
 */

// Load .env before anything reads the environment
import "dotenv/config";

import { isRecommenderError } from "@studyrank/engine";
import { createCLI } from "./cli/index.js";

async function main(): Promise<void> {
    try {
        await createCLI().parseAsync(process.argv);
    }
    catch (error) {
        if (isRecommenderError(error)) {
            console.error(`${error.code}: ${error.message}`);
        }
        else {
            console.error(error instanceof Error ? error.message : String(error));
        }
        process.exit(1);
    }
}

main().catch(console.error);
