/**
 * @fileoverview Seed Vocabulary Loader
 *
 * Loads the vocabularies the catalog generator draws from.
 *
 * @module config/loadSeedData
 */

import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { parse as parseYaml } from "yaml";
import { isContentType, type ContentType } from "@studyrank/engine";
import { CONFIG_DIR } from "./loadConfig.js";

export const DEFAULT_SEED_DATA_PATH = join(CONFIG_DIR, "catalog-seed.yml");

/**
 * Vocabularies for generated users and content.
 */
export interface SeedData {
    cohorts: string[];
    interests: string[];
    contentTypes: ContentType[];
    titles: string[];
}

function readStringList(document: Record<string, unknown>, key: string, minLength: number): string[] {
    const value = document[key];
    if (!Array.isArray(value)) {
        throw new Error(`Invalid seed file format: '${key}' must be a list`);
    }

    const items: string[] = [];
    value.forEach((item: unknown, index) => {
        if (typeof item !== "string" || item.length === 0) {
            throw new Error(`Invalid seed file: '${key}[${index}]' must be a non-empty string`);
        }
        items.push(item);
    });

    if (items.length < minLength) {
        throw new Error(`Invalid seed file: '${key}' needs at least ${minLength} entries`);
    }
    return items;
}

/**
 * Validate a parsed seed document.
 */
export function parseSeedData(document: unknown): SeedData {
    if (typeof document !== "object" || document === null || Array.isArray(document)) {
        throw new Error("Invalid seed file format: expected a mapping at the top level");
    }
    const raw: Record<string, unknown> = { ...document };

    const contentTypes: ContentType[] = [];
    for (const type of readStringList(raw, "contentTypes", 1)) {
        if (!isContentType(type)) {
            throw new Error(`Invalid seed file: unknown content type '${type}'`);
        }
        contentTypes.push(type);
    }

    return {
        cohorts  : readStringList(raw, "cohorts", 1),
        // Users draw up to four interests
        interests: readStringList(raw, "interests", 4),
        contentTypes,
        titles   : readStringList(raw, "titles", 1),
    };
}

/**
 * Load the seed vocabularies from a YAML file.
 *
 * @throws Error if the file doesn't exist or is invalid
 */
export function loadSeedData(filePath: string = DEFAULT_SEED_DATA_PATH): SeedData {
    if (!existsSync(filePath)) {
        throw new Error(`Seed data file not found: ${filePath}`);
    }

    return parseSeedData(parseYaml(readFileSync(filePath, "utf-8")));
}
