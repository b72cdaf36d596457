/**
 * @fileoverview Tests for application wiring
 *
 * @module app/__tests__/app
 */

import { describe, it, expect } from "vitest";
import { InMemoryEventBus, createEvent, silentLogger } from "@studyrank/engine";
import { attachNotificationLog, createAppContext } from "../app.js";
import { getDefaultConfig } from "../config/index.js";
import { createLogger } from "../logging/createLogger.js";
import { kNOW, makeContent, makeUser } from "./fixtures.js";

function capture() {
    const lines: string[] = [];
    const logger = createLogger({ level: "debug", write: (line) => lines.push(line) });
    return { lines, logger };
}

describe("attachNotificationLog", () => {
    // Scenario: Degraded peer lookup
    it("should log peer degradation as a warning with the trace id", () => {
        const { lines, logger } = capture();
        const bus = new InMemoryEventBus(silentLogger);
        attachNotificationLog(bus, logger);

        bus.emit(createEvent("peers:degraded", { userId: "user_1", error: "timeout" }, "tr_1", kNOW));

        expect(lines).toEqual([
            '[WARN] [PEERS] Degraded to content signals {"userId":"user_1","error":"timeout","traceId":"tr_1"}',
        ]);
    });

    // Scenario: Served recommendations
    it("should log served recommendations at info", () => {
        const { lines, logger } = capture();
        const bus = new InMemoryEventBus(silentLogger);
        attachNotificationLog(bus, logger);

        bus.emit(createEvent("recommendation:served", {
            userId      : "user_1",
            count       : 2,
            strategy    : "hybrid",
            modelVersion: "v2.0.0",
        }, "tr_2", kNOW));

        expect(lines).toEqual([
            '[INFO] [RECOMMENDATION] Served {"userId":"user_1","count":2,"strategy":"hybrid","modelVersion":"v2.0.0","traceId":"tr_2"}',
        ]);
    });

    // Scenario: Lenient policy served without audit rows
    it("should log a failed audit write as a warning", () => {
        const { lines, logger } = capture();
        const bus = new InMemoryEventBus(silentLogger);
        attachNotificationLog(bus, logger);

        bus.emit(createEvent("recommendation:logFailed", { userId: "user_1", count: 3, error: "disk full" }, "tr_3", kNOW));

        expect(lines).toEqual([
            '[WARN] [RECOMMENDATION] Served without audit log {"userId":"user_1","count":3,"error":"disk full","traceId":"tr_3"}',
        ]);
    });
});

describe("createAppContext", () => {
    // Scenario: Engine built from config over an in-memory database
    it("should wire the engine to the database and the notification log", async () => {
        const { lines, logger } = capture();
        const config = {
            ...getDefaultConfig(),
            database: { path: ":memory:" },
            logging : { level: "debug" as const },
        };
        const context = createAppContext(config, logger, { randomSeed: 3 });
        context.database.insertUser(makeUser("user_1"));
        context.database.insertContent(makeContent("content_1"));

        const receipt = await context.engine.ingestEvent({
            userId   : "user_1",
            contentId: "content_1",
            eventType: "view",
        });

        expect(context.database.countEvents()).toBe(1);
        expect(context.engine.weights.tagOverlap).toBe(0.3);
        expect(lines.some((line) => line.startsWith("[INFO] [EVENT] Ingested ")
            && line.includes(`"eventId":"${receipt.eventId}"`))).toBe(true);
        context.close();
    });
});
