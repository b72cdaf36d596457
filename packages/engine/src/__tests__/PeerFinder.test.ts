/**
 * @fileoverview Unit tests for the peer finder
 *
 * @module @studyrank/engine/__tests__/PeerFinder
 */

import { describe, it, expect, vi } from "vitest";
import type { EngineLogger } from "../contracts/Logger.js";
import { InMemoryCatalogStore } from "../impl/InMemoryCatalogStore.js";
import { EMPTY_PEER_SIGNAL, PeerFinder, firstEngagedPeer } from "../peers/PeerFinder.js";
import { makeContent, makeEvent, makeUser } from "./fixtures.js";

function createStore(): InMemoryCatalogStore {
    return new InMemoryCatalogStore({
        users  : ["user_1", "user_2", "user_3"].map((userId) => makeUser({ userId })),
        content: ["content_1", "content_2", "content_3"].map((contentId) => makeContent({ contentId })),
        events : [
            makeEvent({ userId: "user_1", contentId: "content_1", eventType: "view" }),
            makeEvent({ userId: "user_2", contentId: "content_1", eventType: "view" }),
            makeEvent({ userId: "user_2", contentId: "content_1", eventType: "bookmark" }),
            makeEvent({ userId: "user_2", contentId: "content_2", eventType: "like" }),
            makeEvent({ userId: "user_3", contentId: "content_1", eventType: "view" }),
            makeEvent({ userId: "user_3", contentId: "content_2", eventType: "complete" }),
            makeEvent({ userId: "user_3", contentId: "content_3", eventType: "share" }),
        ],
    });
}

describe("PeerFinder", () => {
    // Scenario: Peers and their likes/completions are loaded together
    it("should load ordered peers with their endorsements", async () => {
        const finder = new PeerFinder({ store: createStore() });

        const signal = await finder.loadPeerSignal("user_1");

        expect(signal.peers).toEqual([
            { userId: "user_2", sharedInteractions: 2 },
            { userId: "user_3", sharedInteractions: 1 },
        ]);
        expect(signal.endorsements.get("user_2")).toEqual(new Set(["content_2"]));
        expect(signal.endorsements.get("user_3")).toEqual(new Set(["content_2"]));
    });

    // Scenario: The first endorsing peer in list order wins
    it("should return the first peer in list order that endorsed the content", async () => {
        const signal = await new PeerFinder({ store: createStore() }).loadPeerSignal("user_1");

        expect(firstEngagedPeer(signal, "content_2")).toEqual({ userId: "user_2", sharedInteractions: 2 });
        expect(firstEngagedPeer(signal, "content_3")).toBeNull();
    });

    it("should honour the peer limit", async () => {
        const signal = await new PeerFinder({ store: createStore(), limit: 1 }).loadPeerSignal("user_1");

        expect(signal.peers.map((peer) => peer.userId)).toEqual(["user_2"]);
    });

    // Scenario: A user with no events has no peers
    it("should return the empty signal without querying engagements", async () => {
        const store = new InMemoryCatalogStore({ users: [makeUser({ userId: "user_9" })] });
        const engagementSpy = vi.spyOn(store, "getEngagements");

        const signal = await new PeerFinder({ store }).loadPeerSignal("user_9");

        expect(signal).toBe(EMPTY_PEER_SIGNAL);
        expect(engagementSpy).not.toHaveBeenCalled();
    });

    it("should drop the query user if a store returns it", async () => {
        const store = createStore();
        vi.spyOn(store, "findPeers").mockResolvedValue([
            { userId: "user_1", sharedInteractions: 9 },
            { userId: "user_3", sharedInteractions: 1 },
        ]);

        const peers = await new PeerFinder({ store }).findPeers("user_1");

        expect(peers).toEqual([{ userId: "user_3", sharedInteractions: 1 }]);
    });

    // Scenario: The peer query fails mid-request
    it("should degrade to the empty signal and report the failure", async () => {
        const store = createStore();
        vi.spyOn(store, "getEngagements").mockRejectedValue(new Error("query timeout"));
        const logger: EngineLogger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
        const onDegraded = vi.fn();

        const signal = await new PeerFinder({ store, logger }).loadPeerSignal("user_1", onDegraded);

        expect(signal).toBe(EMPTY_PEER_SIGNAL);
        expect(onDegraded).toHaveBeenCalledWith("query timeout");
        expect(logger.warn).toHaveBeenCalledWith(
            "Peer lookup failed, continuing without peer signal",
            { userId: "user_1", error: "query timeout" }
        );
    });
});
