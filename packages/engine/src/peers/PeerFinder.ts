/**
 * @fileoverview Similarity / Peer Finder
 *
 * Finds a bounded, ordered list of users who share interaction history
 * with the query user, and what those peers liked or completed. The
 * result is a weak collaborative hint, never ground truth: callers get
 * an empty signal rather than a failure when nothing is known.
 *
 * The peer list is an ordered array on purpose. `firstEngagedPeer`
 * returns the first match in list order, not the strongest one.
 *
 * @module @studyrank/engine/peers/PeerFinder
 */

import type { EventType } from "../contracts/Catalog.js";
import type { CatalogStore, Peer } from "../contracts/CatalogStore.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { describeError, silentLogger } from "../contracts/Logger.js";

/** Maximum number of peers considered per request */
export const DEFAULT_PEER_LIMIT = 10;

/** Event types that count as a peer endorsing a content item */
export const ENDORSEMENT_EVENT_TYPES: readonly EventType[] = ["like", "complete"];

/**
 * Peers of one user and the content each of them endorsed.
 */
export interface PeerSignal {
    /** Ordered by shared interactions desc, then user id asc */
    readonly peers: readonly Peer[];

    /** Peer user id → content ids with a like or complete event */
    readonly endorsements: ReadonlyMap<string, ReadonlySet<string>>;
}

export const EMPTY_PEER_SIGNAL: PeerSignal = Object.freeze({
    peers       : Object.freeze([]),
    endorsements: new Map<string, ReadonlySet<string>>(),
});

/**
 * Peer finder configuration.
 */
export interface PeerFinderConfig {
    readonly store: CatalogStore;

    /** Default 10 */
    readonly limit?: number;

    readonly logger?: EngineLogger;
}

/**
 * Return the first peer, in list order, who endorsed the content.
 */
export function firstEngagedPeer(signal: PeerSignal, contentId: string): Peer | null {
    for (const peer of signal.peers) {
        if (signal.endorsements.get(peer.userId)?.has(contentId)) {
            return peer;
        }
    }
    return null;
}

/**
 * Similarity / peer finder backed by the catalog store's aggregates.
 *
 * @example
 * ```typescript
 * const finder = new PeerFinder({ store });
 * const signal = await finder.loadPeerSignal("user_1");
 *
 * if (firstEngagedPeer(signal, "content_42")) {
 *     // at least one peer liked or completed content_42
 * }
 * ```
 */
export class PeerFinder {
    private readonly store: CatalogStore;
    private readonly limit: number;
    private readonly logger: EngineLogger;

    constructor(config: PeerFinderConfig) {
        this.store  = config.store;
        this.limit  = config.limit ?? DEFAULT_PEER_LIMIT;
        this.logger = config.logger ?? silentLogger;
    }

    /**
     * Ordered peers of a user. Empty when the user has no events.
     */
    async findPeers(userId: string): Promise<readonly Peer[]> {
        const peers = await this.store.findPeers(userId, this.limit);

        // Stores are expected to exclude the query user already
        return peers.filter((peer) => peer.userId !== userId).slice(0, this.limit);
    }

    /**
     * Load peers and their endorsements in two store round trips.
     *
     * A store failure here is logged and degrades to an empty signal;
     * the caller is told through `onDegraded`.
     */
    async loadPeerSignal(userId: string, onDegraded?: (reason: string) => void): Promise<PeerSignal> {
        try {
            const peers = await this.findPeers(userId);
            if (peers.length === 0) {
                this.logger.debug("No peers found", { userId });
                return EMPTY_PEER_SIGNAL;
            }

            const rows = await this.store.getEngagements(
                peers.map((peer) => peer.userId),
                ENDORSEMENT_EVENT_TYPES
            );

            const endorsements = new Map<string, Set<string>>();
            for (const row of rows) {
                let contentIds = endorsements.get(row.userId);
                if (!contentIds) {
                    contentIds = new Set();
                    endorsements.set(row.userId, contentIds);
                }
                contentIds.add(row.contentId);
            }

            this.logger.debug("Peer signal loaded", {
                userId,
                peers       : peers.length,
                endorsements: rows.length,
            });

            return { peers, endorsements };
        }
        catch (error) {
            const reason = describeError(error);
            this.logger.warn("Peer lookup failed, continuing without peer signal", {
                userId,
                error: reason,
            });
            onDegraded?.(reason);
            return EMPTY_PEER_SIGNAL;
        }
    }
}
