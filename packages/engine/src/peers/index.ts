/**
 * @fileoverview Peer finder barrel exports
 *
 * @module @studyrank/engine/peers
 */

export {
    PeerFinder,
    DEFAULT_PEER_LIMIT,
    ENDORSEMENT_EVENT_TYPES,
    EMPTY_PEER_SIGNAL,
    firstEngagedPeer,
    type PeerSignal,
    type PeerFinderConfig,
} from "./PeerFinder.js";
