/**
 * @fileoverview Ranker barrel exports
 *
 * @module @studyrank/engine/ranking
 */

export { rankCandidates, validateK } from "./Ranker.js";
