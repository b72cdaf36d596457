/**
 * @fileoverview StudyRank Engine
 *
 * Learning-content recommendation engine.
 *
 * The engine provides:
 * - Per-candidate feature extraction and weighted scoring
 * - Peer affinity from shared interaction history
 * - Top-K ranking with an audited recommendation log
 * - Event ingestion with popularity recompute
 * - Notifications over an in-memory event bus
 *
 * @module @studyrank/engine
 * @example
 * ```typescript
 * import {
 *     InMemoryCatalogStore,
 *     RecommendationEngine,
 * } from "@studyrank/engine";
 *
 * const engine = new RecommendationEngine({ store: new InMemoryCatalogStore({ users, content }) });
 * const response = await engine.recommend({ userId: "user_1", k: 5 });
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export * from "./contracts/index.js";

// ============================================================================
// Error exports
// ============================================================================

export * from "./errors/index.js";

// ============================================================================
// Pipeline stage exports
// ============================================================================

export * from "./features/index.js";
export * from "./peers/index.js";
export * from "./scoring/index.js";
export * from "./ranking/index.js";
export * from "./logging/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export * from "./impl/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export * from "./engine/index.js";
