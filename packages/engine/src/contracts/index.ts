/**
 * @fileoverview Contract barrel exports
 *
 * Records, store interface, request/response shapes and the shared
 * logging, randomness and notification contracts of the engine.
 *
 * @module @studyrank/engine/contracts
 */

// Catalog records
export type {
    SkillLevel,
    Difficulty,
    ContentType,
    EventType,
    User,
    Content,
    LearningEvent,
    RecommendationLogEntry,
} from "./Catalog.js";
export {
    SKILL_LEVELS,
    DIFFICULTIES,
    CONTENT_TYPES,
    EVENT_TYPES,
    isSkillLevel,
    isDifficulty,
    isContentType,
    isEventType,
} from "./Catalog.js";

// Catalog store
export type {
    CatalogStore,
    InteractionCountRow,
    Peer,
    EngagementRow,
    RecordEventOptions,
} from "./CatalogStore.js";

// Requests and responses
export type {
    Strategy,
    RecommendationRequest,
    RecommendationItem,
    RecommendationResponse,
    ScoreBreakdown,
    ScoredCandidate,
    EventInput,
    EventReceipt,
} from "./Recommendation.js";
export {
    MODEL_VERSION,
    STRATEGIES,
    DEFAULT_STRATEGY,
    DEFAULT_K,
    MIN_K,
    MAX_K,
    FALLBACK_REASON_TAG,
    PEER_REASON_TAG,
    isStrategy,
    toRecommendationItem,
} from "./Recommendation.js";

// Logger
export type { EngineLogger } from "./Logger.js";
export {
    consoleLogger,
    silentLogger,
    createScopedLogger,
    describeError,
} from "./Logger.js";

// Randomness
export type { RandomSource } from "./RandomSource.js";
export {
    systemRandom,
    createSeededRandom,
    randomInt,
    randomChoice,
    randomSample,
} from "./RandomSource.js";

// EventBus
export type {
    EventBus,
    EngineEvent,
    EngineEventMap,
    EngineEventHandler,
    EngineEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent, isEventOf } from "./EventBus.js";
