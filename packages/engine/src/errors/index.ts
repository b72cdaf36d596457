/**
 * @fileoverview Error barrel exports
 *
 * @module @studyrank/engine/errors
 */

export {
    RecommenderError,
    NotFoundError,
    DataIntegrityError,
    LoggingFailureError,
    InvalidRequestError,
    isRecommenderError,
    type RecommenderErrorCode,
    type CatalogEntity,
} from "./RecommenderError.js";
