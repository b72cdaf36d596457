/**
 * @fileoverview Domain barrel exports
 *
 * @module domain
 */

// Analytics
export {
    AnalyticsService,
    type SystemAnalytics,
    type UserAnalytics,
    type PopularContent,
    type ActivityPoint,
    type HealthReport,
    type UserSummary,
    type RecentEvent,
    type PageOptions,
    type ContentFilter,
} from "./analytics/AnalyticsService.js";

// Seeding
export {
    seedCatalog,
    type SeedOptions,
    type SeedResult,
} from "./seed/seedCatalog.js";
