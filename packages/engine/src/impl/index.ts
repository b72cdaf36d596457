/**
 * @fileoverview Implementation barrel exports
 *
 * @module @studyrank/engine/impl
 */

export { InMemoryEventBus } from "./InMemoryEventBus.js";
export {
    InMemoryCatalogStore,
    assertValidLogEntry,
    type InMemoryCatalogSnapshot,
} from "./InMemoryCatalogStore.js";
