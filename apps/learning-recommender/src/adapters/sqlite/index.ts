/**
 * @fileoverview SQLite adapter barrel exports
 *
 * @module adapters/sqlite
 */

export {
    CatalogDatabase,
    splitList,
    joinList,
    rowToUser,
    rowToContent,
    rowToEvent,
    type UserRow,
    type ContentRow,
    type EventRow,
} from "./catalog-db.js";

export { SqliteCatalogStore } from "./SqliteCatalogStore.js";
