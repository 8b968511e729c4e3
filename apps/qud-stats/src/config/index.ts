/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    loadTables,
    loadTablesWithFallback,
    getDefaultTablesPath,
    getDefaultPropertiesPath,
} from "./loadTables.js";
