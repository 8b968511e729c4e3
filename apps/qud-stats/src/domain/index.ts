/**
 * @fileoverview Domain barrel exports
 *
 * Caves of Qud specific resolution: attributes, aggregated defenses,
 * static tables and the derived property catalog.
 *
 * @module domain
 */

export * from "./attributes/index.js";
export * from "./modifiers/index.js";
export * from "./catalog/index.js";
export * from "./utils/index.js";
export { emptyTables, lookup, type ItemModProps, type QudTables } from "./tables.js";
