/**
 * @fileoverview Modifier barrel exports
 *
 * @module domain/modifiers
 */

export { ModifierAggregator, type Element } from "./ModifierAggregator.js";
export { carriedItems, isBlueprintReference, wornOn } from "./equipment.js";
