/**
 * @fileoverview Catalog context
 *
 * What every catalog function receives besides the blueprint: the
 * engine's property context plus the domain services and static tables.
 *
 * @module domain/catalog/CatalogContext
 */

import type {
    BlueprintView,
    PropertyContext,
    PropertyValue,
} from "@bpstats/engine";
import { AttributeResolver } from "../attributes/AttributeResolver.js";
import { ModifierAggregator } from "../modifiers/ModifierAggregator.js";
import type { QudTables } from "../tables.js";

/**
 * Context passed to catalog functions.
 */
export interface CatalogContext extends PropertyContext {
    readonly tables: QudTables;
    readonly attributes: AttributeResolver;
    readonly modifiers: ModifierAggregator;
}

/**
 * A named, pure catalog function.
 */
export type CatalogFunction = (subject: BlueprintView, context: CatalogContext) => PropertyValue | undefined;

/**
 * Extend a property context with the domain services for a set of tables.
 */
export function createCatalogContext(tables: QudTables, base: PropertyContext): CatalogContext {
    const attributes = new AttributeResolver();
    return {
        ...base,
        tables,
        attributes,
        modifiers: new ModifierAggregator(attributes, tables),
    };
}
