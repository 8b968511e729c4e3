/**
 * @fileoverview Shared test fixtures
 *
 * A small blueprint tree shaped like the game's (Object, Creature, Item,
 * Armor) and a catalog context with a mock logger.
 *
 * @module __tests__/helpers
 */

import { vi } from "vitest";
import {
    BlueprintView,
    InMemoryBlueprintStore,
    type Blueprint,
    type PropertyLogger,
} from "@bpstats/engine";
import { createCatalogContext, type CatalogContext } from "../domain/catalog/CatalogContext.js";
import { emptyTables, type QudTables } from "../domain/tables.js";

export const kBASE_BLUEPRINTS: readonly Blueprint[] = [
    {
        name  : "Object",
        fields: {
            part: {
                Physics: { Takeable: "true", Weight: "1" },
                Render : { DisplayName: "object" },
            },
        },
    },
    {
        name  : "Creature",
        parent: "Object",
        fields: {
            part: {
                Physics: { Takeable: "false" },
                Combat : {},
                Brain  : {},
            },
        },
    },
    { name: "Item", parent: "Object", fields: {} },
    {
        name  : "Armor",
        parent: "Item",
        fields: { part: { Armor: { WornOn: "Body" } } },
    },
    {
        name  : "Wall",
        parent: "Object",
        fields: { part: { Physics: { Takeable: "false" } } },
    },
];

export function createMockLogger(): PropertyLogger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

/**
 * Store holding the base tree plus the given blueprints.
 */
export function createStore(blueprints: readonly Blueprint[]): InMemoryBlueprintStore {
    return new InMemoryBlueprintStore([...kBASE_BLUEPRINTS, ...blueprints]);
}

/**
 * View of one blueprint in the store.
 */
export function viewOf(store: InMemoryBlueprintStore, name: string): BlueprintView {
    const blueprint = store.resolveReference(name);
    if (!blueprint) {
        throw new Error(`Fixture has no blueprint named ${name}`);
    }
    return new BlueprintView(blueprint, store);
}

/**
 * Catalog context over the given tables, with a mock logger.
 */
export function createTestContext(tables: Partial<QudTables> = {}): CatalogContext {
    return createCatalogContext(
        { ...emptyTables(), ...tables },
        { logger: createMockLogger(), traceId: "tr_test" }
    );
}
