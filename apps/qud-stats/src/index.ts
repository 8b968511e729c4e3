/**
 * @fileoverview Caves of Qud blueprint statistics
 *
 * Wires the derived property catalog and the YAML field properties into a
 * {@link PropertyEngine} over a blueprint store.
 *
 * Registration order:
 * 1. Catalog properties (computed, consulting the static tables)
 * 2. Field properties from `config/properties.yml`
 *
 * @module qud-stats
 * @example
 * ```typescript
 * import { InMemoryBlueprintStore } from "@bpstats/engine";
 * import { createPropertyEngine } from "qud-stats";
 *
 * const engine = createPropertyEngine(new InMemoryBlueprintStore(blueprints));
 * engine.evaluate("Snapjaw Scavenger", "dv");
 * engine.evaluateAll("Leather Armor");
 * ```
 */

import {
    PropertyEngine,
    PropertyLoader,
    type BlueprintStore,
    type BlueprintView,
    type EngineLogger,
    type EventBus,
} from "@bpstats/engine";
import {
    getDefaultPropertiesPath,
    getDefaultTablesPath,
    loadTablesWithFallback,
} from "./config/index.js";
import { AttributeResolver, type StatMode } from "./domain/attributes/index.js";
import { createCatalog } from "./domain/catalog/index.js";
import type { QudTables } from "./domain/tables.js";

/**
 * Options for {@link createPropertyEngine}.
 */
export interface QudEngineOptions {
    /** Static tables; loaded from `tablesPath` when omitted */
    readonly tables?: QudTables;

    /** Tables file (default: the bundled `config/tables.yml`) */
    readonly tablesPath?: string;

    /** Field properties file (default: the bundled `config/properties.yml`) */
    readonly propertiesPath?: string;

    /** Custom EventBus (default: the engine's InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Logger for the engine and the property loader */
    readonly logger?: EngineLogger;
}

/**
 * Create an engine with the whole catalog registered.
 *
 * @throws Error if the properties file cannot be read, or declares an id
 *         the catalog already has
 */
export function createPropertyEngine(store: BlueprintStore, options: QudEngineOptions = {}): PropertyEngine {
    const tables = options.tables ?? loadTablesWithFallback(options.tablesPath ?? getDefaultTablesPath());

    const engine = new PropertyEngine(store, {
        eventBus: options.eventBus,
        logger  : options.logger,
    });

    engine.registerProperties(createCatalog(tables));

    const loader = new PropertyLoader({ logger: options.logger });
    engine.registerProperties(loader.loadYamlFile(options.propertiesPath ?? getDefaultPropertiesPath()));

    return engine;
}

const kRESOLVER = new AttributeResolver();

/**
 * Stat modifier of an attribute at one end of its range.
 *
 * @example
 * ```typescript
 * attributeModifier(engine.view("Snapjaw Scavenger"), "Agility");        // 1
 * attributeModifier(engine.view("Snapjaw Scavenger"), "Agility", "min"); // -1
 * ```
 */
export function attributeModifier(
    entity: BlueprintView,
    attribute: string,
    mode: StatMode = "avg"
): number | undefined {
    return kRESOLVER.modifier(entity, attribute, mode);
}

export * from "./domain/index.js";
export * from "./config/index.js";
