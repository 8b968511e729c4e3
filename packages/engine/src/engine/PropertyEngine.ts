/**
 * @fileoverview PropertyEngine
 *
 * The evaluation engine: a lookup table of named property functions and
 * the machinery to run them against blueprints from a store.
 *
 * Evaluation flow:
 * 1. Blueprint resolved from the store (by name or given directly)
 * 2. Property looked up by id
 * 3. Property evaluated with a scoped logger
 * 4. Failures isolated: logged, emitted, reported as absent
 *
 * Design principles:
 * - Domain-agnostic: knows nothing about armor, mutations or dice tables
 * - Table-driven: properties are independent entries, registered by id
 * - Observable: emits events for every evaluation outcome
 * - Isolated: one failing property never aborts a batch
 *
 * @module @bpstats/engine/engine/PropertyEngine
 */

import type { Blueprint } from "../contracts/Blueprint.js";
import type { BlueprintStore } from "../contracts/BlueprintStore.js";
import type {
    PropertyContext,
    PropertyDefinition,
    PropertyLogger,
    PropertyValue,
} from "../contracts/Property.js";
import type { EventBus, EventPayload } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import { isBlueprintStatsError } from "../contracts/errors.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { BlueprintView } from "./BlueprintView.js";

/**
 * Engine configuration options.
 */
export interface EngineConfig {
    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Logger for engine operations */
    readonly logger?: EngineLogger;
}

/**
 * Logger interface for the engine.
 */
export interface EngineLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Default console logger.
 */
const defaultLogger: EngineLogger = {
    debug: (msg, data) => console.debug(`[DEBUG] ${msg}`, data ?? ""),
    info : (msg, data) => console.info(`[INFO] ${msg}`, data ?? ""),
    warn : (msg, data) => console.warn(`[WARN] ${msg}`, data ?? ""),
    error: (msg, data) => console.error(`[ERROR] ${msg}`, data ?? ""),
};

/**
 * Generate a unique trace ID for an evaluation batch.
 */
function generateTraceId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `tr_${timestamp}_${random}`;
}

/**
 * PropertyEngine - evaluates registered properties against blueprints.
 *
 * @example
 * ```typescript
 * const engine = new PropertyEngine(store);
 *
 * engine.registerProperties(catalog);
 *
 * engine.eventBus.subscribe("property:error", (event) => {
 *     console.log("Failed:", event.data);
 * });
 *
 * engine.evaluate("Leather Armor", "av");  // 2
 * engine.evaluateAll("Snapjaw Scavenger"); // { av: 1, dv: 6, ... }
 * ```
 */
export class PropertyEngine {
    private readonly logger: EngineLogger;
    private readonly properties: Map<string, PropertyDefinition> = new Map();

    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    constructor(
        private readonly store: BlueprintStore,
        config: EngineConfig = {}
    ) {
        this.eventBus = config.eventBus ?? new InMemoryEventBus();
        this.logger = config.logger ?? defaultLogger;
    }

    /**
     * Register a property.
     *
     * @throws Error if a property with the same id is already registered
     */
    registerProperty(property: PropertyDefinition): void {
        if (this.properties.has(property.id)) {
            throw new Error(`Property already registered: ${property.id}`);
        }

        this.properties.set(property.id, property);
        this.emit(createEvent("property:registered", { propertyId: property.id }));
    }

    /**
     * Register several properties at once.
     *
     * @throws Error on the first duplicate id
     */
    registerProperties(properties: readonly PropertyDefinition[]): void {
        for (const property of properties) {
            this.registerProperty(property);
        }

        this.logger.debug("Properties registered", {
            count: properties.length,
            total: this.properties.size,
        });
    }

    /**
     * Registered property ids, in registration order.
     */
    get propertyIds(): string[] {
        return Array.from(this.properties.keys());
    }

    /**
     * Whether a property id is registered.
     */
    hasProperty(propertyId: string): boolean {
        return this.properties.has(propertyId);
    }

    /**
     * A typed view of a blueprint from the engine's store.
     *
     * @throws Error if no blueprint has that name
     */
    view(entity: Blueprint | string): BlueprintView {
        if (typeof entity !== "string") {
            return new BlueprintView(entity, this.store);
        }

        const blueprint = this.store.resolveReference(entity);
        if (!blueprint) {
            throw new Error(`Unknown blueprint: ${entity}`);
        }
        return new BlueprintView(blueprint, this.store);
    }

    /**
     * Evaluate one property for one blueprint.
     *
     * @returns The value, or undefined when the property does not apply or failed
     * @throws Error if the property id or blueprint name is unknown
     */
    evaluate(entity: Blueprint | string, propertyId: string): PropertyValue | undefined {
        const property = this.properties.get(propertyId);
        if (!property) {
            throw new Error(`Unknown property: ${propertyId}`);
        }

        return this.runProperty(this.view(entity), property, generateTraceId());
    }

    /**
     * Evaluate every registered property for one blueprint.
     *
     * @returns Defined values keyed by property id; absent properties are left out
     * @throws Error if the blueprint name is unknown
     */
    evaluateAll(entity: Blueprint | string): Record<string, PropertyValue> {
        const subject = this.view(entity);
        const traceId = generateTraceId();
        const startTime = Date.now();
        const results: Record<string, PropertyValue> = {};
        let failures = 0;

        for (const property of this.properties.values()) {
            const value = this.runProperty(subject, property, traceId, () => failures++);
            if (value !== undefined) {
                results[property.id] = value;
            }
        }

        const duration = Date.now() - startTime;
        this.emit(createEvent("entity:evaluated", {
            entity    : subject.name,
            properties: this.properties.size,
            defined   : Object.keys(results).length,
            failures,
            duration,
        }, traceId));

        this.logger.debug("Entity evaluated", {
            entity : subject.name,
            defined: Object.keys(results).length,
            failures,
            traceId,
            duration,
        });

        return results;
    }

    /**
     * Run one property, isolating any failure.
     */
    private runProperty(
        subject: BlueprintView,
        property: PropertyDefinition,
        traceId: string,
        onFailure?: () => void
    ): PropertyValue | undefined {
        const context: PropertyContext = {
            logger: this.createPropertyLogger(subject.name, property.id, traceId),
            traceId,
        };

        try {
            const value = property.evaluate(subject, context);

            this.emit(createEvent("property:evaluated", {
                entity    : subject.name,
                propertyId: property.id,
                defined   : value !== undefined,
            }, traceId));

            return value;
        }
        catch (error) {
            onFailure?.();

            const kind = isBlueprintStatsError(error) ? error.kind : "Unexpected";
            const message = error instanceof Error ? error.message : String(error);

            this.logger.error("Property evaluation failed", {
                entity    : subject.name,
                propertyId: property.id,
                kind,
                error     : message,
                traceId,
            });

            this.emit(createEvent("property:error", {
                entity    : subject.name,
                propertyId: property.id,
                kind,
                error     : message,
            }, traceId));

            return undefined;
        }
    }

    /**
     * Emit an event to the event bus.
     */
    private emit(event: EventPayload): void {
        this.eventBus.emit(event);
    }

    /**
     * Create a logger for a property evaluation.
     */
    private createPropertyLogger(entity: string, propertyId: string, traceId: string): PropertyLogger {
        return {
            debug: (msg, data) => this.logger.debug(`[${entity}:${propertyId}] ${msg}`, { ...data, traceId }),
            info : (msg, data) => this.logger.info(`[${entity}:${propertyId}] ${msg}`, { ...data, traceId }),
            warn : (msg, data) => this.logger.warn(`[${entity}:${propertyId}] ${msg}`, { ...data, traceId }),
            error: (msg, data) => this.logger.error(`[${entity}:${propertyId}] ${msg}`, { ...data, traceId }),
        };
    }
}
