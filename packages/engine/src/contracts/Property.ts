/**
 * Property Contract
 *
 * A property is a named, pure computation over one blueprint: "what is
 * the AV of this entity?", "what does this weapon's charge power?".
 * The engine keeps properties in a lookup table and evaluates them one
 * at a time, isolating failures.
 *
 * Design principles:
 * - Pure: no blueprint mutation, same input gives the same output
 * - Absent is `undefined`: "not applicable to this entity", never a
 *   substitute zero or empty string
 * - Independent: a property may call other property functions directly,
 *   but never relies on evaluation order
 */

import type { BlueprintView } from "../engine/BlueprintView.js";

/**
 * Values a property can produce.
 *
 * Tuples such as `[faction, reputation]` are arrays of values.
 */
export type PropertyValue =
    | string
    | number
    | boolean
    | readonly PropertyValue[]
    | { readonly [key: string]: PropertyValue };

/**
 * Logger interface for properties.
 */
export interface PropertyLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Context provided to a property during evaluation.
 */
export interface PropertyContext {
    /**
     * Logger scoped to the entity and property being evaluated.
     * Use it to report skipped, inconsistent data segments.
     */
    readonly logger: PropertyLogger;

    /**
     * Trace ID shared by every property of one evaluation batch.
     */
    readonly traceId: string;
}

/**
 * Property definition.
 *
 * @example
 * ```typescript
 * const maxCharge: PropertyDefinition = {
 *     id         : "maxcharge",
 *     description: "How much charge a cell can hold.",
 *     evaluate(subject) {
 *         return intOrUndefined(subject.part("EnergyCell", "MaxCharge"));
 *     },
 * };
 * ```
 */
export interface PropertyDefinition {
    /**
     * Unique property identifier, the key consumers query by.
     */
    readonly id: string;

    /**
     * Optional description of what the property reports.
     */
    readonly description?: string;

    /**
     * Compute the property for one blueprint.
     *
     * @returns The value, or undefined when the property does not apply
     */
    evaluate(subject: BlueprintView, context: PropertyContext): PropertyValue | undefined;
}

/**
 * Type guard to check if an object is a PropertyDefinition.
 */
export function isPropertyDefinition(obj: unknown): obj is PropertyDefinition {
    return (
        typeof obj === "object" &&
        obj !== null &&
        "id" in obj &&
        typeof obj.id === "string" &&
        "evaluate" in obj &&
        typeof obj.evaluate === "function"
    );
}
