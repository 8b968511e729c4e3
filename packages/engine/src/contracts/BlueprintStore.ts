/**
 * BlueprintStore Contract
 *
 * The inheritance store owns every blueprint and answers field lookups
 * with nearest-ancestor fallback. The engine never builds or mutates
 * blueprints; it only asks the store.
 *
 * Design principles:
 * - Typed lookup: fields are addressed by (group, key, attribute), never
 *   by composed attribute names
 * - Absent is `undefined`: a field missing along the whole chain is not
 *   an empty string and not zero
 * - Read-only: every method is a pure query
 */

import type { Blueprint, FieldAttributes, FieldGroup } from "./Blueprint.js";

/**
 * BlueprintStore interface.
 *
 * @example
 * ```typescript
 * const av = store.fieldValue(blueprint, "part", "Armor", "AV");
 * if (store.inheritsFrom(blueprint, "Armor")) {
 *     // ...
 * }
 * ```
 */
export interface BlueprintStore {
    /**
     * Value of a field, taken from the blueprint itself or else from the
     * nearest ancestor that declares it.
     *
     * @returns The attribute value, or undefined when no blueprint in the chain declares it
     */
    fieldValue(
        entity: Blueprint,
        group: FieldGroup,
        key: string,
        attribute: string
    ): string | undefined;

    /**
     * Whether the blueprint is `ancestorName` or descends from it.
     */
    inheritsFrom(entity: Blueprint, ancestorName: string): boolean;

    /**
     * Whether the field is declared on the blueprint itself.
     *
     * Distinguishes "present, possibly empty" from "absent or only inherited".
     * Without an attribute, checks for the entry itself.
     */
    isFieldPresent(
        entity: Blueprint,
        group: FieldGroup,
        key: string,
        attribute?: string
    ): boolean;

    /**
     * Whether the field is declared anywhere along the inheritance chain.
     * Without an attribute, checks for the entry itself.
     */
    hasField(
        entity: Blueprint,
        group: FieldGroup,
        key: string,
        attribute?: string
    ): boolean;

    /**
     * All entries of a group as seen by the blueprint: ancestors' entries
     * merged with the blueprint's own, attribute by attribute.
     * Entries keep their declaration order, ancestors first.
     */
    entries(entity: Blueprint, group: FieldGroup): ReadonlyMap<string, FieldAttributes>;

    /**
     * Index lookup by blueprint name.
     */
    resolveReference(name: string): Blueprint | undefined;

    /**
     * The parent of a blueprint, if any.
     */
    parentOf(entity: Blueprint): Blueprint | undefined;
}
