/**
 * @fileoverview BlueprintView
 *
 * Typed accessor over one blueprint and the store that owns it.
 * Properties read fields through a view instead of talking to the store,
 * so every lookup is addressed by (group, key, attribute).
 *
 * @module @bpstats/engine/engine/BlueprintView
 */

import type { Blueprint, FieldAttributes, FieldGroup } from "../contracts/Blueprint.js";
import type { BlueprintStore } from "../contracts/BlueprintStore.js";

/**
 * Read-only view of a blueprint with nearest-ancestor field resolution.
 *
 * @example
 * ```typescript
 * const view = engine.view("Leather Armor");
 * view.part("Armor", "AV");        // "2"
 * view.inheritsFrom("Armor");      // true
 * view.specified("part", "Armor"); // true only if declared on Leather Armor itself
 * ```
 */
export class BlueprintView {
    constructor(
        readonly blueprint: Blueprint,
        private readonly store: BlueprintStore
    ) {}

    /**
     * The blueprint name.
     */
    get name(): string {
        return this.blueprint.name;
    }

    /**
     * Generic field lookup with nearest-ancestor fallback.
     */
    field(group: FieldGroup, key: string, attribute: string): string | undefined {
        return this.store.fieldValue(this.blueprint, group, key, attribute);
    }

    /**
     * Attribute of a part, e.g. `part("Armor", "AV")`.
     */
    part(key: string, attribute: string): string | undefined {
        return this.field("part", key, attribute);
    }

    /**
     * Whether a part is present on the blueprint or an ancestor.
     */
    hasPart(key: string): boolean {
        return this.store.hasField(this.blueprint, "part", key);
    }

    /**
     * Attribute of a tag; tags usually carry a single `Value`.
     */
    tag(key: string, attribute = "Value"): string | undefined {
        return this.field("tag", key, attribute);
    }

    /**
     * Whether a tag is present on the blueprint or an ancestor.
     */
    hasTag(key: string): boolean {
        return this.store.hasField(this.blueprint, "tag", key);
    }

    /**
     * Attribute of a stat, e.g. `stat("Strength", "sValue")`.
     */
    stat(key: string, attribute = "Value"): string | undefined {
        return this.field("stat", key, attribute);
    }

    /**
     * Attribute of a string property, e.g. `property("Role")`.
     */
    property(key: string, attribute = "Value"): string | undefined {
        return this.field("property", key, attribute);
    }

    /**
     * Attribute of an integer property. The value is still text.
     */
    intProperty(key: string, attribute = "Value"): string | undefined {
        return this.field("intproperty", key, attribute);
    }

    /**
     * Whether the field is present anywhere along the inheritance chain.
     */
    has(group: FieldGroup, key: string, attribute?: string): boolean {
        return this.store.hasField(this.blueprint, group, key, attribute);
    }

    /**
     * Whether the field is declared on this blueprint itself, not inherited.
     */
    specified(group: FieldGroup, key: string, attribute?: string): boolean {
        return this.store.isFieldPresent(this.blueprint, group, key, attribute);
    }

    /**
     * Merged entries of a group, ancestors first.
     */
    entries(group: FieldGroup): ReadonlyMap<string, FieldAttributes> {
        return this.store.entries(this.blueprint, group);
    }

    /**
     * Whether this blueprint is `ancestorName` or descends from it.
     */
    inheritsFrom(ancestorName: string): boolean {
        return this.store.inheritsFrom(this.blueprint, ancestorName);
    }

    /**
     * View of another blueprint from the same store, by name.
     */
    resolve(name: string): BlueprintView | undefined {
        const blueprint = this.store.resolveReference(name);
        return blueprint ? new BlueprintView(blueprint, this.store) : undefined;
    }

    /**
     * View of the parent blueprint.
     */
    parent(): BlueprintView | undefined {
        const blueprint = this.store.parentOf(this.blueprint);
        return blueprint ? new BlueprintView(blueprint, this.store) : undefined;
    }
}
