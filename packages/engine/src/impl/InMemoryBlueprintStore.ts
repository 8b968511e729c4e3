/**
 * @fileoverview In-Memory BlueprintStore Implementation
 *
 * Holds a fixed set of blueprints and answers field lookups by walking
 * the inheritance chain. Built once; never mutated afterwards.
 *
 * @module @bpstats/engine/impl/InMemoryBlueprintStore
 */

import type { Blueprint, FieldAttributes, FieldGroup } from "../contracts/Blueprint.js";
import type { BlueprintStore } from "../contracts/BlueprintStore.js";
import { InconsistentDataError } from "../contracts/errors.js";

/**
 * In-memory BlueprintStore implementation.
 *
 * Construction validates the tree: names are unique, every parent exists
 * and no chain loops back on itself.
 *
 * @example
 * ```typescript
 * const store = new InMemoryBlueprintStore([
 *     { name: "Item", fields: { part: { Physics: { Weight: "1" } } } },
 *     { name: "Dagger", parent: "Item", fields: { part: { MeleeWeapon: { BaseDamage: "1d4" } } } },
 * ]);
 *
 * const dagger = store.resolveReference("Dagger");
 * ```
 */
export class InMemoryBlueprintStore implements BlueprintStore {
    private readonly index: Map<string, Blueprint> = new Map();
    private readonly chains: Map<string, readonly Blueprint[]> = new Map();
    private readonly merged: Map<string, ReadonlyMap<string, FieldAttributes>> = new Map();

    /**
     * @throws InconsistentDataError on duplicate names, unknown parents or cycles
     */
    constructor(blueprints: Iterable<Blueprint>) {
        for (const blueprint of blueprints) {
            if (this.index.has(blueprint.name)) {
                throw new InconsistentDataError(`Duplicate blueprint: ${blueprint.name}`, blueprint.name);
            }
            this.index.set(blueprint.name, blueprint);
        }

        for (const blueprint of this.index.values()) {
            this.chains.set(blueprint.name, this.buildChain(blueprint));
        }
    }

    /**
     * Number of blueprints in the store.
     */
    get size(): number {
        return this.index.size;
    }

    /**
     * Blueprint names, in insertion order.
     */
    names(): string[] {
        return Array.from(this.index.keys());
    }

    fieldValue(entity: Blueprint, group: FieldGroup, key: string, attribute: string): string | undefined {
        for (const blueprint of this.chainOf(entity)) {
            const entry = blueprint.fields[group]?.[key];
            if (entry && Object.hasOwn(entry, attribute)) {
                return entry[attribute];
            }
        }
        return undefined;
    }

    inheritsFrom(entity: Blueprint, ancestorName: string): boolean {
        return this.chainOf(entity).some((blueprint) => blueprint.name === ancestorName);
    }

    isFieldPresent(entity: Blueprint, group: FieldGroup, key: string, attribute?: string): boolean {
        return declares(entity, group, key, attribute);
    }

    hasField(entity: Blueprint, group: FieldGroup, key: string, attribute?: string): boolean {
        return this.chainOf(entity).some((blueprint) => declares(blueprint, group, key, attribute));
    }

    entries(entity: Blueprint, group: FieldGroup): ReadonlyMap<string, FieldAttributes> {
        const cacheable = this.index.get(entity.name) === entity;
        const cacheKey = `${entity.name}\u0000${group}`;

        if (cacheable) {
            const cached = this.merged.get(cacheKey);
            if (cached) {
                return cached;
            }
        }

        const result = new Map<string, FieldAttributes>();
        for (const blueprint of [...this.chainOf(entity)].reverse()) {
            const own = blueprint.fields[group];
            if (!own) {
                continue;
            }
            for (const [key, attributes] of Object.entries(own)) {
                result.set(key, { ...result.get(key), ...attributes });
            }
        }

        if (cacheable) {
            this.merged.set(cacheKey, result);
        }
        return result;
    }

    resolveReference(name: string): Blueprint | undefined {
        return this.index.get(name);
    }

    parentOf(entity: Blueprint): Blueprint | undefined {
        return entity.parent === undefined ? undefined : this.index.get(entity.parent);
    }

    /**
     * The blueprint followed by its ancestors, nearest first.
     */
    private chainOf(entity: Blueprint): readonly Blueprint[] {
        const known = this.chains.get(entity.name);
        if (known && this.index.get(entity.name) === entity) {
            return known;
        }
        return this.buildChain(entity);
    }

    private buildChain(entity: Blueprint): Blueprint[] {
        const chain: Blueprint[] = [entity];
        const seen = new Set<string>([entity.name]);
        let current = entity;

        while (current.parent !== undefined) {
            const parent = this.index.get(current.parent);
            if (!parent) {
                throw new InconsistentDataError(
                    `Blueprint ${current.name} inherits from unknown blueprint ${current.parent}`,
                    current.parent
                );
            }
            if (seen.has(parent.name)) {
                throw new InconsistentDataError(`Inheritance cycle through ${parent.name}`, parent.name);
            }
            seen.add(parent.name);
            chain.push(parent);
            current = parent;
        }

        return chain;
    }
}

function declares(blueprint: Blueprint, group: FieldGroup, key: string, attribute?: string): boolean {
    const entry = blueprint.fields[group]?.[key];
    if (!entry) {
        return false;
    }
    return attribute === undefined || Object.hasOwn(entry, attribute);
}
