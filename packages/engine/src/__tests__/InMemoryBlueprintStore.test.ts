/**
 * @fileoverview Unit tests for InMemoryBlueprintStore and BlueprintView
 *
 * Tests cover:
 * - Nearest-ancestor field resolution
 * - Own versus inherited presence
 * - Merged entries
 * - Tree validation
 *
 * @module @bpstats/engine/__tests__/InMemoryBlueprintStore
 */

import { describe, it, expect } from "vitest";
import { InMemoryBlueprintStore } from "../impl/InMemoryBlueprintStore.js";
import { BlueprintView } from "../engine/BlueprintView.js";
import { InconsistentDataError } from "../contracts/errors.js";
import type { Blueprint } from "../contracts/Blueprint.js";

const kBLUEPRINTS: Blueprint[] = [
    {
        name  : "Object",
        fields: {
            part: { Physics: { Weight: "1", Takeable: "true" } },
            tag : { Tier: { Value: "1" } },
        },
    },
    {
        name  : "Item",
        parent: "Object",
        fields: {
            part: {
                Physics    : { Weight: "5" },
                Description: { Short: "an item" },
            },
        },
    },
    {
        name  : "Dagger",
        parent: "Item",
        fields: {
            part: {
                MeleeWeapon: { BaseDamage: "1d4" },
                Physics    : { Category: "Weapons" },
            },
            tag: { Tier: {} },
        },
    },
];

function lookup(store: InMemoryBlueprintStore, name: string): Blueprint {
    const blueprint = store.resolveReference(name);
    if (!blueprint) {
        throw new Error(`missing fixture ${name}`);
    }
    return blueprint;
}

describe("InMemoryBlueprintStore", () => {
    const store = new InMemoryBlueprintStore(kBLUEPRINTS);
    const dagger = lookup(store, "Dagger");
    const item = lookup(store, "Item");
    const root = lookup(store, "Object");

    describe("fieldValue", () => {
        // Scenario: Nearest ancestor wins, attribute by attribute
        it("should resolve each attribute from the nearest declaring blueprint", () => {
            expect(store.fieldValue(dagger, "part", "Physics", "Weight")).toBe("5");
            expect(store.fieldValue(dagger, "part", "Physics", "Takeable")).toBe("true");
            expect(store.fieldValue(dagger, "part", "Physics", "Category")).toBe("Weapons");
        });

        // Scenario: An own entry without the attribute still inherits it
        it("should look past an own entry that lacks the attribute", () => {
            expect(store.fieldValue(dagger, "tag", "Tier", "Value")).toBe("1");
        });

        // Scenario: Absent everywhere
        it("should return undefined for absent fields", () => {
            expect(store.fieldValue(dagger, "part", "Armor", "AV")).toBeUndefined();
        });
    });

    describe("presence", () => {
        // Scenario: Own versus inherited
        it("should distinguish own declaration from inheritance", () => {
            expect(store.isFieldPresent(dagger, "part", "Physics")).toBe(true);
            expect(store.isFieldPresent(dagger, "part", "Physics", "Weight")).toBe(false);
            expect(store.hasField(dagger, "part", "Physics", "Weight")).toBe(true);
            expect(store.isFieldPresent(dagger, "tag", "Tier")).toBe(true);
            expect(store.isFieldPresent(dagger, "tag", "Tier", "Value")).toBe(false);
            expect(store.hasField(dagger, "part", "Armor")).toBe(false);
        });
    });

    describe("entries", () => {
        // Scenario: Ancestors first, attributes merged
        it("should merge entries along the chain", () => {
            const parts = store.entries(dagger, "part");

            expect([...parts.keys()]).toEqual(["Physics", "Description", "MeleeWeapon"]);
            expect(parts.get("Physics")).toEqual({ Weight: "5", Takeable: "true", Category: "Weapons" });
        });

        // Scenario: Merged view is built once per blueprint and group
        it("should return the cached view on repeat calls", () => {
            expect(store.entries(dagger, "part")).toBe(store.entries(dagger, "part"));
        });

        // Scenario: Group declared nowhere
        it("should return an empty map for an unused group", () => {
            expect(store.entries(dagger, "mutation").size).toBe(0);
        });
    });

    describe("inheritance", () => {
        it("should answer ancestry and parent queries", () => {
            expect(store.inheritsFrom(dagger, "Object")).toBe(true);
            expect(store.inheritsFrom(dagger, "Dagger")).toBe(true);
            expect(store.inheritsFrom(item, "Dagger")).toBe(false);
            expect(store.parentOf(dagger)?.name).toBe("Item");
            expect(store.parentOf(root)).toBeUndefined();
            expect(store.resolveReference("Nope")).toBeUndefined();
        });

        it("should list blueprints in insertion order", () => {
            expect(store.size).toBe(3);
            expect(store.names()).toEqual(["Object", "Item", "Dagger"]);
        });
    });

    describe("validation", () => {
        // Scenario: Duplicate names
        it("should reject duplicate names", () => {
            expect(() => new InMemoryBlueprintStore([
                { name: "A", fields: {} },
                { name: "A", fields: {} },
            ])).toThrow("Duplicate blueprint: A");
        });

        // Scenario: Unknown parent
        it("should reject unknown parents", () => {
            expect(() => new InMemoryBlueprintStore([
                { name: "B", parent: "Missing", fields: {} },
            ])).toThrow("Blueprint B inherits from unknown blueprint Missing");
        });

        // Scenario: Cycle
        it("should reject inheritance cycles", () => {
            expect(() => new InMemoryBlueprintStore([
                { name: "A", parent: "B", fields: {} },
                { name: "B", parent: "A", fields: {} },
            ])).toThrow(InconsistentDataError);
        });
    });
});

describe("BlueprintView", () => {
    const store = new InMemoryBlueprintStore(kBLUEPRINTS);
    const view = new BlueprintView(lookup(store, "Dagger"), store);

    it("should read typed fields", () => {
        expect(view.name).toBe("Dagger");
        expect(view.part("Physics", "Weight")).toBe("5");
        expect(view.part("MeleeWeapon", "BaseDamage")).toBe("1d4");
        expect(view.tag("Tier")).toBe("1");
        expect(view.stat("Strength")).toBeUndefined();
    });

    it("should report presence", () => {
        expect(view.hasPart("MeleeWeapon")).toBe(true);
        expect(view.hasPart("Armor")).toBe(false);
        expect(view.hasTag("Tier")).toBe(true);
        expect(view.specified("tag", "Tier")).toBe(true);
        expect(view.specified("part", "Description")).toBe(false);
        expect(view.has("part", "Description", "Short")).toBe(true);
    });

    it("should navigate to related blueprints", () => {
        expect(view.parent()?.name).toBe("Item");
        expect(view.resolve("Object")?.part("Physics", "Weight")).toBe("1");
        expect(view.resolve("Nope")).toBeUndefined();
        expect(view.inheritsFrom("Item")).toBe(true);
    });
});
