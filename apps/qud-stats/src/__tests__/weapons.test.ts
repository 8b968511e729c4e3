/**
 * @fileoverview Unit tests for weapon properties
 *
 * Tests cover:
 * - Projectile delegation and loader order
 * - Melee, missile and thrown damage and penetration
 * - Elemental mods
 * - Two-handedness
 *
 * @module domain/catalog/__tests__/weapons
 */

import { describe, it, expect } from "vitest";
import { InconsistentDataError } from "@bpstats/engine";
import {
    accuracy,
    ammo,
    ammodamagetypes,
    damage,
    elementaldamage,
    elementaltype,
    gasemitted,
    ismissile,
    isthrown,
    maxpv,
    projectileOf,
    pv,
    twohanded,
    weaponskill,
} from "../domain/catalog/weapons.js";
import { createStore, createTestContext, viewOf } from "./helpers.js";

const store = createStore([
    { name: "Projectile", parent: "Object", fields: {} },
    {
        name  : "Test Slug",
        parent: "Projectile",
        fields: {
            part: {
                Projectile: { BaseDamage: "1d8", BasePenetration: "3", Attributes: "Explosive  Fire" },
                GasOnHit  : { Blueprint: "PoisonGas" },
            },
        },
    },
    {
        name  : "Test Bio Spit",
        parent: "Projectile",
        fields: { part: { Projectile: { BaseDamage: "2d4", BasePenetration: "1" } } },
    },
    {
        name  : "MissileWeapon",
        parent: "Item",
        fields: { part: { MissileWeapon: { Skill: "Rifle" } } },
    },
    {
        name  : "Test Rifle",
        parent: "MissileWeapon",
        fields: {
            part: {
                BioAmmoLoader     : { ProjectileObject: "" },
                MagazineAmmoLoader: { ProjectileObject: "Test Slug", AmmoPart: "AmmoSlug" },
            },
        },
    },
    {
        name  : "Test Spitter",
        parent: "MissileWeapon",
        fields: {
            part: {
                BioAmmoLoader     : { ProjectileObject: "Test Bio Spit" },
                MagazineAmmoLoader: { ProjectileObject: "Test Slug" },
            },
        },
    },
    {
        name  : "Test Broken Launcher",
        parent: "MissileWeapon",
        fields: { part: { EnergyAmmoLoader: { ProjectileObject: "Missing Bolt" } } },
    },
    {
        name  : "MeleeWeapon",
        parent: "Item",
        fields: { part: { MeleeWeapon: { BaseDamage: "1d2" } } },
    },
    {
        name  : "Test Long Sword",
        parent: "MeleeWeapon",
        fields: {
            part: { MeleeWeapon: { BaseDamage: "1d8", PenBonus: "1", MaxStrengthBonus: "3", Skill: "LongBlades" } },
        },
    },
    {
        name  : "Test Flaming Sword",
        parent: "Test Long Sword",
        fields: { part: { ModFlaming: { Tier: "5" } } },
    },
    {
        name  : "Test Battle Axe",
        parent: "MeleeWeapon",
        fields: { part: { Physics: { UsesTwoSlots: "true" } } },
    },
    {
        name  : "Test Snout",
        parent: "Test Battle Axe",
        fields: { tag: { UsesSlots: { Value: "Face" } } },
    },
    {
        name  : "Test Throwing Star",
        parent: "Item",
        fields: { part: { ThrownWeapon: {} } },
    },
]);

describe("weapon properties", () => {
    describe("projectileOf", () => {
        // Scenario: Empty loader entries are skipped
        it("should take the first loader that names a projectile", () => {
            expect(projectileOf(viewOf(store, "Test Rifle"))?.name).toBe("Test Slug");
        });

        // Scenario: Bio loader comes before the magazine
        it("should follow the loader order", () => {
            expect(projectileOf(viewOf(store, "Test Spitter"))?.name).toBe("Test Bio Spit");
        });

        // Scenario: Not a missile weapon
        it("should return undefined for weapons without a projectile", () => {
            expect(projectileOf(viewOf(store, "Test Long Sword"))).toBeUndefined();
        });

        // Scenario: Loader names a blueprint the store does not have
        it("should throw for an unknown projectile", () => {
            const launcher = viewOf(store, "Test Broken Launcher");

            expect(() => damage(launcher)).toThrow(InconsistentDataError);
            expect(() => damage(launcher)).toThrow("Unknown projectile blueprint: Missing Bolt");
        });
    });

    describe("missile weapons", () => {
        // Scenario: Rifle firing slugs
        it("should delegate damage, penetration and gas to the projectile", () => {
            const rifle = viewOf(store, "Test Rifle");

            expect(damage(rifle)).toBe("1d8");
            expect(pv(rifle)).toBe(7);
            expect(ammodamagetypes(rifle)).toEqual(["Explosive", "Fire"]);
            expect(gasemitted(rifle)).toBe("PoisonGas");
        });

        // Scenario: Defaults and lookups
        it("should report accuracy, ammo, skill and the missile flag", () => {
            const rifle = viewOf(store, "Test Rifle");
            const context = createTestContext({ ammoTypes: { AmmoSlug: "lead slug" } });

            expect(accuracy(rifle)).toBe(0);
            expect(ammo(rifle, context)).toBe("lead slug");
            expect(weaponskill(rifle)).toBe("Rifle");
            expect(ismissile(rifle)).toBe(true);
            expect(twohanded(rifle)).toBe(false);
        });
    });

    describe("melee weapons", () => {
        // Scenario: Penetration 4 plus bonus, capped by strength bonus
        it("should compute damage, penetration and skill", () => {
            const sword = viewOf(store, "Test Long Sword");

            expect(damage(sword)).toBe("1d8");
            expect(pv(sword)).toBe(5);
            expect(maxpv(sword)).toBe(8);
            expect(weaponskill(sword)).toBe("LongBlades");
            expect(accuracy(sword)).toBeUndefined();
        });

        // Scenario: Flaming mod tier 5
        it("should derive elemental damage from an elemental mod", () => {
            const sword = viewOf(store, "Test Flaming Sword");

            expect(elementaldamage(sword)).toBe("4-6");
            expect(elementaltype(sword)).toBe("Fire");
        });

        // Scenario: Two-handed unless worn on a non-hand slot
        it("should report two-handedness", () => {
            expect(twohanded(viewOf(store, "Test Long Sword"))).toBe(false);
            expect(twohanded(viewOf(store, "Test Battle Axe"))).toBe(true);
            expect(twohanded(viewOf(store, "Test Snout"))).toBeUndefined();
        });
    });

    describe("thrown weapons", () => {
        // Scenario: Thrown defaults
        it("should default damage to 1 and penetration to 5", () => {
            const star = viewOf(store, "Test Throwing Star");

            expect(damage(star)).toBe("1");
            expect(pv(star)).toBe(5);
            expect(isthrown(star)).toBe(true);
            expect(twohanded(star)).toBeUndefined();
        });
    });
});
