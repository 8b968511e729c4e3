/**
 * @fileoverview Unit tests for creature properties
 *
 * @module domain/catalog/__tests__/creatures
 */

import { describe, it, expect } from "vitest";
import {
    bleedliquid,
    corpse,
    corpsechance,
    demeanor,
    dynamictable,
    faction,
    gender,
    hp,
    hurtbydefoliant,
    inventory,
    lv,
    movespeed,
    mutations,
    phase,
    skills,
    xptier,
    xpvalue,
} from "../domain/catalog/creatures.js";
import { createStore, createTestContext, viewOf } from "./helpers.js";

const store = createStore([
    {
        name  : "Test Villager",
        parent: "Creature",
        fields: {
            part: {
                Brain : { Factions: "Joppa-100,Villagers,Farmers-x50", Calm: "true" },
                Corpse: { CorpseChance: "30", CorpseBlueprint: "Test Villager Corpse" },
            },
            tag: {
                "BleedLiquid"              : { Value: "blood-1000" },
                "Gender"                   : { Value: "female" },
                "DynamicObjectsTable:Joppa": {},
            },
            stat: {
                Level    : { Value: "6" },
                Hitpoints: { Value: "20" },
                XPValue  : { Value: "*XP" },
                MoveSpeed: { Value: "100" },
            },
            property : { Role: { Value: "Leader" } },
            inventory: {
                "Test Club" : { Number: "2", Chance: "50" },
                "*Junk 2"   : {},
                "Test Bread": {},
            },
            skill: { Cudgel: {} },
        },
    },
    {
        name  : "Test Villager Child",
        parent: "Test Villager",
        fields: { tag: { "DynamicObjectsTable:Joppa": { Value: "{{{remove}}}" } } },
    },
    {
        name  : "Test Oil Robot",
        parent: "Creature",
        fields: {
            part: {
                Roboticized: { ChanceOneIn: "1" },
                Corpse     : { CorpseChance: "50", CorpseBlueprint: "Test Scrap" },
            },
            mutation: {
                IrritatingGases: { Level: "3", GasObject: "ConfusionGas" },
                Stinger        : {},
            },
            stat: { Level: { Value: "10-12" }, XPValue: { Value: "*XP" } },
        },
    },
    {
        name  : "Test Hero",
        parent: "Creature",
        fields: {
            stat    : { Level: { Value: "4" }, XPValue: { Value: "*XP" } },
            property: { Role: { Value: "Hero" } },
        },
    },
    {
        name  : "Test Skirmisher",
        parent: "Creature",
        fields: {
            stat    : { Level: { Value: "4" }, XPValue: { Value: "*XP" } },
            property: { Role: { Value: "Skirmisher" } },
        },
    },
    {
        name  : "Test Grunt",
        parent: "Creature",
        fields: { stat: { Level: { Value: "3" }, XPValue: { Value: "*XP" } } },
    },
    {
        name  : "Test Brute",
        parent: "Creature",
        fields: { stat: { Level: { Value: "3" }, XPValue: { Value: "150" } } },
    },
    {
        name  : "Test Snapper",
        parent: "Creature",
        fields: { part: { Brain: { Hostile: "True" } } },
    },
    {
        name  : "Test Slime",
        parent: "Creature",
        fields: { tag: { BleedLiquid: { Value: "slime-1000" } } },
    },
    { name: "Test Ghost", parent: "Creature", fields: { tag: { Astral: {} } } },
    { name: "Test Hologram", parent: "Creature", fields: { part: { HologramMaterial: {} } } },
    {
        name  : "Test Spider",
        parent: "Creature",
        fields: { mutation: { Spinnerets: { Level: "1", Phase: "True" } } },
    },
    { name: "Test Shrub", parent: "Wall", fields: { tag: { LivePlant: {} } } },
    { name: "Test Walking Vine", parent: "Creature", fields: { tag: { LivePlant: {} } } },
]);

describe("creature properties", () => {
    describe("faction", () => {
        // Scenario: One good segment, one without a value, one with a non-numeric value
        it("should keep well-formed segments and warn about the rest", () => {
            const context = createTestContext();

            expect(faction(viewOf(store, "Test Villager"), context)).toEqual([["Joppa", 100]]);
            expect(context.logger.warn).toHaveBeenCalledTimes(2);
            expect(context.logger.warn).toHaveBeenCalledWith(
                "Skipping malformed faction segment",
                { segment: "Villagers" }
            );
            expect(context.logger.warn).toHaveBeenCalledWith(
                "Skipping malformed faction segment",
                { segment: "Farmers-x50" }
            );
        });

        // Scenario: No factions
        it("should return undefined without factions", () => {
            expect(faction(viewOf(store, "Test Hero"), createTestContext())).toBeUndefined();
        });
    });

    describe("mutations", () => {
        // Scenario: Gas mutation, level-less mutation, robot dark vision
        it("should list mutations and give robots dark vision", () => {
            expect(mutations(viewOf(store, "Test Oil Robot"))).toEqual([
                ["IrritatingGasesConfusionGas", 3],
                ["Stinger", 0],
                ["DarkVision", 12],
            ]);
        });

        // Scenario: No mutations
        it("should return undefined without mutations", () => {
            expect(mutations(viewOf(store, "Test Villager"))).toBeUndefined();
        });
    });

    describe("xpvalue", () => {
        // Scenario: *XP by role
        it("should scale *XP by level and role", () => {
            const context = createTestContext();

            expect(xpvalue(viewOf(store, "Test Villager"), context)).toBe(300);
            expect(xpvalue(viewOf(store, "Test Hero"), context)).toBe(400);
            expect(xpvalue(viewOf(store, "Test Skirmisher"), context)).toBe(100);
            expect(xpvalue(viewOf(store, "Test Grunt"), context)).toBe(30);
        });

        // Scenario: Fixed experience
        it("should read a fixed value", () => {
            expect(xpvalue(viewOf(store, "Test Brute"), createTestContext())).toBe(150);
        });

        // Scenario: Range level 10-12 scales like level 10, as the tier does
        it("should use the first number of a range level", () => {
            const context = createTestContext();
            const robot = viewOf(store, "Test Oil Robot");

            expect(xpvalue(robot, context)).toBe(100);
            expect(xptier(robot, context)).toBe(2);
            expect(context.logger.debug).toHaveBeenCalledWith(
                "Level given as a range, using its first number",
                { level: "10-12" }
            );
        });
    });

    describe("levels", () => {
        // Scenario: Plain and range levels
        it("should report the raw level and its tier", () => {
            const context = createTestContext();

            expect(lv(viewOf(store, "Test Villager"))).toBe("6");
            expect(xptier(viewOf(store, "Test Villager"), context)).toBe(1);
            expect(xptier(viewOf(store, "Test Oil Robot"), context)).toBe(2);
            expect(context.logger.debug).toHaveBeenCalledWith(
                "Level given as a range, using its first number",
                { level: "10-12" }
            );
        });
    });

    describe("inventory", () => {
        // Scenario: Population rolls are skipped
        it("should list blueprint references with count and chance", () => {
            expect(inventory(viewOf(store, "Test Villager"))).toEqual([
                ["Test Club", "2", "no", "50"],
                ["Test Bread", "1", "no", "100"],
            ]);
        });

        // Scenario: Empty inventory
        it("should return undefined without an inventory", () => {
            expect(inventory(viewOf(store, "Test Hero"))).toBeUndefined();
        });
    });

    describe("demeanor", () => {
        // Scenario: Calm and hostile brains
        it("should read calm and hostile flags", () => {
            expect(demeanor(viewOf(store, "Test Villager"))).toBe("docile");
            expect(demeanor(viewOf(store, "Test Snapper"))).toBe("aggressive");
            expect(demeanor(viewOf(store, "Test Hero"))).toBeUndefined();
        });
    });

    describe("corpse", () => {
        // Scenario: Corpse with a chance
        it("should report the corpse and its chance", () => {
            expect(corpsechance(viewOf(store, "Test Villager"))).toBe(30);
            expect(corpse(viewOf(store, "Test Villager"))).toBe("Test Villager Corpse");
        });

        // Scenario: Robots leave no corpse
        it("should give robots no corpse", () => {
            expect(corpsechance(viewOf(store, "Test Oil Robot"))).toBeUndefined();
            expect(corpse(viewOf(store, "Test Oil Robot"))).toBeUndefined();
        });
    });

    describe("bleedliquid", () => {
        // Scenario: Blood, oil and slime
        it("should report liquids other than blood", () => {
            expect(bleedliquid(viewOf(store, "Test Villager"))).toBeUndefined();
            expect(bleedliquid(viewOf(store, "Test Oil Robot"))).toBe("oil");
            expect(bleedliquid(viewOf(store, "Test Slime"))).toBe("slime");
        });
    });

    describe("phase", () => {
        // Scenario: Hologram, astral tag and phasing spinnerets
        it("should report unusual phases", () => {
            expect(phase(viewOf(store, "Test Hologram"))).toBe("omniphase");
            expect(phase(viewOf(store, "Test Ghost"))).toBe("out of phase");
            expect(phase(viewOf(store, "Test Spider"))).toBe("out of phase");
            expect(phase(viewOf(store, "Test Villager"))).toBeUndefined();
        });
    });

    describe("dynamictable", () => {
        // Scenario: A descendant removes the inherited table
        it("should list tables and honor removals", () => {
            expect(dynamictable(viewOf(store, "Test Villager"))).toEqual(["Joppa"]);
            expect(dynamictable(viewOf(store, "Test Villager Child"))).toBeUndefined();
        });
    });

    describe("hurtbydefoliant", () => {
        // Scenario: Live plant with and without combat
        it("should rate plants without combat as badly hurt", () => {
            expect(hurtbydefoliant(viewOf(store, "Test Walking Vine"))).toBe(1);
            expect(hurtbydefoliant(viewOf(store, "Test Shrub"))).toBe(2);
            expect(hurtbydefoliant(viewOf(store, "Test Villager"))).toBeUndefined();
        });
    });

    describe("simple creature facts", () => {
        // Scenario: Hit points, gender, speed and skills
        it("should read hit points, gender, move speed and skills", () => {
            const villager = viewOf(store, "Test Villager");

            expect(hp(villager)).toBe("20");
            expect(gender(villager)).toBe("female");
            expect(movespeed(villager)).toBe(100);
            expect(skills(villager)).toEqual(["Cudgel"]);
        });
    });
});
