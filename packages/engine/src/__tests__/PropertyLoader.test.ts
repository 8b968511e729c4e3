/**
 * @fileoverview Unit tests for PropertyLoader
 *
 * Tests cover:
 * - createPropertyFromYaml factory
 * - Definition validation
 * - YAML file loading
 *
 * @module @bpstats/engine/__tests__/PropertyLoader
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

const fsMocks = vi.hoisted(() => ({
    readFileSync: vi.fn<[string, string], string>(),
}));

vi.mock("fs", () => fsMocks);

import {
    PropertyLoader,
    createPropertyFromYaml,
    isYamlPropertyDefinition,
    type PropertyLoaderLogger,
} from "../plugins/PropertyLoader.js";
import { InMemoryBlueprintStore } from "../impl/InMemoryBlueprintStore.js";
import { BlueprintView } from "../engine/BlueprintView.js";
import { InconsistentDataError } from "../contracts/errors.js";

const mockReadFileSync = fsMocks.readFileSync;

function createMockLogger(): PropertyLoaderLogger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

const store = new InMemoryBlueprintStore([
    { name: "Food", fields: { part: { Food: { Satiation: "Snack", Healing: "1d4" } } } },
    { name: "Hedge", fields: { part: { Hidden: { Difficulty: "15" } }, intproperty: { Weight: { Value: "2.5" } } } },
    { name: "Odd", fields: { part: { Hidden: { Difficulty: "high" } } } },
]);

function view(name: string): BlueprintView {
    const blueprint = store.resolveReference(name);
    if (!blueprint) {
        throw new Error(`missing fixture ${name}`);
    }
    return new BlueprintView(blueprint, store);
}

const kCONTEXT = { logger: createMockLogger(), traceId: "tr_test" };

describe("createPropertyFromYaml", () => {
    // Scenario: String field read
    it("should read a string field", () => {
        const property = createPropertyFromYaml({
            name       : "hunger",
            description: "How much hunger it satiates.",
            field      : { group: "part", key: "Food", attribute: "Satiation" },
        });

        expect(property.id).toBe("hunger");
        expect(property.description).toBe("How much hunger it satiates.");
        expect(property.evaluate(view("Food"), kCONTEXT)).toBe("Snack");
        expect(property.evaluate(view("Hedge"), kCONTEXT)).toBeUndefined();
    });

    // Scenario: Integer conversion
    it("should convert integer fields", () => {
        const property = createPropertyFromYaml({
            name : "hidden",
            field: { group: "part", key: "Hidden", attribute: "Difficulty" },
            type : "int",
        });

        expect(property.evaluate(view("Hedge"), kCONTEXT)).toBe(15);
        expect(() => property.evaluate(view("Odd"), kCONTEXT)).toThrow(InconsistentDataError);
    });

    // Scenario: Attribute defaults to Value
    it("should read the Value attribute by default", () => {
        const property = createPropertyFromYaml({
            name : "weightfactor",
            field: { group: "intproperty", key: "Weight" },
            type : "float",
        });

        expect(property.evaluate(view("Hedge"), kCONTEXT)).toBe(2.5);
    });
});

describe("isYamlPropertyDefinition", () => {
    it("should accept complete definitions", () => {
        expect(isYamlPropertyDefinition({ name: "a", field: { group: "part", key: "B" } })).toBe(true);
        expect(isYamlPropertyDefinition({ name: "a", field: { group: "stat", key: "B", attribute: "C" }, type: "int" })).toBe(true);
    });

    it("should reject incomplete or unknown shapes", () => {
        expect(isYamlPropertyDefinition(null)).toBe(false);
        expect(isYamlPropertyDefinition({ name: "a" })).toBe(false);
        expect(isYamlPropertyDefinition({ name: "", field: { group: "part", key: "B" } })).toBe(false);
        expect(isYamlPropertyDefinition({ name: "a", field: { group: "widget", key: "B" } })).toBe(false);
        expect(isYamlPropertyDefinition({ name: "a", field: { group: "part", key: 3 } })).toBe(false);
        expect(isYamlPropertyDefinition({ name: "a", field: { group: "part", key: "B" }, type: "date" })).toBe(false);
    });
});

describe("PropertyLoader", () => {
    let logger: PropertyLoaderLogger;
    let loader: PropertyLoader;

    beforeEach(() => {
        vi.clearAllMocks();
        logger = createMockLogger();
        loader = new PropertyLoader({ logger });
    });

    describe("loadYamlFile", () => {
        // Scenario: List of definitions with one invalid entry
        it("should load valid definitions and skip invalid ones", () => {
            mockReadFileSync.mockReturnValue(`
- name: hunger
  field: { group: part, key: Food, attribute: Satiation }
- name: broken
- name: healing
  field:
    group: part
    key: Food
    attribute: Healing
`);

            const properties = loader.loadYamlFile("/config/properties.yml");

            expect(properties.map((property) => property.id)).toEqual(["hunger", "healing"]);
            expect(properties[1].evaluate(view("Food"), kCONTEXT)).toBe("1d4");
            expect(logger.warn).toHaveBeenCalledWith(
                "Skipping invalid property definition",
                { filePath: "/config/properties.yml", definition: { name: "broken" } }
            );
        });

        // Scenario: Single definition
        it("should accept a single definition", () => {
            mockReadFileSync.mockReturnValue("name: hidden\nfield: { group: part, key: Hidden, attribute: Difficulty }\ntype: int\n");

            const properties = loader.loadYamlFile("/config/hidden.yml");

            expect(properties).toHaveLength(1);
            expect(properties[0].evaluate(view("Hedge"), kCONTEXT)).toBe(15);
        });

        // Scenario: Empty file
        it("should return nothing for an empty file", () => {
            mockReadFileSync.mockReturnValue("");

            expect(loader.loadYamlFile("/config/empty.yml")).toEqual([]);
        });

        // Scenario: Unreadable file
        it("should let read errors reach the caller", () => {
            mockReadFileSync.mockImplementation(() => {
                throw new Error("EACCES");
            });

            expect(() => loader.loadYamlFile("/config/locked.yml")).toThrow("EACCES");
        });
    });
});
