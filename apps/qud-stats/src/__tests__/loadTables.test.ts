/**
 * @fileoverview Unit tests for loadTables configuration module
 *
 * Tests cover:
 * - loadTables function
 * - loadTablesWithFallback function
 * - Default file paths
 * - Error handling for invalid files
 *
 * @module config/__tests__/loadTables
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

const fsMocks = vi.hoisted(() => ({
    readFileSync: vi.fn<[string, string], string>(),
    existsSync  : vi.fn<[string], boolean>(),
}));

vi.mock("fs", () => fsMocks);

import {
    getDefaultPropertiesPath,
    getDefaultTablesPath,
    loadTables,
    loadTablesWithFallback,
} from "../config/loadTables.js";
import { emptyTables } from "../domain/tables.js";

const mockExistsSync = fsMocks.existsSync;
const mockReadFileSync = fsMocks.readFileSync;

describe("loadTables", () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    describe("loadTables", () => {
        // Scenario: Load a file with every kind of section
        it("should parse strings, lists, integers and mod entries", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue(`
bitCodes: RGBCrgbcKM
ammoTypes:
  AmmoSlug: lead slug
ignoredChargeParts: [ProgrammableRecoiler]
chargeUseOverrides:
  Test Borer: 500
itemMods:
  ModSharp: { complexity: 1 }
  ModMasterwork: { complexity: 2, ifComplex: true }
egoOverrides:
  Test Shield: 1
descriptionAttributeOverrides:
  Test Prism:
    ego: '+1'
`);

            const tables = loadTables("/path/to/tables.yml");

            expect(tables.bitCodes).toBe("RGBCrgbcKM");
            expect(tables.ammoTypes).toEqual({ AmmoSlug: "lead slug" });
            expect(tables.ignoredChargeParts).toEqual(["ProgrammableRecoiler"]);
            expect(tables.chargeUseOverrides).toEqual({ "Test Borer": 500 });
            expect(tables.itemMods).toEqual({
                ModSharp     : { complexity: 1, ifComplex: false },
                ModMasterwork: { complexity: 2, ifComplex: true },
            });
            expect(tables.egoOverrides).toEqual({ "Test Shield": "1" });
            expect(tables.descriptionAttributeOverrides).toEqual({ "Test Prism": { ego: "+1" } });
        });

        // Scenario: Missing sections default to empty tables
        it("should default missing sections to empty", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("ammoTypes:\n  AmmoDart: dart\n");

            const tables = loadTables("/path/to/tables.yml");

            expect(tables).toEqual({ ...emptyTables(), ammoTypes: { AmmoDart: "dart" } });
        });

        // Scenario: An empty file is a file with no sections
        it("should treat an empty file as empty tables", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("");

            expect(loadTables("/path/to/tables.yml")).toEqual(emptyTables());
        });

        // Scenario: File doesn't exist
        it("should throw error when file doesn't exist", () => {
            mockExistsSync.mockReturnValue(false);

            expect(() => loadTables("/nonexistent/tables.yml")).toThrow(
                "Tables file not found: /nonexistent/tables.yml"
            );
        });

        // Scenario: Top level is a list
        it("should throw error when the file is not a mapping", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("- one\n- two\n");

            expect(() => loadTables("/path/to/tables.yml")).toThrow(
                "Invalid tables file format: expected a mapping of sections"
            );
        });

        // Scenario: Bit codes must cover the ten digits
        it("should throw error when bitCodes has the wrong length", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("bitCodes: RGB\n");

            expect(() => loadTables("/path/to/tables.yml")).toThrow(
                "Invalid tables file: 'bitCodes' must have one letter per digit"
            );
        });

        // Scenario: Charge overrides must be integers
        it("should throw error when an override is not an integer", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("chargeUseOverrides:\n  Test Borer: lots\n");

            expect(() => loadTables("/path/to/tables.yml")).toThrow(
                "Invalid tables file: 'chargeUseOverrides.Test Borer' must be an integer"
            );
        });

        // Scenario: List sections must hold strings
        it("should throw error when a list section holds a mapping", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("hiddenDescriptions:\n  - { text: nope }\n");

            expect(() => loadTables("/path/to/tables.yml")).toThrow(
                "Invalid tables file: 'hiddenDescriptions' must be a list of strings"
            );
        });
    });

    describe("loadTablesWithFallback", () => {
        // Scenario: Fall back to empty tables when the file is missing
        it("should return empty tables and warn when loading fails", () => {
            const consoleSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
            mockExistsSync.mockReturnValue(false);

            const tables = loadTablesWithFallback("/nonexistent/tables.yml");

            expect(tables).toEqual(emptyTables());
            expect(consoleSpy).toHaveBeenCalledWith(
                "Failed to load tables from /nonexistent/tables.yml:",
                expect.any(Error)
            );

            consoleSpy.mockRestore();
        });

        // Scenario: Valid file loads normally
        it("should return loaded tables when the file is valid", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("wornOnOverrides:\n  Hooks: Feet\n");

            expect(loadTablesWithFallback("/path/to/tables.yml").wornOnOverrides).toEqual({ Hooks: "Feet" });
        });
    });

    describe("default paths", () => {
        // Scenario: Bundled configuration files
        it("should point at the bundled config directory", () => {
            expect(getDefaultTablesPath()).toMatch(/config[\\/]tables\.yml$/);
            expect(getDefaultPropertiesPath()).toMatch(/config[\\/]properties\.yml$/);
        });
    });
});
