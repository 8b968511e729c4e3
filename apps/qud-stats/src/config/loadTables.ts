/**
 * @fileoverview Static Table Loader
 *
 * Loads the catalog's lookup tables from a YAML configuration file.
 *
 * @module config/loadTables
 */

import { readFileSync, existsSync } from "fs";
import { fileURLToPath } from "url";
import { parse as parseYaml } from "yaml";
import { emptyTables, type ItemModProps, type QudTables } from "../domain/tables.js";

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(raw: unknown, section: string): string {
    if (raw === undefined) {
        return "";
    }
    if (typeof raw !== "string") {
        throw new Error(`Invalid tables file: '${section}' must be a string`);
    }
    return raw;
}

function readStringList(raw: unknown, section: string): string[] {
    if (raw === undefined) {
        return [];
    }
    if (!Array.isArray(raw) || !raw.every((entry): entry is string => typeof entry === "string")) {
        throw new Error(`Invalid tables file: '${section}' must be a list of strings`);
    }
    return raw;
}

function readMap<T>(
    raw: unknown,
    section: string,
    readEntry: (value: unknown, key: string) => T
): Record<string, T> {
    if (raw === undefined) {
        return {};
    }
    if (!isRecord(raw)) {
        throw new Error(`Invalid tables file: '${section}' must be a mapping`);
    }

    const result: Record<string, T> = {};
    for (const [key, value] of Object.entries(raw)) {
        result[key] = readEntry(value, `${section}.${key}`);
    }
    return result;
}

function stringEntry(value: unknown, path: string): string {
    // YAML reads bare numbers as numbers; table values are text
    if (typeof value === "number") {
        return String(value);
    }
    if (typeof value !== "string") {
        throw new Error(`Invalid tables file: '${path}' must be a string`);
    }
    return value;
}

function numberEntry(value: unknown, path: string): number {
    if (typeof value !== "number" || !Number.isInteger(value)) {
        throw new Error(`Invalid tables file: '${path}' must be an integer`);
    }
    return value;
}

function itemModEntry(value: unknown, path: string): ItemModProps {
    if (!isRecord(value)) {
        throw new Error(`Invalid tables file: '${path}' must be a mapping`);
    }
    const ifComplex = value.ifComplex ?? false;
    if (typeof ifComplex !== "boolean") {
        throw new Error(`Invalid tables file: '${path}.ifComplex' must be a boolean`);
    }
    return {
        complexity: numberEntry(value.complexity, `${path}.complexity`),
        ifComplex,
    };
}

/**
 * Load the static tables from a YAML file.
 *
 * Every section is optional and defaults to an empty table.
 *
 * @param filePath - Path to the tables.yml file
 * @throws Error if the file doesn't exist or a section has the wrong shape
 *
 * @example
 * ```typescript
 * const tables = loadTables("./config/tables.yml");
 * tables.ammoTypes.AmmoSlug; // "lead slug"
 * ```
 */
export function loadTables(filePath: string): QudTables {
    if (!existsSync(filePath)) {
        throw new Error(`Tables file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    const parsed: unknown = parseYaml(content) ?? {};

    if (!isRecord(parsed)) {
        throw new Error("Invalid tables file format: expected a mapping of sections");
    }

    const bitCodes = readString(parsed.bitCodes, "bitCodes");
    if (bitCodes !== "" && bitCodes.length !== 10) {
        throw new Error("Invalid tables file: 'bitCodes' must have one letter per digit");
    }

    return {
        bitCodes,
        ammoTypes                    : readMap(parsed.ammoTypes, "ammoTypes", stringEntry),
        ignoredChargeParts           : readStringList(parsed.ignoredChargeParts, "ignoredChargeParts"),
        chargeUseOverrides           : readMap(parsed.chargeUseOverrides, "chargeUseOverrides", numberEntry),
        chargeUseReasons             : readMap(parsed.chargeUseReasons, "chargeUseReasons", stringEntry),
        chargeFunctionLabels         : readMap(parsed.chargeFunctionLabels, "chargeFunctionLabels", stringEntry),
        chargeFunctionFallbackLabels : readMap(parsed.chargeFunctionFallbackLabels, "chargeFunctionFallbackLabels", stringEntry),
        itemMods                     : readMap(parsed.itemMods, "itemMods", itemModEntry),
        factionNames                 : readMap(parsed.factionNames, "factionNames", stringEntry),
        cyberneticsInfixes           : readMap(parsed.cyberneticsInfixes, "cyberneticsInfixes", stringEntry),
        cyberneticsPostfixes         : readMap(parsed.cyberneticsPostfixes, "cyberneticsPostfixes", stringEntry),
        behaviorDescriptionParts     : readStringList(parsed.behaviorDescriptionParts, "behaviorDescriptionParts"),
        titleOverrides               : readMap(parsed.titleOverrides, "titleOverrides", stringEntry),
        egoOverrides                 : readMap(parsed.egoOverrides, "egoOverrides", stringEntry),
        egoBonusDice                 : readMap(parsed.egoBonusDice, "egoBonusDice", stringEntry),
        wornOnOverrides              : readMap(parsed.wornOnOverrides, "wornOnOverrides", stringEntry),
        hiddenDescriptions           : readStringList(parsed.hiddenDescriptions, "hiddenDescriptions"),
        descriptionRules             : readMap(parsed.descriptionRules, "descriptionRules", (value, path) => readStringList(value, path)),
        descriptionHiddenAttributes  : readMap(parsed.descriptionHiddenAttributes, "descriptionHiddenAttributes", (value, path) => readStringList(value, path)),
        descriptionAttributeOverrides: readMap(parsed.descriptionAttributeOverrides, "descriptionAttributeOverrides", (value, path) => readMap(value, path, stringEntry)),
        wielderGasRepellers          : readStringList(parsed.wielderGasRepellers, "wielderGasRepellers"),
    };
}

/**
 * Load the static tables, falling back to empty tables.
 *
 * @param filePath - Path to the tables.yml file
 */
export function loadTablesWithFallback(filePath: string): QudTables {
    try {
        return loadTables(filePath);
    }
    catch (error) {
        console.warn(`Failed to load tables from ${filePath}:`, error);
        return emptyTables();
    }
}

/**
 * Path of the tables file shipped with the package.
 */
export function getDefaultTablesPath(): string {
    return fileURLToPath(new URL("../../config/tables.yml", import.meta.url));
}

/**
 * Path of the simple field properties shipped with the package.
 */
export function getDefaultPropertiesPath(): string {
    return fileURLToPath(new URL("../../config/properties.yml", import.meta.url));
}
