/**
 * @fileoverview Property Loader
 *
 * Loads declarative properties from YAML files. A YAML property reads one
 * field and converts it to a string, integer or decimal; anything that
 * needs logic is written as code and registered directly.
 *
 * @module @bpstats/engine/plugins/PropertyLoader
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import { isFieldGroup, type FieldGroup } from "../contracts/Blueprint.js";
import type { PropertyDefinition, PropertyValue } from "../contracts/Property.js";
import type { BlueprintView } from "../engine/BlueprintView.js";
import { floatOrUndefined, intOrUndefined } from "../engine/values.js";

/**
 * Conversion applied to the raw field text.
 */
export type YamlPropertyType = "string" | "int" | "float";

/**
 * YAML property definition.
 *
 * @example
 * ```yaml
 * - name: hidden
 *   description: Difficulty of the search roll needed to find the object.
 *   field: { group: part, key: Hidden, attribute: Difficulty }
 *   type: int
 * ```
 */
export interface YamlPropertyDefinition {
    /** Unique property id */
    name: string;

    /** Human-readable description */
    description?: string;

    /** Field to read */
    field: {
        group: FieldGroup;
        key: string;

        /** Attribute name (default "Value") */
        attribute?: string;
    };

    /** Conversion (default "string") */
    type?: YamlPropertyType;
}

/**
 * Property loader configuration.
 */
export interface PropertyLoaderConfig {
    /** Logger for property loading */
    logger?: PropertyLoaderLogger;
}

/**
 * Logger interface for property loader.
 */
export interface PropertyLoaderLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Default console logger.
 */
const defaultLogger: PropertyLoaderLogger = {
    debug: (msg, data) => console.debug(`[PropertyLoader] ${msg}`, data ?? ""),
    info : (msg, data) => console.info(`[PropertyLoader] ${msg}`, data ?? ""),
    warn : (msg, data) => console.warn(`[PropertyLoader] ${msg}`, data ?? ""),
    error: (msg, data) => console.error(`[PropertyLoader] ${msg}`, data ?? ""),
};

const kCONVERTERS: Record<YamlPropertyType, (raw: string | undefined) => PropertyValue | undefined> = {
    string: (raw) => raw,
    int   : (raw) => intOrUndefined(raw),
    float : (raw) => floatOrUndefined(raw),
};

/**
 * Create a PropertyDefinition from a YAML definition.
 *
 * @param def - YAML property definition
 * @returns Property reading the declared field with nearest-ancestor fallback
 */
export function createPropertyFromYaml(def: YamlPropertyDefinition): PropertyDefinition {
    const { group, key } = def.field;
    const attribute = def.field.attribute ?? "Value";
    const convert = kCONVERTERS[def.type ?? "string"];

    return {
        id         : def.name,
        description: def.description,

        evaluate(subject: BlueprintView): PropertyValue | undefined {
            return convert(subject.field(group, key, attribute));
        },
    };
}

/**
 * Type guard for YAML property definitions.
 */
export function isYamlPropertyDefinition(obj: unknown): obj is YamlPropertyDefinition {
    if (typeof obj !== "object" || obj === null) {
        return false;
    }
    if (!("name" in obj) || typeof obj.name !== "string" || obj.name === "") {
        return false;
    }
    if ("type" in obj && obj.type !== undefined && obj.type !== "string" && obj.type !== "int" && obj.type !== "float") {
        return false;
    }
    if (!("field" in obj) || typeof obj.field !== "object" || obj.field === null) {
        return false;
    }

    const field = obj.field;
    return (
        "group" in field &&
        isFieldGroup(field.group) &&
        "key" in field &&
        typeof field.key === "string" &&
        (!("attribute" in field) || field.attribute === undefined || typeof field.attribute === "string")
    );
}

/**
 * Property Loader
 *
 * Loads properties from YAML files.
 *
 * @example
 * ```typescript
 * const loader = new PropertyLoader();
 *
 * const properties = loader.loadYamlFile("./config/properties.yml");
 * engine.registerProperties(properties);
 * ```
 */
export class PropertyLoader {
    private readonly logger: PropertyLoaderLogger;

    constructor(config: PropertyLoaderConfig = {}) {
        this.logger = config.logger ?? defaultLogger;
    }

    /**
     * Load properties from a YAML file holding one definition or a list.
     *
     * Entries that are not property definitions are logged and skipped.
     *
     * @throws Error if the file cannot be read or is not valid YAML
     */
    loadYamlFile(filePath: string): PropertyDefinition[] {
        const content = readFileSync(filePath, "utf-8");
        const parsed: unknown = parseYaml(content);

        if (!parsed) {
            return [];
        }

        const definitions: unknown[] = Array.isArray(parsed) ? parsed : [parsed];
        const result: PropertyDefinition[] = [];

        for (const def of definitions) {
            if (!isYamlPropertyDefinition(def)) {
                this.logger.warn("Skipping invalid property definition", { filePath, definition: def });
                continue;
            }

            const property = createPropertyFromYaml(def);
            result.push(property);
            this.logger.debug("Loaded YAML property", { id: property.id });
        }

        return result;
    }
}
