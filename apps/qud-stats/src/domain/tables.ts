/**
 * @fileoverview Static Tables
 *
 * Name-keyed and part-keyed lookup tables the catalog consults. They are
 * loaded from `config/tables.yml` and passed into the catalog, so no
 * property hard-codes a blueprint name.
 *
 * @module domain/tables
 */

/**
 * Complexity contribution of an item modification.
 */
export interface ItemModProps {
    /** Complexity added to the item */
    readonly complexity: number;

    /** Only counts when the item is already complex */
    readonly ifComplex: boolean;
}

type Table<T> = Readonly<Record<string, T>>;

/**
 * All static tables.
 */
export interface QudTables {
    /** Bit letters for the digits 0-9, in order */
    readonly bitCodes: string;

    readonly ammoTypes: Table<string>;
    readonly ignoredChargeParts: readonly string[];
    readonly chargeUseOverrides: Table<number>;
    readonly chargeUseReasons: Table<string>;
    readonly chargeFunctionLabels: Table<string>;
    readonly chargeFunctionFallbackLabels: Table<string>;
    readonly itemMods: Table<ItemModProps>;
    readonly factionNames: Table<string>;
    readonly cyberneticsInfixes: Table<string>;
    readonly cyberneticsPostfixes: Table<string>;
    readonly behaviorDescriptionParts: readonly string[];
    readonly titleOverrides: Table<string>;
    readonly egoOverrides: Table<string>;
    readonly egoBonusDice: Table<string>;
    readonly wornOnOverrides: Table<string>;
    readonly hiddenDescriptions: readonly string[];
    readonly descriptionRules: Table<readonly string[]>;
    readonly descriptionHiddenAttributes: Table<readonly string[]>;
    readonly descriptionAttributeOverrides: Table<Table<string>>;
    readonly wielderGasRepellers: readonly string[];
}

/**
 * Tables with every section empty.
 */
export function emptyTables(): QudTables {
    return {
        bitCodes                     : "",
        ammoTypes                    : {},
        ignoredChargeParts           : [],
        chargeUseOverrides           : {},
        chargeUseReasons             : {},
        chargeFunctionLabels         : {},
        chargeFunctionFallbackLabels : {},
        itemMods                     : {},
        factionNames                 : {},
        cyberneticsInfixes           : {},
        cyberneticsPostfixes         : {},
        behaviorDescriptionParts     : [],
        titleOverrides               : {},
        egoOverrides                 : {},
        egoBonusDice                 : {},
        wornOnOverrides              : {},
        hiddenDescriptions           : [],
        descriptionRules             : {},
        descriptionHiddenAttributes  : {},
        descriptionAttributeOverrides: {},
        wielderGasRepellers          : [],
    };
}

/**
 * Own-key lookup; inherited object keys such as `constructor` never match.
 */
export function lookup<T>(table: Table<T>, key: string): T | undefined {
    return Object.hasOwn(table, key) ? table[key] : undefined;
}
