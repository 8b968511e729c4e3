/**
 * @fileoverview Identification and modification properties
 *
 * Complexity decides whether an artifact starts unidentified; mods add to
 * it. Tinkering data (bits, build and disassemble flags) and the item tier
 * live here too.
 *
 * @module domain/catalog/identification
 */

import {
    intOrDefault,
    intOrUndefined,
    resolveLevel,
    type BlueprintView,
} from "@bpstats/engine";
import { rawLevel } from "../attributes/classification.js";
import { lookup } from "../tables.js";
import type { CatalogContext } from "./CatalogContext.js";

/**
 * Mods from `AddMod` (by name, with tiers) and from `Mod*` parts.
 */
function modEntries(subject: BlueprintView): Array<readonly [string, number]> {
    const entries: Array<readonly [string, number]> = [];

    const names = subject.part("AddMod", "Mods");
    if (names !== undefined) {
        const modNames = names.split(",");
        const tiers = subject.part("AddMod", "Tiers");
        const modTiers = tiers !== undefined
            ? tiers.split(",").map((tier) => intOrDefault(tier, 1))
            : modNames.map(() => 1);

        const count = Math.min(modNames.length, modTiers.length);
        for (let index = 0; index < count; index++) {
            entries.push([modNames[index], modTiers[index]]);
        }
    }

    for (const [part, attributes] of subject.entries("part")) {
        if (part.startsWith("Mod")) {
            entries.push([part, intOrDefault(attributes.Tier, 1)]);
        }
    }

    return entries;
}

/**
 * Complexity, used to decide whether the item starts unidentified.
 *
 * Mods marked `ifComplex` only add to an item that is already complex.
 */
export function complexity(subject: BlueprintView, context: CatalogContext): number | undefined {
    let value = intOrDefault(subject.part("Examiner", "Complexity"), 0);

    const addMods = subject.part("AddMod", "Mods")?.split(",") ?? [];
    const modParts = [...subject.entries("part").keys()].filter((part) => part.startsWith("Mod"));

    for (const mod of [...addMods, ...modParts]) {
        const props = lookup(context.tables.itemMods, mod);
        if (!props || (props.ifComplex && value <= 0)) {
            continue;
        }
        value += props.complexity;
    }

    return value > 0 || canbuild(subject) === true ? value : undefined;
}

/**
 * Examiner display name while the item is not understood.
 */
function unidentifiedName(
    subject: BlueprintView,
    context: CatalogContext,
    attribute: string,
    fallback: string
): string | undefined {
    const required = complexity(subject, context);
    if (required === undefined || required <= 0) {
        return undefined;
    }

    const understanding = intOrUndefined(subject.part("Examiner", "Understanding"));
    if (understanding !== undefined && understanding >= required) {
        return undefined;
    }

    const name = subject.part("Examiner", attribute) ?? fallback;
    return name !== "*med" ? name : undefined;
}

/**
 * Name shown before the item is identified, such as "weird artifact".
 */
export function unknownname(subject: BlueprintView, context: CatalogContext): string | undefined {
    return unidentifiedName(subject, context, "UnknownDisplayName", "weird artifact");
}

/**
 * Name shown once the item is partly understood, such as "device".
 */
export function unknownaltname(subject: BlueprintView, context: CatalogContext): string | undefined {
    return unidentifiedName(subject, context, "AlternateDisplayName", "device");
}

/**
 * Number of mods on the item.
 */
export function modcount(subject: BlueprintView): number | undefined {
    let count = subject.part("AddMod", "Mods")?.split(",").length ?? 0;
    count += [...subject.entries("part").keys()].filter((part) => part.startsWith("Mod")).length;
    return count > 0 ? count : undefined;
}

/**
 * Mods on the item, as `[mod, tier]` pairs.
 */
export function mods(subject: BlueprintView): Array<readonly [string, number]> | undefined {
    const entries = modEntries(subject);
    return entries.length > 0 ? entries : undefined;
}

/**
 * Bits recovered by disassembly, as bit letters (`"0034"` reads `"RRCr"`).
 */
export function bits(subject: BlueprintView, context: CatalogContext): string | undefined {
    if (!subject.hasPart("TinkerItem")) {
        return undefined;
    }
    if (subject.part("TinkerItem", "CanDisassemble") === "false" && subject.part("TinkerItem", "CanBuild") === "false") {
        return undefined;
    }

    const codes = subject.part("TinkerItem", "Bits");
    if (codes === undefined) {
        return undefined;
    }

    const letters = context.tables.bitCodes;
    return [...codes]
        .map((code) => (/^\d$/.test(code) && letters !== "" ? letters[Number(code)] : code))
        .join("");
}

/**
 * Whether the item can be built. `false` marks items that can only be
 * taken apart.
 */
export function canbuild(subject: BlueprintView): boolean | undefined {
    if (subject.part("TinkerItem", "CanBuild") === "true") {
        return true;
    }
    if (subject.part("TinkerItem", "CanDisassemble") === "true") {
        return false;
    }
    return undefined;
}

/**
 * Whether the item can be disassembled.
 */
export function candisassemble(subject: BlueprintView): boolean | undefined {
    if (subject.part("TinkerItem", "CanDisassemble") === "true") {
        return true;
    }
    if (subject.part("TinkerItem", "CanBuild") === "true") {
        return false;
    }
    return undefined;
}

/**
 * Tier: the blueprint's own tier tag, else the highest bit it yields,
 * else a fifth of its level, else the inherited tier tag.
 */
export function tier(subject: BlueprintView, context: CatalogContext): number | undefined {
    if (!subject.specified("tag", "Tier", "Value")) {
        if (subject.specified("part", "TinkerItem", "Bits")) {
            const last = subject.part("TinkerItem", "Bits")?.slice(-1) ?? "";
            return /^\d$/.test(last) ? Number(last) : 0;
        }

        const level = rawLevel(subject);
        if (level !== undefined) {
            const resolved = resolveLevel(level);
            if (resolved.ambiguous) {
                context.logger.debug("Level given as a range, using its first number", { level });
            }
            return Math.floor(resolved.level / 5);
        }
    }
    return intOrUndefined(subject.tag("Tier"));
}
