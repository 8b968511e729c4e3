/**
 * @fileoverview Creature properties
 *
 * Levels, hit points, factions, mutations, inventories and the other
 * facts that describe a creature rather than an item.
 *
 * @module domain/catalog/creatures
 */

import {
    intOrUndefined,
    resolveLevel,
    type BlueprintView,
} from "@bpstats/engine";
import {
    characterKind,
    isCharacter,
    isRoboticized,
    rawLevel,
} from "../attributes/classification.js";
import { isBlueprintReference } from "../modifiers/equipment.js";
import type { CatalogContext } from "./CatalogContext.js";

/**
 * Whether the creature has to stay submerged.
 */
export function aquatic(subject: BlueprintView): boolean | undefined {
    if (!subject.inheritsFrom("Creature")) {
        return undefined;
    }
    const flag = subject.part("Brain", "Aquatic");
    return flag === undefined ? undefined : flag === "true";
}

export function animatable(subject: BlueprintView): true | undefined {
    return subject.hasTag("Animatable") ? true : undefined;
}

/**
 * The liquid the creature bleeds, when it is not blood.
 */
export function bleedliquid(subject: BlueprintView): string | undefined {
    const robotic = isRoboticized(subject);
    if (!robotic && !subject.specified("tag", "BleedLiquid")) {
        return undefined;
    }

    // written as liquid-amount, e.g. "oil-1000"
    const liquid = robotic ? "oil" : (subject.tag("BleedLiquid") ?? "").split("-")[0];
    return liquid !== "blood" && liquid !== "" ? liquid : undefined;
}

/**
 * Chance of leaving a corpse, when one can be left at all.
 */
export function corpsechance(subject: BlueprintView): number | undefined {
    const chance = intOrUndefined(subject.part("Corpse", "CorpseChance"));
    if (chance === undefined || chance <= 0 || isRoboticized(subject)) {
        return undefined;
    }
    return chance;
}

/**
 * The corpse the creature leaves.
 */
export function corpse(subject: BlueprintView): string | undefined {
    const blueprint = subject.part("Corpse", "CorpseBlueprint");
    return blueprint !== undefined && corpsechance(subject) !== undefined ? blueprint : undefined;
}

/**
 * How the creature behaves on sight: docile, neutral or aggressive.
 */
export function demeanor(subject: BlueprintView): string | undefined {
    if (characterKind(subject) !== "active") {
        return undefined;
    }

    const calm = subject.part("Brain", "Calm");
    if (calm !== undefined) {
        return calm.toLowerCase() === "true" ? "docile" : "neutral";
    }
    const hostile = subject.part("Brain", "Hostile");
    if (hostile !== undefined) {
        return hostile.toLowerCase() === "true" ? "aggressive" : "neutral";
    }
    return undefined;
}

/**
 * Dynamic encounter tables the blueprint belongs to.
 */
export function dynamictable(subject: BlueprintView): string[] | undefined {
    if (subject.hasTag("ExcludeFromDynamicEncounters")) {
        return undefined;
    }

    const tables: string[] = [];
    for (const [key, attributes] of subject.entries("tag")) {
        // a descendant removes itself from an inherited table with {{{remove}}}
        if (!key.startsWith("DynamicObjectsTable") || attributes.Value === "{{{remove}}}") {
            continue;
        }
        const table = key.split(":")[1];
        if (table !== undefined) {
            tables.push(table);
        }
    }
    return tables.length > 0 ? tables : undefined;
}

/**
 * Faction loyalties as `[faction, reputation]` pairs.
 *
 * Written as `Joppa-100,Barathrumites-100`; malformed segments are logged
 * and skipped.
 */
export function faction(subject: BlueprintView, context: CatalogContext): Array<readonly [string, number]> | undefined {
    const factions = subject.part("Brain", "Factions");
    if (!factions) {
        return undefined;
    }

    const result: Array<readonly [string, number]> = [];
    for (const segment of factions.split(",")) {
        const separator = segment.indexOf("-");
        const value = separator > 0 ? segment.slice(separator + 1) : "";
        if (!/^\d+$/.test(value)) {
            context.logger.warn("Skipping malformed faction segment", { segment });
            continue;
        }
        result.push([segment.slice(0, separator), Number(value)]);
    }
    return result;
}

/**
 * Fixed gender of an active character.
 */
export function gender(subject: BlueprintView): string | undefined {
    if (characterKind(subject) !== "active") {
        return undefined;
    }

    const fixed = subject.tag("Gender");
    if (fixed !== undefined) {
        return fixed;
    }
    const random = subject.tag("RandomGender");
    return random !== undefined && !random.includes(",") ? random : undefined;
}

/**
 * Hit points, as text since they may be level-scaled.
 */
export function hp(subject: BlueprintView): string | undefined {
    if (!isCharacter(subject)) {
        return undefined;
    }
    return subject.stat("Hitpoints", "sValue") ?? subject.stat("Hitpoints");
}

function gasVulnerability(subject: BlueprintView, tag: string): number | undefined {
    if (!subject.hasTag(tag)) {
        return undefined;
    }
    // 1: normal damage, 2: significant damage
    return subject.hasPart("Combat") && !subject.hasTag("GasDamageAsIfInanimate") ? 1 : 2;
}

export function hurtbydefoliant(subject: BlueprintView): number | undefined {
    return gasVulnerability(subject, "LivePlant");
}

export function hurtbyfungicide(subject: BlueprintView): number | undefined {
    return gasVulnerability(subject, "LiveFungus");
}

/**
 * Starting inventory as `[name, count, equipped, chance]`.
 */
export function inventory(subject: BlueprintView): Array<readonly [string, string, string, string]> | undefined {
    const entries = subject.entries("inventory");
    if (entries.size === 0) {
        return undefined;
    }

    const result: Array<readonly [string, string, string, string]> = [];
    for (const [name, attributes] of entries) {
        if (!isBlueprintReference(name)) {
            continue;
        }
        result.push([name, attributes.Number ?? "1", "no", attributes.Chance ?? "100"]);
    }
    return result;
}

export function isswarmer(subject: BlueprintView): true | undefined {
    return subject.inheritsFrom("Creature") && subject.specified("part", "Swarmer") ? true : undefined;
}

/**
 * Level, as text since it is rarely a range.
 */
export function lv(subject: BlueprintView): string | undefined {
    return rawLevel(subject);
}

/**
 * Movement speed; lower stat values are faster, so it is reported as 200 minus the stat.
 */
export function movespeed(subject: BlueprintView): number | undefined {
    if (!subject.inheritsFrom("Creature")) {
        return undefined;
    }
    const stat = intOrUndefined(subject.stat("MoveSpeed"));
    return stat === undefined ? undefined : 200 - stat;
}

export function mutatedplant(subject: BlueprintView): true | undefined {
    return subject.inheritsFrom("MutatedPlant") ? true : undefined;
}

/**
 * Mutations as `[name, level]` pairs. Robots always see in the dark.
 */
export function mutations(subject: BlueprintView): Array<readonly [string, number]> | undefined {
    const result: Array<readonly [string, number]> = [];
    const entries = subject.entries("mutation");

    for (const [name, attributes] of entries) {
        result.push([name + (attributes.GasObject ?? ""), intOrUndefined(attributes.Level) ?? 0]);
    }

    if (isRoboticized(subject) && !entries.has("NightVision") && !entries.has("DarkVision")) {
        result.push(["DarkVision", 12]);
    }

    return result.length > 0 ? result : undefined;
}

export function noprone(subject: BlueprintView): true | undefined {
    return subject.hasPart("NoKnockdown") ? true : undefined;
}

export function pettable(subject: BlueprintView): true | undefined {
    return subject.hasPart("Pettable") ? true : undefined;
}

/**
 * Phase the creature or object is in, when not the ordinary one.
 */
export function phase(subject: BlueprintView): string | undefined {
    if (subject.hasPart("HologramMaterial") || subject.hasTag("Omniphase")) {
        return "omniphase";
    }
    if (subject.hasTag("Nullphase")) {
        return "nullphase";
    }
    if (subject.hasTag("Astral")) {
        return "out of phase";
    }
    if (subject.entries("mutation").get("Spinnerets")?.Phase === "True") {
        return "out of phase";
    }
    return undefined;
}

export function pronouns(subject: BlueprintView): string | undefined {
    return subject.inheritsFrom("Creature") ? subject.tag("PronounSet") : undefined;
}

/**
 * Names of the skills the creature starts with.
 */
export function skills(subject: BlueprintView): string[] | undefined {
    const names = [...subject.entries("skill").keys()];
    return names.length > 0 ? names : undefined;
}

function offersWaterRitual(subject: BlueprintView): boolean {
    return subject.specified("xtag", "WaterRitual") || subject.hasPart("GivesRep");
}

export function waterritualable(subject: BlueprintView): true | undefined {
    return offersWaterRitual(subject) ? true : undefined;
}

/**
 * Skill the creature teaches in the water ritual.
 */
export function waterritualskill(subject: BlueprintView): string | undefined {
    return offersWaterRitual(subject) ? subject.field("xtag", "WaterRitual", "SellSkill") : undefined;
}

const kXP_PER_LEVEL: Readonly<Record<string, number>> = {
    Minion: 10,
    Leader: 50,
    Hero  : 100,
};

/**
 * Experience for killing the creature. `*XP` scales with level and role.
 */
export function xpvalue(subject: BlueprintView, context: CatalogContext): number | undefined {
    const level = effectiveLevel(subject, context);
    if (level === undefined) {
        return undefined;
    }

    const scaled = subject.stat("XPValue", "sValue");
    const xp = scaled ? scaled : subject.stat("XPValue");
    if (!xp) {
        return undefined;
    }

    if (xp === "*XP") {
        const role = subject.property("Role") ?? "Minion";
        return level * (Object.hasOwn(kXP_PER_LEVEL, role) ? kXP_PER_LEVEL[role] : 25);
    }
    return intOrUndefined(xp);
}

/**
 * Experience tier: a fifth of the level.
 */
export function xptier(subject: BlueprintView, context: CatalogContext): number | undefined {
    const level = effectiveLevel(subject, context);
    return level === undefined ? undefined : Math.floor(level / 5);
}

/**
 * Integer level; a range level gives its first number.
 */
function effectiveLevel(subject: BlueprintView, context: CatalogContext): number | undefined {
    const level = rawLevel(subject);
    if (level === undefined) {
        return undefined;
    }

    const resolved = resolveLevel(level);
    if (resolved.ambiguous) {
        context.logger.debug("Level given as a range, using its first number", { level });
    }
    return resolved.level;
}
