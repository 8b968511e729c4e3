/**
 * @fileoverview Capability classification
 *
 * Sorts blueprints into active characters (creatures with a brain and
 * combat), inactive characters (walls, turrets, furniture: non-takeable
 * but missing one of the two) and everything else.
 *
 * @module domain/attributes/classification
 */

import { intOrUndefined, isFalseText, type BlueprintView } from "@bpstats/engine";

/**
 * Capability class of a blueprint.
 */
export type CharacterKind = "active" | "inactive" | "none";

/**
 * Classify a blueprint.
 */
export function characterKind(subject: BlueprintView): CharacterKind {
    if (!isFalseText(subject.part("Physics", "Takeable")) || subject.hasPart("Gas")) {
        return "none";
    }
    if (subject.hasPart("Combat") && subject.hasPart("Brain")) {
        return "active";
    }
    return "inactive";
}

/**
 * Whether the blueprint is an active or inactive character.
 */
export function isCharacter(subject: BlueprintView): boolean {
    return characterKind(subject) !== "none";
}

/**
 * Whether the blueprint is always a robot (`Roboticized` one chance in one).
 */
export function isRoboticized(subject: BlueprintView): boolean {
    return subject.hasPart("Roboticized") && subject.part("Roboticized", "ChanceOneIn") === "1";
}

/**
 * Raw level field: `stat.Level.sValue`, else `stat.Level.Value`.
 */
export function rawLevel(subject: BlueprintView): string | undefined {
    return subject.stat("Level", "sValue") ?? subject.stat("Level");
}

/**
 * Mutation levels by mutation name. A mutation without a level counts as 0.
 */
export function mutationLevels(subject: BlueprintView): Map<string, number> {
    const levels = new Map<string, number>();
    for (const [name, attributes] of subject.entries("mutation")) {
        levels.set(name, intOrUndefined(attributes.Level) ?? 0);
    }
    return levels;
}
