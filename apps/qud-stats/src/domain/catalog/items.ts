/**
 * @fileoverview Item properties
 *
 * Food, furniture, equipment and trade facts about objects that are not
 * creatures.
 *
 * @module domain/catalog/items
 */

import {
    floatOrUndefined,
    intOrDefault,
    intOrUndefined,
    type BlueprintView,
    type PropertyLogger,
} from "@bpstats/engine";
import { isRoboticized } from "../attributes/classification.js";
import { wornOn } from "../modifiers/equipment.js";
import type { CatalogContext } from "./CatalogContext.js";

/**
 * Power of the Sitting effect a chair gives. Chairs without a level are level 0.
 */
export function chairlevel(subject: BlueprintView): number | undefined {
    if (!subject.hasPart("Chair")) {
        return undefined;
    }
    return intOrDefault(subject.part("Chair", "Level"), 0);
}

/**
 * Trade value of an item.
 */
export function commerce(subject: BlueprintView): number | undefined {
    if (!subject.inheritsFrom("Item") && !subject.inheritsFrom("BaseThrownWeapon")) {
        return undefined;
    }
    return floatOrUndefined(subject.part("Commerce", "Value"));
}

/**
 * Cooking effect families the ingredient can contribute.
 */
export function cookeffect(subject: BlueprintView): string[] | undefined {
    return subject.part("PreparedCookingIngredient", "type")?.split(",");
}

export function cursed(subject: BlueprintView): true | undefined {
    return subject.hasPart("Cursed") ? true : undefined;
}

export function destroyonunequip(subject: BlueprintView): true | undefined {
    return subject.hasPart("DestroyOnUnequip") ? true : undefined;
}

/**
 * Whether preserving the food needs explicit consent.
 */
export function exoticfood(subject: BlueprintView): true | undefined {
    return subject.hasTag("ChooseToPreserve") ? true : undefined;
}

/**
 * Temperature at which an item catches fire.
 */
export function flametemperature(subject: BlueprintView): number | undefined {
    if (!subject.inheritsFrom("Item") || !subject.specified("part", "Physics")) {
        return undefined;
    }
    return intOrUndefined(subject.part("Physics", "FlameTemperature"));
}

/**
 * Whether flying creatures pass over a wall or piece of furniture.
 */
export function flyover(subject: BlueprintView): boolean | undefined {
    if (!subject.inheritsFrom("Wall") && !subject.inheritsFrom("Furniture")) {
        return undefined;
    }
    return subject.hasTag("Flyover");
}

export function illoneat(subject: BlueprintView): true | undefined {
    if (subject.inheritsFrom("Corpse")) {
        return undefined;
    }
    return subject.part("Food", "IllOnEat") === "true" ? true : undefined;
}

/**
 * Whether the item trades at a fixed price.
 */
export function iscurrency(subject: BlueprintView): true | undefined {
    return subject.intProperty("Currency") === "1" ? true : undefined;
}

export function isfungus(subject: BlueprintView): true | undefined {
    return subject.hasTag("Mushroom") ? true : undefined;
}

export function ismeat(subject: BlueprintView): true | undefined {
    return subject.hasTag("Meat") ? true : undefined;
}

export function isoccluding(subject: BlueprintView): true | undefined {
    const occluding = subject.part("Render", "Occluding");
    return occluding === "true" || occluding === "True" ? true : undefined;
}

export function isplant(subject: BlueprintView): true | undefined {
    return subject.hasTag("Plant") ? true : undefined;
}

/**
 * Percentage of contents leaked per turn once broken, as a range.
 */
export function leakswhenbroken(subject: BlueprintView): string | undefined {
    if (!subject.hasPart("LeakWhenBroken")) {
        return undefined;
    }
    return subject.part("LeakWhenBroken", "PercentPerTurn") ?? "10-20";
}

export function lightradius(subject: BlueprintView): number | undefined {
    return intOrUndefined(subject.part("LightSource", "Radius"))
        ?? intOrUndefined(subject.part("ActiveLightSource", "Radius"));
}

export function metal(subject: BlueprintView): true | undefined {
    return subject.hasPart("Metal") || isRoboticized(subject) ? true : undefined;
}

/**
 * Move speed bonus of an item. The game stores it as a cost, hence the sign.
 */
export function movespeedbonus(subject: BlueprintView): number | undefined {
    if (!subject.inheritsFrom("Item")) {
        return undefined;
    }
    const cost = intOrUndefined(subject.part("MoveCostMultiplier", "Amount"));
    return cost === undefined ? undefined : -cost;
}

/**
 * Effects granted when eaten, such as `BreatheOnEatFireBreather5`.
 */
export function oneat(subject: BlueprintView): string[] | undefined {
    const effects: string[] = [];
    for (const [part, attributes] of subject.entries("part")) {
        if (!part.endsWith("OnEat")) {
            continue;
        }
        const effect = attributes.Class !== undefined
            ? `${part}${attributes.Class}${attributes.Level ?? ""}`
            : part;
        effects.push(effect);
    }
    return effects.length > 0 ? effects : undefined;
}

/**
 * Reputation changes an item grants, as `[faction, amount]` pairs.
 *
 * Factions are either `Fungi:200,Consortium:-200` or a list sharing the
 * part's `Value`. Entries without an amount are logged and skipped.
 */
export function reputationEntries(subject: BlueprintView, logger?: PropertyLogger): Array<readonly [string, number]> {
    const factions = subject.part("AddsRep", "Faction");
    if (!factions) {
        return [];
    }

    const entries: Array<readonly [string, number]> = [];
    for (const segment of factions.split(",")) {
        const [faction, amount] = segment.includes(":")
            ? segment.split(":")
            : [segment, subject.part("AddsRep", "Value")];

        const value = intOrUndefined(amount);
        if (value === undefined) {
            logger?.warn("Skipping reputation entry without an amount", { faction });
            continue;
        }
        entries.push([faction, value]);
    }
    return entries;
}

export function reputationbonus(subject: BlueprintView, context: CatalogContext): Array<readonly [string, number]> | undefined {
    const entries = reputationEntries(subject, context.logger);
    return entries.length > 0 ? entries : undefined;
}

export function savemodifieramt(subject: BlueprintView): number | undefined {
    if (subject.part("SaveModifier", "Vs") === undefined) {
        return undefined;
    }
    return intOrUndefined(subject.part("SaveModifier", "Amount"));
}

/**
 * Whether a gas seeps through walls: "yes" or "no".
 */
export function seeping(subject: BlueprintView): string | undefined {
    if (!subject.hasPart("Gas")) {
        return undefined;
    }
    if (subject.specified("part", "Gas", "Seeping") && subject.part("Gas", "Seeping") === "true") {
        return "yes";
    }
    if (subject.specified("tag", "GasGenerationAddSeeping") && subject.tag("GasGenerationAddSeeping") === "true") {
        return "yes";
    }
    return "no";
}

/**
 * Whether the object blocks movement. Only reported when the blueprint
 * sets it, and not for doors or small thrown weapons.
 */
export function solid(subject: BlueprintView): boolean | undefined {
    if (!subject.specified("part", "Physics", "Solid")) {
        return undefined;
    }

    const value = subject.part("Physics", "Solid");
    if (value === "true" || value === "True") {
        return true;
    }
    if (subject.parent()?.name === "Door") {
        return undefined;
    }
    // thrown weapons often set Solid="false" for no visible reason
    if (subject.hasPart("ThrownWeapon") && !subject.name.includes("Boulder")) {
        return undefined;
    }
    return false;
}

export function spectacles(subject: BlueprintView): true | undefined {
    return subject.hasPart("Spectacles") ? true : undefined;
}

/**
 * Body slots the item occupies once equipped, e.g. `["Back", "Floating Nearby"]`.
 */
export function usesslots(subject: BlueprintView): string[] | undefined {
    return subject.tag("UsesSlots")?.split(",");
}

/**
 * Weight, for objects that can be picked up or weighed at all.
 */
export function weight(subject: BlueprintView): number | undefined {
    if (
        subject.inheritsFrom("InertObject") ||
        subject.inheritsFrom("CosmeticObject") ||
        subject.part("Physics", "IsReal") === "false" ||
        subject.hasTag("IgnoresGravity") ||
        subject.hasTag("ExcavatoryTerrainFeature")
    ) {
        return undefined;
    }
    return intOrUndefined(subject.part("Physics", "Weight"));
}

/**
 * Body slot the item is equipped to.
 */
export function wornon(subject: BlueprintView, context: CatalogContext): string | undefined {
    return wornOn(subject, context.tables);
}
