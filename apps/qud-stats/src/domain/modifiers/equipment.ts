/**
 * @fileoverview Equipment helpers
 *
 * Inventory references and equipment slots, shared by the aggregated
 * defenses and the item catalog.
 *
 * @module domain/modifiers/equipment
 */

import { hasText, type BlueprintView, type PropertyLogger } from "@bpstats/engine";
import { lookup, type QudTables } from "../tables.js";

/**
 * Inventory entries starting with one of these are population table
 * rolls (`*Junk 1`), not blueprint names.
 */
const kSPECIAL_INVENTORY_PREFIXES = ["*", "#", "@"];

/**
 * Whether an inventory entry names a blueprint.
 */
export function isBlueprintReference(name: string): boolean {
    return !kSPECIAL_INVENTORY_PREFIXES.some((prefix) => name.startsWith(prefix));
}

/**
 * Blueprints a character carries. References to unknown blueprints are
 * logged and skipped.
 */
export function carriedItems(subject: BlueprintView, logger?: PropertyLogger): BlueprintView[] {
    const items: BlueprintView[] = [];

    for (const name of subject.entries("inventory").keys()) {
        if (!isBlueprintReference(name)) {
            continue;
        }

        const item = subject.resolve(name);
        if (!item) {
            logger?.warn("Skipping unknown inventory reference", { reference: name });
            continue;
        }
        items.push(item);
    }

    return items;
}

/**
 * The body slot an item is worn on.
 */
export function wornOn(subject: BlueprintView, tables: QudTables): string | undefined {
    let slot: string | undefined;

    const shieldSlot = subject.part("Shield", "WornOn");
    if (hasText(shieldSlot)) {
        slot = shieldSlot;
    }
    const armorSlot = subject.part("Armor", "WornOn");
    if (hasText(armorSlot)) {
        slot = armorSlot;
    }

    return lookup(tables.wornOnOverrides, subject.name) ?? slot;
}
