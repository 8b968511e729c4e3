/**
 * @fileoverview Defense properties
 *
 * Thin catalog entries over the {@link ModifierAggregator}.
 *
 * @module domain/catalog/defense
 */

import type { BlueprintView } from "@bpstats/engine";
import type { CatalogContext } from "./CatalogContext.js";

export function av(subject: BlueprintView, context: CatalogContext): number | undefined {
    return context.modifiers.armorValue(subject, context.logger);
}

export function dv(subject: BlueprintView, context: CatalogContext): number | undefined {
    return context.modifiers.dodgeValue(subject, context.logger);
}

export function ma(subject: BlueprintView, context: CatalogContext): number | undefined {
    return context.modifiers.mentalArmor(subject, context.logger);
}

export function marange(subject: BlueprintView, context: CatalogContext): string | undefined {
    return context.modifiers.mentalArmorRange(subject, context.logger);
}

export function hasmentalshield(subject: BlueprintView, context: CatalogContext): true | undefined {
    return context.modifiers.hasMentalShield(subject) ? true : undefined;
}

export function heat(subject: BlueprintView, context: CatalogContext): number | undefined {
    return context.modifiers.resistance(subject, "Heat");
}

export function cold(subject: BlueprintView, context: CatalogContext): number | undefined {
    return context.modifiers.resistance(subject, "Cold");
}

export function acid(subject: BlueprintView, context: CatalogContext): number | undefined {
    return context.modifiers.resistance(subject, "Acid");
}

export function electric(subject: BlueprintView, context: CatalogContext): number | undefined {
    return context.modifiers.resistance(subject, "Electric");
}

/**
 * Alias of {@link electric}.
 */
export function electrical(subject: BlueprintView, context: CatalogContext): number | undefined {
    return electric(subject, context);
}

export function quickness(subject: BlueprintView, context: CatalogContext): number | undefined {
    return context.modifiers.quickness(subject);
}
