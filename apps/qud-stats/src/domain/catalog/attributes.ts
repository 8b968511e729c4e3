/**
 * @fileoverview Attribute properties
 *
 * The six core attributes as raw dice text, their boost multipliers and
 * the bonuses mutations add on top.
 *
 * @module domain/catalog/attributes
 */

import type { BlueprintView } from "@bpstats/engine";
import { lookup } from "../tables.js";
import type { CatalogContext } from "./CatalogContext.js";

export function strength(subject: BlueprintView, context: CatalogContext): string | undefined {
    return context.attributes.value(subject, "Strength", context.logger);
}

export function agility(subject: BlueprintView, context: CatalogContext): string | undefined {
    return context.attributes.value(subject, "Agility", context.logger);
}

export function toughness(subject: BlueprintView, context: CatalogContext): string | undefined {
    return context.attributes.value(subject, "Toughness", context.logger);
}

export function intelligence(subject: BlueprintView, context: CatalogContext): string | undefined {
    return context.attributes.value(subject, "Intelligence", context.logger);
}

export function willpower(subject: BlueprintView, context: CatalogContext): string | undefined {
    return context.attributes.value(subject, "Willpower", context.logger);
}

/**
 * Ego, with per-blueprint replacements and bonus dice.
 */
export function ego(subject: BlueprintView, context: CatalogContext): string | undefined {
    const fixed = lookup(context.tables.egoOverrides, subject.name);
    if (fixed !== undefined) {
        return fixed;
    }

    const value = context.attributes.value(subject, "Ego", context.logger);
    const bonus = lookup(context.tables.egoBonusDice, subject.name);
    return value !== undefined && bonus !== undefined ? `${value}+${bonus}` : value;
}

export function strengthmult(subject: BlueprintView, context: CatalogContext): number | undefined {
    return context.attributes.boostFactor(subject, "Strength");
}

export function agilitymult(subject: BlueprintView, context: CatalogContext): number | undefined {
    return context.attributes.boostFactor(subject, "Agility");
}

export function toughnessmult(subject: BlueprintView, context: CatalogContext): number | undefined {
    return context.attributes.boostFactor(subject, "Toughness");
}

export function intelligencemult(subject: BlueprintView, context: CatalogContext): number | undefined {
    return context.attributes.boostFactor(subject, "Intelligence");
}

export function willpowermult(subject: BlueprintView, context: CatalogContext): number | undefined {
    return context.attributes.boostFactor(subject, "Willpower");
}

export function egomult(subject: BlueprintView, context: CatalogContext): number | undefined {
    return context.attributes.boostFactor(subject, "Ego");
}

export function strengthextrinsic(subject: BlueprintView, context: CatalogContext): number | undefined {
    return context.modifiers.extrinsicBonus(subject, "Strength");
}

export function agilityextrinsic(subject: BlueprintView, context: CatalogContext): number | undefined {
    return context.modifiers.extrinsicBonus(subject, "Agility");
}

export function toughnessextrinsic(subject: BlueprintView, context: CatalogContext): number | undefined {
    return context.modifiers.extrinsicBonus(subject, "Toughness");
}

export function intelligenceextrinsic(subject: BlueprintView, context: CatalogContext): number | undefined {
    return context.modifiers.extrinsicBonus(subject, "Intelligence");
}

export function willpowerextrinsic(subject: BlueprintView, context: CatalogContext): number | undefined {
    return context.modifiers.extrinsicBonus(subject, "Willpower");
}

export function egoextrinsic(subject: BlueprintView, context: CatalogContext): number | undefined {
    return context.modifiers.extrinsicBonus(subject, "Ego");
}
