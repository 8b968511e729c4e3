/**
 * @fileoverview Charge properties
 *
 * How much charge an item draws per use, and what for.
 *
 * @module domain/catalog/charge
 */

import { intOrDefault, intOrUndefined, type BlueprintView } from "@bpstats/engine";
import { lookup, type QudTables } from "../tables.js";
import type { CatalogContext } from "./CatalogContext.js";

/**
 * A part that draws charge.
 */
interface ChargeUse {
    readonly part: string;
    readonly label: string;

    /** Raw `ChargeUse` text */
    readonly charge: string;
}

/**
 * Parts with a positive `ChargeUse`, in declaration order.
 */
function chargeUses(subject: BlueprintView, tables: QudTables): ChargeUse[] {
    const uses: ChargeUse[] = [];

    for (const [part, attributes] of subject.entries("part")) {
        if (tables.ignoredChargeParts.includes(part)) {
            continue;
        }

        const charge = attributes.ChargeUse;
        if (charge === undefined || (intOrUndefined(charge) ?? 0) <= 0) {
            continue;
        }

        const label = lookup(tables.chargeFunctionLabels, part)
            ?? attributes.NameForStatus
            ?? lookup(tables.chargeFunctionFallbackLabels, part)
            ?? part;
        uses.push({ part, label, charge });
    }

    return uses;
}

/**
 * Charge used per use, summed over the item's charge-using parts.
 */
export function chargeused(subject: BlueprintView, context: CatalogContext): number | undefined {
    const { tables } = context;

    let charge = chargeUses(subject, tables).reduce((sum, use) => sum + Number(use.charge), 0);
    const override = lookup(tables.chargeUseOverrides, subject.name);
    if (override !== undefined) {
        charge = override;
    }

    return charge > 0 ? charge : undefined;
}

/**
 * What the charge is used for.
 *
 * A single function is reported by name; several are listed with the
 * charge each one draws: `"Weapon Power [5], Stun effect [10]"`.
 */
export function chargefunction(subject: BlueprintView, context: CatalogContext): string | undefined {
    const { tables } = context;

    const uses = chargeUses(subject, tables);
    const labels = uses.map((use) => use.label);
    const detailed = uses.map((use) => `${use.label} [${use.charge}]`);

    const reason = lookup(tables.chargeUseReasons, subject.name);
    if (reason !== undefined) {
        const override = lookup(tables.chargeUseOverrides, subject.name);
        labels.push(reason);
        detailed.push(override !== undefined ? `${reason} [${override}]` : reason);
    }

    if (labels.length === 0) {
        return undefined;
    }
    return labels.length === 1 ? labels[0] : detailed.join(", ");
}

/**
 * Charge a programmable recoiler needs to imprint a location.
 */
export function imprintchargecost(subject: BlueprintView): number | undefined {
    if (!subject.hasPart("ProgrammableRecoiler")) {
        return undefined;
    }
    return intOrDefault(subject.part("ProgrammableRecoiler", "ChargeUse"), 10000);
}

const kEMP_FLAG_PARTS = [
    "EquipStatBoost",
    "BootSequence",
    "NavigationBonus",
    "SaveModifier",
    "LiquidFueledPowerPlant",
    "LiquidProducer",
    "TemperatureAdjuster",
];

const kEMP_PARTS = [
    "EnergyCellSocket",
    "ZeroPointEnergyCollector",
    "ModFlaming",
    "ModFreezing",
    "ModElectrified",
];

/**
 * Whether an electromagnetic pulse disables the item.
 */
export function empsensitive(subject: BlueprintView): true | undefined {
    const flagged = kEMP_FLAG_PARTS.some((part) => subject.part(part, "IsEMPSensitive") === "true");
    return flagged || kEMP_PARTS.some((part) => subject.hasPart(part)) ? true : undefined;
}

/**
 * Whether the item needs an energy cell to work.
 */
export function energycellrequired(subject: BlueprintView): true | undefined {
    return subject.specified("part", "EnergyCellSocket") ? true : undefined;
}
