/**
 * @fileoverview ModifierAggregator
 *
 * Combines base stats, mutation levels, equipment and attribute modifiers
 * into the defensive numbers of a blueprint: armor value (AV), dodge value
 * (DV), mental armor (MA), elemental resistances and quickness.
 *
 * Slot exclusivity: a mutation that covers the body (Carapace, Quills)
 * replaces the contribution of any carried item worn on the body.
 *
 * @module domain/modifiers/ModifierAggregator
 */

import {
    hasText,
    intOrDefault,
    intOrUndefined,
    isFalseText,
    type BlueprintView,
    type PropertyLogger,
} from "@bpstats/engine";
import { AttributeResolver } from "../attributes/AttributeResolver.js";
import {
    characterKind,
    isCharacter,
    isRoboticized,
    mutationLevels,
} from "../attributes/classification.js";
import type { QudTables } from "../tables.js";
import { carriedItems, wornOn } from "./equipment.js";

/**
 * Elements a blueprint can resist.
 */
export type Element = "Heat" | "Cold" | "Acid" | "Electric";

const kBODY_SLOT = "Body";

/**
 * Aggregates defensive modifiers.
 *
 * @example
 * ```typescript
 * const aggregator = new ModifierAggregator(new AttributeResolver(), tables);
 * aggregator.armorValue(engine.view("Leather Armor")); // 2
 * aggregator.dodgeValue(engine.view("Glowfish"));      // 8
 * ```
 */
export class ModifierAggregator {
    constructor(
        private readonly resolver: AttributeResolver,
        private readonly tables: QudTables
    ) {}

    /**
     * AV of an armor piece or shield, or the total AV of a character.
     */
    armorValue(subject: BlueprintView, logger?: PropertyLogger): number | undefined {
        let av: number | undefined;

        const armorAv = subject.part("Armor", "AV");
        if (hasText(armorAv)) {
            av = intOrUndefined(armorAv);
        }
        const shieldAv = subject.part("Shield", "AV");
        if (hasText(shieldAv)) {
            av = intOrUndefined(shieldAv);
        }

        if (!isCharacter(subject)) {
            return av;
        }

        let total = intOrDefault(subject.stat("AV"), 0);
        let bodyCovered = false;

        for (const [mutation, level] of mutationLevels(subject)) {
            switch (mutation) {
                case "Carapace":
                    total += Math.floor(level / 2) + 3;
                    bodyCovered = true;
                    break;
                case "Quills":
                    total += Math.floor(level / 3) + 2;
                    bodyCovered = true;
                    break;
                case "Horns":
                    total += Math.floor((level - 1) / 3) + 1;
                    break;
                case "MultiHorns":
                    total += Math.floor((level + 1) / 4);
                    break;
                case "SlogGlands":
                    total += 1;
                    break;
            }
        }

        for (const item of carriedItems(subject, logger)) {
            const itemAv = this.armorValue(item, logger);
            if (itemAv && this.countsForSlot(item, bodyCovered)) {
                total += itemAv;
            }
        }

        return total;
    }

    /**
     * DV of an armor piece or shield, or the total DV of a character.
     *
     * Inactive characters and immobile creatures have a DV of -10.
     */
    dodgeValue(subject: BlueprintView, logger?: PropertyLogger): number | undefined {
        let dv = intOrUndefined(subject.part("Armor", "DV"));

        const shieldDv = subject.part("Shield", "DV");
        const kind = characterKind(subject);

        if (shieldDv !== undefined) {
            return intOrUndefined(shieldDv);
        }
        if (kind === "inactive") {
            return -10;
        }
        if (kind !== "active") {
            return dv;
        }

        if (subject.specified("part", "Brain", "Mobile") && isFalseText(subject.part("Brain", "Mobile"))) {
            return -10;
        }

        const agilityModifier = this.resolver.modifier(subject, "Agility", "avg", logger);
        if (agilityModifier === undefined) {
            return undefined;
        }

        dv = 6 + intOrDefault(subject.stat("DV"), 0);
        if (subject.has("skill", "Acrobatics_Dodge")) {
            dv += 2;
        }
        if (subject.has("skill", "Acrobatics_Tumble")) {
            dv += 1;
        }
        dv += agilityModifier;

        let bodyCovered = false;
        if (mutationLevels(subject).has("Carapace")) {
            dv -= 2;
            bodyCovered = true;
        }

        for (const item of carriedItems(subject, logger)) {
            const itemDv = this.dodgeValue(item, logger);
            if (itemDv && this.countsForSlot(item, bodyCovered)) {
                dv += itemDv;
            }
        }

        return dv;
    }

    /**
     * Whether an active character is immune to mental effects.
     */
    hasMentalShield(subject: BlueprintView): boolean {
        return characterKind(subject) === "active" && (
            subject.hasPart("MentalShield") ||
            subject.name.includes("Mechanical") ||
            isRoboticized(subject)
        );
    }

    /**
     * Mental armor, using the average Willpower modifier.
     */
    mentalArmor(subject: BlueprintView, logger?: PropertyLogger): number | undefined {
        if (this.hasMentalShield(subject)) {
            return undefined;
        }

        const kind = characterKind(subject);
        if (kind === "inactive") {
            return 0;
        }
        if (kind !== "active") {
            return undefined;
        }

        const willpowerModifier = this.resolver.modifier(subject, "Willpower", "avg", logger);
        return willpowerModifier === undefined ? undefined : this.baseMentalArmor(subject) + willpowerModifier;
    }

    /**
     * Full range of mental armor over the Willpower range.
     *
     * A single value is written as a number; a spread is written as a dice
     * expression (`-3+1d2`) so that negative ranges still parse.
     */
    mentalArmorRange(subject: BlueprintView, logger?: PropertyLogger): string | undefined {
        if (this.hasMentalShield(subject) || characterKind(subject) !== "active") {
            return undefined;
        }

        const minModifier = this.resolver.modifier(subject, "Willpower", "min", logger);
        const maxModifier = this.resolver.modifier(subject, "Willpower", "max", logger);
        if (minModifier === undefined || maxModifier === undefined) {
            return undefined;
        }

        const ma = this.baseMentalArmor(subject);
        if (minModifier === maxModifier) {
            return String(ma + minModifier);
        }
        return `${ma + minModifier - 1}+1d${maxModifier - minModifier + 1}`;
    }

    /**
     * Elemental resistance of a creature or armor piece.
     */
    resistance(subject: BlueprintView, element: Element): number | undefined {
        let value: string | number | undefined = subject.stat(`${element}Resistance`);
        let key: string = element;

        if (subject.hasPart("Armor")) {
            // armor writes electric resistance as Elec
            key = element === "Electric" ? "Elec" : element;
            value = subject.part("Armor", key);
        }

        if (isRoboticized(subject)) {
            if (key === "Heat" || key === "Cold") {
                value = 25;
            }
            else if (key === "Electric") {
                value = -50;
            }
        }

        for (const [mutation, level] of mutationLevels(subject)) {
            if (mutation === "Carapace" && (element === "Heat" || element === "Cold")) {
                value = (intOrUndefined(value) ?? 0) + level * 5 + 5;
            }
            if (mutation === "SlogGlands" && element === "Acid") {
                value = 100;
            }
        }

        return intOrUndefined(value);
    }

    /**
     * Quickness of a creature, or the speed bonus of an armor piece.
     */
    quickness(subject: BlueprintView): number | undefined {
        if (characterKind(subject) === "active") {
            let mutationBonus = 0;
            for (const [mutation, level] of mutationLevels(subject)) {
                if (mutation === "ColdBlooded") {
                    mutationBonus -= 10;
                }
                if (mutation === "HeightenedSpeed") {
                    mutationBonus += level * 2 + 13;
                }
            }

            const speed = intOrUndefined(subject.stat("Speed"));
            if (mutationBonus !== 0) {
                return mutationBonus + (speed ?? 100);
            }
            return speed;
        }

        if (subject.hasPart("Armor")) {
            return intOrUndefined(subject.part("Armor", "SpeedBonus"));
        }
        return undefined;
    }

    /**
     * Attribute bonus an active character gets from its mutations.
     */
    extrinsicBonus(subject: BlueprintView, attribute: string): number | undefined {
        if (characterKind(subject) !== "active") {
            return undefined;
        }

        const levels = mutationLevels(subject);
        const heightened = (level: number): number => Math.floor((level - 1) / 2) + 2;

        switch (attribute) {
            case "Strength": {
                let bonus = 0;
                const strength = levels.get("HeightenedStrength");
                if (strength !== undefined) {
                    bonus += heightened(strength);
                }
                if (levels.has("SlogGlands")) {
                    bonus += 6;
                }
                return bonus !== 0 ? bonus : undefined;
            }
            case "Agility":
            case "Toughness": {
                const level = levels.get(`Heightened${attribute}`);
                return level === undefined ? undefined : heightened(level);
            }
            case "Ego":
                return levels.has("Beak") ? 1 : undefined;
            default:
                return undefined;
        }
    }

    private baseMentalArmor(subject: BlueprintView): number {
        const ma = subject.stat("MA");
        return 4 + (hasText(ma) ? intOrDefault(ma, 0) : 0);
    }

    private countsForSlot(item: BlueprintView, bodyCovered: boolean): boolean {
        return !bodyCovered || wornOn(item, this.tables) !== kBODY_SLOT;
    }
}
