/**
 * @fileoverview AttributeResolver
 *
 * Resolves the six core attributes (and any other stat written the same
 * way) to numbers.
 *
 * Resolution:
 * 1. Raw value: an active character's `sValue`, evaluated at its level,
 *    else its `Value`; an armor piece's `part.Armor.<Attr>` bonus
 * 2. Boost factor from `stat.<Attr>.Boost`, applied only to sValues
 * 3. Minimum, maximum or average of the dice expression, boosted
 *
 * @module domain/attributes/AttributeResolver
 */

import {
    DiceExpression,
    InconsistentDataError,
    LevelScaledValue,
    hasText,
    intOrUndefined,
    resolveLevel,
    type BlueprintView,
    type PropertyLogger,
} from "@bpstats/engine";
import { characterKind, rawLevel } from "./classification.js";

/**
 * Which end of an attribute's range to report.
 */
export type StatMode = "min" | "max" | "avg";

/**
 * Attributes every creature has; minions get one less boost on these.
 */
export const kCORE_ATTRIBUTES: readonly string[] = [
    "Strength",
    "Agility",
    "Toughness",
    "Intelligence",
    "Willpower",
    "Ego",
];

/**
 * Integer level of a blueprint, taking the first number of a range.
 *
 * @throws InconsistentDataError if the blueprint has no level
 */
export function levelOf(subject: BlueprintView, logger?: PropertyLogger): number {
    const raw = rawLevel(subject);
    if (raw === undefined) {
        throw new InconsistentDataError(`${subject.name} has no level`);
    }

    const { level, ambiguous } = resolveLevel(raw);
    if (ambiguous) {
        logger?.debug("Level given as a range, using its first number", { level: raw });
    }
    return level;
}

/**
 * Stat modifier of an attribute value.
 *
 * @example
 * ```typescript
 * attributeModifierFor(16); // 0
 * attributeModifierFor(15); // -1
 * attributeModifierFor(0);  // -8
 * ```
 */
export function attributeModifierFor(value: number): number {
    return Math.floor((value - 16) / 2);
}

/**
 * Resolves attribute values and modifiers for blueprints.
 *
 * @example
 * ```typescript
 * const resolver = new AttributeResolver();
 * resolver.resolve(engine.view("Snapjaw Scavenger"), "Agility", "avg"); // 18
 * resolver.modifier(engine.view("Snapjaw Scavenger"), "Agility");        // 1
 * ```
 */
export class AttributeResolver {
    /**
     * Raw attribute text: a dice expression, a range or a number.
     */
    value(subject: BlueprintView, attribute: string, logger?: PropertyLogger): string | undefined {
        const kind = characterKind(subject);

        if (kind === "active") {
            const scaled = subject.stat(attribute, "sValue");
            if (hasText(scaled)) {
                return new LevelScaledValue(scaled, levelOf(subject, logger)).toString();
            }
            const plain = subject.stat(attribute);
            return hasText(plain) ? plain : undefined;
        }

        if (subject.inheritsFrom("Armor")) {
            return subject.part("Armor", attribute);
        }
        return undefined;
    }

    /**
     * Multiplier applied to an sValue attribute after it is rolled.
     *
     * Each boost step above zero adds 25%; each step at or below zero takes 20%.
     */
    boostFactor(subject: BlueprintView, attribute: string): number | undefined {
        if (characterKind(subject) !== "active") {
            return undefined;
        }

        let boost = intOrUndefined(subject.stat(attribute, "Boost"));
        if (boost === undefined || !hasText(subject.stat(attribute, "sValue"))) {
            return undefined;
        }

        if (subject.property("Role") === "Minion" && kCORE_ATTRIBUTES.includes(attribute)) {
            boost -= 1;
        }
        return boost > 0 ? 0.25 * boost + 1.0 : 0.2 * boost + 1.0;
    }

    /**
     * Attribute value for one end of its range.
     */
    resolve(
        subject: BlueprintView,
        attribute: string,
        mode: StatMode,
        logger?: PropertyLogger
    ): number | undefined {
        const raw = this.value(subject, attribute, logger);
        if (!hasText(raw)) {
            return undefined;
        }

        const dice = new DiceExpression(raw);
        const factor = this.boostFactor(subject, attribute);

        if (factor === undefined) {
            if (mode === "min") {
                return dice.minimum();
            }
            return mode === "max" ? dice.maximum() : Math.trunc(dice.average());
        }

        // Each rolled value is rounded up after boosting, so the average comes from the boosted ends
        const min = Math.ceil(dice.minimum() * factor);
        const max = Math.ceil(dice.maximum() * factor);
        if (mode === "min") {
            return min;
        }
        return mode === "max" ? max : Math.floor((min + max) / 2);
    }

    /**
     * Attribute modifier for one end of the attribute's range.
     */
    modifier(
        subject: BlueprintView,
        attribute: string,
        mode: StatMode = "avg",
        logger?: PropertyLogger
    ): number | undefined {
        const value = this.resolve(subject, attribute, mode, logger);
        return value === undefined ? undefined : attributeModifierFor(value);
    }
}
