/**
 * @fileoverview LevelScaledValue
 *
 * Resolves a level-dependent ("sValue") specification into the dice
 * expression that applies at a given level.
 *
 * Two forms are accepted:
 *
 * 1. Threshold table, `level:expression` pairs separated by `;`:
 *    `1:1d4;5:2d4;10:14-18`. The pair with the highest threshold not above
 *    the level applies; below every threshold, the lowest one applies.
 *
 * 2. Tier sum, comma-separated terms added together: `16,1d3,(t-1)d2`.
 *    The tokens `(t)`, `(t-1)` and `(t+1)` stand for the tier of the level
 *    (`floor(level / 5) + 1`, kept within 1..8). The result is the range
 *    of the sum, e.g. `19-23`, or a flat number when the range is a point.
 *
 * @module @bpstats/engine/dice/LevelScaledValue
 */

import { InconsistentDataError, MalformedExpressionError } from "../contracts/errors.js";
import { DiceExpression } from "./DiceExpression.js";

const kMIN_TIER = 1;
const kMAX_TIER = 8;

/**
 * A parsed level field.
 */
export interface ResolvedLevel {
    /** The effective integer level */
    readonly level: number;

    /** True when the field was a range and its first number was taken */
    readonly ambiguous: boolean;
}

/**
 * Parse a level field.
 *
 * Levels are very rarely written as a range (`"18-29"`); the first number
 * of the range is taken as the level.
 *
 * @throws InconsistentDataError if the field is neither an integer nor a range
 */
export function resolveLevel(raw: string): ResolvedLevel {
    const text = raw.trim();
    if (/^[+-]?\d+$/.test(text)) {
        return { level: Number(text), ambiguous: false };
    }

    const range = /^(-?\d+)\s*-\s*-?\d+$/.exec(text);
    if (range) {
        return { level: Number(range[1]), ambiguous: true };
    }

    throw new InconsistentDataError(`Level is not an integer or a range: "${raw}"`, raw);
}

/**
 * Item tier for a level, as used by tier-sum specifications.
 */
export function tierForLevel(level: number): number {
    return Math.min(kMAX_TIER, Math.max(kMIN_TIER, Math.floor(level / 5) + 1));
}

/**
 * A level-scaled value bound to one level.
 *
 * @example
 * ```typescript
 * String(new LevelScaledValue("1:1d4;5:2d4;10:14-18", 12)); // "14-18"
 * String(new LevelScaledValue("16,1d3,(t-1)d2", 10));       // "19-23"
 * ```
 */
export class LevelScaledValue {
    private readonly resolved: string;

    /**
     * @param specification - Threshold table or tier sum
     * @param level - Level to resolve at
     * @throws MalformedExpressionError if a term is not a dice expression
     */
    constructor(
        readonly specification: string,
        readonly level: number
    ) {
        this.resolved = specification.includes(":")
            ? resolveThresholdTable(specification, level)
            : resolveTierSum(specification, tierForLevel(level));
    }

    /**
     * The dice expression that applies at this level.
     */
    toDice(): DiceExpression {
        return new DiceExpression(this.resolved);
    }

    toString(): string {
        return this.resolved;
    }
}

/**
 * Pick the entry of a `level:expression;...` table.
 */
function resolveThresholdTable(specification: string, level: number): string {
    const entries = specification
        .split(";")
        .map((entry) => entry.trim())
        .filter((entry) => entry !== "")
        .map((entry) => {
            const separator = entry.indexOf(":");
            const threshold = entry.slice(0, separator).trim();
            const expression = entry.slice(separator + 1).trim();
            if (separator < 0 || !/^\d+$/.test(threshold)) {
                throw new MalformedExpressionError(specification, `invalid level threshold in "${entry}"`);
            }
            if (!DiceExpression.isValid(expression)) {
                throw new MalformedExpressionError(specification, `invalid expression "${expression}"`);
            }
            return { threshold: Number(threshold), expression };
        })
        .sort((a, b) => a.threshold - b.threshold);

    if (entries.length === 0) {
        throw new MalformedExpressionError(specification, "empty level table");
    }

    let chosen = entries[0];
    for (const entry of entries) {
        if (entry.threshold <= level) {
            chosen = entry;
        }
    }
    return chosen.expression;
}

/**
 * Add up comma-separated terms with tier tokens substituted.
 */
function resolveTierSum(specification: string, tier: number): string {
    let min = 0;
    let max = 0;

    for (const part of specification.split(",")) {
        const term = part
            .replace(/\(t\)/g, String(tier))
            .replace(/\(t-1\)/g, String(tier - 1))
            .replace(/\(t\+1\)/g, String(tier + 1))
            // (t-1) is 0 at tier 1, and "0d2" contributes nothing
            .replace(/(^|[+-])\s*0d\d+/g, "")
            .trim();
        if (term === "") {
            continue;
        }
        const dice = new DiceExpression(term);
        min += dice.minimum();
        max += dice.maximum();
    }

    if (min === max) {
        return String(min);
    }
    if (min < 0) {
        // "-3--1" does not parse back; write it as a one-die spread instead
        return `${min - 1}+1d${max - min + 1}`;
    }
    return `${min}-${max}`;
}
