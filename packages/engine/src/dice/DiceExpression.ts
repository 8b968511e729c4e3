/**
 * @fileoverview DiceExpression
 *
 * Parses randomized value strings into their minimum, maximum and average.
 *
 * An expression is a sum of signed terms, each one of:
 * - a flat integer: `7`
 * - a uniform range: `10-20` (only when the first bound is not above the second)
 * - a dice roll: `2d6`
 *
 * So `2d6+3`, `14-18+3d1`, `-3+1d2`, `1d4+5-2` and `1+2-3d4` are all valid.
 *
 * @module @bpstats/engine/dice/DiceExpression
 */

import { MalformedExpressionError } from "../contracts/errors.js";

/**
 * One signed term of an expression.
 */
interface DiceTerm {
    readonly sign: 1 | -1;
    readonly min: number;
    readonly max: number;
    readonly average: number;
}

/**
 * A die roll `AdB`, a range `N-M`, or a flat integer, with an optional sign.
 * The range alternative needs a second bound that is not a dice count, so
 * `5-2` falls through to the flat `5` and leaves `-2` for the next term, and
 * `2-3d4` reads as `2` minus `3d4`.
 */
const kTERM_PATTERN = /([+-]?)(?:(\d+)d(\d+)|(\d+)-(\d+)(?!\d*d)|(\d+))/y;

/**
 * Immutable random integer draw.
 *
 * @example
 * ```typescript
 * const dice = new DiceExpression("2d6+3");
 * dice.minimum(); // 5
 * dice.maximum(); // 15
 * dice.average(); // 10
 * ```
 */
export class DiceExpression {
    private readonly terms: readonly DiceTerm[];

    /**
     * @param text - Expression to parse; surrounding and inner whitespace is ignored
     * @throws MalformedExpressionError if the text is not a dice expression
     */
    constructor(readonly text: string) {
        this.terms = parseTerms(text);
    }

    /**
     * Whether `text` parses as a dice expression.
     */
    static isValid(text: string): boolean {
        try {
            parseTerms(text);
            return true;
        }
        catch (error) {
            if (error instanceof MalformedExpressionError) {
                return false;
            }
            throw error;
        }
    }

    /**
     * Lowest possible draw.
     */
    minimum(): number {
        return this.terms.reduce(
            (sum, term) => sum + (term.sign > 0 ? term.min : -term.max),
            0
        );
    }

    /**
     * Highest possible draw.
     */
    maximum(): number {
        return this.terms.reduce(
            (sum, term) => sum + (term.sign > 0 ? term.max : -term.min),
            0
        );
    }

    /**
     * Expected draw. May be fractional (`1d6` averages 3.5).
     */
    average(): number {
        return this.terms.reduce((sum, term) => sum + term.sign * term.average, 0);
    }

    toString(): string {
        return this.text;
    }
}

/**
 * Split an expression into signed terms.
 */
function parseTerms(text: string): DiceTerm[] {
    const source = text.replace(/\s+/g, "");
    if (source === "") {
        throw new MalformedExpressionError(text, "empty expression");
    }

    const terms: DiceTerm[] = [];
    kTERM_PATTERN.lastIndex = 0;
    let position = 0;

    while (position < source.length) {
        kTERM_PATTERN.lastIndex = position;
        const match = kTERM_PATTERN.exec(source);
        if (!match) {
            throw new MalformedExpressionError(text, `unexpected "${source.slice(position)}"`);
        }

        const [whole, signText, diceCount, diceSides, rangeLow, rangeHigh, flat] = match;
        if (terms.length > 0 && signText === "") {
            throw new MalformedExpressionError(text, `missing operator before "${whole}"`);
        }
        const sign = signText === "-" ? -1 : 1;

        if (diceCount !== undefined && diceSides !== undefined) {
            const count = Number(diceCount);
            const sides = Number(diceSides);
            if (count < 1 || sides < 1) {
                throw new MalformedExpressionError(text, `invalid die "${diceCount}d${diceSides}"`);
            }
            terms.push({ sign, min: count, max: count * sides, average: count * (sides + 1) / 2 });
            position += whole.length;
        }
        else if (rangeLow !== undefined && rangeHigh !== undefined && Number(rangeLow) <= Number(rangeHigh)) {
            const low = Number(rangeLow);
            const high = Number(rangeHigh);
            terms.push({ sign, min: low, max: high, average: (low + high) / 2 });
            position += whole.length;
        }
        else {
            // Descending pair: keep the first number, the rest is a subtraction
            const value = Number(flat ?? rangeLow);
            terms.push({ sign, min: value, max: value, average: value });
            position += signText.length + String(flat ?? rangeLow).length;
        }
    }

    return terms;
}
