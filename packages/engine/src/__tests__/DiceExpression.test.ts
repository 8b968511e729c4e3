/**
 * @fileoverview Unit tests for DiceExpression
 *
 * @module @bpstats/engine/__tests__/DiceExpression
 */

import { describe, it, expect } from "vitest";
import { DiceExpression } from "../dice/DiceExpression.js";
import { MalformedExpressionError } from "../contracts/errors.js";

describe("DiceExpression", () => {
    describe("single terms", () => {
        // Scenario: Flat integer
        it("should treat a flat integer as a fixed value", () => {
            const dice = new DiceExpression("7");

            expect(dice.minimum()).toBe(7);
            expect(dice.maximum()).toBe(7);
            expect(dice.average()).toBe(7);
        });

        // Scenario: Uniform range
        it("should read N-M as a range", () => {
            const dice = new DiceExpression("10-20");

            expect(dice.minimum()).toBe(10);
            expect(dice.maximum()).toBe(20);
            expect(dice.average()).toBe(15);
        });

        // Scenario: Negative die roll as the leading term
        it("should accept a leading sign", () => {
            const dice = new DiceExpression("-2d4");

            expect(dice.minimum()).toBe(-8);
            expect(dice.maximum()).toBe(-2);
            expect(dice.average()).toBe(-5);
        });
    });

    describe("sums", () => {
        // Scenario: Dice with a flat bonus
        it("should evaluate 2d6+3", () => {
            const dice = new DiceExpression("2d6+3");

            expect(dice.minimum()).toBe(5);
            expect(dice.maximum()).toBe(15);
            expect(dice.average()).toBe(10);
        });

        // Scenario: Dice with a flat penalty
        it("should evaluate 1d4-1", () => {
            const dice = new DiceExpression("1d4-1");

            expect(dice.minimum()).toBe(0);
            expect(dice.maximum()).toBe(3);
            expect(dice.average()).toBe(1.5);
        });

        // Scenario: Range plus a fixed die
        it("should evaluate 14-18+3d1", () => {
            const dice = new DiceExpression("14-18+3d1");

            expect(dice.minimum()).toBe(17);
            expect(dice.maximum()).toBe(21);
            expect(dice.average()).toBe(19);
        });

        // Scenario: Negative base with a die spread
        it("should evaluate -3+1d2", () => {
            const dice = new DiceExpression("-3+1d2");

            expect(dice.minimum()).toBe(-2);
            expect(dice.maximum()).toBe(-1);
            expect(dice.average()).toBe(-1.5);
        });

        // Scenario: Descending pair reads as subtraction
        it("should read 5-2 inside a sum as five minus two", () => {
            const dice = new DiceExpression("1d4+5-2");

            expect(dice.minimum()).toBe(4);
            expect(dice.maximum()).toBe(7);
            expect(dice.average()).toBe(5.5);
        });

        // Scenario: Subtracted die after a flat term
        it("should read 2-3d4 inside a sum as two minus 3d4", () => {
            const dice = new DiceExpression("1+2-3d4");

            expect(dice.minimum()).toBe(-9);
            expect(dice.maximum()).toBe(0);
            expect(dice.average()).toBe(-4.5);
        });

        // Scenario: Subtracted die after a die and a flat bonus
        it("should evaluate 1d4+1-2d2", () => {
            const dice = new DiceExpression("1d4+1-2d2");

            expect(DiceExpression.isValid("1d4+1-2d2")).toBe(true);
            expect(dice.minimum()).toBe(-2);
            expect(dice.maximum()).toBe(3);
            expect(dice.average()).toBe(0.5);
        });

        // Scenario: Whitespace is ignored
        it("should ignore whitespace", () => {
            const dice = new DiceExpression(" 2d6 + 3 ");

            expect(dice.minimum()).toBe(5);
            expect(dice.maximum()).toBe(15);
            expect(dice.toString()).toBe(" 2d6 + 3 ");
        });

        // Scenario: minimum <= average <= maximum
        it("should keep the average between the bounds", () => {
            for (const text of ["1d3+2d4-1", "3-9", "-1d6+10", "12", "1d20-5-3"]) {
                const dice = new DiceExpression(text);

                expect(dice.minimum()).toBeLessThanOrEqual(dice.average());
                expect(dice.average()).toBeLessThanOrEqual(dice.maximum());
            }
        });
    });

    describe("malformed input", () => {
        // Scenario: Unparseable strings throw
        it.each(["", "abc", "d6", "1d4*2", "3+", "2d6+"])("should reject %j", (text) => {
            expect(() => new DiceExpression(text)).toThrow(MalformedExpressionError);
        });

        // Scenario: Dice need at least one die with one side
        it("should reject zero dice and zero sides", () => {
            expect(() => new DiceExpression("0d6")).toThrow('invalid die "0d6"');
            expect(() => new DiceExpression("2d0")).toThrow('invalid die "2d0"');
        });

        // Scenario: Error message carries the original text
        it("should name the expression in the error", () => {
            expect(() => new DiceExpression("abc")).toThrow('Malformed dice expression "abc": unexpected "abc"');
        });

        // Scenario: Validity check does not throw
        it("should report validity without throwing", () => {
            expect(DiceExpression.isValid("2d6")).toBe(true);
            expect(DiceExpression.isValid("14-18")).toBe(true);
            expect(DiceExpression.isValid("d6")).toBe(false);
            expect(DiceExpression.isValid("")).toBe(false);
        });
    });
});
