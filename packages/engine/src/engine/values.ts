/**
 * @fileoverview Field value conversions
 *
 * Every field arrives as text. These helpers turn text into numbers and
 * flags while keeping "absent" distinct from zero and from false.
 *
 * @module @bpstats/engine/engine/values
 */

import { InconsistentDataError } from "../contracts/errors.js";

const kINTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;
const kNUMBER_PATTERN = /^\s*[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?\s*$/;

/**
 * Parse an integer field.
 *
 * @returns The integer, or undefined when the field is absent
 * @throws InconsistentDataError if the field is present but not an integer
 *
 * @example
 * ```typescript
 * intOrUndefined("12");      // 12
 * intOrUndefined(undefined); // undefined
 * intOrUndefined("1d4");     // throws InconsistentDataError
 * ```
 */
export function intOrUndefined(value: string | number | undefined): number | undefined {
    if (value === undefined) {
        return undefined;
    }
    if (typeof value === "number") {
        if (!Number.isInteger(value)) {
            throw new InconsistentDataError(`Expected an integer, got ${value}`, String(value));
        }
        return value;
    }
    if (!kINTEGER_PATTERN.test(value)) {
        throw new InconsistentDataError(`Expected an integer, got "${value}"`, value);
    }
    return Number(value.trim());
}

/**
 * Parse an integer field, falling back to a documented default when absent.
 */
export function intOrDefault(value: string | undefined, fallback: number): number {
    return intOrUndefined(value) ?? fallback;
}

/**
 * Parse a decimal field.
 *
 * @throws InconsistentDataError if the field is present but not a number
 */
export function floatOrUndefined(value: string | undefined): number | undefined {
    if (value === undefined) {
        return undefined;
    }
    if (!kNUMBER_PATTERN.test(value)) {
        throw new InconsistentDataError(`Expected a number, got "${value}"`, value);
    }
    return Number(value.trim());
}

/**
 * Whether a field holds non-empty text.
 */
export function hasText(value: string | undefined): value is string {
    return value !== undefined && value !== "";
}

/**
 * Whether a flag field reads `true` (either capitalization).
 */
export function isTrueText(value: string | undefined): boolean {
    return value === "true" || value === "True";
}

/**
 * Whether a flag field reads `false` (either capitalization).
 */
export function isFalseText(value: string | undefined): boolean {
    return value === "false" || value === "False";
}

/**
 * Parse a flag field, falling back to a default when absent or unrecognized.
 */
export function boolOrDefault(value: string | undefined, fallback: boolean): boolean {
    if (isTrueText(value)) {
        return true;
    }
    if (isFalseText(value)) {
        return false;
    }
    return fallback;
}
