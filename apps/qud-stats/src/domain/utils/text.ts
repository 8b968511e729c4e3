/**
 * @fileoverview Text Utilities
 *
 * Helpers for the markup found in display names and rules text.
 *
 * Two color syntaxes appear in blueprint text:
 * - Old style: `&X` sets the foreground and `^X` the background, one
 *   character each (`&&` and `^^` are literal)
 * - New style: `{{X|text}}` wraps text in a named shader, and nests
 *
 * @module domain/utils/text
 */

const kOLDSTYLE_COLOR = /&(?!&)[a-zA-Z]|\^(?!\^)[a-zA-Z]/g;
const kNEWSTYLE_COLOR = /\{\{[^{}|]*\|([^{}]*)\}\}/g;

/**
 * Remove old-style `&X` / `^X` color codes.
 *
 * @example
 * ```typescript
 * stripOldstyleColors("&Yiron &rmace"); // "iron mace"
 * ```
 */
export function stripOldstyleColors(text: string): string {
    return text.replace(kOLDSTYLE_COLOR, "");
}

/**
 * Reduce new-style `{{shader|text}}` markup to its text, innermost first.
 *
 * @example
 * ```typescript
 * stripNewstyleColors("{{c|{{K|dark}} matter}}"); // "dark matter"
 * ```
 */
export function stripNewstyleColors(text: string): string {
    let current = text;
    let previous: string;
    do {
        previous = current;
        current = current.replace(kNEWSTYLE_COLOR, "$1");
    } while (current !== previous);
    return current;
}

/**
 * Sign to put in front of a number that has none.
 */
export function posOrNeg(value: number | string): "+" | "-" {
    return Number(value) < 0 ? "-" : "+";
}

/**
 * Text with an explicit sign: `3` becomes `+3`, `-2` and `+1` stay as they are.
 */
export function signed(value: number | string): string {
    const text = String(value);
    return text.startsWith("+") || text.startsWith("-") ? text : `${posOrNeg(value)}${text}`;
}

/**
 * Join words as an English list.
 *
 * @example
 * ```typescript
 * makeListFromWords(["heat"]);                   // "heat"
 * makeListFromWords(["heat", "cold"]);           // "heat and cold"
 * makeListFromWords(["heat", "cold", "acid"]);   // "heat, cold, and acid"
 * ```
 */
export function makeListFromWords(words: readonly string[]): string {
    if (words.length <= 2) {
        return words.join(" and ");
    }
    return `${words.slice(0, -1).join(", ")}, and ${words[words.length - 1]}`;
}

/**
 * Capitalize the first letter of each word.
 */
export function titleCase(text: string): string {
    return text.replace(/\b[a-z]/g, (letter) => letter.toUpperCase());
}
