/**
 * @fileoverview Code page 437
 *
 * Render strings are sometimes written as a decimal code page 437 index.
 *
 * @module domain/utils/cp437
 */

import { readFileSync } from "fs";
import { InconsistentDataError } from "@bpstats/engine";

let table: readonly string[] | undefined;

function loadTable(): readonly string[] {
    if (!table) {
        const content = readFileSync(new URL("../../../data/cp437.json", import.meta.url), "utf-8");
        const parsed: unknown = JSON.parse(content);
        if (!Array.isArray(parsed) || parsed.length !== 256) {
            throw new Error("Code page table must list 256 characters");
        }
        table = parsed.map(String);
    }
    return table;
}

/**
 * Unicode character for a code page 437 index.
 *
 * @throws InconsistentDataError if the code is outside 0-255
 */
export function cp437ToUnicode(code: number): string {
    if (!Number.isInteger(code) || code < 0 || code > 255) {
        throw new InconsistentDataError(`Not a code page 437 character: ${code}`, String(code));
    }
    return loadTable()[code];
}
