/**
 * @fileoverview Presentation properties
 *
 * Names, glyphs and colors as the game shows them.
 *
 * @module domain/catalog/presentation
 */

import { hasText, intOrUndefined, type BlueprintView } from "@bpstats/engine";
import { isRoboticized } from "../attributes/classification.js";
import { lookup } from "../tables.js";
import { cp437ToUnicode, stripNewstyleColors, stripOldstyleColors } from "../utils/index.js";
import type { CatalogContext } from "./CatalogContext.js";

const kGAS_GLYPH = "▓";
const kDEFAULT_ROBOT_PREFIX = "{{c|mechanical}}";

export function id(subject: BlueprintView): string {
    return subject.name;
}

/**
 * Name of the parent blueprint; the root has none.
 */
export function inheritingfrom(subject: BlueprintView): string | undefined {
    return subject.parent()?.name;
}

/**
 * Display name with color markup removed.
 */
export function displayname(subject: BlueprintView): string | undefined {
    const name = subject.part("Render", "DisplayName");
    return name === undefined ? undefined : stripNewstyleColors(stripOldstyleColors(name));
}

/**
 * Display name with color markup, as shown in game.
 *
 * Roboticized creatures are prefixed with their name prefix.
 */
export function title(subject: BlueprintView, context: CatalogContext): string {
    let value = subject.field("builder", "GoatfolkHero1", "ForceName")
        || lookup(context.tables.titleOverrides, subject.name)
        || subject.part("Render", "DisplayName")
        || subject.name;

    if (isRoboticized(subject)) {
        const prefix = subject.part("Roboticized", "NamePrefix");
        value = `${hasText(prefix) ? prefix : kDEFAULT_ROBOT_PREFIX} ${value}`;
    }
    return value;
}

/**
 * Character drawn for the object in ASCII mode.
 */
export function renderstr(subject: BlueprintView): string | undefined {
    const render = subject.part("Render", "RenderString");

    // multi-character render strings are decimal code page 437 indexes
    if (render !== undefined && render.length > 1) {
        const code = intOrUndefined(render);
        return code === undefined ? undefined : cp437ToUnicode(code);
    }
    if (subject.hasPart("Gas")) {
        return kGAS_GLYPH;
    }
    return render;
}

/**
 * Color code of the render string.
 */
export function colorstr(subject: BlueprintView): string | undefined {
    const render = subject.part("Render", "ColorString");
    if (hasText(render)) {
        return render;
    }
    const gas = subject.part("Gas", "ColorString");
    return hasText(gas) ? gas : undefined;
}
