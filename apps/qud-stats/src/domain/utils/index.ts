/**
 * @fileoverview Domain utilities barrel exports
 *
 * @module domain/utils
 */

export {
    stripOldstyleColors,
    stripNewstyleColors,
    posOrNeg,
    signed,
    makeListFromWords,
    titleCase,
} from "./text.js";
export { cp437ToUnicode } from "./cp437.js";
