/**
 * @fileoverview Dice barrel exports
 *
 * @module @bpstats/engine/dice
 */

export { DiceExpression } from "./DiceExpression.js";
export {
    LevelScaledValue,
    resolveLevel,
    tierForLevel,
    type ResolvedLevel,
} from "./LevelScaledValue.js";
