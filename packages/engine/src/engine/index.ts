/**
 * @fileoverview Engine barrel exports
 *
 * @module @bpstats/engine/engine
 */

export {
    PropertyEngine,
    type EngineConfig,
    type EngineLogger,
} from "./PropertyEngine.js";
export { BlueprintView } from "./BlueprintView.js";
export {
    boolOrDefault,
    floatOrUndefined,
    hasText,
    intOrDefault,
    intOrUndefined,
    isFalseText,
    isTrueText,
} from "./values.js";
