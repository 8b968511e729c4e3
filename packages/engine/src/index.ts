/**
 * @fileoverview Blueprint property engine
 *
 * Domain-agnostic machinery for deriving statistics from an inheritance
 * tree of blueprints.
 *
 * The engine provides:
 * - Typed field lookup with nearest-ancestor fallback
 * - Dice expressions and level-scaled values
 * - A lookup table of named properties, evaluated with per-property isolation
 * - YAML-declared field properties
 *
 * @module @bpstats/engine
 * @example
 * ```typescript
 * import {
 *     InMemoryBlueprintStore,
 *     PropertyEngine,
 *     type PropertyDefinition,
 * } from "@bpstats/engine";
 *
 * // Build a store, register properties
 * // Ask the engine for values
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

// Blueprint
export type {
    Blueprint,
    FieldAttributes,
    FieldEntries,
    FieldGroup,
    FieldTable,
} from "./contracts/index.js";
export { FIELD_GROUPS, isFieldGroup } from "./contracts/index.js";

// Inheritance store
export type { BlueprintStore } from "./contracts/index.js";

// Property
export type {
    PropertyContext,
    PropertyDefinition,
    PropertyLogger,
    PropertyValue,
} from "./contracts/index.js";
export { isPropertyDefinition } from "./contracts/index.js";

// EventBus
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    EvaluationEventType,
    RegistryEventType,
    Subscription,
} from "./contracts/index.js";
export { createEvent } from "./contracts/index.js";

// Errors
export type { BlueprintStatsErrorKind } from "./contracts/index.js";
export {
    BlueprintStatsError,
    InconsistentDataError,
    MalformedExpressionError,
    isBlueprintStatsError,
} from "./contracts/index.js";

// ============================================================================
// Dice exports
// ============================================================================

export {
    DiceExpression,
    LevelScaledValue,
    resolveLevel,
    tierForLevel,
    type ResolvedLevel,
} from "./dice/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export {
    InMemoryBlueprintStore,
    InMemoryEventBus,
    type HandlerErrorReporter,
} from "./impl/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export {
    BlueprintView,
    PropertyEngine,
    boolOrDefault,
    floatOrUndefined,
    hasText,
    intOrDefault,
    intOrUndefined,
    isFalseText,
    isTrueText,
    type EngineConfig,
    type EngineLogger,
} from "./engine/index.js";

// ============================================================================
// Loader exports
// ============================================================================

export {
    PropertyLoader,
    createPropertyFromYaml,
    isYamlPropertyDefinition,
    type YamlPropertyDefinition,
    type YamlPropertyType,
    type PropertyLoaderConfig,
    type PropertyLoaderLogger,
} from "./plugins/index.js";
