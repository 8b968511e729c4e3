/**
 * @fileoverview Contract barrel exports
 *
 * All domain-agnostic interfaces and types that define
 * the blueprint property engine contract.
 *
 * @module @bpstats/engine/contracts
 */

// Blueprint contract
export type {
    Blueprint,
    FieldAttributes,
    FieldEntries,
    FieldGroup,
    FieldTable,
} from "./Blueprint.js";
export { FIELD_GROUPS, isFieldGroup } from "./Blueprint.js";

// Inheritance store contract
export type { BlueprintStore } from "./BlueprintStore.js";

// Property contract
export type {
    PropertyContext,
    PropertyDefinition,
    PropertyLogger,
    PropertyValue,
} from "./Property.js";
export { isPropertyDefinition } from "./Property.js";

// EventBus contract
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    EvaluationEventType,
    RegistryEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";

// Errors
export type { BlueprintStatsErrorKind } from "./errors.js";
export {
    BlueprintStatsError,
    InconsistentDataError,
    MalformedExpressionError,
    isBlueprintStatsError,
} from "./errors.js";
