/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of engine contracts.
 *
 * @module @bpstats/engine/impl
 */

export { InMemoryBlueprintStore } from "./InMemoryBlueprintStore.js";
export { InMemoryEventBus, type HandlerErrorReporter } from "./InMemoryEventBus.js";
