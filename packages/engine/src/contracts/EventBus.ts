/**
 * @fileoverview EventBus Contract
 *
 * Defines the contract for observing property evaluation.
 * Events report what the engine did; they never feed back into a result.
 *
 * Design decisions:
 * - Synchronous dispatch, matching the synchronous evaluator
 * - In-memory implementation (no external queue dependency)
 * - Ordering is preserved within a single event type
 *
 * @module @bpstats/engine/contracts/EventBus
 */

/**
 * Event payload base interface.
 * All events must have a type and timestamp.
 */
export interface EventPayload {
    /** Event type identifier */
    readonly type: string;

    /** ISO timestamp when event was emitted */
    readonly timestamp: string;

    /** Trace ID for correlation */
    readonly traceId?: string;

    /** Additional event-specific data */
    readonly data?: Record<string, unknown>;
}

/**
 * Registry event types emitted when the property table changes.
 */
export type RegistryEventType = "property:registered";

/**
 * Evaluation event types emitted while resolving properties.
 */
export type EvaluationEventType =
    | "property:evaluated"
    | "property:error"
    | "entity:evaluated";

/**
 * All known event types.
 */
export type EventType = RegistryEventType | EvaluationEventType | string;

/**
 * Event handler function signature.
 */
export type EventHandler<T extends EventPayload = EventPayload> = (event: T) => void;

/**
 * Subscription handle returned when subscribing to events.
 */
export interface Subscription {
    /** Unsubscribe from the event */
    unsubscribe(): void;
}

/**
 * EventBus interface.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * const sub = bus.subscribe("property:error", (event) => {
 *     console.log("Property failed:", event.data);
 * });
 *
 * bus.emit(createEvent("property:error", { entity: "Snapjaw", property: "dv" }));
 *
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    /**
     * Emit an event to all subscribers.
     */
    emit(event: EventPayload): void;

    /**
     * Subscribe to events of a specific type.
     *
     * @param eventType - The event type to subscribe to (or "*" for all events)
     * @param handler - Handler function called when event is emitted
     * @returns Subscription handle for unsubscribing
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription;

    /**
     * Subscribe to events of a specific type, auto-unsubscribe after first event.
     */
    once(eventType: EventType, handler: EventHandler): Subscription;

    /**
     * Remove all subscriptions for a specific event type.
     *
     * @param eventType - The event type to clear (or "*" for all)
     */
    clear(eventType?: EventType | "*"): void;
}

/**
 * Factory function to create an event payload.
 *
 * @param type - Event type
 * @param data - Optional event data
 * @param traceId - Optional trace ID
 * @returns Event payload with timestamp
 */
export function createEvent(
    type: EventType,
    data?: Record<string, unknown>,
    traceId?: string
): EventPayload {
    return {
        type,
        timestamp: new Date().toISOString(),
        traceId,
        data,
    };
}
