/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * Synchronous, in-process event bus used by the property engine to
 * report evaluation outcomes.
 *
 * @module @bpstats/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";

/**
 * Where handler failures are reported. Defaults to `console.error`.
 */
export type HandlerErrorReporter = (eventType: string, error: unknown) => void;

/**
 * In-memory EventBus implementation.
 *
 * Features:
 * - Synchronous dispatch, specific handlers before wildcard handlers
 * - Wildcard subscription ("*" for all events)
 * - One-time subscriptions via once()
 * - A throwing handler is reported and never reaches the emitter
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus();
 *
 * bus.subscribe("property:error", (event) => {
 *     console.log("Failed:", event.data);
 * });
 *
 * bus.emit(createEvent("property:error", { entity: "Snapjaw", propertyId: "dv" }));
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private readonly handlers: Map<string, Set<EventHandler>> = new Map();

    constructor(
        private readonly reportHandlerError: HandlerErrorReporter = (eventType, error) =>
            console.error(`EventBus handler error for ${eventType}:`, error)
    ) {}

    /**
     * Emit an event to all subscribers of its type, then to wildcard subscribers.
     */
    emit(event: EventPayload): void {
        this.dispatch(event, this.handlers.get(event.type));
        this.dispatch(event, this.handlers.get("*"));
    }

    /**
     * Subscribe to events of a specific type.
     *
     * @param eventType - The event type to subscribe to (or "*" for all events)
     * @param handler - Handler function called when event is emitted
     * @returns Subscription handle for unsubscribing
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription {
        let handlers = this.handlers.get(eventType);
        if (!handlers) {
            handlers = new Set();
            this.handlers.set(eventType, handlers);
        }
        handlers.add(handler);

        return {
            unsubscribe: () => {
                const current = this.handlers.get(eventType);
                if (!current) {
                    return;
                }
                current.delete(handler);
                if (current.size === 0) {
                    this.handlers.delete(eventType);
                }
            },
        };
    }

    /**
     * Subscribe to events of a specific type, auto-unsubscribe after first event.
     */
    once(eventType: EventType, handler: EventHandler): Subscription {
        const subscription = this.subscribe(eventType, (event) => {
            subscription.unsubscribe();
            handler(event);
        });
        return subscription;
    }

    /**
     * Remove all subscriptions for a specific event type.
     *
     * @param eventType - The event type to clear (or "*" / undefined for everything)
     */
    clear(eventType?: EventType | "*"): void {
        if (eventType === undefined || eventType === "*") {
            this.handlers.clear();
        }
        else {
            this.handlers.delete(eventType);
        }
    }

    /**
     * Number of handlers for an event type.
     */
    handlerCount(eventType: EventType | "*"): number {
        return this.handlers.get(eventType)?.size ?? 0;
    }

    private dispatch(event: EventPayload, handlers: Set<EventHandler> | undefined): void {
        if (!handlers) {
            return;
        }
        // Copy: once() handlers remove themselves mid-iteration
        for (const handler of [...handlers]) {
            try {
                handler(event);
            }
            catch (error) {
                this.reportHandlerError(event.type, error);
            }
        }
    }
}
