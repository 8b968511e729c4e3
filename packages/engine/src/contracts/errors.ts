/**
 * @fileoverview Error taxonomy
 *
 * Errors raised while resolving a property. The engine isolates them per
 * property: one failing property is logged and reported as absent, and the
 * rest of the batch carries on.
 *
 * A level given as a range ("18-29") is not an error; it is recovered by
 * {@link resolveLevel} and never thrown.
 *
 * @module @bpstats/engine/contracts/errors
 */

/**
 * Discriminator for error kinds.
 */
export type BlueprintStatsErrorKind = "MalformedExpression" | "InconsistentData";

/**
 * Base class of all engine errors.
 */
export abstract class BlueprintStatsError extends Error {
    abstract readonly kind: BlueprintStatsErrorKind;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * A dice or range string that cannot be parsed.
 */
export class MalformedExpressionError extends BlueprintStatsError {
    readonly kind = "MalformedExpression" as const;

    constructor(
        readonly expression: string,
        reason?: string
    ) {
        super(`Malformed dice expression "${expression}"${reason ? `: ${reason}` : ""}`);
    }
}

/**
 * A field whose value has an unexpected shape, such as a non-integer
 * where an integer is required.
 */
export class InconsistentDataError extends BlueprintStatsError {
    readonly kind = "InconsistentData" as const;

    constructor(
        message: string,
        readonly value?: string
    ) {
        super(message);
    }
}

/**
 * Type guard for engine errors.
 */
export function isBlueprintStatsError(error: unknown): error is BlueprintStatsError {
    return error instanceof BlueprintStatsError;
}
