export type InvalidArgumentCode =
    | "invalid_source"
    | "invalid_target"
    | "invalid_callable"
    | "invalid_signal_name";

/**
 * Precondition violation raised by the strict setters. Meant to surface
 * programmer error while developing, not to be caught and recovered from.
 */
export class InvalidArgumentError extends Error {
    readonly code: InvalidArgumentCode;

    constructor(code: InvalidArgumentCode, message: string) {
        super(message);
        this.name = "InvalidArgumentError";
        this.code = code;
    }
}
