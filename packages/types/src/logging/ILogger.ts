/**
 * A single log method in pino's calling convention.
 *
 * Structured bindings come first and the message second, or the message
 * alone when there is nothing to bind.
 */
export interface ILogMethod {
    (bindings: Record<string, unknown>, message?: string): void;
    (message: string): void;
}

/**
 * Structured logging contract shared across the engine and its services.
 *
 * Services receive an `ILogger` through their constructor instead of importing
 * a concrete logger, so tests can pass a mock and hosts can route the engine's
 * output into their own pino instance.
 */
export interface ILogger {
    /**
     * Unrecoverable failures.
     */
    fatal: ILogMethod;

    /**
     * Failures that abort an operation.
     */
    error: ILogMethod;

    /**
     * Unusual but tolerated conditions, such as a widget lookup that found
     * none of its candidate blocks.
     */
    warn: ILogMethod;

    info: ILogMethod;

    /**
     * Diagnostic detail: template resolution and widget library loads.
     */
    debug: ILogMethod;

    /**
     * Per-render detail such as alias activation.
     */
    trace: ILogMethod;

    /**
     * Create a scoped child logger with predefined bindings.
     *
     * @param bindings - Key-value pairs merged into every entry the child emits
     * @returns A logger that inherits from this one while applying the bindings
     */
    child(bindings: Record<string, unknown>): ILogger;
}
