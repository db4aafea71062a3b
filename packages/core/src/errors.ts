/**
 * Error taxonomy of the command framework.
 *
 * Everything deriving from CommandError is a one-shot user-facing message:
 * the loop reports it and keeps going. CommandConfigError is raised while
 * registering commands and screens, so it only ever surfaces at startup.
 */

export class CommandError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CommandError';
    }
}

/**
 * A required field found nothing to claim.
 */
export class ValidationError extends CommandError {
    readonly field: string;

    constructor(field: string, message = 'Missing required input') {
        super(`${message}: ${field}`);
        this.name = 'ValidationError';
        this.field = field;
    }
}

export type RoutingFailure = 'empty' | 'not-found' | 'unresolved-fork' | 'leftover' | 'shortcut' | 'syntax';

/**
 * The input could not be routed to exactly one command.
 */
export class RoutingError extends CommandError {
    readonly reason: RoutingFailure;
    readonly tokens: readonly string[];

    constructor(reason: RoutingFailure, message: string, tokens: readonly string[] = []) {
        super(message);
        this.name = 'RoutingError';
        this.reason = reason;
        this.tokens = tokens;
    }
}

/**
 * The user cancelled a prompt with the abort sentinel.
 */
export class AbortError extends CommandError {
    constructor(message = 'Input aborted.') {
        super(message);
        this.name = 'AbortError';
    }
}

export class UnsupportedOperationError extends CommandError {
    constructor(message: string) {
        super(message);
        this.name = 'UnsupportedOperationError';
    }
}

/**
 * Bad line selection, unknown screen and similar display problems.
 */
export class DisplayError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'DisplayError';
    }
}

/**
 * A command or screen was registered with an invalid configuration.
 */
export class CommandConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CommandConfigError';
    }
}

/**
 * Ends the interactive loop.
 */
export class QuitSignal extends Error {
    constructor(message = 'User quit program.') {
        super(message);
        this.name = 'QuitSignal';
    }
}
