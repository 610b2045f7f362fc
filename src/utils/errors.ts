/**
 * Application error hierarchy and the Result type used at internal boundaries
 * where an exception would blur ack/nack semantics.
 */

export type Result<T, E = Error> =
    | { ok: true; value: T }
    | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
    return {ok: true, value};
}

export function err<E>(error: E): Result<never, E> {
    return {ok: false, error};
}

/**
 * Base class for application-specific errors
 */
export class BridgeError extends Error {
    code: string;
    details: unknown;
    isCustomError: boolean;

    constructor(message: string, code: string = 'BRIDGE_ERROR', details: unknown = null) {
        super(message);
        this.name = 'BridgeError';
        this.code = code;
        this.details = details;
        this.isCustomError = true;
        // Maintain proper stack trace
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, new.target);
        }
    }
}

export class ConfigurationError extends BridgeError {
    constructor(message: string, details: unknown = null) {
        super(message, 'CONFIGURATION_ERROR', details);
        this.name = 'ConfigurationError';
    }
}

/** Broker publish failed after every attempt. */
export class DispatchError extends BridgeError {
    attempts: number;

    constructor(message: string, attempts: number, cause?: unknown) {
        super(message, 'DISPATCH_ERROR', cause instanceof Error ? cause.message : cause ?? null);
        this.name = 'DispatchError';
        this.attempts = attempts;
    }
}

/**
 * Orchestrator REST call failure. `status` is absent for transport errors
 * (connection refused, timeout), which are always retriable.
 */
export class OrchestratorError extends BridgeError {
    status?: number;
    retriable: boolean;

    constructor(message: string, status?: number, details: unknown = null) {
        super(message, 'ORCHESTRATOR_ERROR', details);
        this.name = 'OrchestratorError';
        this.status = status;
        this.retriable = status === undefined || status >= 500 || status === 408 || status === 429;
    }

    /** Camunda answers 404 once an external task has been completed or deleted. */
    get isTaskGone(): boolean {
        return this.status === 404;
    }
}

export class MessageFormatError extends BridgeError {
    constructor(message: string, details: unknown = null) {
        super(message, 'MESSAGE_FORMAT_ERROR', details);
        this.name = 'MessageFormatError';
    }
}

export class MetadataError extends BridgeError {
    constructor(message: string, details: unknown = null) {
        super(message, 'METADATA_ERROR', details);
        this.name = 'MetadataError';
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === 'string') return error;
    return String(error);
}
