/**
 * Error types for packetflow.
 *
 * Codec and table errors are thrown synchronously and signal a programming
 * mistake (mis-sized packet, mismatched put/get order). Transport failures
 * never surface as these; they close the connection instead.
 */

/**
 * Base class for all packetflow errors.
 */
export class PacketFlowError extends Error {
    constructor(message: string, public readonly code: string) {
        super(message);
        this.name = 'PacketFlowError';
        // Maintains proper stack trace for where error was thrown (V8 only)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, PacketFlowError);
        }
    }
}

/**
 * Thrown when a cursor or offset would run past the packet capacity.
 */
export class BoundsError extends PacketFlowError {
    constructor(
        message: string,
        public readonly position: number,
        public readonly width: number,
        public readonly capacity: number
    ) {
        super(`${message} (position ${position}, width ${width}, capacity ${capacity})`, 'BOUNDS_ERROR');
        this.name = 'BoundsError';
    }
}

/**
 * Thrown when encoded data is inconsistent with its declared shape.
 */
export class FormatError extends PacketFlowError {
    constructor(message: string) {
        super(message, 'FORMAT_ERROR');
        this.name = 'FormatError';
    }
}

/**
 * Thrown when a value or table does not fit its allowed range.
 */
export class OutOfRangeError extends PacketFlowError {
    constructor(message: string) {
        super(message, 'OUT_OF_RANGE_ERROR');
        this.name = 'OutOfRangeError';
    }
}

/**
 * Thrown by start() when the loop it would spawn is already running.
 */
export class AlreadyRunningError extends PacketFlowError {
    constructor(message: string) {
        super(message, 'ALREADY_RUNNING_ERROR');
        this.name = 'AlreadyRunningError';
    }
}

/**
 * Thrown when an operation needs a connection that has been torn down.
 */
export class ClosedConnectionError extends PacketFlowError {
    constructor(message: string = 'Connection closed') {
        super(message, 'CLOSED_CONNECTION_ERROR');
        this.name = 'ClosedConnectionError';
    }
}

export class DuplicateKeyError extends PacketFlowError {
    constructor(public readonly key: string) {
        super(`Key "${key}" is already registered`, 'DUPLICATE_KEY_ERROR');
        this.name = 'DuplicateKeyError';
    }
}

export class KeyNotFoundError extends PacketFlowError {
    constructor(public readonly key: string) {
        super(`Key "${key}" is not registered`, 'KEY_NOT_FOUND_ERROR');
        this.name = 'KeyNotFoundError';
    }
}

/**
 * Thrown when configuration is invalid.
 */
export class ConfigurationError extends PacketFlowError {
    constructor(message: string) {
        super(message, 'CONFIGURATION_ERROR');
        this.name = 'ConfigurationError';
    }
}

/**
 * Normalizes a caught value into an Error.
 */
export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
