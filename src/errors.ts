export class SerialscopeError extends Error {
    constructor(message: string, public originalError?: unknown) {
        super(message);
        this.name = 'SerialscopeError';
    }
}

export type DecodeErrorKind = 'MissingTimestamp' | 'InvalidTimestamp';

/**
 * A line that cannot be placed on the time axis. Recoverable: the pump drops the line and keeps running.
 */
export class DecodeError extends SerialscopeError {
    constructor(public readonly kind: DecodeErrorKind, public readonly line: string) {
        super(kind === 'MissingTimestamp'
            ? `Time value is missing in the received data: "${line}"`
            : `Time value is not numeric in the received data: "${line}"`);
        this.name = 'DecodeError';
    }
}

export type StoreErrorKind = 'NotFound';

/**
 * Registry/store coordination bug. Not expected in production.
 */
export class StoreError extends SerialscopeError {
    constructor(public readonly kind: StoreErrorKind, public readonly signal: string) {
        super(`Signal "${signal}" is not registered in the sample store`);
        this.name = 'StoreError';
    }
}

export type ConfigErrorKind = 'InvalidWindowSize' | 'InvalidTickInterval' | 'InvalidTransport';

export class ConfigError extends SerialscopeError {
    constructor(public readonly kind: ConfigErrorKind, message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export class PumpStateError extends SerialscopeError {
    constructor(message: string) {
        super(message);
        this.name = 'PumpStateError';
    }
}

export class ArchiveError extends SerialscopeError {
    constructor(message: string, originalError?: unknown) {
        super(message, originalError);
        this.name = 'ArchiveError';
    }
}
