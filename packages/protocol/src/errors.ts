export type SyncErrorCode =
    | 'invalid_input'
    | 'permission_denied'
    | 'not_found'
    | 'remote_transient'
    | 'remote_conflict'
    | 'internal'
    | 'command_timeout'
    | 'admission_rejected';

/**
 * Base class of every error the bridge surfaces to a caller.
 * `code` is stable and safe to put on the wire.
 */
export class SyncError extends Error {
    readonly code: SyncErrorCode;

    constructor(code: SyncErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.code = code;
        this.name = 'SyncError';
    }
}

export class InvalidInputError extends SyncError {
    constructor(message: string) {
        super('invalid_input', message);
        this.name = 'InvalidInputError';
    }
}

export class PermissionDeniedError extends SyncError {
    constructor(message = 'Not allowed to modify this comment') {
        super('permission_denied', message);
        this.name = 'PermissionDeniedError';
    }
}

export class NotFoundError extends SyncError {
    constructor(message: string) {
        super('not_found', message);
        this.name = 'NotFoundError';
    }
}

export class RemoteTransientError extends SyncError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('remote_transient', message, options);
        this.name = 'RemoteTransientError';
    }
}

/**
 * Raised when the network refuses to create something that already exists
 * (an alias taken by a concurrent creator). Callers re-resolve instead of failing.
 */
export class RemoteConflictError extends SyncError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('remote_conflict', message, options);
        this.name = 'RemoteConflictError';
    }
}

export class InternalError extends SyncError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('internal', message, options);
        this.name = 'InternalError';
    }
}

export class CommandTimeoutError extends SyncError {
    constructor(timeoutMs: number) {
        super('command_timeout', `Command did not complete within ${timeoutMs}ms`);
        this.name = 'CommandTimeoutError';
    }
}

export class AdmissionRejectedError extends SyncError {
    constructor(message = 'Invalid proof-of-work challenge') {
        super('admission_rejected', message);
        this.name = 'AdmissionRejectedError';
    }
}

export function isSyncError(error: unknown): error is SyncError {
    return error instanceof SyncError;
}

/**
 * Wraps anything thrown by a lower layer so that callers only ever see SyncError.
 */
export function toSyncError(error: unknown): SyncError {
    if (error instanceof SyncError) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new InternalError(message, { cause: error });
}
