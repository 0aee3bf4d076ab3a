/**
 * Error taxonomy and structured, serializable error records.
 *
 * Thrown values are MatrixError subclasses; reports carry StructuredError
 * records built from them (or from anything else that was thrown).
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ErrorCode =
    // Configuration
    | 'INVALID_CONFIG'

    // Cache layer (always absorbed)
    | 'REMOTE_LOOKUP_FAILED'
    | 'CACHE_UNAVAILABLE'

    // Job-fatal
    | 'PROVISION_FAILED'
    | 'STEP_FAILED'
    | 'TIMEOUT'

    // Scheduling
    | 'CANCELLED'

    | 'INTERNAL_ERROR';

export type Severity = 'FATAL' | 'ERROR' | 'WARNING' | 'INFO';

export interface StructuredError {
    code: ErrorCode;
    message: string;
    severity: Severity;
    context: Record<string, unknown>;
    timestamp: string;
}

/* -------------------------------------------------------------------------- */
/* Error classes                                                              */
/* -------------------------------------------------------------------------- */

export class MatrixError extends Error {
    constructor(
        message: string,
        public readonly code: ErrorCode,
        public readonly context: Record<string, unknown> = {},
        public readonly cause?: unknown
    ) {
        super(message);
        this.name = 'MatrixError';
    }
}

/** Workflow or axis declaration is unusable; raised before any job starts. */
export class ConfigurationError extends MatrixError {
    constructor(message: string, context: Record<string, unknown> = {}) {
        super(message, 'INVALID_CONFIG', context);
        this.name = 'ConfigurationError';
    }
}

export class RemoteLookupError extends MatrixError {
    constructor(message: string, public readonly url: string, cause?: unknown) {
        super(message, 'REMOTE_LOOKUP_FAILED', { url }, cause);
        this.name = 'RemoteLookupError';
    }
}

export class CacheUnavailableError extends MatrixError {
    constructor(message: string, cause?: unknown) {
        super(message, 'CACHE_UNAVAILABLE', {}, cause);
        this.name = 'CacheUnavailableError';
    }
}

export class ProvisionError extends MatrixError {
    constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
        super(message, 'PROVISION_FAILED', context, cause);
        this.name = 'ProvisionError';
    }
}

export class StepExecutionError extends MatrixError {
    constructor(
        message: string,
        public readonly step: string,
        public readonly exitCode: number,
        cause?: unknown
    ) {
        super(message, 'STEP_FAILED', { step, exit_code: exitCode }, cause);
        this.name = 'StepExecutionError';
    }
}

export class CancelledError extends MatrixError {
    constructor(reason: string) {
        super(`Cancelled: ${reason}`, 'CANCELLED', { reason });
        this.name = 'CancelledError';
    }
}

export class TimeoutError extends MatrixError {
    constructor(operation: string, public readonly timeoutMs: number) {
        super(`${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT', { operation, timeout_ms: timeoutMs });
        this.name = 'TimeoutError';
    }
}

/* -------------------------------------------------------------------------- */
/* Builders                                                                   */
/* -------------------------------------------------------------------------- */

function getSeverity(code: ErrorCode): Severity {
    switch (code) {
        case 'INVALID_CONFIG':
        case 'INTERNAL_ERROR':
            return 'FATAL';
        case 'REMOTE_LOOKUP_FAILED':
        case 'CACHE_UNAVAILABLE':
            return 'WARNING';
        case 'CANCELLED':
            return 'INFO';
        default:
            return 'ERROR';
    }
}

export function createStructuredError(
    code: ErrorCode,
    message: string,
    context: Record<string, unknown> = {}
): StructuredError {
    return {
        code,
        message,
        severity: getSeverity(code),
        context,
        timestamp: new Date().toISOString(),
    };
}

export function toStructuredError(err: unknown): StructuredError {
    if (err instanceof MatrixError) {
        return createStructuredError(err.code, err.message, err.context);
    }
    if (err instanceof Error) {
        return createStructuredError('INTERNAL_ERROR', err.message, { name: err.name });
    }
    return createStructuredError('INTERNAL_ERROR', String(err));
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
