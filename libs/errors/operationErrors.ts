/**
 * Critical Operation Error Taxonomy
 *
 * Every failure surfaced by the executor is one of five kinds. Callers map
 * kinds to responses through `kind`/`statusCode`, never by parsing messages.
 */

export type OperationErrorKind =
    | 'VALIDATION'
    | 'UNAUTHORIZED'
    | 'RATE_LIMITED'
    | 'RESULT_INVALID'
    | 'OPERATION_FAILED';

export abstract class CriticalOperationError extends Error {
    abstract readonly kind: OperationErrorKind;
    abstract readonly code: string;
    abstract readonly statusCode: number;
    abstract readonly retryable: boolean;
    public override cause?: unknown;

    protected constructor(
        message: string,
        public readonly operationId: string,
        options?: { cause?: unknown }
    ) {
        super(message);
        this.name = new.target.name;
        this.cause = options?.cause;
    }
}

/**
 * Malformed context or input. Caller bug.
 */
export class ValidationError extends CriticalOperationError {
    readonly kind = 'VALIDATION';
    readonly code = 'VALIDATION_ERROR';
    readonly statusCode = 400;
    readonly retryable = false;

    constructor(
        operationId: string,
        public readonly issues: readonly string[],
        options?: { cause?: unknown }
    ) {
        super(`Operation context rejected: ${issues.join('; ')}`, operationId, options);
    }
}

/**
 * Permission denied. Always audited at critical severity.
 */
export class UnauthorizedError extends CriticalOperationError {
    readonly kind = 'UNAUTHORIZED';
    readonly code = 'PERMISSION_DENIED';
    readonly statusCode = 403;
    readonly retryable = false;

    constructor(
        operationId: string,
        public readonly actorId: string,
        public readonly action: string,
        public readonly requiredPermissions: readonly string[]
    ) {
        super(`Actor ${actorId} is not permitted to perform ${action}`, operationId);
    }
}

export class RateLimitError extends CriticalOperationError {
    readonly kind = 'RATE_LIMITED';
    readonly code = 'RATE_LIMIT_EXCEEDED';
    readonly statusCode = 429;
    readonly retryable = true;

    constructor(
        operationId: string,
        public readonly key: string,
        public readonly limit: number,
        public readonly retryAfterMs: number
    ) {
        super(`Rate limit of ${limit} exceeded for ${key}`, operationId);
    }
}

/**
 * The unit of work returned a value that broke a declared invariant.
 */
export class ResultValidationError extends CriticalOperationError {
    readonly kind = 'RESULT_INVALID';
    readonly code = 'RESULT_VALIDATION_FAILED';
    readonly statusCode = 500;
    readonly retryable = false;

    constructor(operationId: string, public readonly reason: string) {
        super(`Operation result failed validation: ${reason}`, operationId);
    }
}

/**
 * Wraps whatever the unit of work (or the transaction around it) threw.
 */
export class OperationFailedError extends CriticalOperationError {
    readonly kind = 'OPERATION_FAILED';
    readonly code = 'OPERATION_FAILED';
    readonly statusCode = 502;
    readonly retryable = false;

    constructor(operationId: string, cause: unknown) {
        super(`Operation failed: ${describeCause(cause)}`, operationId, { cause });
    }
}

// --- Errors raised by units of work and infrastructure ---

/**
 * Thrown by a unit of work when presented credentials do not verify.
 * Counts toward lockout when the operation carries an authIdentity.
 */
export class AuthenticationError extends Error {
    readonly code = 'AUTH_FAILED';

    constructor(message = 'Invalid credentials') {
        super(message);
        this.name = 'AuthenticationError';
    }
}

export class AccountLockedError extends Error {
    readonly code = 'ACCOUNT_LOCKED';

    constructor(public readonly identity: string, public readonly lockedUntil: Date) {
        super(`Identity is locked until ${lockedUntil.toISOString()}`);
        this.name = 'AccountLockedError';
    }
}

export class OperationTimeoutError extends Error {
    readonly code = 'DEADLINE_EXCEEDED';

    constructor(public readonly timeoutMs: number) {
        super(`Operation did not complete within ${timeoutMs}ms`);
        this.name = 'OperationTimeoutError';
    }
}

export class NestedTransactionError extends Error {
    readonly code = 'NESTED_TRANSACTION';

    constructor() {
        super('Nested transaction detected: begin() cannot be invoked within an active transaction.');
        this.name = 'NestedTransactionError';
    }
}

export class ThresholdConfigurationError extends Error {
    readonly code = 'THRESHOLD_CONFIG_INVALID';

    constructor(public readonly metricKey: string, public readonly issues: readonly string[]) {
        super(`Invalid threshold rule for ${metricKey}: ${issues.join('; ')}`);
        this.name = 'ThresholdConfigurationError';
    }
}

export function isCriticalOperationError(error: unknown): error is CriticalOperationError {
    return error instanceof CriticalOperationError;
}

export function describeCause(cause: unknown): string {
    if (cause instanceof Error) return cause.message;
    if (typeof cause === 'string') return cause;
    return String(cause);
}
