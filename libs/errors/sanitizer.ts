import { logger } from '../logging/logger.js';
import {
    CriticalOperationError,
    OperationErrorKind,
    RateLimitError
} from './operationErrors.js';

/**
 * Error Information Disclosure Prevention
 * Maps operation errors to a fixed public shape. Internal messages, causes
 * and stacks stay in the logs, correlated by operationId.
 */

export interface PublicError {
    status: number;
    code: string;
    message: string;
    retryable: boolean;
    operationId?: string;
    retryAfterMs?: number;
}

const PUBLIC_MESSAGES: Record<OperationErrorKind, string> = {
    VALIDATION: 'The request was malformed.',
    UNAUTHORIZED: 'You are not permitted to perform this operation.',
    RATE_LIMITED: 'Too many requests. Please retry later.',
    RESULT_INVALID: 'The operation could not be completed.',
    OPERATION_FAILED: 'The operation failed and was rolled back.'
};

export const ErrorSanitizer = {
    toPublicError: (err: unknown, contextLabel = 'unknown'): PublicError => {
        if (err instanceof CriticalOperationError) {
            const publicError: PublicError = {
                status: err.statusCode,
                code: err.code,
                message: PUBLIC_MESSAGES[err.kind],
                retryable: err.retryable,
                operationId: err.operationId
            };
            if (err instanceof RateLimitError) {
                publicError.retryAfterMs = err.retryAfterMs;
            }
            return publicError;
        }

        logger.error({
            context: contextLabel,
            internalDetails: err instanceof Error ? { message: err.message, stack: err.stack } : String(err)
        }, 'Unclassified error sanitized');

        return {
            status: 500,
            code: 'INTERNAL_ERROR',
            message: `An internal system error occurred. Please contact support with ID: ${contextLabel}`,
            retryable: false
        };
    }
};
