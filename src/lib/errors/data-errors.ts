/**
 * Typed error classes for remote store failures
 * Enables proper error discrimination, structured logging, and graceful degradation
 */

import { logger } from '../logger';

/**
 * Base error for all store-layer failures
 */
export class DataError extends Error {
    public readonly code: string;
    public readonly retryable: boolean;
    public readonly cause?: Error;

    constructor(
        message: string,
        options: {
            code: string;
            retryable?: boolean;
            cause?: Error;
        }
    ) {
        super(message);
        this.name = 'DataError';
        this.code = options.code;
        this.retryable = options.retryable ?? false;
        this.cause = options.cause;

        // Maintains proper stack trace for where error was thrown (V8 engines)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    /**
     * Log the error with structured metadata
     */
    log(context?: Record<string, unknown>): void {
        logger.sync.error(this.message, {
            errorCode: this.code,
            errorName: this.name,
            retryable: this.retryable,
            cause: this.cause?.message,
            ...context,
        });
    }
}

/**
 * Store query execution failed
 */
export class QueryError extends DataError {
    public readonly operation: string;

    constructor(operation: string, cause?: Error) {
        super(`Store query failed: ${operation}`, {
            code: 'QUERY_ERROR',
            retryable: true,
            cause,
        });
        this.name = 'QueryError';
        this.operation = operation;
    }
}

/**
 * Store connection or network error
 */
export class ConnectionError extends DataError {
    constructor(cause?: Error) {
        super('Store connection failed', {
            code: 'CONNECTION_ERROR',
            retryable: true,
            cause,
        });
        this.name = 'ConnectionError';
    }
}

/**
 * Row validation or transformation error
 */
export class DataTransformError extends DataError {
    constructor(operation: string, cause?: Error) {
        super(`Data transformation failed: ${operation}`, {
            code: 'TRANSFORM_ERROR',
            retryable: false,
            cause,
        });
        this.name = 'DataTransformError';
    }
}

/**
 * Helper to check if an error is a known data error
 */
export function isDataError(error: unknown): error is DataError {
    return error instanceof DataError;
}

function toError(error: unknown): Error {
    if (error instanceof Error) return error;
    // PostgREST errors arrive as plain { message, code, details } objects
    if (
        typeof error === 'object' &&
        error !== null &&
        'message' in error &&
        typeof error.message === 'string'
    ) {
        const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
        return code ? Object.assign(new Error(error.message), { code }) : new Error(error.message);
    }
    return new Error(String(error));
}

/**
 * Helper to wrap unknown errors into typed DataError instances
 * Detects connection-related errors and wraps appropriately
 */
export function wrapDatabaseError(error: unknown, operation: string): DataError {
    // If already a DataError, return as-is
    if (isDataError(error)) {
        return error;
    }

    const cause = toError(error);
    const message = cause.message.toLowerCase();

    // Detect connection-related errors
    if (
        message.includes('connection') ||
        message.includes('timeout') ||
        message.includes('timed out') ||
        message.includes('econnrefused') ||
        message.includes('econnreset') ||
        message.includes('etimedout') ||
        message.includes('fetch failed') ||
        message.includes('socket')
    ) {
        return new ConnectionError(cause);
    }

    // Default to QueryError for other store failures
    return new QueryError(operation, cause);
}
