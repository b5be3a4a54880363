/**
 * Custom error classes for better error handling
 * Use these instead of generic Error for specific error types
 *
 * Clients only see the HTTP status and a free-text message; the class
 * decides the status.
 */

import type { ZodIssue } from 'zod';

/**
 * Base interface for custom errors with HTTP status codes
 */
export interface CustomError extends Error {
    readonly statusCode: number;
}

/** One violated field constraint */
export interface IssueDetail {
    path: string;
    message: string;
}

export function toIssueDetails(issues: readonly ZodIssue[]): IssueDetail[] {
    return issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message,
    }));
}

/**
 * Validation error - thrown when input validation fails
 * Use for schema validation, format validation, etc.
 *
 * @example
 * throw new ValidationError('Invalid order id', { order_id: 'abc' });
 */
export class ValidationError extends Error implements CustomError {
    readonly name = 'ValidationError' as const;
    readonly statusCode = 400 as const;
    readonly details: unknown;

    constructor(message: string, details: unknown = null) {
        super(message);
        this.details = details;
        Object.setPrototypeOf(this, ValidationError.prototype);
    }

    /** Build from zod issues; the message is the first issue */
    static fromIssues(issues: readonly ZodIssue[], fallback = 'Validation failed'): ValidationError {
        const details = toIssueDetails(issues);
        const first = details[0];
        const message = first ? (first.path ? `${first.path}: ${first.message}` : first.message) : fallback;
        return new ValidationError(message, details);
    }
}

/**
 * Not found error - thrown when a resource is not found
 * Use for well-formed ids that match no stored record
 *
 * @example
 * throw new NotFoundError('Order not found', 'jerseyorder', orderId);
 */
export class NotFoundError extends Error implements CustomError {
    readonly name = 'NotFoundError' as const;
    readonly statusCode = 404 as const;
    readonly resourceType: string | null;
    readonly resourceId: string | null;

    constructor(
        message: string = 'Resource not found',
        resourceType: string | null = null,
        resourceId: string | null = null
    ) {
        super(message);
        this.resourceType = resourceType;
        this.resourceId = resourceId;
        Object.setPrototypeOf(this, NotFoundError.prototype);
    }
}

/**
 * Encoding error - thrown when uploaded bytes are not valid text
 *
 * @example
 * throw new EncodingError('Uploaded file is not valid UTF-8');
 */
export class EncodingError extends Error implements CustomError {
    readonly name = 'EncodingError' as const;
    readonly statusCode = 400 as const;
    readonly encoding: string;

    constructor(message: string, encoding = 'utf-8') {
        super(message);
        this.encoding = encoding;
        Object.setPrototypeOf(this, EncodingError.prototype);
    }
}

/**
 * Storage error - thrown when the document store is unreachable
 * or a read/write fails
 *
 * @example
 * throw new StorageError('Failed to insert into jerseyorder', originalError);
 */
export class StorageError extends Error implements CustomError {
    readonly name = 'StorageError' as const;
    readonly statusCode = 500 as const;
    readonly originalError: Error | null;

    constructor(message: string, originalError: Error | null = null) {
        super(message);
        this.originalError = originalError;
        Object.setPrototypeOf(this, StorageError.prototype);
    }
}

/**
 * Type guard to check if an error is a custom error with statusCode
 */
export function isCustomError(error: unknown): error is CustomError {
    return (
        error instanceof Error &&
        'statusCode' in error &&
        typeof error.statusCode === 'number'
    );
}
