/**
 * Base class for custom operational errors raised by the document client.
 */
export class BaseError extends Error {
    public readonly statusCode: number;
    public readonly isOperational: boolean;
    public readonly details?: Record<string, unknown>;

    constructor(name: string, statusCode: number, message: string, isOperational = true, details?: Record<string, unknown>) {
        super(message);
        this.name = name;
        this.statusCode = statusCode;
        this.isOperational = isOperational;
        this.details = details;

        if (typeof Error.captureStackTrace === 'function') {
            Error.captureStackTrace(this, this.constructor);
        }
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

// --- Shared Errors ---

/**
 * Invalid call arguments. Always raised before the store is contacted.
 */
export class ValidationError extends BaseError {
    constructor(message = 'Validation Failed', details?: Record<string, unknown>) {
        super('ValidationError', 400, message, true, details);
    }
}
