import { ValidationError } from '../errors/BaseError';

/**
 * Argument guards shared by the client operations. Each throws a ValidationError
 * so bad input never reaches the document store.
 */

export function ensureExists(value: string | null | undefined, name: string): asserts value is string {
    if (value === null || value === undefined || value.trim() === '') {
        throw new ValidationError(`${name} cannot be null or empty`);
    }
}

export function ensureNotNull<T>(value: T | null | undefined, name: string): asserts value is T {
    if (value === null || value === undefined) {
        throw new ValidationError(`${name} cannot be null`);
    }
}

export function ensureGreaterThan(value: number, comparedTo: number, name: string): void {
    if (!Number.isInteger(value)) {
        throw new ValidationError(`${name} must be an integer`, { value });
    }
    if (value <= comparedTo) {
        throw new ValidationError(`${name} must be greater than ${comparedTo}`, { value });
    }
}
