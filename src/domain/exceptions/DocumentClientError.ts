import { BaseError } from '../../shared/errors/BaseError';

/**
 * Invalid construction parameters: client options, namespace, document type
 * declarations or required environment keys. Fatal to client creation.
 */
export class ConfigurationError extends BaseError {
    constructor(message = 'Invalid document client configuration', details?: Record<string, unknown>) {
        super('ConfigurationError', 500, message, false, details);
        if (typeof Error.captureStackTrace === 'function') {
            Error.captureStackTrace(this, this.constructor);
        }
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * A by-id read found nothing the caller may see.
 *
 * Raised both when the document is absent and when it lives in another
 * namespace. Only the message tells the two apart, so callers matching on the
 * error type cannot probe for documents owned by other namespaces.
 */
export class EntityNotFoundError extends BaseError {
    public readonly id: string;

    constructor(id: string, message = `An entity with id ${id} was not found in the data store.`) {
        super('EntityNotFoundError', 404, message, true);
        this.id = id;
        if (typeof Error.captureStackTrace === 'function') {
            Error.captureStackTrace(this, this.constructor);
        }
        Object.setPrototypeOf(this, new.target.prototype);
    }

    static outsideNamespace(id: string, namespace: string): EntityNotFoundError {
        return new EntityNotFoundError(
            id,
            `An entity with id ${id} was found in the data store but is not in the '${namespace}' namespace.`
        );
    }

    static otherType(id: string, typeName: string): EntityNotFoundError {
        return new EntityNotFoundError(id, `An entity with id ${id} was found in the data store but is not a ${typeName}.`);
    }
}
