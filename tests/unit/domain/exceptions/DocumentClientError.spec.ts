import { ConfigurationError, EntityNotFoundError } from '@src/domain/exceptions/DocumentClientError';
import { BaseError, ValidationError } from '@src/shared/errors/BaseError';

describe('Document client errors', () => {
    it('ConfigurationError is a non-operational 500', () => {
        const error = new ConfigurationError(undefined, { key: 'COSMOS_KEY' });
        expect(error).toBeInstanceOf(BaseError);
        expect(error).toBeInstanceOf(ConfigurationError);
        expect(error.name).toBe('ConfigurationError');
        expect(error.statusCode).toBe(500);
        expect(error.isOperational).toBe(false);
        expect(error.message).toBe('Invalid document client configuration');
        expect(error.details).toEqual({ key: 'COSMOS_KEY' });
    });

    it('EntityNotFoundError carries the id and a default message', () => {
        const error = new EntityNotFoundError('doc-1');
        expect(error).toBeInstanceOf(EntityNotFoundError);
        expect(error.statusCode).toBe(404);
        expect(error.isOperational).toBe(true);
        expect(error.id).toBe('doc-1');
        expect(error.message).toBe('An entity with id doc-1 was not found in the data store.');
    });

    it('EntityNotFoundError.outsideNamespace names the caller namespace', () => {
        const error = EntityNotFoundError.outsideNamespace('doc-1', 'billing');
        expect(error).toBeInstanceOf(EntityNotFoundError);
        expect(error.id).toBe('doc-1');
        expect(error.message).toBe("An entity with id doc-1 was found in the data store but is not in the 'billing' namespace.");
    });

    it('EntityNotFoundError.otherType names the requested type', () => {
        const error = EntityNotFoundError.otherType('doc-1', 'Person');
        expect(error).toBeInstanceOf(EntityNotFoundError);
        expect(error.id).toBe('doc-1');
        expect(error.message).toBe('An entity with id doc-1 was found in the data store but is not a Person.');
    });

    it('ValidationError is an operational 400', () => {
        const error = new ValidationError('page must be greater than 0');
        expect(error.name).toBe('ValidationError');
        expect(error.statusCode).toBe(400);
        expect(error.isOperational).toBe(true);
        expect(error.stack).toBeDefined();
    });
});
