import { z } from 'zod';
import { APP_CONSTANTS } from '../../shared/constants';
import { ConfigurationError } from '../exceptions/DocumentClientError';

/**
 * Declares how one kind of document is persisted.
 *
 * The zod schema lists every field that is written to and read from the store,
 * whatever its visibility on the caller's objects. `name` is the type name that
 * goes into the `EntityType` tag, and `idField` is the property holding the
 * document identifier (stored under the reserved `id`).
 */
export interface DocumentType<S extends z.AnyZodObject> {
    readonly name: string;
    readonly schema: S;
    readonly idField: string;
}

/** A document as returned by reads: the declared fields plus the namespace tag, when stored. */
export type StoredDocument<T> = T & { EntityType?: string };

export interface DocumentTypeOptions<S extends z.AnyZodObject> {
    idField?: Extract<keyof z.infer<S>, string>;
}

export function defineDocumentType<S extends z.AnyZodObject>(
    name: string,
    schema: S,
    options: DocumentTypeOptions<S> = {}
): DocumentType<S> {
    const typeName = name.trim();
    if (typeName === '') {
        throw new ConfigurationError('A document type name cannot be null or empty.');
    }
    if (typeName.includes(APP_CONSTANTS.DOCUMENTS.NAMESPACE_SEPARATOR)) {
        throw new ConfigurationError(`The document type name '${typeName}' cannot contain a period.`);
    }

    const idField: string = options.idField ?? APP_CONSTANTS.DOCUMENTS.STORE_ID_FIELD;
    if (!declaredFields(schema).includes(idField)) {
        throw new ConfigurationError(`The document type '${typeName}' does not declare its identifier field '${idField}'.`);
    }

    return { name: typeName, schema, idField };
}

export function declaredFields(schema: z.AnyZodObject): string[] {
    return Object.keys(schema.shape);
}
