import { inject, injectable } from 'tsyringe';
import { z } from 'zod';
import { ILogger } from '../../application/interfaces/ILogger';
import { DocumentType, StoredDocument } from '../../domain/entities/DocumentType';
import { APP_CONSTANTS } from '../../shared/constants';
import { TYPES } from '../../shared/constants/types';
import { BaseError, ValidationError } from '../../shared/errors/BaseError';
import { DocumentRecord } from '../../shared/types/query.types';

const { ENTITY_TYPE_FIELD, STORE_ID_FIELD, SYSTEM_FIELDS } = APP_CONSTANTS.DOCUMENTS;
const systemFields: readonly string[] = SYSTEM_FIELDS;

/**
 * Converts between typed documents and the store's generic records.
 *
 * Only the fields a document type declares are persisted. They are read by
 * property access, so getters and fields that are `private` in TypeScript are
 * written like any other.
 */
@injectable()
export class DocumentMapper {
    constructor(@inject(TYPES.Logger) private logger: ILogger) {}

    toRecord<S extends z.AnyZodObject>(type: DocumentType<S>, document: z.infer<S>): DocumentRecord {
        const result = type.schema.safeParse(document);
        if (!result.success) {
            throw new ValidationError(`Invalid ${type.name} document`, { issues: result.error.flatten().fieldErrors });
        }

        const record: DocumentRecord = {};
        for (const [field, value] of Object.entries(result.data)) {
            if (value === undefined || field === ENTITY_TYPE_FIELD) continue;
            record[field === type.idField ? STORE_ID_FIELD : field] = value;
        }

        const id = record[STORE_ID_FIELD];
        if (typeof id !== 'string' || id.trim() === '') {
            throw new ValidationError(`${type.name}.${type.idField} cannot be null or empty`);
        }
        return record;
    }

    fromRecord<S extends z.AnyZodObject>(type: DocumentType<S>, record: DocumentRecord): StoredDocument<z.infer<S>> {
        const data: DocumentRecord = {};
        for (const [field, value] of Object.entries(record)) {
            if (systemFields.includes(field)) continue;
            data[field === STORE_ID_FIELD ? type.idField : field] = value;
        }

        const result = type.schema.safeParse(data);
        if (!result.success) {
            this.logger.error(`Failed to map stored record to ${type.name}`, result.error, { id: record[STORE_ID_FIELD] });
            throw new BaseError('InvalidDataError', 500, `Invalid ${type.name} data retrieved from the data store: ${result.error.message}`, false);
        }

        const entityType = record[ENTITY_TYPE_FIELD];
        const tag: { EntityType?: string } = typeof entityType === 'string' ? { EntityType: entityType } : {};
        return { ...result.data, ...tag };
    }
}
