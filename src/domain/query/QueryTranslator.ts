import { injectable } from 'tsyringe';
import { z } from 'zod';
import { APP_CONSTANTS } from '../../shared/constants';
import { ValidationError } from '../../shared/errors/BaseError';
import { ensureExists } from '../../shared/utils/guards';
import { declaredFields, DocumentType } from '../entities/DocumentType';
import { FilterExpression, mapFilterFields } from './Filter';

export type SortDirection = 'ASC' | 'DESC';

export interface SortOrder {
    field: string;
    direction: SortDirection;
}

/**
 * A query in store field names, ready for a store adapter to render.
 */
export interface DocumentQuery {
    where: FilterExpression;
    orderBy?: SortOrder;
    limit?: number;
}

/**
 * Binds caller-facing filters and sort keys to a document type, producing
 * store field names.
 */
@injectable()
export class QueryTranslator {
    /**
     * Rewrites references to the type's identifier field to the store's reserved `id`.
     */
    translateFilter<S extends z.AnyZodObject>(type: DocumentType<S>, filter: FilterExpression): FilterExpression {
        return mapFilterFields(filter, field => this.toStoreField(type, field));
    }

    /**
     * Parses a sort key such as `age`, `-Age` or `lastName,firstName`.
     *
     * Only the first comma-separated column is honoured (the store orders by a
     * single column). A leading `-` sorts descending. The column is matched
     * case-insensitively against the declared fields.
     */
    parseSortKey<S extends z.AnyZodObject>(type: DocumentType<S>, sortKey: string): SortOrder {
        ensureExists(sortKey, 'sortBy');

        let column = sortKey.split(',')[0].trim();
        let direction: SortDirection = 'ASC';
        if (column.startsWith('-')) {
            direction = 'DESC';
            column = column.slice(1).trim();
        }
        if (column === '') {
            throw new ValidationError(`sortBy '${sortKey}' does not name a field`);
        }

        const fields = declaredFields(type.schema);
        const match = fields.find(field => field === column)
            ?? fields.find(field => field.toLowerCase() === column.toLowerCase());
        if (!match) {
            throw new ValidationError(`Cannot sort ${type.name} documents by unknown field '${column}'`, { sortBy: sortKey });
        }

        return { field: this.toStoreField(type, match), direction };
    }

    private toStoreField<S extends z.AnyZodObject>(type: DocumentType<S>, field: string): string {
        return field === type.idField ? APP_CONSTANTS.DOCUMENTS.STORE_ID_FIELD : field;
    }
}
