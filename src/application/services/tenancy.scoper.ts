import { ConfigurationError, EntityNotFoundError } from '../../domain/exceptions/DocumentClientError';
import { FilterExpression } from '../../domain/query/Filter';
import { APP_CONSTANTS } from '../../shared/constants';
import { DocumentRecord } from '../../shared/types/query.types';

const { ENTITY_TYPE_FIELD, NAMESPACE_SEPARATOR } = APP_CONSTANTS.DOCUMENTS;

/**
 * Scopes documents to the namespace of a microservice.
 *
 * Every saved document is tagged `EntityType = "<namespace>.<TypeName>"` (or
 * `"<TypeName>"` without a namespace). Predicate reads and listings carry an
 * equality constraint on that tag to the store; by-id reads are checked after
 * the fetch.
 *
 * This is a soft boundary. The store itself enforces nothing, and anything
 * that reads the container without going through this client sees every
 * namespace.
 */
export class TenancyScoper {
    public readonly namespace: string;

    constructor(microserviceName?: string | null) {
        const namespace = microserviceName?.trim() ?? '';
        if (namespace.includes(NAMESPACE_SEPARATOR)) {
            throw new ConfigurationError('The microserviceName cannot contain a period.');
        }
        this.namespace = namespace;
    }

    entityTypeOf(typeName: string): string {
        return this.namespace === '' ? typeName : `${this.namespace}${NAMESPACE_SEPARATOR}${typeName}`;
    }

    /**
     * Returns a copy of the record tagged for this namespace. Any tag the caller set is replaced.
     */
    stamp(record: DocumentRecord, typeName: string): DocumentRecord {
        return { ...record, [ENTITY_TYPE_FIELD]: this.entityTypeOf(typeName) };
    }

    /**
     * Constrains a filter to documents of `typeName` in this namespace.
     */
    scope(filter: FilterExpression, typeName: string): FilterExpression {
        const tagConstraint: FilterExpression = {
            kind: 'compare',
            field: ENTITY_TYPE_FIELD,
            operator: '=',
            value: this.entityTypeOf(typeName),
        };
        return { kind: 'and', filters: [filter, tagConstraint] };
    }

    /**
     * The namespace part of a tag: the text before the first separator, or '' when there is none.
     */
    namespaceOf(entityType: string): string {
        const separatorIndex = entityType.indexOf(NAMESPACE_SEPARATOR);
        return separatorIndex === -1 ? '' : entityType.slice(0, separatorIndex);
    }

    /**
     * Checks a record fetched by id as a `typeName`. Untagged records were
     * written outside this client and are returned as they are.
     * @throws {EntityNotFoundError} When the record is tagged for another namespace or another type.
     */
    ensureVisible(record: DocumentRecord, id: string, typeName: string): void {
        const entityType = record[ENTITY_TYPE_FIELD];
        if (entityType === undefined || entityType === null) {
            return;
        }
        const tag = String(entityType);
        if (this.namespaceOf(tag) !== this.namespace) {
            throw EntityNotFoundError.outsideNamespace(id, this.namespace);
        }
        if (tag !== this.entityTypeOf(typeName)) {
            throw EntityNotFoundError.otherType(id, typeName);
        }
    }
}
