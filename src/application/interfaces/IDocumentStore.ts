import { DocumentQuery } from '../../domain/query/QueryTranslator';
import { DocumentRecord } from '../../shared/types/query.types';

/**
 * Port to the remote document store. Records are keyed by the store's reserved `id` field.
 *
 * Failures other than "not found" are propagated unchanged to the caller.
 */
export interface IDocumentStore {
    /** Runs a query and returns the full matching records, all result pages drained. */
    find(query: DocumentQuery): Promise<DocumentRecord[]>;

    /** Runs a query projecting only the `id` of every match, in query order. */
    findIds(query: DocumentQuery): Promise<string[]>;

    /** Inserts the record, or replaces the record with the same `id`. */
    upsert(record: DocumentRecord): Promise<void>;

    /** Returns null if no record has this id. */
    readById(id: string): Promise<DocumentRecord | null>;

    /** Returns false if no record has this id. */
    deleteById(id: string): Promise<boolean>;
}
