import { z } from 'zod';
import { DocumentType, StoredDocument } from '../../domain/entities/DocumentType';
import { FilterExpression } from '../../domain/query/Filter';
import { PageResult } from '../../shared/types/query.types';

/**
 * Namespaced CRUD and listing over typed documents.
 */
export interface IDocumentClient {
    /** Upserts the document, stamping its `EntityType` tag. */
    save<S extends z.AnyZodObject>(type: DocumentType<S>, document: z.infer<S>): Promise<void>;

    /**
     * @throws {EntityNotFoundError} When the id is absent or belongs to another namespace.
     */
    getById<S extends z.AnyZodObject>(type: DocumentType<S>, id: string): Promise<StoredDocument<z.infer<S>>>;

    /** Returns the first match in this client's namespace, or null. */
    get<S extends z.AnyZodObject>(type: DocumentType<S>, predicate: FilterExpression): Promise<StoredDocument<z.infer<S>> | null>;

    /**
     * @throws {EntityNotFoundError} When the id is absent or belongs to another namespace.
     */
    deleteById<S extends z.AnyZodObject>(type: DocumentType<S>, id: string): Promise<void>;

    list<S extends z.AnyZodObject>(
        type: DocumentType<S>,
        page: number,
        pageSize: number,
        sortBy: string,
        predicate: FilterExpression
    ): Promise<PageResult<StoredDocument<z.infer<S>>>>;
}
