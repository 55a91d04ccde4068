import { inject, injectable } from 'tsyringe';
import { z } from 'zod';
import { DocumentType, StoredDocument } from '../../domain/entities/DocumentType';
import { EntityNotFoundError } from '../../domain/exceptions/DocumentClientError';
import { FilterExpression } from '../../domain/query/Filter';
import { QueryTranslator } from '../../domain/query/QueryTranslator';
import { DocumentMapper } from '../../infrastructure/persistence/DocumentMapper';
import { TYPES } from '../../shared/constants/types';
import { PageResult } from '../../shared/types/query.types';
import { ensureExists, ensureNotNull } from '../../shared/utils/guards';
import { IDocumentClient } from '../interfaces/IDocumentClient';
import { IDocumentStore } from '../interfaces/IDocumentStore';
import { ILogger } from '../interfaces/ILogger';
import { PaginationEngine } from './pagination.engine';
import { TenancyScoper } from './tenancy.scoper';

/**
 * Stateless facade over one document container, scoped to the configured
 * microservice namespace. Safe to share between concurrent callers.
 *
 * Namespace isolation is enforced by this client only; see {@link TenancyScoper}.
 */
@injectable()
export class DocumentClient implements IDocumentClient {
    constructor(
        @inject(TYPES.DocumentStore) private store: IDocumentStore,
        @inject(TYPES.TenancyScoper) private scoper: TenancyScoper,
        @inject(TYPES.QueryTranslator) private translator: QueryTranslator,
        @inject(TYPES.DocumentMapper) private mapper: DocumentMapper,
        @inject(TYPES.PaginationEngine) private paginationEngine: PaginationEngine,
        @inject(TYPES.Logger) private logger: ILogger
    ) {}

    get namespace(): string {
        return this.scoper.namespace;
    }

    async save<S extends z.AnyZodObject>(type: DocumentType<S>, document: z.infer<S>): Promise<void> {
        ensureNotNull(document, 'data');

        const record = this.scoper.stamp(this.mapper.toRecord(type, document), type.name);
        await this.store.upsert(record);
        this.logger.info(`${type.name} saved successfully: ${record.id}`, { entityType: record.EntityType });
    }

    async getById<S extends z.AnyZodObject>(type: DocumentType<S>, id: string): Promise<StoredDocument<z.infer<S>>> {
        ensureExists(id, 'id');

        const record = await this.store.readById(id);
        if (!record) {
            this.logger.warn(`${type.name} not found`, { id });
            throw new EntityNotFoundError(id);
        }

        try {
            this.scoper.ensureVisible(record, id, type.name);
        } catch (error: unknown) {
            this.logger.warn(`${type.name} is not visible to this client`, {
                id,
                namespace: this.scoper.namespace,
                entityType: record.EntityType,
            });
            throw error;
        }
        return this.mapper.fromRecord(type, record);
    }

    async get<S extends z.AnyZodObject>(type: DocumentType<S>, predicate: FilterExpression): Promise<StoredDocument<z.infer<S>> | null> {
        ensureNotNull(predicate, 'predicate');

        const where = this.scoper.scope(this.translator.translateFilter(type, predicate), type.name);
        const [record] = await this.store.find({ where, limit: 1 });
        if (!record) {
            this.logger.debug(`No ${type.name} matched the predicate`);
            return null;
        }
        return this.mapper.fromRecord(type, record);
    }

    async deleteById<S extends z.AnyZodObject>(type: DocumentType<S>, id: string): Promise<void> {
        // Validates the id and applies the namespace check before anything is removed
        await this.getById(type, id);

        const deleted = await this.store.deleteById(id);
        if (!deleted) {
            this.logger.warn(`${type.name} disappeared before it could be deleted`, { id });
            throw new EntityNotFoundError(id);
        }
        this.logger.info(`${type.name} deleted successfully: ${id}`);
    }

    async list<S extends z.AnyZodObject>(
        type: DocumentType<S>,
        page: number,
        pageSize: number,
        sortBy: string,
        predicate: FilterExpression
    ): Promise<PageResult<StoredDocument<z.infer<S>>>> {
        return this.paginationEngine.list(type, page, pageSize, sortBy, predicate);
    }
}
