import { inject, injectable } from 'tsyringe';
import { z } from 'zod';
import { DocumentType, StoredDocument } from '../../domain/entities/DocumentType';
import { FilterExpression } from '../../domain/query/Filter';
import { QueryTranslator } from '../../domain/query/QueryTranslator';
import { DocumentMapper } from '../../infrastructure/persistence/DocumentMapper';
import { APP_CONSTANTS } from '../../shared/constants';
import { TYPES } from '../../shared/constants/types';
import { PageResult } from '../../shared/types/query.types';
import { ensureExists, ensureGreaterThan, ensureNotNull } from '../../shared/utils/guards';
import { LogFormats } from '../../shared/utils/logFormat';
import { IDocumentStore } from '../interfaces/IDocumentStore';
import { ILogger } from '../interfaces/ILogger';
import { TenancyScoper } from './tenancy.scoper';

/**
 * Produces exact totals and one sorted page in two round trips.
 *
 * The store returns matched rows but no total alongside a paged result, so the
 * engine first asks for the ordered ids of every match (the count), then
 * fetches the page's ids with the same ORDER BY re-applied, since an id set
 * alone carries no order.
 *
 * The two queries are independent requests. A write landing between them can
 * make `totalCount` disagree with the fetched page (read skew); a failure of
 * the second query fails the whole call.
 */
@injectable()
export class PaginationEngine {
    constructor(
        @inject(TYPES.DocumentStore) private store: IDocumentStore,
        @inject(TYPES.TenancyScoper) private scoper: TenancyScoper,
        @inject(TYPES.QueryTranslator) private translator: QueryTranslator,
        @inject(TYPES.DocumentMapper) private mapper: DocumentMapper,
        @inject(TYPES.Logger) private logger: ILogger
    ) {}

    async list<S extends z.AnyZodObject>(
        type: DocumentType<S>,
        page: number,
        pageSize: number,
        sortBy: string,
        predicate: FilterExpression
    ): Promise<PageResult<StoredDocument<z.infer<S>>>> {
        ensureGreaterThan(page, 0, 'page');
        ensureGreaterThan(pageSize, 0, 'pageSize');
        ensureExists(sortBy, 'sortBy');
        ensureNotNull(predicate, 'predicate');

        const orderBy = this.translator.parseSortKey(type, sortBy);
        const where = this.scoper.scope(this.translator.translateFilter(type, predicate), type.name);
        const startedAt = Date.now();

        const ids = await this.store.findIds({ where, orderBy });
        const totalCount = ids.length;
        const totalPages = Math.ceil(totalCount / pageSize);

        const skip = (page - 1) * pageSize;
        const pageIds = ids.slice(skip, skip + pageSize);

        let data: StoredDocument<z.infer<S>>[] = [];
        if (pageIds.length > 0) {
            const records = await this.store.find({
                where: { kind: 'in', field: APP_CONSTANTS.DOCUMENTS.STORE_ID_FIELD, values: pageIds },
                orderBy,
            });
            data = records.map(record => this.mapper.fromRecord(type, record));
        }

        this.logger.debug(`Listed ${type.name} documents`, {
            page,
            pageSize,
            totalCount,
            ...LogFormats.formatOperation({
                operation: 'list',
                duration: Date.now() - startedAt,
                success: true,
                requestCount: pageIds.length > 0 ? 2 : 1,
            }),
        });

        return { data, totalCount, totalPages };
    }
}
