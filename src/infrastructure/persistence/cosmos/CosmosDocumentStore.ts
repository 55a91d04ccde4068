import { Container } from '@azure/cosmos';
import { inject, injectable } from 'tsyringe';
import { IDocumentStore } from '../../../application/interfaces/IDocumentStore';
import { ILogger } from '../../../application/interfaces/ILogger';
import { DocumentQuery } from '../../../domain/query/QueryTranslator';
import { TYPES } from '../../../shared/constants/types';
import { DocumentRecord } from '../../../shared/types/query.types';
import { CosmosQueryRenderer, QueryProjection } from './CosmosQueryRenderer';

const NOT_FOUND_STATUS = 404;

/**
 * True for the SDK's "Resource Not Found" failures.
 */
export function isNotFoundError(error: unknown): boolean {
    if (typeof error !== 'object' || error === null) {
        return false;
    }
    const code = Reflect.get(error, 'code');
    const statusCode = Reflect.get(error, 'statusCode');
    if (code === NOT_FOUND_STATUS || statusCode === NOT_FOUND_STATUS) {
        return true;
    }
    const message = Reflect.get(error, 'message');
    return typeof message === 'string' && message.includes('Resource Not Found');
}

/**
 * Document store backed by a Cosmos DB container partitioned on `/id`.
 */
@injectable()
export class CosmosDocumentStore implements IDocumentStore {
    constructor(
        @inject(TYPES.CosmosContainer) private container: Container,
        @inject(TYPES.Logger) private logger: ILogger
    ) {}

    async find(query: DocumentQuery): Promise<DocumentRecord[]> {
        return this.runQuery<DocumentRecord>(query, 'documents');
    }

    async findIds(query: DocumentQuery): Promise<string[]> {
        return this.runQuery<string>(query, 'ids');
    }

    async upsert(record: DocumentRecord): Promise<void> {
        const response = await this.container.items.upsert(record);
        this.logger.debug('Cosmos upsert completed', {
            id: record.id,
            statusCode: response.statusCode,
            requestCharge: response.requestCharge,
        });
    }

    async readById(id: string): Promise<DocumentRecord | null> {
        try {
            const response = await this.container.item(id, id).read<DocumentRecord>();
            if (response.statusCode === NOT_FOUND_STATUS || !response.resource) {
                return null;
            }
            return response.resource;
        } catch (error: unknown) {
            if (isNotFoundError(error)) {
                return null;
            }
            throw error;
        }
    }

    async deleteById(id: string): Promise<boolean> {
        try {
            await this.container.item(id, id).delete();
            this.logger.debug('Cosmos delete completed', { id });
            return true;
        } catch (error: unknown) {
            if (isNotFoundError(error)) {
                return false;
            }
            throw error;
        }
    }

    private async runQuery<T>(query: DocumentQuery, projection: QueryProjection): Promise<T[]> {
        const querySpec = CosmosQueryRenderer.render(query, projection);
        const response = await this.container.items.query<T>(querySpec).fetchAll();
        this.logger.debug('Cosmos query executed', {
            query: querySpec.query,
            resultCount: response.resources.length,
            requestCharge: response.requestCharge,
        });
        return response.resources;
    }
}
