import 'reflect-metadata';
import { Container, FeedResponse, Item, ItemDefinition, ItemResponse, QueryIterator } from '@azure/cosmos';
import { DeepMockProxy, mock, mockDeep, MockProxy } from 'jest-mock-extended';
import { ILogger } from '@src/application/interfaces/ILogger';
import { CosmosDocumentStore, isNotFoundError } from '@src/infrastructure/persistence/cosmos/CosmosDocumentStore';
import { createLoggerMock } from '../../../../mocks/logger.mock';

// Mock proxies answer every property, `then` included; clear it so awaiting a response resolves
const settled = <T extends object>(value: T): T => {
    Reflect.set(value, 'then', undefined);
    return value;
};

const notFound = (): Error => Object.assign(new Error('Entity with the specified id does not exist in the system.'), { code: 404 });

describe('CosmosDocumentStore', () => {
    let container: DeepMockProxy<Container>;
    let item: MockProxy<Item>;
    let logger: MockProxy<ILogger>;
    let store: CosmosDocumentStore;

    const givenQueryResults = (resources: unknown[]): void => {
        const iterator = mock<QueryIterator<unknown>>();
        iterator.fetchAll.mockResolvedValue(settled(mock<FeedResponse<unknown>>({ resources, requestCharge: 2.5 })));
        container.items.query.mockReturnValue(iterator);
    };

    beforeEach(() => {
        container = mockDeep<Container>();
        item = mock<Item>();
        container.item.mockReturnValue(item);
        logger = createLoggerMock();
        store = new CosmosDocumentStore(container, logger);
    });

    // --- find / findIds ---
    describe('find()', () => {
        it('should send the rendered query and return every record', async () => {
            const records = [{ id: 'p-1', firstName: 'Ada' }, { id: 'p-2', firstName: 'Grace' }];
            givenQueryResults(records);

            const result = await store.find({
                where: { kind: 'compare', field: 'EntityType', operator: '=', value: 'billing.Person' },
                limit: 1,
            });

            expect(result).toEqual(records);
            expect(container.items.query).toHaveBeenCalledWith({
                query: 'SELECT TOP 1 * FROM c WHERE c["EntityType"] = @p0',
                parameters: [{ name: '@p0', value: 'billing.Person' }],
            });
            expect(logger.debug).toHaveBeenCalledWith('Cosmos query executed', {
                query: 'SELECT TOP 1 * FROM c WHERE c["EntityType"] = @p0',
                resultCount: 2,
                requestCharge: 2.5,
            });
        });

        it('should propagate query failures unchanged', async () => {
            const failure = Object.assign(new Error('Request rate is large'), { code: 429 });
            const iterator = mock<QueryIterator<unknown>>();
            iterator.fetchAll.mockRejectedValue(failure);
            container.items.query.mockReturnValue(iterator);

            await expect(store.find({ where: { kind: 'all' } })).rejects.toBe(failure);
        });
    });

    describe('findIds()', () => {
        it('should project ids in query order', async () => {
            givenQueryResults(['p-2', 'p-1']);

            const ids = await store.findIds({ where: { kind: 'all' }, orderBy: { field: 'age', direction: 'DESC' } });

            expect(ids).toEqual(['p-2', 'p-1']);
            expect(container.items.query).toHaveBeenCalledWith({
                query: 'SELECT VALUE c["id"] FROM c ORDER BY c["age"] DESC',
                parameters: [],
            });
        });
    });

    // --- upsert ---
    describe('upsert()', () => {
        it('should upsert the record as given', async () => {
            container.items.upsert.mockResolvedValue(settled(mock<ItemResponse<ItemDefinition>>({ statusCode: 201, requestCharge: 6.1 })));
            const record = { id: 'p-1', firstName: 'Ada', EntityType: 'billing.Person' };

            await store.upsert(record);

            expect(container.items.upsert).toHaveBeenCalledWith(record);
            expect(logger.debug).toHaveBeenCalledWith('Cosmos upsert completed', { id: 'p-1', statusCode: 201, requestCharge: 6.1 });
        });
    });

    // --- readById ---
    describe('readById()', () => {
        it('should read the item using the id as partition key', async () => {
            item.read.mockResolvedValue(settled(mock<ItemResponse<ItemDefinition>>({ statusCode: 200, resource: { id: 'p-1', firstName: 'Ada' } })));

            await expect(store.readById('p-1')).resolves.toEqual({ id: 'p-1', firstName: 'Ada' });
            expect(container.item).toHaveBeenCalledWith('p-1', 'p-1');
        });

        it('should return null for a 404 response without a resource', async () => {
            item.read.mockResolvedValue(settled(mock<ItemResponse<ItemDefinition>>({ statusCode: 404, resource: undefined })));

            await expect(store.readById('missing')).resolves.toBeNull();
        });

        it('should return null when the SDK throws not found', async () => {
            item.read.mockRejectedValue(notFound());

            await expect(store.readById('missing')).resolves.toBeNull();
        });

        it('should rethrow other failures', async () => {
            const failure = Object.assign(new Error('Forbidden'), { code: 403 });
            item.read.mockRejectedValue(failure);

            await expect(store.readById('p-1')).rejects.toBe(failure);
        });
    });

    // --- deleteById ---
    describe('deleteById()', () => {
        it('should delete the item and report success', async () => {
            item.delete.mockResolvedValue(settled(mock<ItemResponse<ItemDefinition>>({ statusCode: 204 })));

            await expect(store.deleteById('p-1')).resolves.toBe(true);
            expect(container.item).toHaveBeenCalledWith('p-1', 'p-1');
            expect(logger.debug).toHaveBeenCalledWith('Cosmos delete completed', { id: 'p-1' });
        });

        it('should report false when the item is already gone', async () => {
            item.delete.mockRejectedValue(notFound());

            await expect(store.deleteById('p-1')).resolves.toBe(false);
        });

        it('should rethrow other failures', async () => {
            const failure = new Error('Service unavailable');
            item.delete.mockRejectedValue(failure);

            await expect(store.deleteById('p-1')).rejects.toBe(failure);
        });
    });
});

describe('isNotFoundError', () => {
    it.each([
        ['a code of 404', Object.assign(new Error('gone'), { code: 404 })],
        ['a statusCode of 404', { statusCode: 404 }],
        ['a Resource Not Found message', new Error('Message: {"Errors":["Resource Not Found"]}')],
    ])('should recognise %s', (_description, error) => {
        expect(isNotFoundError(error)).toBe(true);
    });

    it.each([
        ['another status', { code: 409 }],
        ['a plain string', 'Resource Not Found'],
        ['null', null],
    ])('should reject %s', (_description, error) => {
        expect(isNotFoundError(error)).toBe(false);
    });
});
