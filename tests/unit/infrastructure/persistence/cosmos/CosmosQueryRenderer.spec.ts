import { filterOn } from '@src/domain/query/Filter';
import { CosmosQueryRenderer } from '@src/infrastructure/persistence/cosmos/CosmosQueryRenderer';

interface Contact {
    id: string;
    name: string;
    email: string;
    age: number;
    tags: string[];
    'first name': string;
}

interface Setting {
    id: string;
    value: string;
    order: number;
}

describe('CosmosQueryRenderer', () => {
    const where = filterOn<Contact>();

    describe('render()', () => {
        it('should select everything when the filter matches all', () => {
            expect(CosmosQueryRenderer.render({ where: where.all() })).toEqual({ query: 'SELECT * FROM c', parameters: [] });
        });

        it('should render a scoped id projection with ordering', () => {
            const querySpec = CosmosQueryRenderer.render({
                where: {
                    kind: 'and',
                    filters: [where.eq('name', 'Ada'), { kind: 'compare', field: 'EntityType', operator: '=', value: 'billing.Contact' }],
                },
                orderBy: { field: 'age', direction: 'DESC' },
            }, 'ids');

            expect(querySpec).toEqual({
                query: 'SELECT VALUE c["id"] FROM c WHERE (c["name"] = @p0 AND c["EntityType"] = @p1) ORDER BY c["age"] DESC',
                parameters: [
                    { name: '@p0', value: 'Ada' },
                    { name: '@p1', value: 'billing.Contact' },
                ],
            });
        });

        it('should drop match-all operands of a conjunction', () => {
            const querySpec = CosmosQueryRenderer.render({
                where: where.and(where.all(), where.eq('name', 'Ada')),
            });
            expect(querySpec.query).toBe('SELECT * FROM c WHERE c["name"] = @p0');
        });

        it('should render TOP for a limit', () => {
            const querySpec = CosmosQueryRenderer.render({ where: where.gte('age', 18), limit: 1 });
            expect(querySpec).toEqual({
                query: 'SELECT TOP 1 * FROM c WHERE c["age"] >= @p0',
                parameters: [{ name: '@p0', value: 18 }],
            });
        });

        it('should render id windows as IN lists', () => {
            const querySpec = CosmosQueryRenderer.render({
                where: where.in('id', ['a', 'b']),
                orderBy: { field: 'name', direction: 'ASC' },
            });
            expect(querySpec).toEqual({
                query: 'SELECT * FROM c WHERE c["id"] IN (@p0, @p1) ORDER BY c["name"] ASC',
                parameters: [
                    { name: '@p0', value: 'a' },
                    { name: '@p1', value: 'b' },
                ],
            });
        });

        it('should render an empty IN list as false', () => {
            expect(CosmosQueryRenderer.render({ where: where.in('id', []) })).toEqual({
                query: 'SELECT * FROM c WHERE false',
                parameters: [],
            });
        });

        it('should render the string and array functions', () => {
            const querySpec = CosmosQueryRenderer.render({
                where: where.and(
                    where.contains('name', 'd'),
                    where.startsWith('name', 'A'),
                    where.arrayContains('tags', 'vip'),
                    where.isDefined('email')
                ),
            });
            expect(querySpec.query).toBe(
                'SELECT * FROM c WHERE (CONTAINS(c["name"], @p0) AND STARTSWITH(c["name"], @p1) AND ARRAY_CONTAINS(c["tags"], @p2) AND IS_DEFINED(c["email"]))'
            );
            expect(querySpec.parameters).toEqual([
                { name: '@p0', value: 'd' },
                { name: '@p1', value: 'A' },
                { name: '@p2', value: 'vip' },
            ]);
        });

        it('should render negation and disjunction', () => {
            const querySpec = CosmosQueryRenderer.render({
                where: where.not(where.or(where.lt('age', 18), where.ne('name', 'Ada'))),
            });
            expect(querySpec.query).toBe('SELECT * FROM c WHERE NOT ((c["age"] < @p0 OR c["name"] != @p1))');
        });

        it('should render empty conjunctions and disjunctions as constants', () => {
            expect(CosmosQueryRenderer.render({ where: where.and() }).query).toBe('SELECT * FROM c WHERE true');
            expect(CosmosQueryRenderer.render({ where: where.or() }).query).toBe('SELECT * FROM c WHERE false');
        });

        it('should keep hostile values out of the query text', () => {
            const querySpec = CosmosQueryRenderer.render({ where: where.eq('name', "x' OR 1=1 --") });
            expect(querySpec.query).toBe('SELECT * FROM c WHERE c["name"] = @p0');
            expect(querySpec.parameters).toEqual([{ name: '@p0', value: "x' OR 1=1 --" }]);
        });

        it('should number parameters per query', () => {
            CosmosQueryRenderer.render({ where: where.eq('name', 'a') });
            const querySpec = CosmosQueryRenderer.render({ where: where.eq('name', 'b') });
            expect(querySpec.parameters).toEqual([{ name: '@p0', value: 'b' }]);
        });

        it('should bracket-quote fields named after SQL keywords', () => {
            const querySpec = CosmosQueryRenderer.render({
                where: filterOn<Setting>().eq('value', 'dark'),
                orderBy: { field: 'order', direction: 'ASC' },
            });
            expect(querySpec).toEqual({
                query: 'SELECT * FROM c WHERE c["value"] = @p0 ORDER BY c["order"] ASC',
                parameters: [{ name: '@p0', value: 'dark' }],
            });
        });

        it('should quote field names that are not plain identifiers', () => {
            const querySpec = CosmosQueryRenderer.render({ where: where.eq('first name', 'Ada') });
            expect(querySpec.query).toBe('SELECT * FROM c WHERE c["first name"] = @p0');
        });
    });

    describe('fieldPath()', () => {
        it.each([
            ['id', 'c["id"]'],
            ['EntityType', 'c["EntityType"]'],
            ['_ts', 'c["_ts"]'],
            ['value', 'c["value"]'],
            ['order', 'c["order"]'],
            ['first name', 'c["first name"]'],
            ['2fa', 'c["2fa"]'],
            ['a"b', 'c["a\\"b"]'],
        ])('should render %p as %p', (field, path) => {
            expect(CosmosQueryRenderer.fieldPath(field)).toBe(path);
        });
    });
});
