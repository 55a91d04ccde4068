import { SqlParameter, SqlQuerySpec } from '@azure/cosmos';
import { FilterExpression, FilterValue } from '../../../domain/query/Filter';
import { DocumentQuery, SortOrder } from '../../../domain/query/QueryTranslator';

export type QueryProjection = 'documents' | 'ids';

const ROOT = 'c';

/**
 * Renders a DocumentQuery into Cosmos DB SQL. Literal values are always sent as
 * named parameters, never spliced into the query text.
 */
export class CosmosQueryRenderer {
    private parameters: SqlParameter[] = [];

    private constructor() {}

    static render(query: DocumentQuery, projection: QueryProjection = 'documents'): SqlQuerySpec {
        return new CosmosQueryRenderer().renderQuery(query, projection);
    }

    static fieldPath(field: string): string {
        return `${ROOT}[${JSON.stringify(field)}]`;
    }

    private renderQuery(query: DocumentQuery, projection: QueryProjection): SqlQuerySpec {
        const top = query.limit !== undefined ? `TOP ${Math.trunc(query.limit)} ` : '';
        const select = projection === 'ids' ? `VALUE ${CosmosQueryRenderer.fieldPath('id')}` : '*';

        let text = `SELECT ${top}${select} FROM ${ROOT}`;
        if (query.where.kind !== 'all') {
            text += ` WHERE ${this.renderFilter(query.where)}`;
        }
        if (query.orderBy) {
            text += ` ${this.renderOrderBy(query.orderBy)}`;
        }
        return { query: text, parameters: this.parameters };
    }

    private renderOrderBy(orderBy: SortOrder): string {
        return `ORDER BY ${CosmosQueryRenderer.fieldPath(orderBy.field)} ${orderBy.direction}`;
    }

    private renderFilter(filter: FilterExpression): string {
        switch (filter.kind) {
            case 'all':
                return 'true';
            case 'compare':
                return `${CosmosQueryRenderer.fieldPath(filter.field)} ${filter.operator} ${this.parameter(filter.value)}`;
            case 'in':
                if (filter.values.length === 0) return 'false';
                return `${CosmosQueryRenderer.fieldPath(filter.field)} IN (${filter.values.map(value => this.parameter(value)).join(', ')})`;
            case 'contains':
                return `CONTAINS(${CosmosQueryRenderer.fieldPath(filter.field)}, ${this.parameter(filter.value)})`;
            case 'startsWith':
                return `STARTSWITH(${CosmosQueryRenderer.fieldPath(filter.field)}, ${this.parameter(filter.value)})`;
            case 'arrayContains':
                return `ARRAY_CONTAINS(${CosmosQueryRenderer.fieldPath(filter.field)}, ${this.parameter(filter.value)})`;
            case 'isDefined':
                return `IS_DEFINED(${CosmosQueryRenderer.fieldPath(filter.field)})`;
            case 'and':
            case 'or': {
                const parts = filter.filters.filter(inner => filter.kind === 'or' || inner.kind !== 'all');
                if (parts.length === 0) return filter.kind === 'and' ? 'true' : 'false';
                if (parts.length === 1) return this.renderFilter(parts[0]);
                const joiner = filter.kind === 'and' ? ' AND ' : ' OR ';
                return `(${parts.map(inner => this.renderFilter(inner)).join(joiner)})`;
            }
            case 'not':
                return `NOT (${this.renderFilter(filter.filter)})`;
        }
    }

    private parameter(value: FilterValue): string {
        const name = `@p${this.parameters.length}`;
        this.parameters.push({ name, value });
        return name;
    }
}
