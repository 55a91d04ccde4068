import { z } from 'zod';
import { DocumentType } from '../entities/DocumentType';

export type FilterValue = string | number | boolean | null;

export type ComparisonOperator = '=' | '!=' | '<' | '<=' | '>' | '>=';

/**
 * Filter intermediate representation. Field names and literal values travel in
 * separate slots, so rewriting a field reference can never touch a value.
 */
export type FilterExpression =
    | { kind: 'all' }
    | { kind: 'compare'; field: string; operator: ComparisonOperator; value: FilterValue }
    | { kind: 'in'; field: string; values: FilterValue[] }
    | { kind: 'contains'; field: string; value: string }
    | { kind: 'startsWith'; field: string; value: string }
    | { kind: 'arrayContains'; field: string; value: FilterValue }
    | { kind: 'isDefined'; field: string }
    | { kind: 'and'; filters: FilterExpression[] }
    | { kind: 'or'; filters: FilterExpression[] }
    | { kind: 'not'; filter: FilterExpression };

type FieldName<T> = Extract<keyof T, string>;
type ValueOf<T, K extends keyof T> = Extract<T[K], FilterValue>;
type ElementOf<T, K extends keyof T> = NonNullable<T[K]> extends ReadonlyArray<infer E> ? Extract<E, FilterValue> : never;

/**
 * Builds filter expressions checked against the fields of `T`.
 */
export interface FilterBuilder<T> {
    all(): FilterExpression;
    eq<K extends FieldName<T>>(field: K, value: ValueOf<T, K>): FilterExpression;
    ne<K extends FieldName<T>>(field: K, value: ValueOf<T, K>): FilterExpression;
    lt<K extends FieldName<T>>(field: K, value: ValueOf<T, K>): FilterExpression;
    lte<K extends FieldName<T>>(field: K, value: ValueOf<T, K>): FilterExpression;
    gt<K extends FieldName<T>>(field: K, value: ValueOf<T, K>): FilterExpression;
    gte<K extends FieldName<T>>(field: K, value: ValueOf<T, K>): FilterExpression;
    in<K extends FieldName<T>>(field: K, values: ValueOf<T, K>[]): FilterExpression;
    contains<K extends FieldName<T>>(field: K, value: string): FilterExpression;
    startsWith<K extends FieldName<T>>(field: K, value: string): FilterExpression;
    arrayContains<K extends FieldName<T>>(field: K, value: ElementOf<T, K>): FilterExpression;
    isDefined<K extends FieldName<T>>(field: K): FilterExpression;
    and(...filters: FilterExpression[]): FilterExpression;
    or(...filters: FilterExpression[]): FilterExpression;
    not(filter: FilterExpression): FilterExpression;
}

const compare = (field: string, operator: ComparisonOperator, value: FilterValue): FilterExpression =>
    ({ kind: 'compare', field, operator, value });

/**
 * Returns a filter builder over the fields of `T`.
 *
 * @example
 * const where = filterOn<Person>();
 * where.and(where.eq('firstName', 'Ada'), where.gte('age', 30));
 */
export function filterOn<T>(): FilterBuilder<T> {
    return {
        all: () => ({ kind: 'all' }),
        eq: (field, value) => compare(field, '=', value),
        ne: (field, value) => compare(field, '!=', value),
        lt: (field, value) => compare(field, '<', value),
        lte: (field, value) => compare(field, '<=', value),
        gt: (field, value) => compare(field, '>', value),
        gte: (field, value) => compare(field, '>=', value),
        in: (field, values) => ({ kind: 'in', field, values: [...values] }),
        contains: (field, value) => ({ kind: 'contains', field, value }),
        startsWith: (field, value) => ({ kind: 'startsWith', field, value }),
        arrayContains: (field, value) => ({ kind: 'arrayContains', field, value }),
        isDefined: (field) => ({ kind: 'isDefined', field }),
        and: (...filters) => ({ kind: 'and', filters }),
        or: (...filters) => ({ kind: 'or', filters }),
        not: (filter) => ({ kind: 'not', filter }),
    };
}

/**
 * Returns a filter builder over the fields a document type declares.
 */
export function filterFor<S extends z.AnyZodObject>(_type: DocumentType<S>): FilterBuilder<z.infer<S>> {
    return filterOn<z.infer<S>>();
}

/**
 * Rewrites every field reference in a filter, leaving values untouched.
 */
export function mapFilterFields(filter: FilterExpression, mapField: (field: string) => string): FilterExpression {
    switch (filter.kind) {
        case 'all':
            return filter;
        case 'and':
        case 'or':
            return { kind: filter.kind, filters: filter.filters.map(inner => mapFilterFields(inner, mapField)) };
        case 'not':
            return { kind: 'not', filter: mapFilterFields(filter.filter, mapField) };
        default:
            return { ...filter, field: mapField(filter.field) };
    }
}
