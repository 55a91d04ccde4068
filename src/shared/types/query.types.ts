/**
 * One page of a sorted, filtered listing.
 */
export interface PageResult<T> {
    data: T[];
    totalCount: number; // matches of filter + namespace constraint, independent of paging
    totalPages: number; // ceil(totalCount / pageSize)
}

/**
 * A raw item as the document store holds it: generic key/value pairs keyed by the reserved `id`.
 */
export type DocumentRecord = Record<string, unknown>;
