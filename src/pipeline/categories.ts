/**
 * Business categories -> the Czech search phrases that cover them in Prague.
 */
export const CATEGORY_QUERIES: Readonly<Record<string, readonly string[]>> = {
    beauty: ['kadeřnictví Praha', 'kosmetika Praha', 'manikúra Praha', 'pedikúra Praha'],
    spa: ['wellness Praha', 'masáže Praha', 'spa Praha'],
    restaurant: ['restaurace Praha', 'kavárna Praha'],
    fitness: ['fitness Praha', 'posilovna Praha'],
    tourism: ['turistické služby Praha', 'cestovní kancelář Praha'],
};

export const DEFAULT_CATEGORY = 'beauty';

/**
 * Unmapped categories are searched verbatim.
 */
export function resolveCategoryQueries(category: string): readonly string[] {
    return Object.prototype.hasOwnProperty.call(CATEGORY_QUERIES, category)
        ? CATEGORY_QUERIES[category]
        : [category];
}

/**
 * Per-query result cap when a category fans out into several searches.
 */
export function perQueryCap(maxResults: number, queryCount: number): number {
    return Math.floor(maxResults / Math.max(queryCount, 1)) + 1;
}
