/**
 * Sort exports
 */

export { partialSort, partialSortNumbers, type Comparator } from './partial-sort';
