/**
 * Canonical ordering: binary UTF-16 code unit ascending only.
 * NEVER use localeCompare (rankings must not depend on the host locale).
 */

/** Binary string comparison (UTF-16 code unit ascending). Returns -1 | 0 | 1. */
export function stringCompareBinary(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Numeric ascending comparison. Returns -1 | 0 | 1; NaN sorts as equal to everything. */
export function compareNumbers(a: number, b: number): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export interface KeyedCount {
  key: string;
  count: number;
}

/** Sort by (count desc, key asc) using binary order. */
export function sortByCountDescending<T extends KeyedCount>(entries: T[]): T[] {
  return [...entries].sort((a, b) => {
    const countCmp = compareNumbers(b.count, a.count);
    if (countCmp !== 0) return countCmp;
    return stringCompareBinary(a.key, b.key);
  });
}
