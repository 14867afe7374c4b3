/**
 * Array utilities
 */

/**
 * Removes duplicate elements from an array, keeping first occurrences
 * @param arr - Array to deduplicate
 * @returns New array with unique elements only
 */
export function uniq<T>(arr: T[]): T[] {
  return Array.from(new Set(arr));
}

export function sum(arr: number[]): number {
  return arr.reduce((acc, n) => acc + n, 0);
}

/**
 * Values occurring more than once, in order of first occurrence
 */
export function duplicates<T>(arr: T[]): T[] {
  const seen = new Set<T>();
  const repeated = new Set<T>();
  for (const v of arr) {
    if (seen.has(v)) repeated.add(v);
    else seen.add(v);
  }
  return uniq(arr.filter((v) => repeated.has(v)));
}

/**
 * Counts elements per key
 * @param arr - Elements to count
 * @param key - Maps an element to its bucket
 */
export function countBy<T>(arr: T[], key: (item: T) => string): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const item of arr) {
    const k = key(item);
    counts[k] = (counts[k] ?? 0) + 1;
  }
  return counts;
}
