/**
 * Locale-independent string ordering used for every deterministic sort
 */
export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Sorted copy without duplicates
 */
export function sortedUnique(values: Iterable<string>): string[] {
  return Array.from(new Set(values)).sort(compareStrings);
}
