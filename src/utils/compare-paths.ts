/**
 * Order paths by UTF-16 code units
 * Locale-independent, so the Corpus sorts the same on every machine
 */
export function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
