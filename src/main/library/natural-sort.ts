const collator = new Intl.Collator(undefined, { numeric: true, sensitivity: 'base' });

/**
 * Numeric-aware, case-insensitive path ordering ("img2" before "img10").
 * Falls back to code-unit order so distinct paths never compare equal.
 */
export function compareNatural(a: string, b: string): number {
  const primary = collator.compare(a, b);
  if (primary !== 0) {
    return primary;
  }
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function sortNatural(paths: Iterable<string>): string[] {
  return Array.from(paths).sort(compareNatural);
}
