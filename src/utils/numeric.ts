/**
 * Maps negative zero to positive zero. Any other value is returned unchanged.
 */
export function normalizeZero(value: number): number {
  return value === 0 ? 0 : value;
}

/**
 * Sums a measure over rows. An empty input sums to 0, never -0.
 */
export function sumBy<T>(rows: readonly T[], measure: (row: T) => number): number {
  let total = 0;
  for (const row of rows) {
    total += measure(row);
  }
  return normalizeZero(total);
}

/**
 * Same coercion the warehouse readers apply to amounts: absent or unparsable
 * values read as 0.
 */
export function parseNumeric(value: unknown): number {
  if (value === null || value === undefined || value === '') {
    return 0;
  }
  const parsed = typeof value === 'number' ? value : parseFloat(String(value));
  return isNaN(parsed) ? 0 : parsed;
}
