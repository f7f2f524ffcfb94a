/**
 * Binary-search helpers over strictly increasing integer arrays.
 */

/** Position of the first element >= value (array length when none). */
export function lowerBound(sorted: readonly number[], value: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] < value) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

export function containsSorted(sorted: readonly number[], value: number): boolean {
  const position = lowerBound(sorted, value);
  return position < sorted.length && sorted[position] === value;
}

/** Greatest element strictly less than value. */
export function predecessor(sorted: readonly number[], value: number): number | undefined {
  const position = lowerBound(sorted, value);
  return position > 0 ? sorted[position - 1] : undefined;
}

/** Smallest element strictly greater than value. */
export function successor(sorted: readonly number[], value: number): number | undefined {
  let position = lowerBound(sorted, value);
  if (position < sorted.length && sorted[position] === value) {
    position += 1;
  }
  return position < sorted.length ? sorted[position] : undefined;
}

/**
 * Inserts value in place, keeping order. Returns false when already present.
 */
export function insertSorted(sorted: number[], value: number): boolean {
  const position = lowerBound(sorted, value);
  if (position < sorted.length && sorted[position] === value) {
    return false;
  }
  sorted.splice(position, 0, value);
  return true;
}

/** Sorted, de-duplicated copy of arbitrary integers. */
export function normalizeIndices(values: Iterable<number>): number[] {
  return Array.from(new Set(values))
    .filter((value) => Number.isSafeInteger(value) && value >= 0)
    .sort((a, b) => a - b);
}
