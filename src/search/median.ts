/**
 * Midpoint of an array: the median when the array is sorted.
 *
 * Odd lengths give one element, even lengths the two middle ones.
 * Arrays of two or fewer elements are returned whole.
 */
export function mid<T>(values: readonly T[]): T[] {
  const midpoint = Math.floor(values.length / 2);

  if (values.length <= 2) {
    return [...values];
  }

  if (values.length % 2 === 1) {
    return values.slice(midpoint, midpoint + 1);
  }

  return values.slice(midpoint - 1, midpoint + 1);
}
