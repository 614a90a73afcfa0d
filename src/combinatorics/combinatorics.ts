/**
 * Permutation and combination generators
 */

import { KeyFn, StateKey } from '../domain/types.js';
import { stateKey } from '../search/state-key.js';

/**
 * Every ordering of `items`, by Heap's algorithm.
 * Repeated items produce repeated orderings; see uniquePermutations.
 */
export function* permutations<T>(items: readonly T[]): Generator<T[]> {
  const current = [...items];
  const counters = new Array<number>(current.length).fill(0);

  yield [...current];

  let i = 1;
  while (i < current.length) {
    if (counters[i] < i) {
      const j = i % 2 === 0 ? 0 : counters[i];
      [current[j], current[i]] = [current[i], current[j]];
      yield [...current];
      counters[i]++;
      i = 1;
    } else {
      counters[i] = 0;
      i++;
    }
  }
}

/**
 * Distinct orderings of `items` when some of them repeat.
 * Items sharing a key are interchangeable; the first one seen represents them.
 *
 * Walks lexicographic successors of the sorted class indices, so each
 * distinct ordering is produced once.
 */
export function uniquePermutations<T>(items: readonly T[], key: KeyFn<T> = stateKey): T[][] {
  const representatives: T[] = [];
  const classOf = new Map<StateKey, number>();
  const indices: number[] = [];

  for (const item of items) {
    const itemKey = key(item);
    let index = classOf.get(itemKey);
    if (index === undefined) {
      index = representatives.length;
      classOf.set(itemKey, index);
      representatives.push(item);
    }
    indices.push(index);
  }

  indices.sort((a, b) => a - b);

  const result: T[][] = [];
  do {
    result.push(indices.map(index => representatives[index]));
  } while (nextPermutation(indices));

  return result;
}

/**
 * Rearrange into the next lexicographic ordering in place.
 * Returns false when `values` was already the last ordering.
 */
function nextPermutation(values: number[]): boolean {
  let i = values.length - 2;
  while (i >= 0 && values[i] >= values[i + 1]) i--;
  if (i < 0) return false;

  let j = values.length - 1;
  while (values[j] <= values[i]) j--;

  [values[i], values[j]] = [values[j], values[i]];

  for (let lo = i + 1, hi = values.length - 1; lo < hi; lo++, hi--) {
    [values[lo], values[hi]] = [values[hi], values[lo]];
  }

  return true;
}

/**
 * All k-element selections of `items`, in lexicographic order of position
 */
export function* combinations<T>(items: readonly T[], k: number): Generator<T[]> {
  const n = items.length;
  if (!Number.isInteger(k) || k < 0 || k > n) return;

  const picked = Array.from({ length: k }, (_, i) => i);

  while (true) {
    yield picked.map(index => items[index]);

    // Rightmost position that can still advance
    let i = k - 1;
    while (i >= 0 && picked[i] === n - k + i) i--;
    if (i < 0) return;

    picked[i]++;
    for (let j = i + 1; j < k; j++) {
      picked[j] = picked[j - 1] + 1;
    }
  }
}

/**
 * Binomial coefficient n choose k.
 * Throws RangeError when the result is past Number.MAX_SAFE_INTEGER.
 */
export function choose(n: number, k: number): number {
  if (!Number.isInteger(n) || !Number.isInteger(k)) {
    throw new RangeError(`choose needs integers, got ${n} and ${k}`);
  }
  if (k < 0 || k > n) return 0;

  const picks = Math.min(k, n - k);
  // Exact at every step: the running product is itself a binomial coefficient
  let result = 1n;
  for (let i = 0; i < picks; i++) {
    result = (result * BigInt(n - i)) / BigInt(i + 1);
  }

  if (result > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new RangeError(`choose(${n}, ${k}) exceeds the safe integer range`);
  }
  return Number(result);
}
