/**
 * Number theory helpers
 */

function requireInteger(value: number, name: string): void {
  if (!Number.isInteger(value)) {
    throw new RangeError(`${name} must be an integer, got ${value}`);
  }
}

/**
 * Greatest common divisor (Euclid). gcd(0, n) is |n|.
 */
export function gcd(a: number, b: number): number {
  requireInteger(a, 'a');
  requireInteger(b, 'b');

  a = Math.abs(a);
  b = Math.abs(b);

  while (b !== 0) {
    [a, b] = [b, a % b];
  }

  return a;
}

/**
 * Least common multiple. lcm(0, n) is 0.
 * Throws RangeError when the result is past Number.MAX_SAFE_INTEGER.
 */
export function lcm(a: number, b: number): number {
  const divisor = gcd(a, b);
  if (divisor === 0) return 0;

  const multiple = Math.abs((a / divisor) * b);
  if (!Number.isSafeInteger(multiple)) {
    throw new RangeError(`lcm(${a}, ${b}) exceeds the safe integer range`);
  }
  return multiple;
}

export function gcdAll(values: readonly number[]): number {
  if (values.length === 0) {
    throw new RangeError('gcdAll needs at least one value');
  }
  return values.reduce((acc, value) => gcd(acc, value));
}

/**
 * LCM of a list, e.g. the step at which several cycles line up again
 */
export function lcmAll(values: readonly number[]): number {
  if (values.length === 0) {
    throw new RangeError('lcmAll needs at least one value');
  }
  return values.reduce((acc, value) => lcm(acc, value));
}
