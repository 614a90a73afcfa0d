/**
 * Runtime checks for caller obligations of the weighted searches.
 * Only consulted when a search runs with `validate: true`.
 */

import { PreconditionError } from '../domain/errors.js';

// Slack for floating point sums in the consistency check
const EPSILON = 1e-9;

export function checkEdgeCost(weight: number): void {
  if (!Number.isFinite(weight) || weight < 0) {
    throw new PreconditionError(`Edge cost must be a non-negative finite number, got ${weight}`);
  }
}

export function checkHeuristicValue(estimate: number): void {
  if (!Number.isFinite(estimate) || estimate < 0) {
    throw new PreconditionError(`Heuristic must return a non-negative finite number, got ${estimate}`);
  }
}

/**
 * A consistent heuristic never drops by more than the edge it crosses
 */
export function checkConsistency(fromEstimate: number, weight: number, toEstimate: number): void {
  if (fromEstimate > weight + toEstimate + EPSILON) {
    throw new PreconditionError(
      `Heuristic is inconsistent: estimate ${fromEstimate} exceeds edge cost ${weight} plus next estimate ${toEstimate}`
    );
  }
}
