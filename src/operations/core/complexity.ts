/**
 * Low-complexity detection
 *
 * A sequence is low complexity when it is long enough to judge and either
 * one character dominates it or a short unit repeated back to back covers
 * almost all of it.
 *
 * For a sequence `s` of length `n`:
 * - dominant fraction = count of the most frequent character / n
 * - repeat coverage(k) = positions covered by the longest run of whole,
 *   adjacent copies of one unit of length `k` (at least two copies) / n
 *
 * `s` is low complexity when `n >= minLength` and the dominant fraction is at
 * least `dominantFraction`, or some unit length `k` in `1..maxUnitLength` has
 * a coverage of at least `repeatCoverage`.
 *
 * Positions are UTF-16 code units, the same unit as `String.length`.
 *
 * @module complexity
 */

import type { LowComplexityThresholds } from "../../types";

export const DEFAULT_LOW_COMPLEXITY: LowComplexityThresholds = Object.freeze({
  minLength: 10,
  dominantFraction: 0.8,
  repeatCoverage: 0.9,
  maxUnitLength: 3,
});

/**
 * Fraction of the sequence taken by its most frequent character
 *
 * @example
 * ```typescript
 * dominantFraction("AAAAC"); // 0.8
 * ```
 */
export function dominantFraction(sequence: string): number {
  if (sequence.length === 0) {
    return 0;
  }

  const counts = new Map<string, number>();
  let maxCount = 0;
  for (let i = 0; i < sequence.length; i++) {
    const char = sequence.charAt(i);
    const count = (counts.get(char) ?? 0) + 1;
    counts.set(char, count);
    if (count > maxCount) {
      maxCount = count;
    }
  }
  return maxCount / sequence.length;
}

/**
 * Share of the sequence covered by the longest tandem repeat of one unit
 *
 * A run where every position equals the one `unitLength` earlier is a
 * stretch of copies of a single unit. Only whole copies count, and a lone
 * copy is not a repeat. Returns 0 for an empty sequence.
 *
 * @example
 * ```typescript
 * repeatCoverage("ACACACAC", 2);               // 1
 * repeatCoverage("ACG".repeat(9) + "TTT", 3);  // 0.9
 * repeatCoverage("AAAAACCCCC", 1);             // 0.5
 * ```
 */
export function repeatCoverage(sequence: string, unitLength: number): number {
  if (!Number.isInteger(unitLength) || unitLength < 1) {
    throw new Error(`unitLength must be a positive integer, got ${unitLength}`);
  }
  if (sequence.length === 0) {
    return 0;
  }

  let run = 0;
  let longestRun = 0;
  for (let i = unitLength; i < sequence.length; i++) {
    if (sequence.charAt(i) === sequence.charAt(i - unitLength)) {
      run++;
      longestRun = Math.max(longestRun, run);
    } else {
      run = 0;
    }
  }

  // A run of r matches spans r + unitLength positions
  const copies = Math.floor((longestRun + unitLength) / unitLength);
  if (copies < 2) {
    return 0;
  }
  return (copies * unitLength) / sequence.length;
}

/**
 * Apply the low-complexity heuristic to an upper-cased sequence
 */
export function isLowComplexity(
  sequence: string,
  thresholds: LowComplexityThresholds = DEFAULT_LOW_COMPLEXITY
): boolean {
  if (sequence.length === 0 || sequence.length < thresholds.minLength) {
    return false;
  }

  if (dominantFraction(sequence) >= thresholds.dominantFraction) {
    return true;
  }

  for (let unitLength = 1; unitLength <= thresholds.maxUnitLength; unitLength++) {
    if (repeatCoverage(sequence, unitLength) >= thresholds.repeatCoverage) {
      return true;
    }
  }
  return false;
}
