/**
 * Sequence composition calculations
 *
 * Provides the base alphabet, GC fraction and base counting shared by the
 * validation engine and the statistics aggregator.
 *
 * @module calculations
 */

/**
 * Bases a sequence may contain, compared case-insensitively
 */
export const ALLOWED_BASES = "ACGTN";

/** Unknown-base sentinel used when sanitizing */
export const UNKNOWN_BASE = "N";

/**
 * Check an upper- or lower-case character against the allowed alphabet
 */
export function isAllowedBase(char: string): boolean {
  switch (char) {
    case "A":
    case "C":
    case "G":
    case "T":
    case "N":
    case "a":
    case "c":
    case "g":
    case "t":
    case "n":
      return true;
    default:
      return false;
  }
}

/**
 * Count UTF-16 code units outside the allowed alphabet
 *
 * @example
 * ```typescript
 * countInvalidBases("ACXT"); // 1
 * countInvalidBases("acgtn"); // 0
 * countInvalidBases("a\u{1F600}c"); // 2
 * ```
 */
export function countInvalidBases(sequence: string): number {
  let count = 0;
  for (let i = 0; i < sequence.length; i++) {
    if (!isAllowedBase(sequence.charAt(i))) {
      count++;
    }
  }
  return count;
}

/**
 * GC fraction of a sequence: (G + C) / length, case-insensitive
 *
 * Every character counts toward the length, including N and characters
 * outside the alphabet. An empty sequence has a GC fraction of 0.
 *
 * @example
 * ```typescript
 * gcFraction("ACGT");  // 0.5
 * gcFraction("ACGTN"); // 0.4
 * gcFraction("");      // 0
 * ```
 */
export function gcFraction(sequence: string): number {
  if (sequence.length === 0) {
    return 0;
  }

  let gcCount = 0;
  for (let i = 0; i < sequence.length; i++) {
    const base = sequence[i];
    if (base === "G" || base === "C" || base === "g" || base === "c") {
      gcCount++;
    }
  }
  return gcCount / sequence.length;
}

/**
 * Per-base counts of a sequence
 */
export interface BaseComposition {
  readonly A: number;
  readonly C: number;
  readonly G: number;
  readonly T: number;
  readonly N: number;
  /** Characters outside ACGTN */
  readonly other: number;
}

/**
 * Count each base of a sequence, case-insensitive
 */
export function baseComposition(sequence: string): BaseComposition {
  const counts = { A: 0, C: 0, G: 0, T: 0, N: 0, other: 0 };

  for (let i = 0; i < sequence.length; i++) {
    switch (sequence.charAt(i).toUpperCase()) {
      case "A":
        counts.A++;
        break;
      case "C":
        counts.C++;
        break;
      case "G":
        counts.G++;
        break;
      case "T":
        counts.T++;
        break;
      case "N":
        counts.N++;
        break;
      default:
        counts.other++;
    }
  }

  return counts;
}
