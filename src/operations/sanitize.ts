/**
 * Sequence sanitization
 *
 * Upper-cases a sequence and replaces every character outside ACGTN with the
 * unknown-base sentinel. Substitution is one UTF-16 unit for one, so position
 * `i` of the result always corresponds to position `i` of the input. A
 * surrogate pair therefore becomes `NN`, and `countInvalidBases` counts it as
 * two.
 */

import { isAllowedBase, UNKNOWN_BASE } from "./core/calculations";

/**
 * Sanitize a sequence
 *
 * Pure and idempotent: `sanitize(sanitize(s)) === sanitize(s)`.
 *
 * @example
 * ```typescript
 * sanitize("acxt"); // "ACNT"
 * sanitize("A-C G"); // "ANCNG"
 * ```
 */
export function sanitize(sequence: string): string {
  let cleaned = "";
  for (let i = 0; i < sequence.length; i++) {
    const char = sequence.charAt(i);
    cleaned += isAllowedBase(char) ? char.toUpperCase() : UNKNOWN_BASE;
  }
  return cleaned;
}

/**
 * Upper-case the allowed bases of a sequence and leave everything else as-is
 *
 * Unlike `String.prototype.toUpperCase` this never changes the length.
 */
export function upperCaseBases(sequence: string): string {
  let upper = "";
  for (let i = 0; i < sequence.length; i++) {
    const char = sequence.charAt(i);
    upper += isAllowedBase(char) ? char.toUpperCase() : char;
  }
  return upper;
}
