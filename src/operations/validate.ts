/**
 * ValidationEngine - per-record rule evaluation
 *
 * Turns raw records into validated records, one for one and in input order.
 * Problems found in a record are collected as ErrorCodes on that record;
 * they never abort the run, and invalid records are kept.
 *
 * Rules, in evaluation order:
 * 1. EmptySequence     - nothing but whitespace in the sequence
 * 2. InvalidCharacters - a character outside ACGTN (case-insensitive) in the
 *                        original sequence, even when sanitization fixes it
 * 3. BelowMinLength    - final sequence shorter than `minLength`
 * 4. DuplicateHeader   - header already seen earlier in the same call
 * 5. LowComplexity     - see `core/complexity`
 *
 * An empty record has no content to score, so rules 2, 3 and 5 are skipped
 * for it; rule 4 still applies.
 */

import { type } from "arktype";
import { ERROR_SUGGESTIONS, ValidationError } from "../errors";
import type {
  RawRecord,
  ResolvedValidationConfig,
  ValidatedRecord,
  ValidationConfig,
} from "../types";
import { ErrorCode, ValidationConfigSchema, WarningCode } from "../types";
import { countInvalidBases, gcFraction, UNKNOWN_BASE } from "./core/calculations";
import { DEFAULT_LOW_COMPLEXITY, isLowComplexity } from "./core/complexity";
import { sanitize, upperCaseBases } from "./sanitize";

/** Default minimum sequence length, in bases */
export const DEFAULT_MIN_LENGTH = 20;

export const DEFAULT_VALIDATION_CONFIG: ResolvedValidationConfig = Object.freeze({
  sanitize: false,
  minLength: DEFAULT_MIN_LENGTH,
  lowComplexity: DEFAULT_LOW_COMPLEXITY,
});

/**
 * Validate a caller-supplied configuration and apply defaults
 *
 * @throws {ValidationError} When a field has the wrong type or is out of range
 */
export function resolveValidationConfig(config: ValidationConfig = {}): ResolvedValidationConfig {
  const validationResult = ValidationConfigSchema(config);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(
      `Invalid validation config: ${validationResult.summary}`,
      undefined,
      ERROR_SUGGESTIONS.INVALID_OPTIONS
    );
  }

  return {
    sanitize: config.sanitize ?? DEFAULT_VALIDATION_CONFIG.sanitize,
    minLength: config.minLength ?? DEFAULT_VALIDATION_CONFIG.minLength,
    lowComplexity: { ...DEFAULT_LOW_COMPLEXITY, ...config.lowComplexity },
  };
}

function isAllAmbiguous(sequence: string): boolean {
  if (sequence.length === 0) {
    return false;
  }
  for (let i = 0; i < sequence.length; i++) {
    if (sequence.charAt(i).toUpperCase() !== UNKNOWN_BASE) {
      return false;
    }
  }
  return true;
}

/**
 * Rule engine for raw sequence records
 *
 * The engine holds only its configuration. Duplicate-header tracking lives in
 * a set created per `validate` call.
 *
 * @example
 * ```typescript
 * const engine = new ValidationEngine({ sanitize: true, minLength: 50 });
 * const validated = engine.validate(parseSequences(text));
 * const invalid = validated.filter((record) => !record.isValid);
 * ```
 */
export class ValidationEngine {
  readonly config: ResolvedValidationConfig;

  constructor(config: ValidationConfig = {}) {
    this.config = resolveValidationConfig(config);
  }

  /**
   * Validate records in input order
   */
  validate(records: Iterable<RawRecord>): ValidatedRecord[] {
    const seenHeaders = new Set<string>();
    const validated: ValidatedRecord[] = [];

    for (const record of records) {
      validated.push(this.validateRecord(record, validated.length, seenHeaders));
    }

    return validated;
  }

  private validateRecord(
    record: RawRecord,
    index: number,
    seenHeaders: Set<string>
  ): ValidatedRecord {
    const { sanitize: shouldSanitize, minLength, lowComplexity } = this.config;
    const originalSequence = record.sequence;
    const errors: ErrorCode[] = [];

    // Counted on the original, before sanitization
    const invalidCharCount = countInvalidBases(originalSequence);
    const finalSequence = shouldSanitize ? sanitize(originalSequence) : originalSequence;
    const isEmpty = originalSequence.trim().length === 0;

    if (isEmpty) {
      errors.push(ErrorCode.EMPTY_SEQUENCE);
    } else if (invalidCharCount > 0) {
      errors.push(ErrorCode.INVALID_CHARACTERS);
    }

    if (!isEmpty && finalSequence.length < minLength) {
      errors.push(ErrorCode.BELOW_MIN_LENGTH);
    }

    if (seenHeaders.has(record.header)) {
      errors.push(ErrorCode.DUPLICATE_HEADER);
    } else {
      seenHeaders.add(record.header);
    }

    if (!isEmpty && isLowComplexity(upperCaseBases(finalSequence), lowComplexity)) {
      errors.push(ErrorCode.LOW_COMPLEXITY);
    }

    const warnings: WarningCode[] = [];
    if (isAllAmbiguous(finalSequence)) {
      warnings.push(WarningCode.ALL_AMBIGUOUS);
    }

    return {
      index,
      header: record.header,
      originalSequence,
      finalSequence,
      ...(record.quality !== undefined && { quality: record.quality }),
      isValid: errors.length === 0,
      errors,
      warnings,
      length: finalSequence.length,
      gcContent: gcFraction(finalSequence),
      invalidCharCount,
      sanitized: shouldSanitize && finalSequence !== originalSequence,
    };
  }
}

/**
 * Validate records with a one-off engine
 *
 * @example
 * ```typescript
 * const validated = validateRecords(records, { minLength: 3 });
 * ```
 */
export function validateRecords(
  records: Iterable<RawRecord>,
  config: ValidationConfig = {}
): ValidatedRecord[] {
  return new ValidationEngine(config).validate(records);
}

/**
 * Keep only valid records, preserving order
 */
export function filterValid(records: readonly ValidatedRecord[]): ValidatedRecord[] {
  return records.filter((record) => record.isValid);
}
