/**
 * Core type definitions for sequence records, validation results and
 * dataset summaries
 *
 * Everything here is plain readonly data. Records are created once per
 * processing call and never mutated after they are handed on.
 */

import { type } from "arktype";

// =============================================================================
// PARSED RECORDS
// =============================================================================

/**
 * Input formats recognized by content sniffing
 */
export type SequenceFormat = "fasta" | "fastq";

/**
 * One entry as read from FASTA or FASTQ text, before any rule is applied
 */
export interface RawRecord {
  /** Header line without its leading marker, whitespace-trimmed */
  readonly header: string;
  /** Concatenated, line-trimmed sequence data (may be empty) */
  readonly sequence: string;
  /** FASTQ quality string, stored but never interpreted */
  readonly quality?: string;
  /** 1-based line number of the header line */
  readonly lineNumber?: number;
}

/**
 * Options shared by the FASTA and FASTQ parsers
 */
export interface ParserOptions {
  /** Record the header line number on each RawRecord */
  trackLineNumbers?: boolean;
  /** Lines longer than this raise a FormatError */
  maxLineLength?: number;
  /** Receives recoverable anomalies such as a truncated trailing FASTQ block */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Per-record problems that make a record invalid.
 * Declaration order is the order in which rules are evaluated.
 */
export const ErrorCode = {
  EMPTY_SEQUENCE: "EmptySequence",
  INVALID_CHARACTERS: "InvalidCharacters",
  BELOW_MIN_LENGTH: "BelowMinLength",
  DUPLICATE_HEADER: "DuplicateHeader",
  LOW_COMPLEXITY: "LowComplexity",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Every ErrorCode, in rule order */
export const ERROR_CODES: readonly ErrorCode[] = Object.values(ErrorCode);

/**
 * Per-record observations that do not affect validity
 */
export const WarningCode = {
  /** Non-empty final sequence made only of N */
  ALL_AMBIGUOUS: "AllAmbiguous",
} as const;

export type WarningCode = (typeof WarningCode)[keyof typeof WarningCode];

export const WARNING_CODES: readonly WarningCode[] = Object.values(WarningCode);

/**
 * Thresholds for the low-complexity heuristic
 */
export interface LowComplexityThresholds {
  /** Sequences shorter than this are never low complexity */
  readonly minLength: number;
  /** Fraction of the most frequent character that triggers the rule */
  readonly dominantFraction: number;
  /** Fraction of the sequence covered by the longest tandem run of one short unit */
  readonly repeatCoverage: number;
  /** Longest repeat unit examined */
  readonly maxUnitLength: number;
}

/**
 * Validation configuration as supplied by a caller; omitted fields take defaults
 */
export interface ValidationConfig {
  sanitize?: boolean;
  minLength?: number;
  lowComplexity?: Partial<LowComplexityThresholds>;
}

/**
 * Validation configuration with every default applied
 */
export interface ResolvedValidationConfig {
  readonly sanitize: boolean;
  readonly minLength: number;
  readonly lowComplexity: LowComplexityThresholds;
}

/**
 * A RawRecord after rule evaluation. Owns no reference back to its RawRecord.
 */
export interface ValidatedRecord {
  /** 0-based position in the input */
  readonly index: number;
  readonly header: string;
  readonly originalSequence: string;
  /** Sanitized sequence when sanitization is enabled, otherwise the original */
  readonly finalSequence: string;
  readonly quality?: string;
  /** Always `errors.length === 0` */
  readonly isValid: boolean;
  /** In rule evaluation order */
  readonly errors: readonly ErrorCode[];
  readonly warnings: readonly WarningCode[];
  /** Always `finalSequence.length`, in UTF-16 code units */
  readonly length: number;
  /** G+C fraction of finalSequence, 0 for an empty sequence */
  readonly gcContent: number;
  /**
   * UTF-16 code units outside ACGTN in the original sequence. A character
   * outside the Basic Multilingual Plane counts twice, matching the two `N`s
   * sanitization writes for it.
   */
  readonly invalidCharCount: number;
  /** Sanitization ran and changed the sequence */
  readonly sanitized: boolean;
}

// =============================================================================
// STATISTICS
// =============================================================================

export interface RankedRecord {
  /** 1-based rank */
  readonly rank: number;
  readonly index: number;
  readonly header: string;
  readonly length: number;
  readonly gcContent: number;
}

export interface LengthDistribution {
  readonly median: number;
  readonly q1: number;
  readonly q2: number;
  readonly q3: number;
}

export interface GcDistribution {
  readonly min: number;
  readonly max: number;
  readonly median: number;
}

export interface QualityTiers {
  /** Valid, no warnings */
  readonly high: number;
  /** Valid with warnings */
  readonly medium: number;
  /** Invalid, but carries InvalidCharacters that sanitization can fix */
  readonly low: number;
  /** Invalid for any other reason */
  readonly unusable: number;
}

export interface ErrorAnalysis {
  readonly totalErrors: number;
  readonly mostCommonError: ErrorCode | null;
  readonly mostCommonCount: number;
}

/**
 * Aggregate metrics over every validated record, valid and invalid alike
 */
export interface DatasetSummary {
  readonly totalCount: number;
  readonly validCount: number;
  readonly invalidCount: number;
  readonly avgGcContent: number;
  readonly minLength: number;
  readonly maxLength: number;
  readonly avgLength: number;
  readonly totalBases: number;
  readonly errorHistogram: Readonly<Record<ErrorCode, number>>;
  readonly warningHistogram: Readonly<Record<WarningCode, number>>;
  readonly topLongest: readonly RankedRecord[];
  readonly lengthDistribution: LengthDistribution;
  readonly gcDistribution: GcDistribution;
  readonly sanitizedCount: number;
  readonly duplicateHeaderCount: number;
  /** Percentage 0-100 */
  readonly validityPercentage: number;
  /** Percentage 0-100 */
  readonly sanitizationRate: number;
  readonly qualityTiers: QualityTiers;
  readonly errorAnalysis: ErrorAnalysis;
}

// =============================================================================
// SCHEMAS
// =============================================================================

/**
 * ArkType schema for parser options
 */
export const ParserOptionsSchema = type({
  "trackLineNumbers?": "boolean",
  "maxLineLength?": "number.integer>0",
});

/**
 * ArkType schema for validation configuration
 */
export const ValidationConfigSchema = type({
  "sanitize?": "boolean",
  "minLength?": "number.integer>=0",
  "lowComplexity?": {
    "minLength?": "number.integer>=0",
    "dominantFraction?": "0 < number <= 1",
    "repeatCoverage?": "0 < number <= 1",
    "maxUnitLength?": "number.integer>=1",
  },
}).narrow((config, ctx) => {
  const maxUnitLength = config.lowComplexity?.maxUnitLength;
  if (maxUnitLength !== undefined && maxUnitLength > 16) {
    return ctx.reject({
      expected: "maxUnitLength <= 16",
      actual: String(maxUnitLength),
      path: ["lowComplexity", "maxUnitLength"],
    });
  }
  return true;
});
