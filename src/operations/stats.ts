/**
 * Dataset statistics for validated sequence records
 *
 * Aggregates counts, GC content, the length distribution, the error
 * histogram and the longest records over a full set of validated records.
 * Valid and invalid records are counted alike.
 *
 * Key conventions:
 * - GC averages are unweighted means of per-record GC fractions
 * - Quartiles take the lower-index element: sorted[floor(n * p)]
 * - Empty input yields zeros, unless the caller asks for an error instead
 */

import { type } from "arktype";
import { EmptyDatasetError, ValidationError } from "../errors";
import type {
  DatasetSummary,
  GcDistribution,
  LengthDistribution,
  QualityTiers,
  RankedRecord,
  ValidatedRecord,
} from "../types";
import { ERROR_CODES, ErrorCode, WarningCode } from "../types";

// =============================================================================
// TYPES AND INTERFACES
// =============================================================================

/** Number of entries in `topLongest` */
export const TOP_LONGEST_LIMIT = 10;

/**
 * Options for {@link summarize}
 */
export interface SummarizeOptions {
  /** Throw EmptyDatasetError instead of returning a zeroed summary */
  requireRecords?: boolean;
  /** Length of the `topLongest` ranking */
  topLimit?: number;
}

const SummarizeOptionsSchema = type({
  "requireRecords?": "boolean",
  "topLimit?": "number.integer>=0",
});

interface RankCandidate {
  readonly index: number;
  readonly header: string;
  readonly length: number;
  readonly gcContent: number;
}

function emptyErrorHistogram(): Record<ErrorCode, number> {
  return {
    [ErrorCode.EMPTY_SEQUENCE]: 0,
    [ErrorCode.INVALID_CHARACTERS]: 0,
    [ErrorCode.BELOW_MIN_LENGTH]: 0,
    [ErrorCode.DUPLICATE_HEADER]: 0,
    [ErrorCode.LOW_COMPLEXITY]: 0,
  };
}

function emptyWarningHistogram(): Record<WarningCode, number> {
  return { [WarningCode.ALL_AMBIGUOUS]: 0 };
}

/**
 * Element at fraction `p` of an ascending array, lower-index convention
 */
export function lowerPercentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) {
    return 0;
  }
  const position = Math.min(sorted.length - 1, Math.floor(sorted.length * p));
  return sorted[position] ?? 0;
}

/**
 * Rank records by length, longest first, earlier input position first on ties
 */
export function rankLongest(
  candidates: readonly RankCandidate[],
  limit: number = TOP_LONGEST_LIMIT
): RankedRecord[] {
  return [...candidates]
    .sort((a, b) => b.length - a.length || a.index - b.index)
    .slice(0, limit)
    .map((candidate, position) => ({
      rank: position + 1,
      index: candidate.index,
      header: candidate.header,
      length: candidate.length,
      gcContent: candidate.gcContent,
    }));
}

// =============================================================================
// ACCUMULATOR
// =============================================================================

/**
 * Accumulates dataset statistics one validated record at a time
 *
 * Records must be added in input order for the error and ranking figures to
 * match a single `summarize` call over the same list.
 *
 * @example
 * ```typescript
 * const accumulator = new DatasetStatsAccumulator();
 * accumulator.addMany(validated);
 * const summary = accumulator.getSummary();
 * ```
 */
export class DatasetStatsAccumulator {
  private count = 0;
  private validCount = 0;
  private totalLength = 0;
  private minLength = Number.MAX_SAFE_INTEGER;
  private maxLength = 0;
  private gcSum = 0;
  private sanitizedCount = 0;
  private totalErrors = 0;

  private readonly lengths: number[] = [];
  private readonly gcValues: number[] = [];
  private readonly candidates: RankCandidate[] = [];
  private readonly errorHistogram = emptyErrorHistogram();
  private readonly warningHistogram = emptyWarningHistogram();
  private readonly tiers = { high: 0, medium: 0, low: 0, unusable: 0 };

  constructor(private readonly topLimit: number = TOP_LONGEST_LIMIT) {}

  /**
   * Add one validated record
   */
  add(record: ValidatedRecord): void {
    this.count++;
    if (record.isValid) {
      this.validCount++;
    }
    if (record.sanitized) {
      this.sanitizedCount++;
    }

    this.totalLength += record.length;
    this.minLength = Math.min(this.minLength, record.length);
    this.maxLength = Math.max(this.maxLength, record.length);
    this.lengths.push(record.length);

    this.gcSum += record.gcContent;
    this.gcValues.push(record.gcContent);

    // A record never carries the same code twice, so this counts records
    for (const code of record.errors) {
      this.errorHistogram[code]++;
    }
    for (const code of record.warnings) {
      this.warningHistogram[code]++;
    }
    this.totalErrors += record.errors.length;

    this.classify(record);

    this.candidates.push({
      index: record.index,
      header: record.header,
      length: record.length,
      gcContent: record.gcContent,
    });
  }

  /**
   * Add records in order
   */
  addMany(records: Iterable<ValidatedRecord>): void {
    for (const record of records) {
      this.add(record);
    }
  }

  /**
   * Number of records added so far
   */
  get size(): number {
    return this.count;
  }

  /**
   * Summary of everything added so far
   */
  getSummary(): DatasetSummary {
    const count = this.count;
    const sortedLengths = [...this.lengths].sort((a, b) => a - b);
    const sortedGc = [...this.gcValues].sort((a, b) => a - b);

    const lengthDistribution: LengthDistribution = {
      median: lowerPercentile(sortedLengths, 0.5),
      q1: lowerPercentile(sortedLengths, 0.25),
      q2: lowerPercentile(sortedLengths, 0.5),
      q3: lowerPercentile(sortedLengths, 0.75),
    };
    const gcDistribution: GcDistribution = {
      min: sortedGc[0] ?? 0,
      max: sortedGc[sortedGc.length - 1] ?? 0,
      median: lowerPercentile(sortedGc, 0.5),
    };

    return {
      totalCount: count,
      validCount: this.validCount,
      invalidCount: count - this.validCount,
      avgGcContent: count > 0 ? this.gcSum / count : 0,
      minLength: count > 0 ? this.minLength : 0,
      maxLength: this.maxLength,
      avgLength: count > 0 ? this.totalLength / count : 0,
      totalBases: this.totalLength,
      errorHistogram: { ...this.errorHistogram },
      warningHistogram: { ...this.warningHistogram },
      topLongest: rankLongest(this.candidates, this.topLimit),
      lengthDistribution,
      gcDistribution,
      sanitizedCount: this.sanitizedCount,
      duplicateHeaderCount: this.errorHistogram[ErrorCode.DUPLICATE_HEADER],
      validityPercentage: count > 0 ? (this.validCount / count) * 100 : 0,
      sanitizationRate: count > 0 ? (this.sanitizedCount / count) * 100 : 0,
      qualityTiers: { ...this.tiers } satisfies QualityTiers,
      errorAnalysis: this.analyzeErrors(),
    };
  }

  private classify(record: ValidatedRecord): void {
    if (record.isValid) {
      if (record.warnings.length === 0) {
        this.tiers.high++;
      } else {
        this.tiers.medium++;
      }
    } else if (record.errors.includes(ErrorCode.INVALID_CHARACTERS)) {
      this.tiers.low++;
    } else {
      this.tiers.unusable++;
    }
  }

  private analyzeErrors(): DatasetSummary["errorAnalysis"] {
    let mostCommonError: ErrorCode | null = null;
    let mostCommonCount = 0;

    // Declaration order breaks ties
    for (const code of ERROR_CODES) {
      const occurrences = this.errorHistogram[code];
      if (occurrences > mostCommonCount) {
        mostCommonError = code;
        mostCommonCount = occurrences;
      }
    }

    return { totalErrors: this.totalErrors, mostCommonError, mostCommonCount };
  }
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Summarize a full set of validated records
 *
 * @throws {EmptyDatasetError} When `requireRecords` is set and there are no records
 * @throws {ValidationError} When options are invalid
 *
 * @example
 * ```typescript
 * const summary = summarize(validateRecords(parseSequences(text)));
 * console.log(`${summary.validCount}/${summary.totalCount} valid, GC ${summary.avgGcContent}`);
 * ```
 */
export function summarize(
  records: readonly ValidatedRecord[],
  options: SummarizeOptions = {}
): DatasetSummary {
  const validationResult = SummarizeOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(`Invalid statistics options: ${validationResult.summary}`);
  }

  if (records.length === 0 && options.requireRecords === true) {
    throw new EmptyDatasetError();
  }

  const accumulator = new DatasetStatsAccumulator(options.topLimit ?? TOP_LONGEST_LIMIT);
  accumulator.addMany(records);
  return accumulator.getSummary();
}
