/**
 * JSON report exporter
 *
 * Field names are snake_case: `original_sequence`, `is_valid` and so on.
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type { DatasetSummary, ErrorCode, RankedRecord, ValidatedRecord, WarningCode } from "../types";
import type { ReportModel } from "./model";

export interface JsonReportOptions {
  /** Spaces per indentation level, 0 for a single line */
  indent?: number;
}

const JsonReportOptionsSchema = type({
  "indent?": "number.integer>=0",
}).narrow((options, ctx) => {
  if (options.indent !== undefined && options.indent > 10) {
    return ctx.reject({ expected: "indent <= 10", actual: String(options.indent), path: ["indent"] });
  }
  return true;
});

export interface JsonRecord {
  readonly index: number;
  readonly header: string;
  readonly original_sequence: string;
  readonly final_sequence: string;
  readonly quality?: string;
  readonly is_valid: boolean;
  readonly errors: readonly ErrorCode[];
  readonly warnings: readonly WarningCode[];
  readonly length: number;
  readonly gc_content: number;
  readonly invalid_char_count: number;
  readonly sanitized: boolean;
}

export interface JsonRankedRecord {
  readonly rank: number;
  readonly index: number;
  readonly header: string;
  readonly length: number;
  readonly gc_content: number;
}

export interface JsonSummary {
  readonly total_count: number;
  readonly valid_count: number;
  readonly invalid_count: number;
  readonly avg_gc_content: number;
  readonly min_length: number;
  readonly max_length: number;
  readonly avg_length: number;
  readonly total_bases: number;
  readonly error_histogram: Readonly<Record<ErrorCode, number>>;
  readonly warning_histogram: Readonly<Record<WarningCode, number>>;
  readonly top_longest: readonly JsonRankedRecord[];
  readonly length_distribution: DatasetSummary["lengthDistribution"];
  readonly gc_distribution: DatasetSummary["gcDistribution"];
  readonly sanitized_count: number;
  readonly duplicate_header_count: number;
  readonly validity_percentage: number;
  readonly sanitization_rate: number;
  readonly quality_tiers: DatasetSummary["qualityTiers"];
  readonly error_analysis: {
    readonly total_errors: number;
    readonly most_common_error: ErrorCode | null;
    readonly most_common_count: number;
  };
}

export interface JsonReport {
  readonly metadata: {
    readonly generated_at: string;
    readonly tool_version: string;
    readonly format?: string;
    readonly total_sequences: number;
  };
  readonly summary: JsonSummary;
  readonly records: readonly JsonRecord[];
}

function toJsonRecord(record: ValidatedRecord): JsonRecord {
  return {
    index: record.index,
    header: record.header,
    original_sequence: record.originalSequence,
    final_sequence: record.finalSequence,
    ...(record.quality !== undefined && { quality: record.quality }),
    is_valid: record.isValid,
    errors: record.errors,
    warnings: record.warnings,
    length: record.length,
    gc_content: record.gcContent,
    invalid_char_count: record.invalidCharCount,
    sanitized: record.sanitized,
  };
}

function toJsonRanked(entry: RankedRecord): JsonRankedRecord {
  return {
    rank: entry.rank,
    index: entry.index,
    header: entry.header,
    length: entry.length,
    gc_content: entry.gcContent,
  };
}

function toJsonSummary(summary: DatasetSummary): JsonSummary {
  return {
    total_count: summary.totalCount,
    valid_count: summary.validCount,
    invalid_count: summary.invalidCount,
    avg_gc_content: summary.avgGcContent,
    min_length: summary.minLength,
    max_length: summary.maxLength,
    avg_length: summary.avgLength,
    total_bases: summary.totalBases,
    error_histogram: summary.errorHistogram,
    warning_histogram: summary.warningHistogram,
    top_longest: summary.topLongest.map(toJsonRanked),
    length_distribution: summary.lengthDistribution,
    gc_distribution: summary.gcDistribution,
    sanitized_count: summary.sanitizedCount,
    duplicate_header_count: summary.duplicateHeaderCount,
    validity_percentage: summary.validityPercentage,
    sanitization_rate: summary.sanitizationRate,
    quality_tiers: summary.qualityTiers,
    error_analysis: {
      total_errors: summary.errorAnalysis.totalErrors,
      most_common_error: summary.errorAnalysis.mostCommonError,
      most_common_count: summary.errorAnalysis.mostCommonCount,
    },
  };
}

/**
 * Convert a report model to its snake_case JSON document
 */
export function toJsonDocument(report: ReportModel): JsonReport {
  const { metadata } = report;
  return {
    metadata: {
      generated_at: metadata.generatedAt,
      tool_version: metadata.toolVersion,
      ...(metadata.format !== undefined && { format: metadata.format }),
      total_sequences: metadata.totalSequences,
    },
    summary: toJsonSummary(report.summary),
    records: report.records.map(toJsonRecord),
  };
}

/**
 * Serialize a report model to JSON text
 *
 * @throws {ValidationError} When options are invalid
 *
 * @example
 * ```typescript
 * const text = toJsonReport(report, { indent: 0 });
 * ```
 */
export function toJsonReport(report: ReportModel, options: JsonReportOptions = {}): string {
  const validationResult = JsonReportOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(`Invalid JSON report options: ${validationResult.summary}`);
  }

  return JSON.stringify(toJsonDocument(report), null, options.indent ?? 2);
}
