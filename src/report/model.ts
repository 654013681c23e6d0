/**
 * Report model assembled from a dataset summary and its validated records
 *
 * The model is plain data. Exporters in this directory turn it into JSON or
 * CSV text; nothing here touches the file system.
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type { DatasetSummary, SequenceFormat, ValidatedRecord } from "../types";

/** Version stamped into every report */
export const TOOL_VERSION = "0.1.0";

export interface ReportMetadata {
  /** ISO-8601 timestamp */
  readonly generatedAt: string;
  readonly toolVersion: string;
  readonly format?: SequenceFormat;
  readonly totalSequences: number;
}

export interface ReportModel {
  readonly metadata: ReportMetadata;
  readonly summary: DatasetSummary;
  readonly records: readonly ValidatedRecord[];
}

export interface BuildReportOptions {
  /** Defaults to the current time */
  generatedAt?: Date;
  /** Input format, when known */
  format?: SequenceFormat;
}

const BuildReportOptionsSchema = type({
  "generatedAt?": "Date",
  "format?": "'fasta' | 'fastq'",
});

/**
 * Assemble a report from a summary and the records it was computed from
 *
 * @throws {ValidationError} When options are invalid
 *
 * @example
 * ```typescript
 * const report = buildReport(summarize(validated), validated, { format: "fasta" });
 * ```
 */
export function buildReport(
  summary: DatasetSummary,
  records: readonly ValidatedRecord[],
  options: BuildReportOptions = {}
): ReportModel {
  const validationResult = BuildReportOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(`Invalid report options: ${validationResult.summary}`);
  }

  const generatedAt = options.generatedAt ?? new Date();
  if (Number.isNaN(generatedAt.getTime())) {
    throw new ValidationError("Invalid report options: generatedAt must be a valid date");
  }

  return {
    metadata: {
      generatedAt: generatedAt.toISOString(),
      toolVersion: TOOL_VERSION,
      ...(options.format !== undefined && { format: options.format }),
      totalSequences: records.length,
    },
    summary,
    records,
  };
}
