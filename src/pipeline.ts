/**
 * One-call analysis: parse, validate, summarize and build the report
 */

import { SequenceParser } from "./formats";
import { type SummarizeOptions, summarize } from "./operations/stats";
import { ValidationEngine } from "./operations/validate";
import { buildReport, type ReportModel } from "./report/model";
import type {
  DatasetSummary,
  ParserOptions,
  SequenceFormat,
  ValidatedRecord,
  ValidationConfig,
} from "./types";

export interface AnalysisOptions {
  parser?: ParserOptions;
  stats?: SummarizeOptions;
  /** Report timestamp, defaults to now */
  generatedAt?: Date;
}

export interface AnalysisResult {
  /** null when the input had no records */
  readonly format: SequenceFormat | null;
  readonly records: readonly ValidatedRecord[];
  readonly summary: DatasetSummary;
  readonly report: ReportModel;
}

/**
 * Run the full pipeline over FASTA or FASTQ text
 *
 * The validation config is checked before the text is parsed.
 *
 * @throws {ValidationError} When the config or options are invalid
 * @throws {FormatError} When the text is not FASTA or FASTQ
 * @throws {EmptyDatasetError} When `stats.requireRecords` is set and there are no records
 *
 * @example
 * ```typescript
 * const { summary, report } = analyzeSequences(text, { sanitize: true, minLength: 50 });
 * console.log(`${summary.validCount} of ${summary.totalCount} records passed`);
 * const json = toJsonReport(report);
 * ```
 */
export function analyzeSequences(
  text: string,
  config: ValidationConfig = {},
  options: AnalysisOptions = {}
): AnalysisResult {
  const engine = new ValidationEngine(config);
  const { format, records: rawRecords } = new SequenceParser(options.parser).parseWithFormat(text);

  const records = engine.validate(rawRecords);
  const summary = summarize(records, options.stats);
  const report = buildReport(summary, records, {
    ...(options.generatedAt !== undefined && { generatedAt: options.generatedAt }),
    ...(format !== null && { format }),
  });

  return { format, records, summary, report };
}
