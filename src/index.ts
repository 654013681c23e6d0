/**
 * seqsieve - FASTA/FASTQ ingestion, validation and dataset statistics
 *
 * Parses sequence text, checks every record against a fixed rule set,
 * optionally sanitizes sequences, and summarizes the dataset into a report
 * that can be exported as JSON, CSV or cleaned FASTA.
 */

// Error types
export {
  EmptyDatasetError,
  ERROR_SUGGESTIONS,
  FormatError,
  getErrorSuggestion,
  ParseError,
  SeqsieveError,
  ValidationError,
} from "./errors";
// Parsing, detection and FASTA output
export {
  AbstractParser,
  createParser,
  DEFAULT_MAX_LINE_LENGTH,
  detectFormat,
  FASTA_MARKER,
  FastaParser,
  FastaWriter,
  FASTQ_LINES_PER_RECORD,
  FASTQ_MARKER,
  FASTQ_SEPARATOR,
  FastqParser,
  parseSequences,
  SequenceParser,
  sniffFormat,
  splitLines,
} from "./formats";
export type { FastaEntry, FastaWriterOptions, ParsedInput, ResolvedParserOptions } from "./formats";
// Sequence calculations
export {
  ALLOWED_BASES,
  type BaseComposition,
  baseComposition,
  countInvalidBases,
  gcFraction,
  isAllowedBase,
  UNKNOWN_BASE,
} from "./operations/core/calculations";
export {
  DEFAULT_LOW_COMPLEXITY,
  dominantFraction,
  isLowComplexity,
  repeatCoverage,
} from "./operations/core/complexity";
// Sanitization, validation and statistics
export { sanitize, upperCaseBases } from "./operations/sanitize";
export {
  DatasetStatsAccumulator,
  lowerPercentile,
  rankLongest,
  type SummarizeOptions,
  summarize,
  TOP_LONGEST_LIMIT,
} from "./operations/stats";
export {
  DEFAULT_MIN_LENGTH,
  DEFAULT_VALIDATION_CONFIG,
  filterValid,
  resolveValidationConfig,
  ValidationEngine,
  validateRecords,
} from "./operations/validate";
// Pipeline
export { type AnalysisOptions, type AnalysisResult, analyzeSequences } from "./pipeline";
// Reports
export * from "./report";
// Core types
export type {
  DatasetSummary,
  ErrorAnalysis,
  GcDistribution,
  LengthDistribution,
  LowComplexityThresholds,
  ParserOptions,
  QualityTiers,
  RankedRecord,
  RawRecord,
  ResolvedValidationConfig,
  SequenceFormat,
  ValidatedRecord,
  ValidationConfig,
} from "./types";
export {
  ERROR_CODES,
  ErrorCode,
  ParserOptionsSchema,
  ValidationConfigSchema,
  WARNING_CODES,
  WarningCode,
} from "./types";

export { TOOL_VERSION as VERSION } from "./report/model";
