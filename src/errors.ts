/**
 * Error handling for sequence ingestion
 *
 * Fatal problems (unreadable input, bad options) are thrown as errors from
 * this module. Problems with individual records are never thrown: they are
 * recorded as `ErrorCode`s on the validated record.
 */

/**
 * Base error class for all seqsieve errors
 */
export class SeqsieveError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "SeqsieveError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Invalid options or configuration handed to a parser, engine or exporter
 */
export class ValidationError extends SeqsieveError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends SeqsieveError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * Input that is not recognizable as FASTA or FASTQ, or a FASTQ block whose
 * structure is broken. Aborts the whole parse call.
 */
export class FormatError extends ParseError {
  constructor(message: string, format: string, lineNumber?: number, context?: string) {
    super(message, format, lineNumber, context);
    this.name = "FormatError";
  }

  /**
   * Error for a first non-blank line that starts with neither marker
   */
  static forUnknownMarker(line: string, lineNumber: number): FormatError {
    const preview = line.length > 40 ? `${line.slice(0, 40)}...` : line;
    return new FormatError(
      `Unrecognized sequence format: first line must start with ">" (FASTA) or "@" (FASTQ), found "${preview}"`,
      "unknown",
      lineNumber,
      ERROR_SUGGESTIONS.UNKNOWN_FORMAT
    );
  }
}

/**
 * Raised by the statistics aggregator when the caller requires a non-empty
 * dataset and receives none
 */
export class EmptyDatasetError extends SeqsieveError {
  constructor(message = "Cannot summarize an empty dataset") {
    super(message, "EMPTY_DATASET", undefined, ERROR_SUGGESTIONS.EMPTY_DATASET);
    this.name = "EmptyDatasetError";
  }
}

/**
 * Common error patterns with helpful suggestions
 */
export const ERROR_SUGGESTIONS = {
  UNKNOWN_FORMAT: "First line must start with > (FASTA) or @ (FASTQ)",
  INVALID_FASTQ_HEADER: 'FASTQ records must start with "@" followed by an identifier',
  INVALID_FASTQ_SEPARATOR: 'The third line of every FASTQ record must start with "+"',
  LINE_TOO_LONG: "Check that the file uses line breaks and is not binary data",
  EMPTY_DATASET: "Check that the input contains at least one record",
  INVALID_OPTIONS: "Check option names and value ranges",
} as const;

/**
 * Get helpful suggestion for common error patterns
 */
export function getErrorSuggestion(error: SeqsieveError): string {
  if (error instanceof EmptyDatasetError) {
    return ERROR_SUGGESTIONS.EMPTY_DATASET;
  }
  if (error instanceof ValidationError) {
    return ERROR_SUGGESTIONS.INVALID_OPTIONS;
  }

  const message = error.message.toLowerCase();

  if (message.includes("separator")) {
    return ERROR_SUGGESTIONS.INVALID_FASTQ_SEPARATOR;
  }
  if (message.includes("fastq") && message.includes("header")) {
    return ERROR_SUGGESTIONS.INVALID_FASTQ_HEADER;
  }
  if (message.includes("line too long")) {
    return ERROR_SUGGESTIONS.LINE_TOO_LONG;
  }

  return ERROR_SUGGESTIONS.UNKNOWN_FORMAT;
}
