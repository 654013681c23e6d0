/**
 * CSV report exporter
 *
 * Layout:
 * - a header row and one row per record
 * - a blank line
 * - a `metric,value` block with the dataset summary
 *
 * Fields are quoted per RFC 4180 when they contain the delimiter, a quote or
 * a line break; embedded quotes are doubled.
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type { DatasetSummary, ValidatedRecord } from "../types";
import { ERROR_CODES, WARNING_CODES } from "../types";
import type { ReportModel } from "./model";

// =============================================================================
// CONSTANTS
// =============================================================================

export const CSV_RECORD_COLUMNS = [
  "index",
  "header",
  "length",
  "gc_content",
  "invalid_char_count",
  "is_valid",
  "errors",
  "warnings",
] as const;

/** Separator for the error and warning lists inside one cell */
export const CSV_LIST_SEPARATOR = ";";

const DELIMITER = ",";
const QUOTE = '"';

/**
 * Names Excel silently turns into dates (SEPT1 -> 1-Sep)
 */
const EXCEL_DATE_PATTERNS = [
  /^(JAN|FEB|MAR|APR|MAY|JUN|JUL|AUG|SEP|SEPT|OCT|NOV|DEC)\d+$/i,
  /^(JANUARY|FEBRUARY|MARCH|APRIL|MAY|JUNE|JULY|AUGUST|SEPTEMBER|OCTOBER|NOVEMBER|DECEMBER)\d+$/i,
] as const;

// =============================================================================
// OPTIONS
// =============================================================================

export interface CsvReportOptions {
  /** Guard header cells against Excel's conversions and formula evaluation */
  excelCompatible?: boolean;
  lineEnding?: string;
  /** Append the `metric,value` block (default true) */
  includeSummary?: boolean;
  /** Decimal places kept for fractional numbers (default 4) */
  precision?: number;
}

const CsvReportOptionsSchema = type({
  "excelCompatible?": "boolean",
  "lineEnding?": "string",
  "includeSummary?": "boolean",
  "precision?": "number.integer>=0",
}).narrow((options, ctx) => {
  if (
    options.lineEnding !== undefined &&
    options.lineEnding !== "\n" &&
    options.lineEnding !== "\r\n"
  ) {
    return ctx.reject({
      expected: "a newline or CRLF line ending",
      actual: JSON.stringify(options.lineEnding),
      path: ["lineEnding"],
    });
  }
  if (options.precision !== undefined && options.precision > 15) {
    return ctx.reject({
      expected: "precision <= 15",
      actual: String(options.precision),
      path: ["precision"],
    });
  }
  return true;
});

type CsvValue = string | number | boolean | null;

// =============================================================================
// EXCEL PROTECTION
// =============================================================================

/**
 * Check whether Excel would rewrite a cell on import
 *
 * Catches date-like names, leading zeros and long digit runs.
 */
export function needsExcelQuoting(field: string): boolean {
  for (const pattern of EXCEL_DATE_PATTERNS) {
    if (pattern.test(field)) {
      return true;
    }
  }
  if (/^0+[0-9A-Za-z]/.test(field)) return true;
  if (/^\d{16,}$/.test(field)) return true;
  return false;
}

/**
 * Check whether a spreadsheet would evaluate a cell as a formula
 */
export function looksLikeFormula(field: string): boolean {
  return /^[=+\-@\t\r]/.test(field);
}

// =============================================================================
// WRITER
// =============================================================================

/**
 * Serializes report models to CSV text
 *
 * @example
 * ```typescript
 * const writer = new CsvReportWriter({ excelCompatible: true });
 * const csv = writer.format(report);
 * ```
 */
export class CsvReportWriter {
  private readonly excelCompatible: boolean;
  private readonly lineEnding: string;
  private readonly includeSummary: boolean;
  private readonly precision: number;

  constructor(options: CsvReportOptions = {}) {
    const validation = CsvReportOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid CSV report options: ${validation.summary}`);
    }

    this.excelCompatible = options.excelCompatible ?? false;
    this.lineEnding = options.lineEnding ?? "\n";
    this.includeSummary = options.includeSummary ?? true;
    this.precision = options.precision ?? 4;
  }

  /**
   * Format a single field with RFC 4180 quoting
   */
  private formatField(value: CsvValue, protect = false): string {
    if (value === null) return "";

    let field = typeof value === "number" ? this.formatNumber(value) : String(value);
    let forceQuote = false;

    if (protect && this.excelCompatible) {
      if (looksLikeFormula(field)) {
        field = `'${field}`;
        forceQuote = true;
      } else if (needsExcelQuoting(field)) {
        forceQuote = true;
      }
    }

    const needsQuoting =
      forceQuote ||
      field.includes(DELIMITER) ||
      field.includes(QUOTE) ||
      field.includes("\n") ||
      field.includes("\r");

    if (needsQuoting) {
      return QUOTE + field.replaceAll(QUOTE, QUOTE + QUOTE) + QUOTE;
    }
    return field;
  }

  private formatNumber(value: number): string {
    if (Number.isInteger(value)) {
      return String(value);
    }
    return String(Number(value.toFixed(this.precision)));
  }

  /**
   * Format a row of fields
   */
  formatRow(fields: readonly CsvValue[]): string {
    return fields.map((field) => this.formatField(field)).join(DELIMITER);
  }

  /**
   * Format one validated record as a data row
   */
  formatRecord(record: ValidatedRecord): string {
    return [
      this.formatField(record.index),
      this.formatField(record.header, true),
      this.formatField(record.length),
      this.formatField(record.gcContent),
      this.formatField(record.invalidCharCount),
      this.formatField(record.isValid),
      this.formatField(record.errors.join(CSV_LIST_SEPARATOR)),
      this.formatField(record.warnings.join(CSV_LIST_SEPARATOR)),
    ].join(DELIMITER);
  }

  /**
   * Summary metrics as `[name, value]` pairs, in output order
   */
  summaryRows(summary: DatasetSummary): Array<[string, CsvValue]> {
    const rows: Array<[string, CsvValue]> = [
      ["total_count", summary.totalCount],
      ["valid_count", summary.validCount],
      ["invalid_count", summary.invalidCount],
      ["avg_gc_content", summary.avgGcContent],
      ["min_length", summary.minLength],
      ["max_length", summary.maxLength],
      ["avg_length", summary.avgLength],
      ["total_bases", summary.totalBases],
      ["median_length", summary.lengthDistribution.median],
      ["q1_length", summary.lengthDistribution.q1],
      ["q3_length", summary.lengthDistribution.q3],
      ["sanitized_count", summary.sanitizedCount],
      ["duplicate_header_count", summary.duplicateHeaderCount],
      ["validity_percentage", summary.validityPercentage],
      ["sanitization_rate", summary.sanitizationRate],
    ];

    for (const code of ERROR_CODES) {
      rows.push([`errors.${code}`, summary.errorHistogram[code]]);
    }
    for (const code of WARNING_CODES) {
      rows.push([`warnings.${code}`, summary.warningHistogram[code]]);
    }

    rows.push(
      ["total_errors", summary.errorAnalysis.totalErrors],
      ["most_common_error", summary.errorAnalysis.mostCommonError]
    );
    return rows;
  }

  /**
   * Format a complete report
   */
  format(report: ReportModel): string {
    const lines: string[] = [this.formatRow(CSV_RECORD_COLUMNS)];
    for (const record of report.records) {
      lines.push(this.formatRecord(record));
    }

    if (this.includeSummary) {
      lines.push("", this.formatRow(["metric", "value"]));
      for (const [name, value] of this.summaryRows(report.summary)) {
        lines.push(this.formatRow([name, value]));
      }
    }

    return lines.join(this.lineEnding) + this.lineEnding;
  }
}

/**
 * Serialize a report model to CSV text
 *
 * @throws {ValidationError} When options are invalid
 */
export function toCsvReport(report: ReportModel, options: CsvReportOptions = {}): string {
  return new CsvReportWriter(options).format(report);
}
