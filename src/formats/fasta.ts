/**
 * FASTA format parser and writer
 *
 * Handles the usual variation in real FASTA files:
 * - Wrapped and unwrapped sequences
 * - Blank lines between records
 * - CRLF line endings and stray surrounding whitespace
 * - Header lines with no sequence underneath
 */

import { type } from "arktype";
import { FormatError, ValidationError } from "../errors";
import type { RawRecord, ValidatedRecord } from "../types";
import { AbstractParser } from "./abstract-parser";
import { FASTA_MARKER } from "./detection";

/**
 * FASTA parser
 *
 * A header line begins a record; every following line up to the next header
 * is trimmed and appended to the sequence. A header without sequence lines
 * still produces a record, with an empty sequence.
 *
 * @example
 * ```typescript
 * const parser = new FastaParser();
 * for (const record of parser.parseString(">seq1\nACGT\nACGT\n")) {
 *   console.log(`${record.header}: ${record.sequence.length} bp`);
 * }
 * ```
 */
export class FastaParser extends AbstractParser {
  protected getFormatName(): string {
    return "FASTA";
  }

  *parseLines(lines: Iterable<string>, startLineNumber = 1): Generator<RawRecord> {
    if (!Number.isInteger(startLineNumber) || startLineNumber < 1) {
      throw new ValidationError("startLineNumber must be a positive integer");
    }

    let header: string | null = null;
    let headerLineNumber = startLineNumber;
    let sequenceBuffer: string[] = [];
    let lineNumber = startLineNumber - 1;

    for (const rawLine of lines) {
      lineNumber++;
      this.checkLineLength(rawLine, lineNumber);

      const line = rawLine.trim();
      if (line === "") continue;

      if (line.startsWith(FASTA_MARKER)) {
        if (header !== null) {
          yield this.buildRecord(header, sequenceBuffer.join(""), headerLineNumber);
        }
        header = line.slice(FASTA_MARKER.length).trim();
        headerLineNumber = lineNumber;
        sequenceBuffer = [];
        continue;
      }

      if (header === null) {
        throw new FormatError(
          `Sequence data found before the first FASTA header: "${line.slice(0, 40)}"`,
          this.getFormatName(),
          lineNumber
        );
      }
      sequenceBuffer.push(line);
    }

    if (header !== null) {
      yield this.buildRecord(header, sequenceBuffer.join(""), headerLineNumber);
    }
  }
}

/**
 * Options for the cleaned-sequence FASTA export
 */
export interface FastaWriterOptions {
  /** Wrap width for sequence lines; 0 disables wrapping */
  lineWidth?: number;
  lineEnding?: string;
}

const FastaWriterOptionsSchema = type({
  "lineWidth?": "number.integer>=0",
  "lineEnding?": "string",
}).narrow((options, ctx) => {
  if (options.lineEnding !== undefined && options.lineEnding !== "\n" && options.lineEnding !== "\r\n") {
    return ctx.reject({
      expected: "LF or CRLF line ending",
      actual: JSON.stringify(options.lineEnding),
      path: ["lineEnding"],
    });
  }
  return true;
});

/**
 * Anything that can be written as a cleaned FASTA entry
 */
export type FastaEntry = Pick<ValidatedRecord, "header" | "finalSequence">;

/**
 * FASTA writer for cleaned sequence export
 *
 * Emits `header` and `finalSequence` of each record. Records whose final
 * sequence is empty are skipped.
 */
export class FastaWriter {
  private readonly lineWidth: number;
  private readonly lineEnding: string;

  constructor(options: FastaWriterOptions = {}) {
    const validation = FastaWriterOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid FASTA writer options: ${validation.summary}`);
    }

    this.lineWidth = options.lineWidth ?? 60;
    this.lineEnding = options.lineEnding ?? "\n";
  }

  /**
   * Format a single entry, without a trailing line ending
   */
  formatEntry(entry: FastaEntry): string {
    const wrappedSequence = this.wrapText(entry.finalSequence, this.lineWidth);
    return `${FASTA_MARKER}${entry.header}${this.lineEnding}${wrappedSequence}`;
  }

  /**
   * Format validated records as FASTA text, one line ending after each entry
   *
   * @param options.onlySanitized - Emit only records that sanitization changed
   */
  formatRecords(
    records: readonly ValidatedRecord[],
    options: { onlySanitized?: boolean } = {}
  ): string {
    const selected = records.filter(
      (record) => record.finalSequence.length > 0 && (options.onlySanitized !== true || record.sanitized)
    );
    return selected.map((record) => this.formatEntry(record) + this.lineEnding).join("");
  }

  private wrapText(text: string, width: number): string {
    if (width <= 0) return text;

    const lines: string[] = [];
    for (let i = 0; i < text.length; i += width) {
      lines.push(text.slice(i, i + width));
    }
    return lines.join(this.lineEnding);
  }
}
