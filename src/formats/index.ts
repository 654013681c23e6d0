/**
 * Central format module exports
 *
 * Provides a single import point for the parsers, the FASTA writer and
 * content-based format detection, plus `SequenceParser`, which picks the
 * right parser for a piece of text.
 *
 * @example
 * ```typescript
 * import { parseSequences } from "../formats";
 *
 * const records = parseSequences(">seq1\nACGT\n>seq2\nGGCC\n");
 * ```
 */

import type { ParserOptions, RawRecord, SequenceFormat } from "../types";
import type { AbstractParser } from "./abstract-parser";
import { detectFormat } from "./detection";
import { FastaParser } from "./fasta";
import { FastqParser } from "./fastq";

export { AbstractParser, DEFAULT_MAX_LINE_LENGTH, splitLines } from "./abstract-parser";
export type { ResolvedParserOptions } from "./abstract-parser";
export { detectFormat, FASTA_MARKER, FASTQ_MARKER, sniffFormat } from "./detection";
export { FastaParser, FastaWriter } from "./fasta";
export type { FastaEntry, FastaWriterOptions } from "./fasta";
export { FASTQ_LINES_PER_RECORD, FASTQ_SEPARATOR, FastqParser } from "./fastq";

/**
 * Records parsed from one input, with the format they were read as
 */
export interface ParsedInput {
  /** null when the input had no non-blank line */
  readonly format: SequenceFormat | null;
  readonly records: readonly RawRecord[];
}

/**
 * Create the parser for a known format
 */
export function createParser(format: SequenceFormat, options: ParserOptions = {}): AbstractParser {
  switch (format) {
    case "fasta":
      return new FastaParser(options);
    case "fastq":
      return new FastqParser(options);
  }
}

/**
 * Format-detecting parser for FASTA or FASTQ text
 *
 * @example
 * ```typescript
 * const parser = new SequenceParser({ trackLineNumbers: false });
 * const { format, records } = parser.parseWithFormat(text);
 * ```
 */
export class SequenceParser {
  constructor(private readonly options: ParserOptions = {}) {}

  /**
   * Parse text into raw records in file order
   * @throws {FormatError} When the first non-blank line starts with neither `>` nor `@`
   */
  parse(data: string): RawRecord[] {
    return [...this.parseWithFormat(data).records];
  }

  /**
   * Parse text and report the detected format alongside the records
   * @throws {FormatError} When the first non-blank line starts with neither `>` nor `@`
   */
  parseWithFormat(data: string): ParsedInput {
    const format = detectFormat(data);
    if (format === null) {
      return { format: null, records: [] };
    }
    return { format, records: createParser(format, this.options).parseAll(data) };
  }
}

/**
 * Parse FASTA or FASTQ text, detecting the format from content
 */
export function parseSequences(data: string, options: ParserOptions = {}): RawRecord[] {
  return new SequenceParser(options).parse(data);
}
