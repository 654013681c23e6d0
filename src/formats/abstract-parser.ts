/**
 * Abstract base parser with shared option handling
 *
 * Gives the FASTA and FASTQ parsers one way to validate and default their
 * options, split text into lines and build records. Each format keeps its
 * own line grouping logic.
 */

import { type } from "arktype";
import { FormatError, ValidationError } from "../errors";
import type { ParserOptions, RawRecord } from "../types";
import { ParserOptionsSchema } from "../types";

/** One million characters */
export const DEFAULT_MAX_LINE_LENGTH = 1_000_000;

/**
 * Parser options with every default applied
 */
export interface ResolvedParserOptions {
  readonly trackLineNumbers: boolean;
  readonly maxLineLength: number;
  readonly onWarning: (warning: string, lineNumber?: number) => void;
}

/**
 * Split text into lines on LF or CRLF
 */
export function splitLines(data: string): string[] {
  return data.split(/\r?\n/);
}

/**
 * Abstract parser base class
 *
 * Parsing is synchronous: `parseLines` is a generator over any iterable of
 * lines, so callers holding a whole file use `parseString` and callers reading
 * incrementally can feed lines as they arrive.
 */
export abstract class AbstractParser {
  protected readonly options: ResolvedParserOptions;

  constructor(options: ParserOptions = {}) {
    const validationResult = ParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(
        `Invalid ${this.getFormatName()} parser options: ${validationResult.summary}`,
        undefined,
        "Parser configuration"
      );
    }

    this.options = {
      trackLineNumbers: options.trackLineNumbers ?? true,
      maxLineLength: options.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH,
      onWarning:
        options.onWarning ??
        ((warning: string, lineNumber?: number): void => {
          console.warn(`${this.getFormatName()} Warning (line ${lineNumber}): ${warning}`);
        }),
    };
  }

  /**
   * Parse records from an iterable of lines
   * @param lines - Lines without their line terminators
   * @param startLineNumber - Line number of the first line, for error reporting
   */
  abstract parseLines(lines: Iterable<string>, startLineNumber?: number): Generator<RawRecord>;

  /**
   * Format name for error messages and warnings
   */
  protected abstract getFormatName(): string;

  /**
   * Parse records from a complete string
   */
  *parseString(data: string): Generator<RawRecord> {
    yield* this.parseLines(splitLines(data));
  }

  /**
   * Parse every record of a complete string into an array, in input order
   */
  parseAll(data: string): RawRecord[] {
    return Array.from(this.parseString(data));
  }

  protected checkLineLength(line: string, lineNumber: number): void {
    if (line.length > this.options.maxLineLength) {
      throw new FormatError(
        `Line too long (${line.length} > ${this.options.maxLineLength})`,
        this.getFormatName(),
        lineNumber
      );
    }
  }

  protected buildRecord(
    header: string,
    sequence: string,
    lineNumber: number,
    quality?: string
  ): RawRecord {
    return {
      header,
      sequence,
      ...(quality !== undefined && { quality }),
      ...(this.options.trackLineNumbers && { lineNumber }),
    };
  }
}
