/**
 * FASTQ format parser
 *
 * Reads the fixed four-line layout: `@header`, sequence, `+separator`,
 * quality. The quality string is kept as-is; its length is not compared with
 * the sequence and its encoding is not interpreted.
 *
 * @module formats/fastq
 */

import { FormatError, ValidationError } from "../errors";
import type { RawRecord } from "../types";
import { AbstractParser } from "./abstract-parser";
import { FASTQ_MARKER } from "./detection";

/** Lines per FASTQ record */
export const FASTQ_LINES_PER_RECORD = 4;

export const FASTQ_SEPARATOR = "+";

interface NumberedLine {
  readonly text: string;
  readonly lineNumber: number;
}

/**
 * FASTQ parser
 *
 * Blank lines between records are skipped. Once a header line is found the
 * next three lines belong to the record whether blank or not, so an empty
 * sequence line yields a record with an empty sequence. A trailing group of
 * fewer than four lines is not a record: it is dropped and reported through
 * `onWarning`.
 *
 * @example
 * ```typescript
 * const parser = new FastqParser({
 *   onWarning: (warning, line) => log.push(`${line}: ${warning}`),
 * });
 * const records = parser.parseAll("@read1\nACGT\n+\nIIII\n");
 * ```
 */
export class FastqParser extends AbstractParser {
  protected getFormatName(): string {
    return "FASTQ";
  }

  *parseLines(lines: Iterable<string>, startLineNumber = 1): Generator<RawRecord> {
    if (!Number.isInteger(startLineNumber) || startLineNumber < 1) {
      throw new ValidationError("startLineNumber must be a positive integer");
    }

    let block: NumberedLine[] = [];
    let lineNumber = startLineNumber - 1;

    for (const rawLine of lines) {
      lineNumber++;
      this.checkLineLength(rawLine, lineNumber);

      const text = rawLine.trim();
      // Blank lines are skipped only between records
      if (text === "" && block.length === 0) continue;

      block.push({ text, lineNumber });
      if (block.length === FASTQ_LINES_PER_RECORD) {
        yield this.buildBlock(block);
        block = [];
      }
    }

    while (block.length > 0 && block[block.length - 1]?.text === "") {
      block.pop();
    }
    const leftover = block[0];
    if (leftover !== undefined) {
      this.options.onWarning(
        `Dropped truncated FASTQ record "${leftover.text}": expected ${FASTQ_LINES_PER_RECORD} lines, found ${block.length}`,
        leftover.lineNumber
      );
    }
  }

  private buildBlock(block: readonly NumberedLine[]): RawRecord {
    const [headerLine, sequenceLine, separatorLine, qualityLine] = block;
    if (
      headerLine === undefined ||
      sequenceLine === undefined ||
      separatorLine === undefined ||
      qualityLine === undefined
    ) {
      throw new FormatError(
        `Incomplete FASTQ record: expected ${FASTQ_LINES_PER_RECORD} lines, found ${block.length}`,
        this.getFormatName(),
        headerLine?.lineNumber
      );
    }

    if (!headerLine.text.startsWith(FASTQ_MARKER)) {
      throw new FormatError(
        `Invalid FASTQ header line: expected "${FASTQ_MARKER}", found "${headerLine.text.slice(0, 40)}"`,
        this.getFormatName(),
        headerLine.lineNumber
      );
    }
    if (!separatorLine.text.startsWith(FASTQ_SEPARATOR)) {
      throw new FormatError(
        `Invalid FASTQ separator line: expected "${FASTQ_SEPARATOR}", found "${separatorLine.text.slice(0, 40)}"`,
        this.getFormatName(),
        separatorLine.lineNumber
      );
    }

    return this.buildRecord(
      headerLine.text.slice(FASTQ_MARKER.length).trim(),
      sequenceLine.text,
      headerLine.lineNumber,
      qualityLine.text
    );
  }
}
