/**
 * Content-based format detection
 *
 * The file extension is never consulted: the first non-blank line decides.
 *
 * @module formats/detection
 */

import { FormatError } from "../errors";
import type { SequenceFormat } from "../types";
import { splitLines } from "./abstract-parser";

/** Record start markers */
export const FASTA_MARKER = ">";
export const FASTQ_MARKER = "@";

interface ContentLine {
  readonly text: string;
  readonly lineNumber: number;
}

function firstContentLine(data: string): ContentLine | null {
  const lines = splitLines(data);
  for (let i = 0; i < lines.length; i++) {
    const text = (lines[i] ?? "").trim();
    if (text !== "") {
      return { text, lineNumber: i + 1 };
    }
  }
  return null;
}

/**
 * Detect whether text is FASTA or FASTQ
 *
 * @returns The detected format, or null when the text has no non-blank line
 * @throws {FormatError} When the first non-blank line starts with neither `>` nor `@`
 *
 * @example
 * ```typescript
 * detectFormat(">seq1\nACGT\n"); // "fasta"
 * detectFormat("\n\n");          // null
 * ```
 */
export function detectFormat(data: string): SequenceFormat | null {
  const first = firstContentLine(data);
  if (first === null) {
    return null;
  }
  if (first.text.startsWith(FASTA_MARKER)) {
    return "fasta";
  }
  if (first.text.startsWith(FASTQ_MARKER)) {
    return "fastq";
  }
  throw FormatError.forUnknownMarker(first.text, first.lineNumber);
}

/**
 * Non-throwing variant of {@link detectFormat} for display purposes
 */
export function sniffFormat(data: string): SequenceFormat | "unknown" {
  try {
    return detectFormat(data) ?? "unknown";
  } catch (error) {
    if (error instanceof FormatError) {
      return "unknown";
    }
    throw error;
  }
}
