/**
 * Tests for content-based format detection and the format-detecting parser
 */

import { describe, expect, test } from "vitest";
import { ERROR_SUGGESTIONS, FormatError } from "../../src/errors";
import { parseSequences, SequenceParser } from "../../src/formats";
import { detectFormat, sniffFormat } from "../../src/formats/detection";

describe("detectFormat", () => {
  test("should detect FASTA and FASTQ from the first non-blank line", () => {
    expect(detectFormat(">a\nAC")).toBe("fasta");
    expect(detectFormat("\n\n  @r\nAC\n+\nII")).toBe("fastq");
  });

  test("should return null for text without content", () => {
    expect(detectFormat("")).toBeNull();
    expect(detectFormat("  \n\t\n")).toBeNull();
  });

  test("should name the offending line for unknown formats", () => {
    try {
      detectFormat("\n\nhello\n>a");
      expect.unreachable("should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(FormatError);
      if (error instanceof FormatError) {
        expect(error.message).toBe(
          'Unrecognized sequence format: first line must start with ">" (FASTA) or "@" (FASTQ), found "hello"'
        );
        expect(error.lineNumber).toBe(3);
        expect(error.format).toBe("unknown");
        expect(error.context).toBe(ERROR_SUGGESTIONS.UNKNOWN_FORMAT);
      }
    }
  });

  test("should shorten long offending lines", () => {
    expect(() => detectFormat("X".repeat(50))).toThrow(`found "${"X".repeat(40)}..."`);
  });
});

describe("sniffFormat", () => {
  test("should report unknown instead of throwing", () => {
    expect(sniffFormat("xyz")).toBe("unknown");
    expect(sniffFormat("")).toBe("unknown");
    expect(sniffFormat("@r")).toBe("fastq");
    expect(sniffFormat(">a")).toBe("fasta");
  });
});

describe("SequenceParser", () => {
  test("should parse FASTQ text with its detected format", () => {
    const parsed = new SequenceParser().parseWithFormat("@r\nA\n+\nI");

    expect(parsed).toEqual({
      format: "fastq",
      records: [{ header: "r", sequence: "A", quality: "I", lineNumber: 1 }],
    });
  });

  test("should return no records for empty input", () => {
    expect(parseSequences("")).toEqual([]);
    expect(new SequenceParser().parseWithFormat("\n")).toEqual({ format: null, records: [] });
  });

  test("should return N records in file order for N FASTA entries", () => {
    const text = Array.from({ length: 25 }, (_, i) => `>seq${i}\nACGT`).join("\n");
    const records = parseSequences(text);

    expect(records).toHaveLength(25);
    expect(records.map((record) => record.header)).toEqual(
      Array.from({ length: 25 }, (_, i) => `seq${i}`)
    );
  });

  test("should throw FormatError for unrecognized text", () => {
    expect(() => parseSequences("ACGT\n")).toThrow(FormatError);
  });
});
