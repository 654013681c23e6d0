/**
 * Tests for FASTA parsing and the cleaned-sequence writer
 */

import { describe, expect, test } from "vitest";
import { FormatError, ValidationError } from "../../src/errors";
import { FastaParser, FastaWriter } from "../../src/formats/fasta";
import { validateRecords } from "../../src/operations/validate";

describe("FastaParser", () => {
  const parser = new FastaParser();

  test("should parse simple FASTA sequence", () => {
    const records = parser.parseAll(">seq1\nACGT");

    expect(records).toEqual([{ header: "seq1", sequence: "ACGT", lineNumber: 1 }]);
  });

  test("should concatenate wrapped sequence lines and trim whitespace", () => {
    const records = parser.parseAll(">seq1 sample description\r\nACGT \r\n  ACGT\r\n");

    expect(records).toEqual([
      { header: "seq1 sample description", sequence: "ACGTACGT", lineNumber: 1 },
    ]);
  });

  test("should parse multiple records across blank lines in file order", () => {
    const records = parser.parseAll(">a\nAC\n\n>b\nGT\n");

    expect(records).toEqual([
      { header: "a", sequence: "AC", lineNumber: 1 },
      { header: "b", sequence: "GT", lineNumber: 4 },
    ]);
  });

  test("should trim whitespace after the header marker", () => {
    const records = parser.parseAll(">  spaced header  \nAC");

    expect(records[0]?.header).toBe("spaced header");
  });

  test("should keep a header without sequence lines as an empty record", () => {
    const records = parser.parseAll(">a\n>b\nACGT");

    expect(records).toEqual([
      { header: "a", sequence: "", lineNumber: 1 },
      { header: "b", sequence: "ACGT", lineNumber: 2 },
    ]);
  });

  test("should omit line numbers when tracking is disabled", () => {
    const records = new FastaParser({ trackLineNumbers: false }).parseAll(">a\nAC");

    expect(records[0]).toEqual({ header: "a", sequence: "AC" });
    expect(records[0]).not.toHaveProperty("lineNumber");
  });

  test("should parse lines fed incrementally from a given line number", () => {
    const records = Array.from(parser.parseLines([">x", "AC", "GT"], 10));

    expect(records).toEqual([{ header: "x", sequence: "ACGT", lineNumber: 10 }]);
  });

  test("should reject sequence data before the first header", () => {
    expect(() => parser.parseAll("ACGT\n>a\nAC")).toThrow(FormatError);

    try {
      parser.parseAll("\nACGT\n>a\nAC");
      expect.unreachable("should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(FormatError);
      if (error instanceof FormatError) {
        expect(error.lineNumber).toBe(2);
        expect(error.format).toBe("FASTA");
      }
    }
  });

  test("should reject lines longer than maxLineLength", () => {
    const strict = new FastaParser({ maxLineLength: 4 });

    expect(() => strict.parseAll(">a\nACGTA")).toThrow("Line too long (5 > 4)");
  });

  test("should reject invalid options", () => {
    expect(() => new FastaParser({ maxLineLength: 0 })).toThrow(ValidationError);
  });
});

describe("FastaWriter", () => {
  test("should wrap sequences at the configured width", () => {
    const writer = new FastaWriter({ lineWidth: 4 });

    expect(writer.formatEntry({ header: "s", finalSequence: "ACGTACGTAC" })).toBe(
      ">s\nACGT\nACGT\nAC"
    );
  });

  test("should wrap at 60 columns by default", () => {
    const writer = new FastaWriter();
    const text = writer.formatEntry({ header: "long", finalSequence: "A".repeat(130) });

    expect(text.split("\n").map((line) => line.length)).toEqual([5, 60, 60, 10]);
  });

  test("should not wrap when lineWidth is 0", () => {
    const writer = new FastaWriter({ lineWidth: 0 });

    expect(writer.formatEntry({ header: "s", finalSequence: "ACGTACGT" })).toBe(">s\nACGTACGT");
  });

  test("should use the configured line ending", () => {
    const writer = new FastaWriter({ lineWidth: 4, lineEnding: "\r\n" });

    expect(writer.formatEntry({ header: "s", finalSequence: "ACGTAC" })).toBe(">s\r\nACGT\r\nAC");
  });

  test("should export final sequences and skip empty records", () => {
    const records = validateRecords(
      [
        { header: "a", sequence: "acxt" },
        { header: "b", sequence: "" },
        { header: "c", sequence: "ACGT" },
      ],
      { sanitize: true, minLength: 0 }
    );
    const writer = new FastaWriter();

    expect(writer.formatRecords(records)).toBe(">a\nACNT\n>c\nACGT\n");
    expect(writer.formatRecords(records, { onlySanitized: true })).toBe(">a\nACNT\n");
  });

  test("should reject unsupported line endings", () => {
    expect(() => new FastaWriter({ lineEnding: "\r" })).toThrow(ValidationError);
  });
});
