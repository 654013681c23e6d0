/**
 * Tests for the validation engine
 */

import { describe, expect, test } from "vitest";
import { ValidationError } from "../../src/errors";
import { parseSequences } from "../../src/formats";
import {
  filterValid,
  resolveValidationConfig,
  ValidationEngine,
  validateRecords,
} from "../../src/operations/validate";
import { ErrorCode, type RawRecord, WarningCode } from "../../src/types";

function raw(header: string, sequence: string): RawRecord {
  return { header, sequence };
}

describe("ValidationEngine", () => {
  test("should build a complete validated record", () => {
    const [record] = validateRecords([{ header: "r", sequence: "acgtn", quality: "IIIII" }], {
      minLength: 5,
    });

    expect(record).toEqual({
      index: 0,
      header: "r",
      originalSequence: "acgtn",
      finalSequence: "acgtn",
      quality: "IIIII",
      isValid: true,
      errors: [],
      warnings: [],
      length: 5,
      gcContent: 0.4,
      invalidCharCount: 0,
      sanitized: false,
    });
  });

  test("should accept short records when minLength allows them", () => {
    const records = validateRecords(parseSequences(">a\nACGT\n>b\nACGTN\n"), { minLength: 3 });

    expect(records.map((record) => record.isValid)).toEqual([true, true]);
    expect(records.map((record) => record.length)).toEqual([4, 5]);
    expect(records.map((record) => record.gcContent)).toEqual([0.5, 0.4]);
  });

  test("should keep InvalidCharacters after sanitization fixes the sequence", () => {
    const [record] = validateRecords(parseSequences(">a\nACXT\n"), { sanitize: true, minLength: 4 });

    expect(record?.finalSequence).toBe("ACNT");
    expect(record?.errors).toEqual([ErrorCode.INVALID_CHARACTERS]);
    expect(record?.invalidCharCount).toBe(1);
    expect(record?.isValid).toBe(false);
    expect(record?.sanitized).toBe(true);
  });

  test("should count invalid characters without sanitizing", () => {
    const [record] = validateRecords([raw("a", "AC-GT")], { minLength: 1 });

    expect(record?.finalSequence).toBe("AC-GT");
    expect(record?.invalidCharCount).toBe(1);
    expect(record?.sanitized).toBe(false);
  });

  test("should flag only repeated headers as duplicates", () => {
    const records = validateRecords(parseSequences(">a\nAC\n>a\nACGTACGT\n"), { minLength: 1 });

    expect(records[0]?.errors).toEqual([]);
    expect(records[1]?.errors).toEqual([ErrorCode.DUPLICATE_HEADER]);
  });

  test("should compare headers exactly and case-sensitively", () => {
    const records = validateRecords(
      ["a", "b", "a", "a", "B"].map((header) => raw(header, "ACGT")),
      { minLength: 1 }
    );

    expect(records.map((record) => record.errors.includes(ErrorCode.DUPLICATE_HEADER))).toEqual([
      false,
      false,
      true,
      true,
      false,
    ]);
  });

  test("should flag a header without sequence as empty only", () => {
    const [record] = validateRecords(parseSequences(">a\n"));

    expect(record?.errors).toEqual([ErrorCode.EMPTY_SEQUENCE]);
    expect(record?.length).toBe(0);
    expect(record?.gcContent).toBe(0);
    expect(record?.isValid).toBe(false);
  });

  test("should still check empty records for duplicate headers", () => {
    const records = validateRecords([raw("a", "ACGT"), raw("a", "")], { minLength: 1 });

    expect(records[1]?.errors).toEqual([ErrorCode.EMPTY_SEQUENCE, ErrorCode.DUPLICATE_HEADER]);
  });

  test("should report errors in rule order", () => {
    const records = validateRecords([raw("x", "ACGT"), raw("x", "xxxxxxxxxxxx")]);

    expect(records[0]?.errors).toEqual([ErrorCode.BELOW_MIN_LENGTH]);
    expect(records[1]?.errors).toEqual([
      ErrorCode.INVALID_CHARACTERS,
      ErrorCode.BELOW_MIN_LENGTH,
      ErrorCode.DUPLICATE_HEADER,
      ErrorCode.LOW_COMPLEXITY,
    ]);
  });

  test("should flag low-complexity sequences regardless of case", () => {
    const records = validateRecords([raw("r", "acacacacac"), raw("s", "ACGTTGCAACGGTCAT")], {
      minLength: 10,
    });

    expect(records[0]?.errors).toEqual([ErrorCode.LOW_COMPLEXITY]);
    expect(records[1]?.errors).toEqual([]);
  });

  test("should apply low-complexity overrides", () => {
    const records = validateRecords([raw("r", "AAAAC")], {
      minLength: 1,
      lowComplexity: { minLength: 5 },
    });

    expect(records[0]?.errors).toEqual([ErrorCode.LOW_COMPLEXITY]);
  });

  test("should flag a tandem repeat covering 90% of the sequence", () => {
    const records = validateRecords(
      [raw("r", "ACG".repeat(9) + "TTT"), raw("s", "ACG".repeat(9) + "TTTT")],
      { minLength: 1 }
    );

    expect(records[0]?.errors).toEqual([ErrorCode.LOW_COMPLEXITY]);
    expect(records[1]?.errors).toEqual([]);
  });

  test("should not flag consecutive homopolymer blocks of different bases", () => {
    const blocks = "A".repeat(10) + "C".repeat(10) + "G".repeat(10) + "T".repeat(10);
    const [record] = validateRecords([raw("blocks", blocks)], { minLength: 1 });

    expect(record?.errors).toEqual([]);
    expect(record?.isValid).toBe(true);
  });

  test("should warn about sequences made only of N", () => {
    const records = validateRecords([raw("n", "NNnn"), raw("x", "x?x?"), raw("e", "")], {
      sanitize: true,
      minLength: 4,
    });

    expect(records[0]?.warnings).toEqual([WarningCode.ALL_AMBIGUOUS]);
    expect(records[0]?.isValid).toBe(true);
    expect(records[1]?.finalSequence).toBe("NNNN");
    expect(records[1]?.warnings).toEqual([WarningCode.ALL_AMBIGUOUS]);
    expect(records[1]?.errors).toEqual([ErrorCode.INVALID_CHARACTERS]);
    expect(records[2]?.warnings).toEqual([]);
  });

  test("should preserve length and set sanitized only when the sequence changed", () => {
    const records = validateRecords([raw("a", "acgt"), raw("b", "ACGT"), raw("c", "a?c-")], {
      sanitize: true,
      minLength: 1,
    });

    expect(records.map((record) => record.finalSequence)).toEqual(["ACGT", "ACGT", "ANCN"]);
    expect(records.map((record) => record.sanitized)).toEqual([true, false, true]);
    for (const record of records) {
      expect(record.finalSequence.length).toBe(record.originalSequence.length);
      expect(record.isValid).toBe(record.errors.length === 0);
    }
  });

  test("should not share seen headers between calls", () => {
    const engine = new ValidationEngine({ minLength: 1 });

    engine.validate([raw("a", "ACGT")]);
    const [again] = engine.validate([raw("a", "ACGT")]);

    expect(again?.errors).toEqual([]);
  });

  test("should number records by input position", () => {
    const records = validateRecords([raw("a", "A"), raw("b", "C"), raw("c", "G")]);

    expect(records.map((record) => record.index)).toEqual([0, 1, 2]);
  });
});

describe("validation config", () => {
  test("should apply defaults", () => {
    expect(new ValidationEngine({ lowComplexity: { minLength: 5 } }).config).toEqual({
      sanitize: false,
      minLength: 20,
      lowComplexity: { minLength: 5, dominantFraction: 0.8, repeatCoverage: 0.9, maxUnitLength: 3 },
    });
  });

  test("should reject invalid values before processing records", () => {
    expect(() => new ValidationEngine({ minLength: -1 })).toThrow(ValidationError);
    expect(() => resolveValidationConfig({ minLength: 2.5 })).toThrow(ValidationError);
    expect(() => resolveValidationConfig({ lowComplexity: { dominantFraction: 0 } })).toThrow(
      ValidationError
    );
    expect(() => resolveValidationConfig({ lowComplexity: { maxUnitLength: 17 } })).toThrow(
      "Invalid validation config"
    );
  });
});

describe("filterValid", () => {
  test("should keep valid records in order", () => {
    const records = validateRecords([raw("a", "ACGT"), raw("b", ""), raw("c", "GGCC")], {
      minLength: 1,
    });

    expect(filterValid(records).map((record) => record.header)).toEqual(["a", "c"]);
  });
});
