/**
 * Samples file reader tests
 */

import { rmSync, writeFileSync } from "fs";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { SamplesFileError } from "../../src/errors";
import { parseSamplesTable, readSamplesFile, removeBOM } from "../../src/formats/samples";
import { failWithPlatform, makeTempDir, runWithPlatform } from "../utils/fixtures";

function parseError(content: string): SamplesFileError {
  try {
    parseSamplesTable(content, "samples.tsv");
  } catch (error) {
    if (error instanceof SamplesFileError) return error;
    throw error;
  }
  throw new Error("expected a SamplesFileError");
}

describe("parseSamplesTable", () => {
  test("reads rows in file order", () => {
    const content = "sample_name\tread1\tread2\nS2\ta_R1.fq.gz\ta_R2.fq.gz\nS1\tb_R1.fq.gz\tb_R2.fq.gz\n";

    expect(parseSamplesTable(content, "samples.tsv")).toEqual([
      { name: "S2", read1: "a_R1.fq.gz", read2: "a_R2.fq.gz" },
      { name: "S1", read1: "b_R1.fq.gz", read2: "b_R2.fq.gz" },
    ]);
  });

  test("accepts columns in any order and ignores extra columns", () => {
    const content = "read2\tnotes\tsample_name\tread1\nr2.fq\tcontrol\tCtl_01\tr1.fq\n";

    expect(parseSamplesTable(content, "samples.tsv")).toEqual([
      { name: "Ctl_01", read1: "r1.fq", read2: "r2.fq" },
    ]);
  });

  test("matches header names case-insensitively and trims whitespace", () => {
    const content = "Sample_Name \tREAD1\t Read2\nS1\t r1.fq \tr2.fq\n";

    expect(parseSamplesTable(content, "samples.tsv")).toEqual([
      { name: "S1", read1: "r1.fq", read2: "r2.fq" },
    ]);
  });

  test("tolerates a byte order mark, CRLF line endings and blank lines", () => {
    const content = "\uFEFFsample_name\tread1\tread2\r\n\r\nS1\tr1.fq\tr2.fq\r\n\r\nS2\tr3.fq\tr4.fq\r\n";

    expect(parseSamplesTable(content, "samples.tsv").map((sample) => sample.name)).toEqual([
      "S1",
      "S2",
    ]);
  });

  test("lists every missing required column", () => {
    const error = parseError("sample_name\tfastq\nS1\tr1.fq\n");

    expect(error.message).toBe(
      "Samples file is missing the following required columns: read1, read2"
    );
    expect(error.lineNumber).toBe(1);
    expect(error.code).toBe("SAMPLES_FILE_ERROR");
  });

  test("rejects a sample name with disallowed characters", () => {
    const error = parseError("sample_name\tread1\tread2\nS1\tr1.fq\tr2.fq\nS 2&x\tr3.fq\tr4.fq\n");

    expect(error.message).toMatch(/^Invalid sample "S 2&x": /);
    expect(error.lineNumber).toBe(3);
  });

  test("rejects a row without a read 2 path", () => {
    const error = parseError("sample_name\tread1\tread2\nS1\tr1.fq\n");

    expect(error.message).toMatch(/^Invalid sample "S1": /);
    expect(error.lineNumber).toBe(2);
  });

  test("rejects duplicate sample names", () => {
    const error = parseError("sample_name\tread1\tread2\nS1\tr1.fq\tr2.fq\nS1\tr3.fq\tr4.fq\n");

    expect(error.message).toBe('Duplicate sample name "S1" (first used on line 2)');
    expect(error.lineNumber).toBe(3);
  });

  test("rejects an empty file", () => {
    expect(parseError("\n\n").message).toBe("Samples file is empty");
  });

  test("rejects a header without rows", () => {
    expect(parseError("sample_name\tread1\tread2\n").message).toBe(
      "Samples file contains no samples"
    );
  });
});

describe("removeBOM", () => {
  test("strips only a leading byte order mark", () => {
    expect(removeBOM("\uFEFFabc")).toBe("abc");
    expect(removeBOM("abc")).toBe("abc");
  });
});

describe("readSamplesFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("reads samples from disk", async () => {
    const file = join(dir, "samples.tsv");
    writeFileSync(file, "sample_name\tread1\tread2\nS1\tr1.fq\tr2.fq\n");

    const samples = await runWithPlatform(readSamplesFile(file));

    expect(samples).toEqual([{ name: "S1", read1: "r1.fq", read2: "r2.fq" }]);
  });

  test("fails with SamplesFileError when the file does not exist", async () => {
    const file = join(dir, "missing.tsv");

    const error = await failWithPlatform(readSamplesFile(file));

    expect(error).toBeInstanceOf(SamplesFileError);
    expect(error.message).toBe(`The provided samples file does not exist: ${file}`);
  });

  test("reports an unreadable path as a SamplesFileError with the system reason", async () => {
    const error = await failWithPlatform(readSamplesFile(dir));

    expect(error).toBeInstanceOf(SamplesFileError);
    expect(error.message).toMatch(new RegExp(`^Could not read samples file ${dir}: `));
    expect(error.message).toContain("EISDIR");
  });
});
