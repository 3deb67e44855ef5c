/**
 * Tests for FASTQ record assembly and reading
 */

import { writeFileSync } from "fs";
import { join } from "path";
import { gzipSync } from "fflate";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FileError, FormatError } from "../../src/errors";
import {
  FastqRecordAssembler,
  openFastq,
  parseFastqText,
  readFastqRecords,
  splitHeaderFields,
} from "../../src/formats/fastq";
import type { FastqRecord } from "../../src/types";
import { createFixtureDir, encode, makeRecord, toFastqText } from "../utils/fixtures";

function catchFormatError(fn: () => unknown): FormatError {
  try {
    fn();
  } catch (error) {
    if (error instanceof FormatError) return error;
    throw error;
  }
  throw new Error("expected a FormatError");
}

async function* linesOf(...lines: string[]): AsyncGenerator<string> {
  for (const line of lines) {
    yield line;
  }
}

async function collect(records: AsyncIterable<FastqRecord>): Promise<FastqRecord[]> {
  const out: FastqRecord[] = [];
  for await (const record of records) {
    out.push(record);
  }
  return out;
}

describe("parseFastqText", () => {
  test("should parse well-formed records", () => {
    const records = parseFastqText("@r1 desc\nACGT\n+\nIIII\n@r2\nGG\n+r2\n#!\n");

    expect(records).toEqual([
      { header: "@r1 desc", sequence: "ACGT", separator: "+", quality: "IIII" },
      { header: "@r2", sequence: "GG", separator: "+r2", quality: "#!" },
    ]);
  });

  test("should accept a final line without a newline and CRLF endings", () => {
    expect(parseFastqText("@r1\r\nAC\r\n+\r\nII")).toEqual([makeRecord("r1", "AC")]);
  });

  test("should skip blank lines between records", () => {
    const records = parseFastqText("\n@r1\nAC\n+\nII\n\n\n@r2\nGT\n+\nII\n\n");

    expect(records.map((r) => r.header)).toEqual(["@r1", "@r2"]);
  });

  test("should keep an empty read", () => {
    expect(parseFastqText("@empty\n\n+\n\n")).toEqual([makeRecord("empty", "", "")]);
  });

  test("should return no records for empty input", () => {
    expect(parseFastqText("")).toEqual([]);
  });

  test("should reject a record that does not start with '@'", () => {
    const error = catchFormatError(() => parseFastqText("r1\nACGT\n+\nIIII\n"));

    expect(error.message).toBe("Record 1: expected a header line starting with '@'");
    expect(error.recordIndex).toBe(1);
    expect(error.lineNumber).toBe(1);
    expect(error.context).toBe('found "r1"');
    expect(error.toString()).toBe(
      'FormatError: Record 1: expected a header line starting with \'@\' (line 1)\nContext: found "r1"'
    );
  });

  test("should reject a missing separator", () => {
    const error = catchFormatError(() => parseFastqText("@r1\nACGT\n-\nIIII\n"));

    expect(error.message).toBe("Record 1: expected a separator line starting with '+'");
    expect(error.lineNumber).toBe(3);
  });

  test("should reject a quality line of the wrong length", () => {
    const error = catchFormatError(() =>
      parseFastqText("@r1\nAC\n+\nII\n@r2\nACGT\n+\nII\n")
    );

    expect(error.message).toBe("Record 2: quality length 2 does not match sequence length 4");
    expect(error.recordIndex).toBe(2);
    expect(error.lineNumber).toBe(8);
    expect(error.context).toBe('header "@r2"');
  });

  test("should reject input that ends mid-record", () => {
    const error = catchFormatError(() => parseFastqText("@r1\nAC\n+\nII\n@r2\nAC\n"));

    expect(error.message).toBe("Record 2: input ends mid-record (expected 4 lines, got 2)");
    expect(error.lineNumber).toBe(6);
  });

  test("should truncate long lines quoted in error context", () => {
    const line = "x".repeat(50);
    const error = catchFormatError(() => parseFastqText(`${line}\n`));

    expect(error.context).toBe(`found "${"x".repeat(40)}"...`);
  });
});

describe("FastqRecordAssembler", () => {
  test("should emit a record on every fourth line", () => {
    const assembler = new FastqRecordAssembler();

    expect(assembler.push("@r1")).toBeUndefined();
    expect(assembler.push("ACGT")).toBeUndefined();
    expect(assembler.push("+")).toBeUndefined();
    expect(assembler.push("IIII")).toEqual(makeRecord("r1", "ACGT"));
    expect(assembler.recordsRead).toBe(1);
    expect(() => assembler.finish()).not.toThrow();
  });
});

describe("readFastqRecords", () => {
  test("should yield records before a malformed one", async () => {
    const seen: string[] = [];
    const reading = (async () => {
      for await (const record of readFastqRecords(
        linesOf("@r1", "AC", "+", "II", "@r2", "AC", "+", "I")
      )) {
        seen.push(record.header);
      }
    })();

    await expect(reading).rejects.toThrow(FormatError);
    expect(seen).toEqual(["@r1"]);
  });

  test("should stop pulling lines when the consumer stops", async () => {
    let pulled = 0;
    async function* counted(): AsyncGenerator<string> {
      for (const line of ["@r1", "AC", "+", "II", "@r2", "GT", "+", "II"]) {
        pulled++;
        yield line;
      }
    }

    for await (const record of readFastqRecords(counted())) {
      expect(record.header).toBe("@r1");
      break;
    }

    expect(pulled).toBe(4);
  });
});

describe("openFastq", () => {
  let dir: string;
  let cleanup: () => void;
  const records = [makeRecord("r1", "ACGT", "!+5?"), makeRecord("r2", "NNGG")];

  beforeEach(() => {
    ({ dir, cleanup } = createFixtureDir());
  });

  afterEach(() => {
    cleanup();
  });

  test("should read a plain file", async () => {
    const file = join(dir, "reads.fastq");
    writeFileSync(file, toFastqText(records));

    expect(await collect(openFastq(file))).toEqual(records);
  });

  test("should read a gzip file", async () => {
    const file = join(dir, "reads.fq.gz");
    writeFileSync(file, gzipSync(encode(toFastqText(records))));

    expect(await collect(openFastq(file))).toEqual(records);
  });

  test("should raise FileError for a missing file", async () => {
    await expect(collect(openFastq(join(dir, "nope.fastq")))).rejects.toThrow(FileError);
  });

  test("should raise FileError for truncated gzip data", async () => {
    const file = join(dir, "reads.fastq.gz");
    const compressed = gzipSync(encode(toFastqText(records)));
    writeFileSync(file, compressed.slice(0, compressed.length - 12));

    await expect(collect(openFastq(file))).rejects.toThrow(FileError);
  });

  test("should raise FileError for gzip data with a bad checksum", async () => {
    const file = join(dir, "reads.fastq.gz");
    const compressed = gzipSync(encode(toFastqText(records)));
    compressed[compressed.length - 8] ^= 0xff;
    writeFileSync(file, compressed);

    await expect(collect(openFastq(file))).rejects.toThrow(
      `read operation failed for ${file}: CRC32/length check failed for gzip member 1`
    );
  });

  test("should raise FormatError for a malformed file", async () => {
    const file = join(dir, "bad.fastq");
    writeFileSync(file, "@r1\nACGT\n+\nIII\n");

    await expect(collect(openFastq(file))).rejects.toThrow(
      "Record 1: quality length 3 does not match sequence length 4"
    );
  });
});

describe("splitHeaderFields", () => {
  test("should split identifier and description on colons", () => {
    expect(splitHeaderFields("@M001:45:1101 1:N:0:7")).toEqual({
      marker: "@",
      idFields: ["M001", "45", "1101"],
      descriptionFields: ["1", "N", "0", "7"],
    });
  });

  test("should report no description for a bare identifier", () => {
    expect(splitHeaderFields("@read1")).toEqual({
      marker: "@",
      idFields: ["read1"],
      descriptionFields: [],
    });
  });
});
