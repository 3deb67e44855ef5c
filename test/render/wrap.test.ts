import { describe, expect, test } from "vitest";
import { alignedChunks, chunkLine } from "../../src/render/wrap";
import { makeRecord } from "../utils/fixtures";

describe("chunkLine", () => {
  test("splits a line into width-sized chunks with a short tail", () => {
    const chunks = chunkLine("A".repeat(25), 10);
    expect(chunks.map((c) => c.length)).toEqual([10, 10, 5]);
  });

  test("returns the whole line without a width", () => {
    expect(chunkLine("ACGTACGT")).toEqual(["ACGTACGT"]);
  });

  test("keeps a line that fits exactly as one chunk", () => {
    expect(chunkLine("ACGT", 4)).toEqual(["ACGT"]);
  });

  test("returns a single empty chunk for an empty line", () => {
    expect(chunkLine("", 5)).toEqual([""]);
  });
});

describe("alignedChunks", () => {
  test("cuts sequence and quality at the same offsets", () => {
    const record = makeRecord("r1", "ACGTACG", "!!##$$%");

    expect(alignedChunks(record, 3)).toEqual([
      { sequence: "ACG", quality: "!!#" },
      { sequence: "TAC", quality: "#$$" },
      { sequence: "G", quality: "%" },
    ]);
  });
});
