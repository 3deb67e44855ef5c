import { describe, expect, test } from "vitest";
import { peekStream, processBuffer, readLines } from "../../src/io/stream-utils";
import { encode, streamOf } from "../utils/fixtures";

async function collect(stream: ReadableStream<Uint8Array>): Promise<string[]> {
  const lines: string[] = [];
  for await (const line of readLines(stream)) {
    lines.push(line);
  }
  return lines;
}

describe("processBuffer", () => {
  test("splits complete lines and keeps the remainder", () => {
    expect(processBuffer("@r1\nACGT\n+\nII")).toEqual({
      lines: ["@r1", "ACGT", "+"],
      remainder: "II",
    });
  });

  test("strips CRLF terminators", () => {
    expect(processBuffer("@r1\r\nACGT\r\n")).toEqual({
      lines: ["@r1", "ACGT"],
      remainder: "",
    });
  });

  test("keeps a dangling carriage return in the remainder", () => {
    expect(processBuffer("ACGT\r")).toEqual({ lines: [], remainder: "ACGT\r" });
  });
});

describe("readLines", () => {
  test("joins lines split across chunks", async () => {
    const lines = await collect(streamOf(encode("@re"), encode("ad1\nAC"), encode("GT\r"), encode("\n")));
    expect(lines).toEqual(["@read1", "ACGT"]);
  });

  test("yields a final line without a trailing newline", async () => {
    expect(await collect(streamOf(encode("+\nIIII")))).toEqual(["+", "IIII"]);
  });

  test("does not yield an empty line after the final newline", async () => {
    expect(await collect(streamOf(encode("a\nb\n")))).toEqual(["a", "b"]);
  });

  test("decodes multi-byte characters split between chunks", async () => {
    const bytes = encode("@réad\n");
    const lines = await collect(streamOf(bytes.slice(0, 3), bytes.slice(3)));
    expect(lines).toEqual(["@réad"]);
  });

  test("cancels the source when the consumer stops early", async () => {
    let cancelled = false;
    const source = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encode("one\ntwo\nthree\n"));
        // Never closed: only a cancel can end it
      },
      cancel() {
        cancelled = true;
      },
    });

    const seen: string[] = [];
    for await (const line of readLines(source)) {
      seen.push(line);
      if (seen.length === 2) break;
    }

    expect(seen).toEqual(["one", "two"]);
    expect(cancelled).toBe(true);
  });
});

describe("peekStream", () => {
  test("replays the first chunk before the rest", async () => {
    const { head, stream } = await peekStream(streamOf(encode("@r1\n"), encode("ACGT\n")));

    expect(head).toEqual(encode("@r1\n"));
    expect(await collect(stream)).toEqual(["@r1", "ACGT"]);
  });

  test("reports an empty stream with an undefined head", async () => {
    const { head, stream } = await peekStream(streamOf());

    expect(head).toBeUndefined();
    expect(await collect(stream)).toEqual([]);
  });

  test("forwards cancellation to the original stream", async () => {
    let cancelled = false;
    const source = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encode("x\n"));
      },
      cancel() {
        cancelled = true;
      },
    });

    const { stream } = await peekStream(source);
    await stream.cancel();

    expect(cancelled).toBe(true);
  });
});
