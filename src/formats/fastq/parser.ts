/**
 * FASTQ record reading
 *
 * Records are read lazily in groups of four lines. A consumer that stops
 * early (for example after the requested number of records) closes the
 * generator, which in turn cancels the line reader and releases the file.
 */

import { FileError, FormatError } from "../../errors";
import { createStream } from "../../io/file-reader";
import { processBuffer, readLines } from "../../io/stream-utils";
import type { FastqRecord, FileReaderOptions } from "../../types";
import { FastqRecordAssembler } from "./state-machine";

/**
 * Group an async line source into FASTQ records
 *
 * @throws {FormatError} When the lines do not form well-structured records;
 * records before the malformed one have already been yielded
 */
export async function* readFastqRecords(
  lines: AsyncIterable<string>
): AsyncGenerator<FastqRecord> {
  const assembler = new FastqRecordAssembler();

  for await (const line of lines) {
    const record = assembler.push(line);
    if (record !== undefined) {
      yield record;
    }
  }

  assembler.finish();
}

/**
 * Parse FASTQ text held in memory
 *
 * @throws {FormatError} Under the same rules as {@link readFastqRecords}
 *
 * @example
 * ```typescript
 * const [record] = parseFastqText("@r1\nACGT\n+\nIIII\n");
 * record.sequence; // "ACGT"
 * ```
 */
export function parseFastqText(text: string): FastqRecord[] {
  const assembler = new FastqRecordAssembler();
  const { lines, remainder } = processBuffer(text);
  const last = remainder.replace(/\r$/, "");
  const allLines = last.length > 0 ? [...lines, last] : lines;

  const records: FastqRecord[] = [];
  for (const line of allLines) {
    const record = assembler.push(line);
    if (record !== undefined) {
      records.push(record);
    }
  }

  assembler.finish();
  return records;
}

/**
 * Read records from an already opened FASTQ byte stream
 *
 * Decompression and I/O failures surface as FileError naming `path`;
 * structural problems as FormatError. Stopping early cancels `stream`.
 */
export async function* readFastqStream(
  stream: ReadableStream<Uint8Array>,
  path: string
): AsyncGenerator<FastqRecord> {
  try {
    yield* readFastqRecords(readLines(stream));
  } catch (error) {
    if (error instanceof FormatError || error instanceof FileError) {
      throw error;
    }
    throw FileError.fromSystemError("read", path, error);
  }
}

/**
 * Open a plain or gzip-compressed FASTQ file and read its records
 *
 * The file is opened on the first `next()`; use {@link createStream} with
 * {@link readFastqStream} to surface a missing file before iterating.
 *
 * @example
 * ```typescript
 * for await (const record of openFastq("reads.fastq.gz")) {
 *   console.log(record.header);
 * }
 * ```
 */
export async function* openFastq(
  path: string,
  options: FileReaderOptions = {}
): AsyncGenerator<FastqRecord> {
  const stream = await createStream(path, options);
  yield* readFastqStream(stream, path);
}

export const FastqReader = {
  readFastqRecords,
  parseFastqText,
  readFastqStream,
  openFastq,
} as const;
