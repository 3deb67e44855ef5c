/**
 * Line wrapping for sequence and quality lines
 */

import type { FastqRecord } from "../types";

/**
 * Matching slices of a record's sequence and quality
 */
export interface AlignedChunk {
  readonly sequence: string;
  readonly quality: string;
}

/**
 * Split a line into consecutive chunks of at most `width` characters
 *
 * Without a width the whole line is one chunk. An empty line is a single
 * empty chunk, so an empty read still prints its (empty) rows.
 *
 * @example
 * ```typescript
 * chunkLine("ACGTACGT", 3); // ["ACG", "TAC", "GT"]
 * ```
 */
export function chunkLine(line: string, width?: number): string[] {
  if (width === undefined || line.length <= width) {
    return [line];
  }

  const chunks: string[] = [];
  for (let start = 0; start < line.length; start += width) {
    chunks.push(line.slice(start, start + width));
  }
  return chunks;
}

/**
 * Wrap a record's sequence and quality at the same offsets
 *
 * The two lines have equal length, so each quality chunk sits exactly
 * beneath its sequence chunk.
 */
export function alignedChunks(record: FastqRecord, width?: number): AlignedChunk[] {
  const sequenceChunks = chunkLine(record.sequence, width);
  const qualityChunks = chunkLine(record.quality, width);

  return sequenceChunks.map((sequence, index) => ({
    sequence,
    quality: qualityChunks[index] ?? "",
  }));
}
