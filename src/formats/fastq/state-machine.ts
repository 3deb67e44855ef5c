/**
 * Line-by-line assembly of four-line FASTQ records
 *
 * Lines are fed in one at a time and a record comes out after every fourth
 * line. Structural problems raise a FormatError naming the record and the
 * line where the problem was seen, so output for earlier records stays
 * valid.
 */

import { FormatError } from "../../errors";
import type { FastqRecord } from "../../types";
import { RECORD_LAYOUT } from "./constants";
import {
  isBlankLine,
  isHeaderLine,
  isSeparatorLine,
  lengthsMatch,
  previewLine,
} from "./primitives";

/**
 * Stateful assembler turning a line sequence into FASTQ records
 *
 * Blank lines between records are skipped, which tolerates trailing
 * newlines at the end of a file. Blank lines inside a record are kept
 * (an empty read has an empty sequence and quality line).
 *
 * @example
 * ```typescript
 * const assembler = new FastqRecordAssembler();
 * for (const line of lines) {
 *   const record = assembler.push(line);
 *   if (record) render(record);
 * }
 * assembler.finish();
 * ```
 */
export class FastqRecordAssembler {
  private pending: string[] = [];
  private lineNumber = 0;
  private completed = 0;

  /** Number of records yielded so far */
  get recordsRead(): number {
    return this.completed;
  }

  /**
   * Feed the next line
   *
   * @returns The completed record when `line` was its fourth line
   * @throws {FormatError} On a misplaced header or separator, or a quality
   * line whose length differs from its sequence
   */
  push(line: string): FastqRecord | undefined {
    this.lineNumber++;

    if (this.pending.length === 0 && isBlankLine(line)) {
      return undefined;
    }

    const position = this.pending.length;
    const recordIndex = this.completed + 1;

    if (position === RECORD_LAYOUT.HEADER_LINE && !isHeaderLine(line)) {
      throw new FormatError(
        "expected a header line starting with '@'",
        recordIndex,
        this.lineNumber,
        `found ${previewLine(line)}`
      );
    }
    if (position === RECORD_LAYOUT.SEPARATOR_LINE && !isSeparatorLine(line)) {
      throw new FormatError(
        "expected a separator line starting with '+'",
        recordIndex,
        this.lineNumber,
        `found ${previewLine(line)}`
      );
    }

    this.pending.push(line);
    if (this.pending.length < RECORD_LAYOUT.LINES_PER_RECORD) {
      return undefined;
    }

    const [header, sequence, separator, quality] = this.pending;
    this.pending = [];

    if (!lengthsMatch(sequence, quality)) {
      throw new FormatError(
        `quality length ${quality.length} does not match sequence length ${sequence.length}`,
        recordIndex,
        this.lineNumber,
        `header ${previewLine(header)}`
      );
    }

    this.completed = recordIndex;
    return { header, sequence, separator, quality };
  }

  /**
   * Signal end of input
   *
   * @throws {FormatError} If the input stopped part-way through a record
   */
  finish(): void {
    if (this.pending.length > 0) {
      throw new FormatError(
        `input ends mid-record (expected ${RECORD_LAYOUT.LINES_PER_RECORD} lines, got ${this.pending.length})`,
        this.completed + 1,
        this.lineNumber
      );
    }
  }
}
