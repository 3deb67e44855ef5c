/**
 * FASTQ Format Module
 *
 * Reads fixed four-line FASTQ records from plain or gzip-compressed files.
 *
 * @module fastq
 *
 * @example
 * ```typescript
 * import { openFastq } from './formats/fastq';
 *
 * for await (const record of openFastq('reads.fastq.gz')) {
 *   console.log(`${record.header}: ${record.sequence.length} bp`);
 * }
 * ```
 */

export type { FastqRecord } from "../../types";
export {
  ASCII_BOUNDARIES,
  LINE_MARKERS,
  PHRED33_OFFSET,
  RECORD_LAYOUT,
} from "./constants";
export {
  FastqReader,
  openFastq,
  parseFastqText,
  readFastqRecords,
  readFastqStream,
} from "./parser";
export {
  type HeaderFields,
  isHeaderLine,
  isSeparatorLine,
  lengthsMatch,
  splitHeaderFields,
} from "./primitives";
export { FastqRecordAssembler } from "./state-machine";
