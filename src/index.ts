/**
 * fqview: colorized FASTQ viewing for the terminal
 *
 * @example
 * ```typescript
 * import { FastqRenderer } from "fqview";
 *
 * await new FastqRenderer({ limit: 3, legend: true }).renderFile("reads.fastq.gz");
 * ```
 */

export { runCli, VERSION } from "./cli";
export {
  CheckedGunzip,
  CompressionDetector,
  crc32,
  createDecompressor,
  GzipDecompressor,
} from "./compression";
export {
  CompressionError,
  FileError,
  FormatError,
  FqviewError,
  isFqviewError,
  ValidationError,
} from "./errors";
export {
  FastqReader,
  FastqRecordAssembler,
  openFastq,
  parseFastqText,
  readFastqRecords,
  readFastqStream,
  splitHeaderFields,
} from "./formats/fastq";
export { createStream, exists, FileReader } from "./io/file-reader";
export { readLines, StreamUtils } from "./io/stream-utils";
export { HEADER_COLORS, NUCLEOTIDE_COLORS } from "./render/palette";
export {
  bucketIndexForScore,
  MAX_BUCKET_SCORE,
  phredScore,
  QUALITY_BUCKETS,
  QUALITY_COLOR_TABLE,
  type QualityBucket,
  qualityBucketForChar,
} from "./render/quality-colors";
export {
  DEFAULT_RENDER_OPTIONS,
  FastqRenderer,
  type OutputSink,
  type RenderContext,
  resolveRenderOptions,
} from "./render/renderer";
export { type AlignedChunk, alignedChunks, chunkLine } from "./render/wrap";
export type {
  CompressionDetection,
  CompressionFormat,
  FastqRecord,
  FileReaderOptions,
  RenderOptions,
} from "./types";
export { FilePathSchema, RenderOptionsSchema } from "./types";
