/**
 * Core type definitions for FASTQ viewing
 *
 * Plain interfaces describe the data that flows from the file reader
 * through the record parser into the renderer; ArkType schemas validate
 * the values that arrive from outside (paths, CLI options).
 */

import { type } from "arktype";

// =============================================================================
// RECORDS
// =============================================================================

/**
 * One four-line FASTQ record
 *
 * Invariant: `sequence.length === quality.length`. The record reader refuses
 * to yield a record that breaks it.
 */
export interface FastqRecord {
  /** Header line including the leading '@' */
  readonly header: string;
  /** Nucleotide line */
  readonly sequence: string;
  /** Separator line including the leading '+' */
  readonly separator: string;
  /** Phred+33 quality line, one character per base */
  readonly quality: string;
}

// =============================================================================
// COMPRESSION
// =============================================================================

/**
 * Input compression formats the viewer can open
 */
export type CompressionFormat = "gzip" | "none";

/**
 * Compression detection result with confidence scoring
 */
export interface CompressionDetection {
  /** Detected compression format */
  readonly format: CompressionFormat;
  /** Detection confidence level (0-1) */
  readonly confidence: number;
  /** Magic bytes that led to detection */
  readonly magicBytes?: Uint8Array;
  /** File extension used in detection */
  readonly extension?: string;
  /** Whether detection used magic bytes vs extension */
  readonly detectionMethod: "magic-bytes" | "extension" | "hybrid";
}

// =============================================================================
// FILE I/O
// =============================================================================

/**
 * Options for opening a FASTQ file as a byte stream
 */
export interface FileReaderOptions {
  /** Read chunk size in bytes (default: 64KB) */
  readonly bufferSize?: number;
  /** Detect and decompress gzip input (default: true) */
  readonly autoDecompress?: boolean;
  /** Receives non-fatal notices such as a misnamed `.gz` file (default: console.warn) */
  readonly onWarning?: (message: string) => void;
}

/**
 * File path validation schema
 *
 * Rejects empty paths and embedded null bytes.
 */
export const FilePathSchema = type("string>0").narrow((path, ctx) => {
  if (path.includes("\0")) {
    return ctx.reject({
      expected: "a path without null characters",
      actual: JSON.stringify(path),
    });
  }
  return true;
});

/**
 * File reader options validation schema
 */
export const FileReaderOptionsSchema = type({
  "bufferSize?": "number>=1024",
  "autoDecompress?": "boolean",
});

// =============================================================================
// RENDERING
// =============================================================================

/**
 * Display configuration, read once from the command line
 */
export interface RenderOptions {
  /** Maximum number of records to render; all records when undefined */
  readonly limit?: number | undefined;
  /** Color each base of the sequence line */
  readonly colorSequence: boolean;
  /** Print the quality color legend before any record */
  readonly legend: boolean;
  /** Print the unmodified quality characters beneath the colored blocks */
  readonly rawQuality: boolean;
  /** Wrap sequence and quality lines at this width; no wrapping when undefined */
  readonly wrapWidth?: number | undefined;
  /** Color the colon-separated fields of the header line */
  readonly colorHeader: boolean;
  /** Print a "Record N:" label above each record */
  readonly recordLabels: boolean;
}

/**
 * Render options validation schema
 *
 * Counts and widths must be positive integers; arktype checks the sign and
 * the narrow step checks integrality so the error names the offending key.
 */
export const RenderOptionsSchema = type({
  "limit?": "number>0 | undefined",
  colorSequence: "boolean",
  legend: "boolean",
  rawQuality: "boolean",
  "wrapWidth?": "number>0 | undefined",
  colorHeader: "boolean",
  recordLabels: "boolean",
}).narrow((options, ctx) => {
  if (options.limit !== undefined && !Number.isInteger(options.limit)) {
    return ctx.reject({
      expected: "an integer record limit",
      actual: `${options.limit}`,
      path: ["limit"],
    });
  }
  if (options.wrapWidth !== undefined && !Number.isInteger(options.wrapWidth)) {
    return ctx.reject({
      expected: "an integer wrap width",
      actual: `${options.wrapWidth}`,
      path: ["wrapWidth"],
    });
  }
  return true;
});
