/**
 * Colorized FASTQ rendering
 *
 * Each record flows through the same small pipeline: wrap the sequence and
 * quality at matching offsets, colorize each chunk, then emit the rows.
 * Display options toggle stages of that pipeline independently.
 */

import { type } from "arktype";
import { Chalk, type ChalkInstance } from "chalk";
import { ValidationError } from "../errors";
import { readFastqStream } from "../formats/fastq/parser";
import { splitHeaderFields } from "../formats/fastq/primitives";
import { createStream } from "../io/file-reader";
import type { FastqRecord, RenderOptions } from "../types";
import { RenderOptionsSchema } from "../types";
import { headerColor, nucleotideColor } from "./palette";
import { QUALITY_BUCKETS, qualityBucketForChar } from "./quality-colors";
import { alignedChunks } from "./wrap";

/** ANSI-256, the level every color in the palettes is written for */
const ANSI_256_LEVEL = 2;

/** Glyph drawn for each quality score */
const QUALITY_BLOCK = "█";

/**
 * Anything rendered text can be written to (process.stdout by default)
 */
export interface OutputSink {
  write(chunk: string): unknown;
}

/**
 * Where output goes and how rendering is stopped from outside
 */
export interface RenderContext {
  /** Destination for rendered lines (default: process.stdout) */
  readonly sink?: OutputSink;
  /** Checked between records; an aborted signal ends rendering early */
  readonly signal?: AbortSignal;
  /** Receives non-fatal input notices (default: console.warn) */
  readonly onWarning?: (message: string) => void;
}

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  limit: undefined,
  colorSequence: true,
  legend: false,
  rawQuality: false,
  wrapWidth: undefined,
  colorHeader: false,
  recordLabels: true,
};

/**
 * Merge user options onto the defaults and validate the result
 *
 * @throws {ValidationError} If a count or width is not a positive integer
 */
export function resolveRenderOptions(options: Partial<RenderOptions> = {}): RenderOptions {
  const merged: RenderOptions = { ...DEFAULT_RENDER_OPTIONS, ...options };

  const validationResult = RenderOptionsSchema(merged);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(`Invalid render options: ${validationResult.summary}`);
  }

  return merged;
}

/**
 * Terminal renderer for FASTQ records
 *
 * @example
 * ```typescript
 * const renderer = new FastqRenderer({ limit: 5, wrapWidth: 60, legend: true });
 * const rendered = await renderer.renderFile("reads.fastq.gz");
 * ```
 */
export class FastqRenderer {
  readonly options: RenderOptions;
  private readonly style: ChalkInstance;
  private readonly sink: OutputSink;
  private readonly signal: AbortSignal | undefined;
  private readonly onWarning: ((message: string) => void) | undefined;

  constructor(options: Partial<RenderOptions> = {}, context: RenderContext = {}) {
    this.options = resolveRenderOptions(options);
    this.style = new Chalk({ level: ANSI_256_LEVEL });
    this.sink = context.sink ?? process.stdout;
    this.signal = context.signal;
    this.onWarning = context.onWarning;
  }

  /**
   * Render records from a FASTQ file
   *
   * The file is opened before anything is written, so a missing or
   * unreadable file produces no output (not even the legend).
   *
   * @returns Number of records rendered
   * @throws {FileError} If the file cannot be opened, read or decompressed
   * @throws {FormatError} At the first malformed record
   */
  async renderFile(path: string): Promise<number> {
    const stream = await createStream(
      path,
      this.onWarning === undefined ? {} : { onWarning: this.onWarning }
    );
    return this.render(readFastqStream(stream, path));
  }

  /**
   * Render records up to the configured limit
   *
   * The legend, when enabled, comes first. Iteration stops as soon as the
   * limit is reached or the signal is aborted, which closes the record
   * source. A FormatError from the source propagates after the records
   * before it have been written.
   *
   * @returns Number of records rendered
   */
  async render(records: AsyncIterable<FastqRecord> | Iterable<FastqRecord>): Promise<number> {
    if (this.options.legend) {
      this.renderLegend();
    }

    const { limit } = this.options;
    let rendered = 0;
    for await (const record of records) {
      if (this.signal?.aborted === true) {
        break;
      }

      rendered++;
      this.renderRecord(record, rendered);

      if (limit !== undefined && rendered >= limit) {
        break;
      }
    }
    return rendered;
  }

  /**
   * Print one swatch per quality bucket, labeled with its score range
   */
  renderLegend(): void {
    this.writeLine(this.style.bold("Quality Score Legend:"));
    for (const bucket of QUALITY_BUCKETS) {
      this.writeLine(`  ${this.style.ansi256(bucket.color)(QUALITY_BLOCK.repeat(2))} Q${bucket.label}`);
    }
    this.writeLine("");
  }

  /**
   * Render a single record; `index` is its 1-based position in the output
   */
  renderRecord(record: FastqRecord, index: number): void {
    if (this.options.recordLabels) {
      this.writeLine(this.style.dim(`Record ${index}:`));
    }
    this.writeLine(this.formatHeader(record.header));

    for (const chunk of alignedChunks(record, this.options.wrapWidth)) {
      this.writeLine(this.formatSequence(chunk.sequence));
      this.writeLine(this.formatQuality(chunk.quality));
      if (this.options.rawQuality) {
        this.writeLine(this.style.dim(chunk.quality));
      }
    }

    this.writeLine("");
  }

  /**
   * Header line, unmodified unless header coloring is on
   */
  formatHeader(header: string): string {
    if (!this.options.colorHeader) {
      return header;
    }

    const { marker, idFields, descriptionFields } = splitHeaderFields(header);
    const colorField = (field: string, position: number): string =>
      this.style.ansi256(headerColor(position))(field);

    let result = this.style.dim(marker) + idFields.map(colorField).join(":");
    if (descriptionFields.length > 0) {
      const offset = idFields.length;
      result += ` ${descriptionFields
        .map((field, position) => colorField(field, position + offset))
        .join(":")}`;
    }
    return result;
  }

  /**
   * Sequence chunk with each known base in its color
   */
  formatSequence(sequence: string): string {
    if (!this.options.colorSequence) {
      return sequence;
    }

    let result = "";
    for (const base of sequence) {
      const color = nucleotideColor(base);
      result += color === undefined ? base : this.style.ansi256(color)(base);
    }
    return result;
  }

  /**
   * Quality chunk as one colored block per score
   */
  formatQuality(quality: string): string {
    let result = "";
    for (const char of quality) {
      result += this.style.ansi256(qualityBucketForChar(char).color)(QUALITY_BLOCK);
    }
    return result;
  }

  private writeLine(line: string): void {
    this.sink.write(`${line}\n`);
  }
}
