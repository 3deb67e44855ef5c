/**
 * Gzip decompression for FASTQ input
 *
 * Streaming decompression runs fflate's `Gunzip` inside a Web
 * `TransformStream`, so compressed and plain files share one line reader
 * downstream. Multi-member gzip files (as written by `cat a.gz b.gz`) are
 * decoded member after member, and each member's trailer (CRC32 and length)
 * is checked against the bytes it produced. Zero bytes after the last
 * member, as left by tape and block-device tools, are ignored.
 */

import { Gunzip } from 'fflate';
import { CompressionError } from '../errors';
import { crc32 } from './crc32';

const GZIP_MAGIC_BYTE1 = 0x1f;
const GZIP_MAGIC_BYTE2 = 0x8b;

/** CRC32 followed by the uncompressed length modulo 2^32, both little-endian */
const GZIP_TRAILER_LENGTH = 8;

/** Compressed bytes kept back so a finished member's trailer can be read */
const TRAILER_WINDOW_SIZE = 64 * 1024;

const UINT32_RANGE = 0x100000000;

function validateGzipFormat(compressed: Uint8Array): void {
  if (compressed.length === 0) {
    throw new CompressionError('Compressed data must not be empty', 'gzip', 'decompress');
  }
  if (
    compressed.length < 2 ||
    compressed[0] !== GZIP_MAGIC_BYTE1 ||
    compressed[1] !== GZIP_MAGIC_BYTE2
  ) {
    throw new CompressionError(
      'Invalid gzip magic bytes - file may not be gzip compressed',
      'gzip',
      'decompress',
      0
    );
  }
}

function readUInt32LE(bytes: Uint8Array, offset: number): number {
  return (
    (bytes[offset] |
      (bytes[offset + 1] << 8) |
      (bytes[offset + 2] << 16) |
      (bytes[offset + 3] << 24)) >>>
    0
  );
}

function concatBytes(a: Uint8Array, b: Uint8Array): Uint8Array {
  const result = new Uint8Array(a.length + b.length);
  result.set(a, 0);
  result.set(b, a.length);
  return result;
}

function toCompressionError(
  error: unknown,
  operation: CompressionError['operation'],
  bytesProcessed: number
): CompressionError {
  if (error instanceof CompressionError) return error;
  return CompressionError.fromSystemError('gzip', operation, error, bytesProcessed);
}

/**
 * Incremental gzip decoder that verifies member trailers
 *
 * fflate inflates the data; this class follows the compressed byte
 * positions so that, when a member ends, the eight trailer bytes can be
 * compared with the CRC32 and length of what that member produced.
 *
 * Trailing zero bytes of each pushed chunk are held back until a non-zero
 * byte follows. At `finish()` they are either the end of the last member
 * or padding, and only reach fflate when the last member is still
 * incomplete without them.
 */
export class CheckedGunzip {
  private readonly gunzip: Gunzip;
  private memberIndex = 1;
  private memberCrc = 0;
  private memberSize = 0;
  private heldZeros = 0;
  private fed = 0;
  private window: Uint8Array = new Uint8Array(0);
  private windowStart = 0;
  private processed = 0;

  constructor(ondata: (chunk: Uint8Array) => void) {
    this.gunzip = new Gunzip((chunk) => {
      this.memberCrc = crc32(chunk, this.memberCrc);
      this.memberSize = (this.memberSize + chunk.length) % UINT32_RANGE;
      ondata(chunk);
    });
    // Called with the compressed offset at which the next member starts
    this.gunzip.onmember = (offset) => {
      this.verifyMember(offset);
    };
  }

  /** Compressed bytes received so far */
  get bytesProcessed(): number {
    return this.processed;
  }

  /**
   * Feed the next piece of compressed data
   *
   * @throws {CompressionError} On a bad header, corrupt block or a member
   * whose trailer does not match its content
   */
  push(chunk: Uint8Array): void {
    this.processed += chunk.length;

    let end = chunk.length;
    while (end > 0 && chunk[end - 1] === 0) end--;

    if (end === 0) {
      this.heldZeros += chunk.length;
      return;
    }

    if (this.heldZeros > 0) {
      this.feed(new Uint8Array(this.heldZeros), false);
    }
    this.feed(chunk.subarray(0, end), false);
    this.heldZeros = chunk.length - end;
  }

  /**
   * Signal the end of compressed input
   *
   * @throws {CompressionError} If the last member is truncated or fails its
   * CRC32/length check
   */
  finish(): void {
    if (this.lastMemberComplete()) return;

    this.feed(new Uint8Array(this.heldZeros), true);
    this.heldZeros = 0;

    if (!this.lastMemberComplete()) {
      throw this.integrityError();
    }
  }

  private feed(bytes: Uint8Array, final: boolean): void {
    const keep = this.window.subarray(Math.max(0, this.window.length - TRAILER_WINDOW_SIZE));
    this.windowStart = this.fed - keep.length;
    this.window = concatBytes(keep, bytes);
    this.fed += bytes.length;

    this.gunzip.push(bytes, final);
  }

  /** Check the trailer that ends at compressed offset `end`, then start a new member */
  private verifyMember(end: number): void {
    const trailerStart = end - GZIP_TRAILER_LENGTH - this.windowStart;
    if (trailerStart < 0 || !this.trailerMatches(this.window, trailerStart)) {
      throw this.integrityError();
    }

    this.memberIndex++;
    this.memberCrc = 0;
    this.memberSize = 0;
  }

  /**
   * Whether the input so far ends with the current member's trailer,
   * optionally followed by zero padding
   */
  private lastMemberComplete(): boolean {
    const tail = concatBytes(this.window, new Uint8Array(this.heldZeros));

    let padding = 0;
    while (padding < tail.length && tail[tail.length - 1 - padding] === 0) padding++;

    for (let skip = 0; skip <= padding; skip++) {
      const trailerStart = tail.length - skip - GZIP_TRAILER_LENGTH;
      if (trailerStart < 0) break;
      if (this.trailerMatches(tail, trailerStart)) return true;
    }
    return false;
  }

  private trailerMatches(bytes: Uint8Array, start: number): boolean {
    return (
      readUInt32LE(bytes, start) === this.memberCrc &&
      readUInt32LE(bytes, start + 4) === this.memberSize
    );
  }

  private integrityError(): CompressionError {
    return new CompressionError(
      `CRC32/length check failed for gzip member ${this.memberIndex}; data is corrupt or truncated`,
      'gzip',
      'stream',
      this.processed
    );
  }
}

/**
 * Decompress a complete gzip buffer
 *
 * @throws {CompressionError} If the data is not gzip, is corrupt, or fails
 * a member's CRC32/length check
 */
export function decompress(compressed: Uint8Array): Uint8Array {
  validateGzipFormat(compressed);

  const chunks: Uint8Array[] = [];
  const decoder = new CheckedGunzip((chunk) => chunks.push(chunk));
  try {
    decoder.push(compressed);
    decoder.finish();
  } catch (err) {
    throw toCompressionError(err, 'decompress', compressed.length);
  }

  const result = new Uint8Array(chunks.reduce((total, chunk) => total + chunk.length, 0));
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

/**
 * Create a gzip decompression transform stream
 *
 * Errors raised while decoding (bad header, corrupt block, truncated input,
 * trailer mismatch) error the stream with a CompressionError that records
 * how many compressed bytes were consumed.
 */
export function createStream(): TransformStream<Uint8Array, Uint8Array> {
  let decoder: CheckedGunzip | undefined;

  return new TransformStream<Uint8Array, Uint8Array>({
    start: (controller) => {
      decoder = new CheckedGunzip((chunk) => {
        controller.enqueue(chunk);
      });
    },
    transform: (chunk, controller) => {
      try {
        decoder?.push(chunk);
      } catch (err) {
        controller.error(toCompressionError(err, 'stream', decoder?.bytesProcessed ?? 0));
      }
    },
    flush: (controller) => {
      try {
        decoder?.finish();
      } catch (err) {
        controller.error(toCompressionError(err, 'stream', decoder?.bytesProcessed ?? 0));
      }
    },
  });
}

/**
 * Wrap a compressed readable stream with gzip decompression
 *
 * Cancelling the returned stream cancels `input` as well.
 *
 * @example
 * ```typescript
 * const decompressed = wrapStream(compressedStream);
 * for await (const line of readLines(decompressed)) { ... }
 * ```
 */
export function wrapStream(input: ReadableStream<Uint8Array>): ReadableStream<Uint8Array> {
  try {
    return input.pipeThrough(createStream());
  } catch (err) {
    throw CompressionError.fromSystemError('gzip', 'stream', err);
  }
}

export const GzipDecompressor = {
  decompress,
  createStream,
  wrapStream,
} as const;
