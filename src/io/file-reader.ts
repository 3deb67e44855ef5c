/**
 * File reading for FASTQ input
 *
 * Opens a path as a Web `ReadableStream` through the Effect platform
 * FileSystem, after checking that it names a readable regular file, and
 * transparently decompresses gzip input.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Stream } from "effect";
import { CompressionDetector, createDecompressor } from "../compression";
import { FileError } from "../errors";
import type { FileReaderOptions } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";
import { getPlatform } from "./runtime";
import { peekStream } from "./stream-utils";

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  bufferSize: 65536,
  autoDecompress: true,
  onWarning: (message) => console.warn(message),
};

interface FileValidationResult {
  readonly isValid: boolean;
  readonly error?: string;
}

/**
 * Check that a path exists, is a regular file and is readable
 */
async function validateFile(path: string): Promise<FileValidationResult> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    const pathExists = yield* fs.exists(path);
    if (!pathExists) {
      return { isValid: false, error: `File not found: ${path}` };
    }

    const info = yield* fs.stat(path);
    if (info.type !== "File") {
      return { isValid: false, error: `Not a regular file: ${path}` };
    }

    const readable = yield* fs.access(path, { readable: true }).pipe(
      Effect.as(true),
      Effect.catchAll(() => Effect.succeed(false))
    );
    if (!readable) {
      return { isValid: false, error: `File is not readable: ${path}` };
    }

    return { isValid: true };
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", path, error);
  }
}

/**
 * Create base file stream using Effect Platform
 */
async function createBaseStream(
  path: string,
  options: Required<FileReaderOptions>
): Promise<ReadableStream<Uint8Array>> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const effectStream = fs.stream(path, { bufferSize: options.bufferSize });
    return Stream.toReadableStream(effectStream);
  });

  return Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
}

/**
 * Route the stream through a decompressor when its content is gzip
 */
async function applyDecompression(
  stream: ReadableStream<Uint8Array>,
  path: string,
  onWarning: (message: string) => void
): Promise<ReadableStream<Uint8Array>> {
  const peeked = await peekStream(stream);
  if (peeked.head === undefined) {
    return peeked.stream;
  }

  const detection = CompressionDetector.hybrid(path, peeked.head);

  // Only a misnamed plain file lands below the threshold.
  if (!CompressionDetector.isReliable(detection)) {
    onWarning(
      `Warning: ${path} has a compressed extension but is not gzip data; reading as plain text`
    );
  }

  if (detection.format === "none") {
    return peeked.stream;
  }
  return createDecompressor(detection.format).wrapStream(peeked.stream);
}

/**
 * Check if a path names an existing regular file
 *
 * @throws {FileError} If the path is invalid or cannot be inspected
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Create a streaming reader for a file
 *
 * Gzip input is detected from the extension and the magic bytes and
 * decompressed on the fly. Cancelling the returned stream closes the file.
 *
 * @throws {FileError} If the file is missing, not a regular file, unreadable,
 * or cannot be opened
 *
 * @example
 * ```typescript
 * const stream = await createStream('reads.fastq.gz');
 * for await (const line of readLines(stream)) { ... }
 * ```
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  const validation = await validateFile(validatedPath);
  if (!validation.isValid) {
    throw new FileError(validation.error ?? "File validation failed", validatedPath, "open");
  }

  try {
    const stream = await createBaseStream(validatedPath, mergedOptions);
    if (!mergedOptions.autoDecompress) {
      return stream;
    }
    return await applyDecompression(stream, validatedPath, mergedOptions.onWarning);
  } catch (error) {
    if (error instanceof FileError) throw error;
    throw FileError.fromSystemError("read", validatedPath, error);
  }
}

export const FileReader = {
  exists,
  createStream,
} as const;

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

/**
 * Validate file path using ArkType
 */
function validatePath(path: string): string {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}

/**
 * Merge user options with defaults
 */
function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const merged = { ...DEFAULT_OPTIONS, ...options };

  const validationResult = FileReaderOptionsSchema(merged);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
  }

  return merged;
}
