/**
 * Error handling for FASTQ viewing
 *
 * Every failure the viewer reports derives from FqviewError so the CLI can
 * print it with context and pick an exit code.
 */

/**
 * Base error class for all fqview errors
 */
export class FqviewError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "FqviewError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for invalid display options
 */
export class ValidationError extends FqviewError {
  constructor(message: string, context?: string) {
    super(message, "VALIDATION_ERROR", undefined, context);
    this.name = "ValidationError";
  }
}

/**
 * Structural FASTQ problems: truncated records, misplaced markers,
 * sequence/quality length mismatches
 */
export class FormatError extends FqviewError {
  constructor(
    message: string,
    public readonly recordIndex: number,
    lineNumber?: number,
    context?: string
  ) {
    super(`Record ${recordIndex}: ${message}`, "FORMAT_ERROR", lineNumber, context);
    this.name = "FormatError";
  }
}

/**
 * Compression/decompression errors with detailed context
 */
export class CompressionError extends FqviewError {
  constructor(
    message: string,
    public readonly format: "gzip" | "none",
    public readonly operation: "detect" | "decompress" | "stream",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  /**
   * Create compression error from an underlying library error
   */
  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown,
    bytesProcessed?: number
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = CompressionError.getSuggestionForCompressionError(format, errorMessage);

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      format,
      operation,
      bytesProcessed,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForCompressionError(
    format: CompressionError["format"],
    errorMessage: string
  ): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("magic") || msg.includes("header")) {
      return `File may be corrupted or not actually ${format} compressed`;
    }
    if (msg.includes("truncated") || msg.includes("unexpected eof") || msg.includes("unexpected end")) {
      return "File appears to be truncated or incomplete";
    }
    if (msg.includes("crc") || msg.includes("checksum")) {
      return "Data integrity check failed - file may be corrupted";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.bytesProcessed !== undefined) {
      msg += `\nBytes processed: ${this.bytesProcessed}`;
    }

    return msg;
  }
}

/**
 * File I/O errors: missing, unreadable or undecompressible input
 */
export class FileError extends FqviewError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "stat" | "open" | "close",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed for ${filePath}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("emfile") || msg.includes("too many open files")) {
      return "Close unused file handles or increase system limits";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.systemError instanceof FqviewError) {
      msg += `\nCaused by: ${this.systemError.toString()}`;
    } else if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }

    return msg;
  }
}

/**
 * Whether the error is one the CLI reports as a user-facing failure
 */
export function isFqviewError(error: unknown): error is FqviewError {
  return error instanceof FqviewError;
}
