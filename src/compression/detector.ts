/**
 * Compression format detection for FASTQ input
 *
 * Combines the file extension with the gzip magic bytes so that a gzip file
 * without a `.gz` suffix, or a plain file that was misnamed, still opens
 * with the right reader.
 */

import type { CompressionDetection, CompressionFormat } from '../types';
import { CompressionError } from '../errors';

const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;

const GZIP_MAGIC_BYTES = new Uint8Array([GZIP_MAGIC_FIRST_BYTE, GZIP_MAGIC_SECOND_BYTE]);

/**
 * File extensions that mark gzip input, including the composite FASTQ ones
 */
const GZIP_EXTENSIONS = ['.gz', '.gzip', '.fastq.gz', '.fq.gz'] as const;

/**
 * Minimum confidence threshold for reliable compression detection
 */
const MIN_CONFIDENCE_THRESHOLD = 0.7;

const HIGH_CONFIDENCE_EXTENSION_ONLY = 0.7;
const MEDIUM_CONFIDENCE_EXTENSION_ONLY = 0.6;
const CONFIDENCE_BOOST_FOR_AGREEMENT = 0.1;
const CONFIDENCE_PENALTY_FOR_DISAGREEMENT = 0.3;
const MIN_CONFIDENCE_DISAGREEMENT = 0.3;

function extensionOf(filePath: string): string {
  const dot = filePath.lastIndexOf('.');
  return dot === -1 ? '' : filePath.substring(dot);
}

/**
 * Compression format detector
 *
 * @example Detection from file extension
 * ```typescript
 * CompressionDetector.fromExtension('/data/reads.fastq.gz'); // 'gzip'
 * ```
 *
 * @example Detection from magic bytes
 * ```typescript
 * const detection = CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08]));
 * detection.format; // 'gzip'
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression format from file extension
   *
   * Matching is case-insensitive and tolerates Windows separators.
   *
   * @throws {CompressionError} If the path is empty
   */
  static fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new CompressionError('File path must not be empty', 'none', 'detect');
    }

    const normalizedPath = filePath.toLowerCase().replace(/\\/g, '/');
    return GZIP_EXTENSIONS.some((ext) => normalizedPath.endsWith(ext)) ? 'gzip' : 'none';
  }

  /**
   * Detect compression format from the leading bytes of a file
   *
   * @throws {CompressionError} If no bytes are given
   */
  static fromMagicBytes(bytes: Uint8Array): CompressionDetection {
    if (bytes.length === 0) {
      throw new CompressionError('Bytes array must not be empty', 'none', 'detect');
    }

    const matches =
      bytes.length >= GZIP_MAGIC_BYTES.length &&
      GZIP_MAGIC_BYTES.every((byte, index) => bytes[index] === byte);

    if (matches) {
      return {
        format: 'gzip',
        confidence: 1.0,
        magicBytes: bytes.slice(0, GZIP_MAGIC_BYTES.length),
        detectionMethod: 'magic-bytes',
      };
    }

    return {
      format: 'none',
      confidence: 0.9,
      detectionMethod: 'magic-bytes',
    };
  }

  /**
   * Hybrid detection combining extension and magic bytes
   *
   * Returns the highest confidence when both methods agree. When they
   * disagree the magic bytes win, since a misnamed file is more common
   * than a forged signature.
   */
  static hybrid(filePath: string, bytes?: Uint8Array): CompressionDetection {
    const extensionFormat = CompressionDetector.fromExtension(filePath);
    const extension = extensionOf(filePath);

    if (bytes === undefined || bytes.length === 0) {
      return {
        format: extensionFormat,
        confidence:
          extensionFormat !== 'none' ? HIGH_CONFIDENCE_EXTENSION_ONLY : MEDIUM_CONFIDENCE_EXTENSION_ONLY,
        extension,
        detectionMethod: 'extension',
      };
    }

    const magicDetection = CompressionDetector.fromMagicBytes(bytes);

    if (extensionFormat === magicDetection.format) {
      return {
        format: extensionFormat,
        confidence: Math.min(1, magicDetection.confidence + CONFIDENCE_BOOST_FOR_AGREEMENT),
        ...(magicDetection.magicBytes && { magicBytes: magicDetection.magicBytes }),
        extension,
        detectionMethod: 'hybrid',
      };
    }

    return {
      format: magicDetection.format,
      confidence: Math.max(
        MIN_CONFIDENCE_DISAGREEMENT,
        magicDetection.confidence - CONFIDENCE_PENALTY_FOR_DISAGREEMENT
      ),
      ...(magicDetection.magicBytes && { magicBytes: magicDetection.magicBytes }),
      extension,
      detectionMethod: 'hybrid',
    };
  }

  /**
   * Whether a detection result meets the minimum confidence threshold
   */
  static isReliable(detection: CompressionDetection): boolean {
    return detection.confidence >= MIN_CONFIDENCE_THRESHOLD;
  }
}
