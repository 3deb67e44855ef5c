/**
 * Compression module for FASTQ input
 *
 * @example Streaming decompression
 * ```typescript
 * import { CompressionDetector, createDecompressor } from './compression';
 *
 * const format = CompressionDetector.fromExtension('reads.fastq.gz');
 * if (format !== 'none') {
 *   const decompressed = createDecompressor(format).wrapStream(compressedStream);
 * }
 * ```
 */

export { CompressionDetector } from './detector';
export { CheckedGunzip, GzipDecompressor } from './gzip';
export { crc32 } from './crc32';

import { CompressionError } from '../errors';
import type { CompressionFormat } from '../types';
import { GzipDecompressor } from './gzip';

export type { CompressionFormat, CompressionDetection } from '../types';
export { CompressionError } from '../errors';

/**
 * Pick the decompressor for a detected format
 *
 * @throws {CompressionError} For uncompressed input, which needs no decompressor
 */
export function createDecompressor(format: CompressionFormat): typeof GzipDecompressor {
  switch (format) {
    case 'gzip':
      return GzipDecompressor;
    case 'none':
      throw new CompressionError(
        'No decompression needed for uncompressed data',
        'none',
        'detect'
      );
  }
}
