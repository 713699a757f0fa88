/**
 * Compression format detection for coordinates files
 *
 * Coordinates tables are usually plain TSV, but pipelines often archive them
 * gzipped. Detection combines the gzip magic bytes with the file extension.
 */

import type { CompressionDetection, CompressionFormat } from '../types';
import { CompressionError } from '../errors';

const GZIP_MAGIC_BYTES = new Uint8Array([0x1f, 0x8b]);

const GZIP_EXTENSIONS = ['.gz', '.gzip'] as const;

/**
 * Confidence assigned when only the extension suggests compression
 */
const EXTENSION_ONLY_CONFIDENCE = 0.6;

/**
 * Compression format detector
 *
 * @example Detection from magic bytes
 * ```typescript
 * const detection = CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08]));
 * console.log(detection.format); // 'gzip'
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression format from file extension
   *
   * @throws {CompressionError} If the path is empty
   */
  static fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new CompressionError('File path must not be empty', 'none', 'detect');
    }

    const normalizedPath = filePath.toLowerCase();
    return GZIP_EXTENSIONS.some((ext) => normalizedPath.endsWith(ext)) ? 'gzip' : 'none';
  }

  /**
   * Detect compression format from the leading bytes of a file
   */
  static fromMagicBytes(bytes: Uint8Array): CompressionDetection {
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

    return { format: 'none', confidence: 1.0, detectionMethod: 'magic-bytes' };
  }

  /**
   * Combine magic bytes and extension; the bytes win when they disagree
   *
   * A `.gz` name on an uncompressed file is common after a manual `gunzip -c`,
   * so the content is trusted over the name.
   */
  static detect(filePath: string, bytes: Uint8Array): CompressionDetection {
    const byMagic = CompressionDetector.fromMagicBytes(bytes);
    if (byMagic.format !== 'none' || bytes.length >= GZIP_MAGIC_BYTES.length) {
      return byMagic;
    }

    const byExtension = CompressionDetector.fromExtension(filePath);
    return {
      format: byExtension,
      confidence: byExtension === 'none' ? 1.0 : EXTENSION_ONLY_CONFIDENCE,
      detectionMethod: 'extension',
    };
  }
}
