/**
 * Gzip compression for coordinates files and result tables
 *
 * Thin wrappers over fflate that validate input and translate failures into
 * CompressionError.
 */

import { type DeflateOptions, gunzipSync, gzipSync } from 'fflate';
import { CompressionError } from '../errors';

type GzipLevel = NonNullable<DeflateOptions['level']>;

const GZIP_LEVELS: readonly GzipLevel[] = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];

const DEFAULT_LEVEL: GzipLevel = 6;

function toGzipLevel(level: number): GzipLevel {
  const match = GZIP_LEVELS.find((candidate) => candidate === level);
  if (match === undefined) {
    throw new CompressionError(`Invalid gzip level ${level} (expected 0-9)`, 'gzip', 'compress');
  }
  return match;
}

function validateGzipFormat(compressed: Uint8Array): void {
  if (compressed.length < 2 || compressed[0] !== 0x1f || compressed[1] !== 0x8b) {
    throw new CompressionError(
      'Invalid gzip magic bytes - file may not be gzip compressed',
      'gzip',
      'decompress'
    );
  }
}

/**
 * Decompress a complete gzip member
 *
 * @throws {CompressionError} If the data is not valid gzip
 */
export function decompress(compressed: Uint8Array): Uint8Array {
  validateGzipFormat(compressed);

  try {
    return gunzipSync(compressed);
  } catch (err) {
    throw CompressionError.fromSystemError('gzip', 'decompress', err);
  }
}

/**
 * Compress data as a single gzip member
 *
 * @param level - Compression level 0-9 (default: 6)
 */
export function compress(data: Uint8Array, level: number = DEFAULT_LEVEL): Uint8Array {
  const gzipLevel = toGzipLevel(level);

  try {
    return gzipSync(data, { level: gzipLevel });
  } catch (err) {
    throw CompressionError.fromSystemError('gzip', 'compress', err);
  }
}
