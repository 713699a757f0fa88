/**
 * Compression support for coordinates files and result tables
 *
 * @example
 * ```typescript
 * import { CompressionDetector, GzipCodec } from './compression';
 *
 * const detection = CompressionDetector.detect('genome.tsv.gz', bytes);
 * if (detection.format === 'gzip') {
 *   const text = new TextDecoder().decode(GzipCodec.decompress(bytes));
 * }
 * ```
 */

export { CompressionDetector } from './detector';
export { CompressionService, type CompressionServiceShape } from './service';

import { compress, decompress } from './gzip';

export const GzipCodec = {
  compress,
  decompress,
} as const;

export type { CompressionDetection, CompressionFormat } from '../types';
