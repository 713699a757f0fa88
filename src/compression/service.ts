/**
 * Effect-based compression service
 *
 * The file reader and writer reach gzip through this service and provide
 * the `Live` layer themselves.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const svc = yield* CompressionService;
 *   return yield* svc.compress(data, "gzip", 6);
 * });
 *
 * await Effect.runPromise(program.pipe(Effect.provide(CompressionService.Live)));
 * ```
 *
 * @module compression/service
 */

import { Context, Effect, Layer } from "effect";
import { CompressionError } from "../errors";
import type { CompressionFormat } from "../types";
import { compress as compressGzip, decompress as decompressGzip } from "./gzip";

/**
 * Operations offered by the compression service
 */
export interface CompressionServiceShape {
  readonly compress: (
    data: Uint8Array,
    format: CompressionFormat,
    level?: number
  ) => Effect.Effect<Uint8Array, CompressionError>;

  readonly decompress: (
    data: Uint8Array,
    format: CompressionFormat
  ) => Effect.Effect<Uint8Array, CompressionError>;
}

export class CompressionService extends Context.Tag("@rearrangement-index/CompressionService")<
  CompressionService,
  CompressionServiceShape
>() {
  /**
   * Gzip compression backed by fflate
   */
  static readonly Live: Layer.Layer<CompressionService> = Layer.succeed(
    CompressionService,
    createGzipService()
  );
}

function toCompressionError(
  operation: "compress" | "decompress"
): (error: unknown) => CompressionError {
  return (error) =>
    error instanceof CompressionError
      ? error
      : CompressionError.fromSystemError("gzip", operation, error);
}

function createGzipService(): CompressionServiceShape {
  return {
    compress: (data, format, level) =>
      format === "none"
        ? Effect.succeed(data)
        : Effect.try({
            try: () => compressGzip(data, level),
            catch: toCompressionError("compress"),
          }),

    decompress: (data, format) =>
      format === "none"
        ? Effect.succeed(data)
        : Effect.try({
            try: () => decompressGzip(data),
            catch: toCompressionError("decompress"),
          }),
  };
}
