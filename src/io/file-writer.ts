/**
 * File writing operations using Effect Platform
 *
 * Output tables are compressed when the target path ends in `.gz` or when a
 * compression format is requested explicitly.
 *
 * @module file-writer
 */

import { FileSystem, Path } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { CompressionDetector, CompressionService } from "../compression";
import { FileError, RearrangementError, ValidationError } from "../errors";
import type { WriteOptions } from "../types";
import { WriteOptionsSchema } from "../types";
import { runWithPlatform } from "./runtime";

/**
 * Write string to file (overwrites if exists, creates parent directories)
 *
 * @example Automatic gzip compression
 * ```typescript
 * await writeString("Rearrangement_index.tsv.gz", table);
 * ```
 *
 * @throws {FileError} When the write fails
 * @throws {ValidationError} When options are invalid
 */
export async function writeString(
  path: string,
  content: string,
  options: WriteOptions = {}
): Promise<void> {
  const validation = WriteOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid write options: ${validation.summary}`);
  }

  const autoCompress = options.autoCompress ?? true;
  let compressionFormat = options.compressionFormat ?? "none";
  if (autoCompress && compressionFormat === "none") {
    compressionFormat = CompressionDetector.fromExtension(path);
  }

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;
    const compression = yield* CompressionService;

    const data = yield* compression.compress(
      new TextEncoder().encode(content),
      compressionFormat,
      options.compressionLevel ?? 6
    );

    const parentDir = pathService.dirname(path);
    if (!(yield* fs.exists(parentDir))) {
      yield* fs.makeDirectory(parentDir, { recursive: true });
    }

    yield* fs.writeFile(path, data);
  });

  try {
    await runWithPlatform(program.pipe(Effect.provide(CompressionService.Live)));
  } catch (error) {
    if (error instanceof RearrangementError) throw error;
    throw FileError.fromSystemError("write", path, error);
  }
}
