/**
 * File reading utilities for coordinates files
 *
 * Promise-based wrappers over the Effect platform FileSystem. Compressed
 * inputs are detected and decompressed transparently.
 */

import { FileSystem, Path } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { CompressionDetector, CompressionService } from "../compression";
import { FileError, RearrangementError } from "../errors";
import type { FileReaderOptions } from "../types";
import { FileReaderOptionsSchema } from "../types";
import { runWithPlatform } from "./runtime";

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  maxFileSize: 1_073_741_824, // 1GB
  autoDecompress: true,
};

/**
 * Check whether a path exists
 */
export async function exists(path: string): Promise<boolean> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.exists(path);
  });

  return withFileError("stat", path, program);
}

/**
 * Check whether a path exists and is a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    if (!(yield* fs.exists(path))) return false;

    const info = yield* fs.stat(path);
    return info.type === "Directory";
  });

  return withFileError("stat", path, program);
}

/**
 * List the regular files directly inside a directory, sorted by name
 *
 * @returns File names (not paths)
 * @throws {FileError} If the directory cannot be read
 */
export async function listFiles(directory: string): Promise<string[]> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;
    const entries = yield* fs.readDirectory(directory);

    const files: string[] = [];
    for (const entry of entries) {
      const info = yield* fs.stat(pathService.join(directory, entry));
      if (info.type === "File") {
        files.push(entry);
      }
    }
    return files.sort();
  });

  return withFileError("list", directory, program);
}

/**
 * Read a whole file to a string, decompressing gzip content when present
 *
 * @throws {FileError} If the file cannot be read or exceeds the size limit
 * @throws {CompressionError} If the file looks compressed but is corrupt
 */
export async function readToString(path: string, options: FileReaderOptions = {}): Promise<string> {
  const mergedOptions = mergeOptions(options);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(path);
    const size = Number(info.size);
    if (size > mergedOptions.maxFileSize) {
      return yield* Effect.fail(
        new FileError(
          `File too large: ${size} bytes exceeds limit of ${mergedOptions.maxFileSize} bytes`,
          path,
          "read"
        )
      );
    }

    const bytes = yield* fs.readFile(path);
    if (!mergedOptions.autoDecompress) {
      return bytes;
    }

    const detection = CompressionDetector.detect(path, bytes);
    const compression = yield* CompressionService;
    return yield* compression.decompress(bytes, detection.format);
  });

  const bytes = await withFileError(
    "read",
    path,
    program.pipe(Effect.provide(CompressionService.Live))
  );
  return new TextDecoder().decode(bytes);
}

export const FileReader = {
  exists,
  isDirectory,
  listFiles,
  readToString,
} as const;

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

/**
 * Run a platform program, turning platform failures into FileError
 */
async function withFileError<A, E>(
  operation: FileError["operation"],
  path: string,
  program: Effect.Effect<A, E, FileSystem.FileSystem | Path.Path>
): Promise<A> {
  try {
    return await runWithPlatform(program);
  } catch (error) {
    if (error instanceof RearrangementError) throw error;
    throw FileError.fromSystemError(operation, path, error);
  }
}

function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const validationResult = FileReaderOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
  }

  return { ...DEFAULT_OPTIONS, ...options };
}
