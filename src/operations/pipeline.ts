/**
 * End-to-end rearrangement index run over a directory of coordinates files
 *
 * Each genome is loaded and indexed independently, several at a time; the
 * per-genome results are then folded into the result tables and written.
 */

import { join } from "node:path";
import { type } from "arktype";
import { Effect } from "effect";
import { InputDirectoryError, ValidationError } from "../errors";
import {
  COORDINATES_EXTENSIONS,
  CoordinatesParser,
  isCoordinatesFile,
} from "../formats/coordinates";
import { ResultTableWriter } from "../formats/table";
import { exists, isDirectory, listFiles } from "../io/file-reader";
import { runToPromise } from "../io/runtime";
import type { AlgMeasure, GenomeIndex, PipelineOptions } from "../types";
import { PipelineOptionsSchema } from "../types";
import { ResultTables } from "./aggregator";
import { RearrangementIndexer } from "./indexer";

/**
 * Output file names for each table
 */
export const OUTPUT_FILES = {
  rearrangement: "Rearrangement_index.tsv",
  splitting: "Splitting_parameter.tsv",
  combining: "Combining_parameter.tsv",
  genome: "Genome_rearrangement_index.tsv",
} as const satisfies Record<AlgMeasure | "genome", string>;

const OUTPUT_LABELS: Record<keyof typeof OUTPUT_FILES, string> = {
  rearrangement: "Rearrangement indices",
  splitting: "Splitting parameters",
  combining: "Combining parameters",
  genome: "Genome rearrangement indices",
};

const DEFAULT_CONCURRENCY = 4;

export interface PipelineResult {
  readonly tables: ResultTables;
  /** Paths of the tables written, in OUTPUT_FILES order */
  readonly outputs: readonly string[];
}

/**
 * Paths of the coordinates files in a directory, sorted by name
 *
 * @throws {InputDirectoryError} If the directory is missing, not a directory,
 * or holds no coordinates files
 */
export async function findCoordinatesFiles(inputDir: string): Promise<string[]> {
  if (!(await exists(inputDir))) {
    throw InputDirectoryError.missing(inputDir);
  }
  if (!(await isDirectory(inputDir))) {
    throw InputDirectoryError.notDirectory(inputDir);
  }

  const files = (await listFiles(inputDir)).filter((name) =>
    isCoordinatesFile(name, COORDINATES_EXTENSIONS)
  );
  if (files.length === 0) {
    throw InputDirectoryError.empty(inputDir, COORDINATES_EXTENSIONS);
  }

  return files.map((name) => join(inputDir, name));
}

/**
 * Load and index every coordinates file in a directory
 *
 * Any malformed file fails the whole run.
 */
export async function indexDirectory(
  inputDir: string,
  options: PipelineOptions = {}
): Promise<ResultTables> {
  const config = validateOptions(options);
  const onProgress = options.onProgress ?? ((message: string): void => console.log(message));

  const paths = await findCoordinatesFiles(inputDir);
  const parser = new CoordinatesParser(
    config.algAliases === undefined ? {} : { algAliases: config.algAliases }
  );
  const indexer = new RearrangementIndexer(
    options.onWarning === undefined ? {} : { onWarning: options.onWarning }
  );

  const indexFile = (path: string): Effect.Effect<GenomeIndex, unknown> =>
    Effect.tryPromise({
      try: async () => {
        onProgress(`Processing file: ${path}`);
        const genome = await parser.loadGenome(path);
        return indexer.indexGenome(genome);
      },
      catch: (error) => error,
    });

  const genomes = await runToPromise(
    Effect.forEach(paths, indexFile, {
      concurrency: config.concurrency ?? DEFAULT_CONCURRENCY,
    })
  );

  return ResultTables.fromGenomes(genomes);
}

/**
 * Write the four result tables
 *
 * @returns Paths written
 */
export async function writeResultTables(
  tables: ResultTables,
  options: PipelineOptions = {}
): Promise<string[]> {
  const config = validateOptions(options);
  const onProgress = options.onProgress ?? ((message: string): void => console.log(message));
  const writer = new ResultTableWriter({
    ...(config.missing !== undefined ? { missing: config.missing } : {}),
    ...(config.precision !== undefined ? { precision: config.precision } : {}),
  });

  const outputDir = config.outputDir ?? ".";
  const suffix = config.compress === true ? ".gz" : "";
  const outputs: string[] = [];

  for (const key of ["rearrangement", "splitting", "combining", "genome"] as const) {
    const path = join(outputDir, OUTPUT_FILES[key] + suffix);
    const matrix = key === "genome" ? tables.genomeMatrix() : tables.matrix(key);
    await writer.writeFile(path, matrix);
    onProgress(`${OUTPUT_LABELS[key]} saved to ${path}`);
    outputs.push(path);
  }

  return outputs;
}

/**
 * Index a directory and write the result tables
 *
 * @example
 * ```typescript
 * const { tables } = await runPipeline("genomes/", { outputDir: "results" });
 * for (const species of tables.species()) {
 *   console.log(species, tables.genome(species)?.ri);
 * }
 * ```
 */
export async function runPipeline(
  inputDir: string,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const tables = await indexDirectory(inputDir, options);
  const outputs = await writeResultTables(tables, options);
  return { tables, outputs };
}

function validateOptions(
  options: PipelineOptions
): Omit<PipelineOptions, "onProgress" | "onWarning"> {
  const { onProgress: _onProgress, onWarning: _onWarning, ...config } = options;
  const validation = PipelineOptionsSchema(config);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid pipeline options: ${validation.summary}`);
  }
  return config;
}
