/**
 * Rearrangement index: how far genomes have scrambled their ancestral
 * linkage groups
 *
 * @example
 * ```typescript
 * import { runPipeline } from "rearrangement-index";
 *
 * const { tables } = await runPipeline("genomes/", { outputDir: "results" });
 * console.log(tables.genomeMatrix());
 * ```
 */

// Compression
export { CompressionDetector, CompressionService, GzipCodec } from "./compression";
export type { CompressionServiceShape } from "./compression";
// Errors
export {
  CompressionError,
  EmptyGenomeWarning,
  FileError,
  InputDirectoryError,
  MalformedInputError,
  RearrangementError,
  ValidationError,
} from "./errors";
// Coordinates tables and result tables
export {
  COORDINATE_COLUMNS,
  COORDINATES_EXTENSIONS,
  CoordinatesParser,
  DEFAULT_ALG_ALIASES,
  DEFAULT_MISSING_MARKER,
  isCoordinatesFile,
  ResultTableWriter,
  speciesLabel,
} from "./formats";
// File I/O
export { FileReader } from "./io/file-reader";
export { writeString } from "./io/file-writer";
// Indexing and aggregation
export {
  ChromosomeAlgTable,
  computeAlgMetrics,
  computeAllAlgMetrics,
  findCoordinatesFiles,
  indexDirectory,
  OUTPUT_FILES,
  RearrangementIndexer,
  rearrangementIndex,
  ResultTables,
  runPipeline,
  writeResultTables,
} from "./operations";
export type { PipelineResult, ResultMatrix } from "./operations";
// Types and schemas
export type {
  AlgAliases,
  AlgMeasure,
  AlgMetrics,
  CompressionDetection,
  CompressionFormat,
  CoordinatesParserOptions,
  FileReaderOptions,
  GeneRecord,
  GenomeIndex,
  GenomeTable,
  PipelineOptions,
  ReportingHooks,
  TableWriterOptions,
  WriteOptions,
} from "./types";
export {
  CoordinatesParserOptionsSchema,
  FileReaderOptionsSchema,
  PipelineOptionsSchema,
  TableWriterOptionsSchema,
  WriteOptionsSchema,
} from "./types";
// CLI
export { main, parseCliArgs, UsageError } from "./cli";
