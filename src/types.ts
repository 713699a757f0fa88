/**
 * Core type definitions for rearrangement index computation
 *
 * Domain types describe genes, genomes and the per-ALG and per-genome results
 * derived from them. Option interfaces are paired with ArkType schemas that
 * validate them at the public entry points.
 */

import { type } from "arktype";

// =============================================================================
// DOMAIN TYPES
// =============================================================================

/**
 * One gene from a coordinates file
 *
 * Only `chromosome` and `alg` take part in the computation; the remaining
 * columns are kept so records can be reported back faithfully.
 */
export interface GeneRecord {
  readonly geneId: string;
  /** Annotation status column (e.g. "Complete"), carried but unused */
  readonly status: string;
  readonly chromosome: string;
  readonly start: number;
  readonly end: number;
  /** Ancestral linkage group label after sub-group merging */
  readonly alg: string;
  /** Source line number for error reporting */
  readonly lineNumber: number;
}

/**
 * All genes of one genome, labelled by the file they came from
 */
export interface GenomeTable {
  /** Species label used as output column header (the source file name) */
  readonly species: string;
  /** Path the table was read from */
  readonly source: string;
  readonly genes: readonly GeneRecord[];
}

/**
 * Per-ALG result for one genome
 */
export interface AlgMetrics {
  readonly alg: string;
  /** Chromosome holding the largest share of this ALG's genes */
  readonly homeChromosome: string;
  /** Number of genes carrying this ALG label in the genome */
  readonly geneCount: number;
  /** SCHR: largest fraction of the ALG's genes found on one chromosome */
  readonly splitting: number;
  /** CCHR: fraction of the home chromosome's genes that belong to the ALG */
  readonly combining: number;
  /** RALG: 1 - SCHR x CCHR */
  readonly rearrangement: number;
}

/**
 * Per-genome result
 */
export interface GenomeIndex {
  readonly species: string;
  readonly geneCount: number;
  /** Per-ALG metrics keyed by ALG label, in sorted label order */
  readonly algs: ReadonlyMap<string, AlgMetrics>;
  /** Ri, or undefined when the genome has no genes */
  readonly ri: number | undefined;
}

/**
 * The three per-ALG measures written as ALG x species tables
 */
export type AlgMeasure = "rearrangement" | "splitting" | "combining";

/**
 * Mapping from sub-group ALG labels to the ALG they are merged into
 */
export type AlgAliases = Readonly<Record<string, string>>;

/**
 * Compression formats understood by the reader and writer
 */
export type CompressionFormat = "gzip" | "none";

/**
 * Compression detection result with confidence scoring
 */
export interface CompressionDetection {
  readonly format: CompressionFormat;
  /** Detection confidence level (0-1) */
  readonly confidence: number;
  readonly magicBytes?: Uint8Array;
  readonly detectionMethod: "magic-bytes" | "extension";
}

// =============================================================================
// OPTION TYPES
// =============================================================================

/**
 * Hooks shared by every stage that reports progress or warnings
 */
export interface ReportingHooks {
  /** Progress messages (default: console.log) */
  onProgress?: (message: string) => void;
  /** Non-fatal problems such as empty genomes (default: console.warn) */
  onWarning?: (warning: string) => void;
}

/**
 * Coordinates parser configuration
 */
export interface CoordinatesParserOptions {
  /** Field delimiter (default: tab) */
  delimiter?: string;
  /** Lines starting with this prefix are skipped (default: "#") */
  commentPrefix?: string;
  /** Skip whitespace-only lines (default: true) */
  skipEmptyLines?: boolean;
  /** Sub-group merge table, or false to keep labels as given */
  algAliases?: AlgAliases | false;
}

/**
 * File reading configuration options
 */
export interface FileReaderOptions {
  /** Maximum file size in bytes (default: 1GB) */
  readonly maxFileSize?: number;
  /** Decompress gzip input transparently (default: true) */
  readonly autoDecompress?: boolean;
}

/**
 * File writing configuration options
 */
export interface WriteOptions {
  /** Automatically compress based on file extension (default: true) */
  readonly autoCompress?: boolean;
  /** Override compression format detection (default: auto-detect from extension) */
  readonly compressionFormat?: CompressionFormat;
  /** Compression level 1-9 for gzip (default: 6) */
  readonly compressionLevel?: number;
}

/**
 * Result table formatting options
 */
export interface TableWriterOptions {
  /** Marker written for cells with no value (default: "NA") */
  missing?: string;
  /** Decimal places for numbers; full precision when omitted */
  precision?: number;
  lineEnding?: "\n" | "\r\n";
}

/**
 * End-to-end pipeline configuration
 */
export interface PipelineOptions extends ReportingHooks {
  /** Directory receiving the output tables (default: current directory) */
  outputDir?: string;
  /** Number of genomes processed in parallel (default: 4) */
  concurrency?: number;
  /** Decimal places in output tables; full precision when omitted */
  precision?: number;
  /** Missing-cell marker (default: "NA") */
  missing?: string;
  /** Sub-group merge table, or false to keep labels as given */
  algAliases?: AlgAliases | false;
  /** Gzip the output tables (default: false) */
  compress?: boolean;
}

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

const AlgAliasesSchema = type("Record<string, string> | false");

// A numeric marker would be indistinguishable from a computed value
function isNumericMarker(missing: string | undefined): boolean {
  const trimmed = missing?.trim();
  return trimmed !== undefined && trimmed !== "" && !Number.isNaN(Number(trimmed));
}

/**
 * ArkType schema for coordinates parser options
 */
export const CoordinatesParserOptionsSchema = type({
  "delimiter?": "string",
  "commentPrefix?": "string",
  "skipEmptyLines?": "boolean",
  "algAliases?": AlgAliasesSchema,
}).narrow((options, ctx) => {
  if (options.delimiter !== undefined && options.delimiter.length !== 1) {
    return ctx.reject({
      path: ["delimiter"],
      expected: "single character delimiter",
      actual: `${options.delimiter.length} characters`,
    });
  }

  if (options.commentPrefix !== undefined && options.commentPrefix.length === 0) {
    return ctx.reject({
      path: ["commentPrefix"],
      expected: "non-empty comment prefix",
      actual: "empty string",
    });
  }

  return true;
});

/**
 * ArkType schema for result table formatting options
 */
export const TableWriterOptionsSchema = type({
  "missing?": "string",
  "precision?": "0 <= number <= 17",
  "lineEnding?": type.enumerated("\n", "\r\n"),
}).narrow((options, ctx) => {
  if (options.precision !== undefined && !Number.isInteger(options.precision)) {
    return ctx.reject({
      path: ["precision"],
      expected: "an integer number of decimal places",
      actual: String(options.precision),
    });
  }

  if (isNumericMarker(options.missing)) {
    return ctx.reject({
      path: ["missing"],
      expected: "a non-numeric missing marker",
      actual: String(options.missing),
    });
  }

  return true;
});

/**
 * File reader options validation schema
 */
export const FileReaderOptionsSchema = type({
  "maxFileSize?": "number>=0",
  "autoDecompress?": "boolean",
});

/**
 * Write options validation schema
 */
export const WriteOptionsSchema = type({
  "autoCompress?": "boolean",
  "compressionFormat?": '"gzip"|"none"',
  "compressionLevel?": "1 <= number <= 9",
});

/**
 * ArkType schema for pipeline options (hooks are validated separately)
 *
 * Output formatting options follow the same rules as the table writer so a
 * bad value fails before any genome is read.
 */
export const PipelineOptionsSchema = type({
  "outputDir?": "string>0",
  "concurrency?": "1 <= number <= 256",
  "precision?": "0 <= number <= 17",
  "missing?": "string",
  "algAliases?": AlgAliasesSchema,
  "compress?": "boolean",
}).narrow((options, ctx) => {
  if (options.concurrency !== undefined && !Number.isInteger(options.concurrency)) {
    return ctx.reject({
      path: ["concurrency"],
      expected: "an integer",
      actual: String(options.concurrency),
    });
  }

  if (options.precision !== undefined && !Number.isInteger(options.precision)) {
    return ctx.reject({
      path: ["precision"],
      expected: "an integer number of decimal places",
      actual: String(options.precision),
    });
  }

  if (isNumericMarker(options.missing)) {
    return ctx.reject({
      path: ["missing"],
      expected: "a non-numeric missing marker",
      actual: String(options.missing),
    });
  }

  return true;
});
