/**
 * @module formats/coordinates/parser
 * @description Parser for per-genome gene coordinates tables
 *
 * Each row describes one gene:
 *
 * ```
 * <gene_id>\t<status>\t<chromosome>\t<start>\t<end>\t<alg>
 * ```
 *
 * There is no header row. Fields past the sixth are ignored. Any row that
 * cannot become a gene record aborts the file with MalformedInputError; rows
 * are never dropped silently.
 */

import { type } from "arktype";
import { MalformedInputError, ValidationError } from "../../errors";
import { readToString } from "../../io/file-reader";
import type { AlgAliases, CoordinatesParserOptions, GeneRecord, GenomeTable } from "../../types";
import { CoordinatesParserOptionsSchema } from "../../types";
import {
  COORDINATE_COLUMNS,
  type CoordinateColumn,
  DEFAULT_ALG_ALIASES,
  DEFAULT_COMMENT_PREFIX,
  DEFAULT_DELIMITER,
  MIN_FIELDS,
  REQUIRED_COLUMNS,
} from "./constants";

/**
 * CoordinatesParser - reads coordinates tables into gene records
 *
 * @example
 * ```typescript
 * const parser = new CoordinatesParser();
 * const genome = await parser.loadGenome("genomes/Species_coordinates.tsv");
 * console.log(`${genome.species}: ${genome.genes.length} genes`);
 * ```
 */
export class CoordinatesParser {
  private readonly delimiter: string;
  private readonly commentPrefix: string;
  private readonly skipEmptyLines: boolean;
  private readonly algAliases: AlgAliases;

  constructor(options: CoordinatesParserOptions = {}) {
    const validation = CoordinatesParserOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid coordinates parser options: ${validation.summary}`);
    }

    this.delimiter = options.delimiter ?? DEFAULT_DELIMITER;
    this.commentPrefix = options.commentPrefix ?? DEFAULT_COMMENT_PREFIX;
    this.skipEmptyLines = options.skipEmptyLines ?? true;
    this.algAliases = options.algAliases === false ? {} : (options.algAliases ?? DEFAULT_ALG_ALIASES);
  }

  /**
   * Parse coordinates data from a string
   *
   * @param source - File name used in error messages
   * @throws {MalformedInputError} On the first row that is not a valid gene
   */
  *parseString(data: string, source: string = "<string>"): Iterable<GeneRecord> {
    const lines = data.replace(/^\uFEFF/, "").split(/\r?\n/);
    if (lines[lines.length - 1] === "") {
      lines.pop();
    }

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? "";
      const lineNumber = i + 1;

      if (line.trim() === "") {
        if (this.skipEmptyLines) continue;
        throw MalformedInputError.tooFewFields(source, lineNumber, line, 0, MIN_FIELDS);
      }
      if (line.startsWith(this.commentPrefix)) continue;

      yield this.parseRow(line, lineNumber, source);
    }
  }

  /**
   * Parse a coordinates file, decompressing it when gzipped
   *
   * @throws {FileError} If the file cannot be read
   * @throws {MalformedInputError} On the first invalid row
   */
  async parseFile(path: string): Promise<GeneRecord[]> {
    const data = await readToString(path);
    return Array.from(this.parseString(data, path));
  }

  /**
   * Load one genome table; the species label is the file name
   */
  async loadGenome(path: string): Promise<GenomeTable> {
    const genes = await this.parseFile(path);
    return { species: speciesLabel(path), source: path, genes };
  }

  /**
   * Map an ALG label through the sub-group merge table
   */
  normalizeAlg(alg: string): string {
    return Object.hasOwn(this.algAliases, alg) ? (this.algAliases[alg] ?? alg) : alg;
  }

  private parseRow(line: string, lineNumber: number, source: string): GeneRecord {
    const fields = line.split(this.delimiter).map((field) => field.trim());
    if (fields.length < MIN_FIELDS) {
      throw MalformedInputError.tooFewFields(source, lineNumber, line, fields.length, MIN_FIELDS);
    }

    const value = (column: CoordinateColumn): string =>
      fields[COORDINATE_COLUMNS.indexOf(column)] ?? "";

    for (const column of REQUIRED_COLUMNS) {
      if (value(column) === "") {
        throw MalformedInputError.emptyField(source, lineNumber, line, column);
      }
    }

    const coordinate = (column: "start" | "end"): number => {
      const raw = value(column);
      const parsed = Number(raw);
      if (raw === "" || !Number.isFinite(parsed) || parsed < 0) {
        throw MalformedInputError.invalidCoordinate(source, lineNumber, line, column, raw);
      }
      return parsed;
    };

    return {
      geneId: value("gene_id"),
      status: value("status"),
      chromosome: value("chromosome"),
      start: coordinate("start"),
      end: coordinate("end"),
      alg: this.normalizeAlg(value("alg")),
      lineNumber,
    };
  }
}

/**
 * Species label for a coordinates file: its base name
 */
export function speciesLabel(path: string): string {
  const parts = path.split(/[\\/]/);
  return parts[parts.length - 1] ?? path;
}

/**
 * Whether a file name looks like a coordinates table
 */
export function isCoordinatesFile(name: string, extensions: readonly string[]): boolean {
  return extensions.some((ext) => name.endsWith(ext));
}
