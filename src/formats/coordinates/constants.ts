/**
 * Coordinates Format Constants
 *
 * Column layout of the per-genome coordinates tables and the default ALG
 * sub-group merge table.
 */

/**
 * Column order of a coordinates row
 */
export const COORDINATE_COLUMNS = [
  "gene_id",
  "status",
  "chromosome",
  "start",
  "end",
  "alg",
] as const;

export type CoordinateColumn = (typeof COORDINATE_COLUMNS)[number];

/**
 * Minimum number of fields in a coordinates row
 */
export const MIN_FIELDS = COORDINATE_COLUMNS.length;

/**
 * Columns that must hold a non-empty value
 */
export const REQUIRED_COLUMNS: readonly CoordinateColumn[] = ["gene_id", "chromosome", "alg"];

/**
 * Bilaterian ALGs recorded as sub-parts, merged into their parent group
 */
export const DEFAULT_ALG_ALIASES = {
  A1a: "A1",
  A1b: "A1",
  Ea: "E",
  Eb: "E",
  Qa: "Q",
  Qb: "Q",
  Qc: "Q",
  Qd: "Q",
} as const satisfies Record<string, string>;

/**
 * File name endings accepted as coordinates tables
 */
export const COORDINATES_EXTENSIONS = [".tsv", ".tsv.gz"] as const;

export const DEFAULT_DELIMITER = "\t";

export const DEFAULT_COMMENT_PREFIX = "#";
