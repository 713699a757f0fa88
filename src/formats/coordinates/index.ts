/**
 * @module formats/coordinates
 * @description Gene coordinates tables (one per genome)
 *
 * @example
 * ```typescript
 * import { CoordinatesParser } from './formats/coordinates';
 *
 * const parser = new CoordinatesParser({ algAliases: false });
 * for (const gene of parser.parseString(text, "species.tsv")) {
 *   console.log(gene.chromosome, gene.alg);
 * }
 * ```
 */

export { CoordinatesParser, isCoordinatesFile, speciesLabel } from "./parser";

export {
  COORDINATE_COLUMNS,
  COORDINATES_EXTENSIONS,
  type CoordinateColumn,
  DEFAULT_ALG_ALIASES,
  DEFAULT_COMMENT_PREFIX,
  DEFAULT_DELIMITER,
  MIN_FIELDS,
  REQUIRED_COLUMNS,
} from "./constants";
