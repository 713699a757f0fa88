/**
 * @module formats/table/writer
 * @description TSV writer for labelled result matrices
 *
 * Output layout:
 *
 * ```
 * ALG<TAB>species_a.tsv<TAB>species_b.tsv
 * A1<TAB>0.25<TAB>NA
 * ```
 *
 * Missing cells are written with a non-numeric marker so they can never be
 * read back as a computed zero.
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import { writeString } from "../../io/file-writer";
import type { ResultMatrix } from "../../operations/aggregator";
import type { TableWriterOptions, WriteOptions } from "../../types";
import { TableWriterOptionsSchema } from "../../types";

export const DEFAULT_MISSING_MARKER = "NA";

/**
 * ResultTableWriter - formats result matrices as TSV
 *
 * @example
 * ```typescript
 * const writer = new ResultTableWriter({ precision: 4 });
 * await writer.writeFile("Rearrangement_index.tsv", tables.matrix("rearrangement"));
 * ```
 */
export class ResultTableWriter {
  private readonly delimiter = "\t";
  private readonly missing: string;
  private readonly precision: number | undefined;
  private readonly lineEnding: string;

  constructor(options: TableWriterOptions = {}) {
    const validation = TableWriterOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid table writer options: ${validation.summary}`);
    }

    this.missing = options.missing ?? DEFAULT_MISSING_MARKER;
    this.precision = options.precision;
    this.lineEnding = options.lineEnding ?? "\n";
  }

  /**
   * Format one cell value
   */
  formatValue(value: number | undefined): string {
    if (value === undefined) return this.missing;
    return this.precision === undefined ? String(value) : value.toFixed(this.precision);
  }

  /**
   * Format a label, rejecting characters that would break the layout
   *
   * @throws {ValidationError} If the label contains a tab or line break
   */
  formatLabel(label: string): string {
    if (/[\t\r\n]/.test(label)) {
      throw new ValidationError(`Label cannot be written to TSV: ${JSON.stringify(label)}`);
    }
    return label;
  }

  /**
   * Format a whole matrix, header first, each line terminated
   */
  formatMatrix(matrix: ResultMatrix): string {
    const lines: string[] = [
      [matrix.rowHeader, ...matrix.columns].map((label) => this.formatLabel(label)).join(this.delimiter),
    ];

    matrix.rows.forEach((row, i) => {
      const values = matrix.values[i] ?? [];
      const cells = matrix.columns.map((_, j) => this.formatValue(values[j]));
      lines.push([this.formatLabel(row), ...cells].join(this.delimiter));
    });

    return lines.map((line) => line + this.lineEnding).join("");
  }

  /**
   * Write a matrix to a file, gzipped when the path ends in `.gz`
   */
  async writeFile(path: string, matrix: ResultMatrix, options: WriteOptions = {}): Promise<void> {
    await writeString(path, this.formatMatrix(matrix), options);
  }
}
