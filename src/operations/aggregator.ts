/**
 * Genome-level index and cross-genome result tables
 *
 * Ri is the mean RALG over the ALGs present in a genome. Results from many
 * genomes are collected into ALG x species matrices without any
 * normalization across genomes.
 */

import { ValidationError } from "../errors";
import type { AlgMeasure, AlgMetrics, GenomeIndex } from "../types";
import { compareLabels } from "./core/cross-tabulation";

/**
 * A labelled 2-D table of optional numbers, ready for writing
 *
 * `values[i][j]` is the cell for `rows[i]` and `columns[j]`; undefined cells
 * are missing, which is distinct from a computed zero.
 */
export interface ResultMatrix {
  /** Header of the row label column */
  readonly rowHeader: string;
  readonly rows: readonly string[];
  readonly columns: readonly string[];
  readonly values: ReadonlyArray<ReadonlyArray<number | undefined>>;
}

/**
 * Mean RALG over the given ALGs, or undefined when there are none
 *
 * Summation runs in ALG label order so the result is bit-identical however
 * the ALGs were produced.
 */
export function rearrangementIndex(metrics: Iterable<AlgMetrics>): number | undefined {
  const sorted = Array.from(metrics).sort((a, b) => compareLabels(a.alg, b.alg));
  if (sorted.length === 0) return undefined;

  let sum = 0;
  for (const alg of sorted) {
    sum += alg.rearrangement;
  }
  return sum / sorted.length;
}

/**
 * Per-genome results collected across a run
 *
 * @example
 * ```typescript
 * const tables = ResultTables.fromGenomes(results);
 * const ralg = tables.matrix("rearrangement");
 * ```
 */
export class ResultTables {
  private readonly genomes = new Map<string, GenomeIndex>();

  static fromGenomes(genomes: Iterable<GenomeIndex>): ResultTables {
    const tables = new ResultTables();
    for (const genome of genomes) {
      tables.add(genome);
    }
    return tables;
  }

  /**
   * Add one genome's results
   *
   * @throws {ValidationError} If the species label is already present
   */
  add(genome: GenomeIndex): this {
    if (this.genomes.has(genome.species)) {
      throw new ValidationError(`Duplicate species label: ${genome.species}`);
    }
    this.genomes.set(genome.species, genome);
    return this;
  }

  get size(): number {
    return this.genomes.size;
  }

  genome(species: string): GenomeIndex | undefined {
    return this.genomes.get(species);
  }

  /**
   * Species labels, sorted
   */
  species(): string[] {
    return Array.from(this.genomes.keys()).sort(compareLabels);
  }

  /**
   * Union of ALG labels over all genomes, sorted
   */
  algs(): string[] {
    const labels = new Set<string>();
    for (const genome of this.genomes.values()) {
      for (const alg of genome.algs.keys()) {
        labels.add(alg);
      }
    }
    return Array.from(labels).sort(compareLabels);
  }

  /**
   * One measure for one (ALG, species) cell; undefined when the ALG is absent
   */
  value(measure: AlgMeasure, alg: string, species: string): number | undefined {
    return this.genomes.get(species)?.algs.get(alg)?.[measure];
  }

  /**
   * ALG x species matrix for one measure
   */
  matrix(measure: AlgMeasure): ResultMatrix {
    const rows = this.algs();
    const columns = this.species();
    return {
      rowHeader: "ALG",
      rows,
      columns,
      values: rows.map((alg) => columns.map((species) => this.value(measure, alg, species))),
    };
  }

  /**
   * Species x Ri matrix
   */
  genomeMatrix(): ResultMatrix {
    const rows = this.species();
    return {
      rowHeader: "species",
      rows,
      columns: ["Ri"],
      values: rows.map((species) => [this.genomes.get(species)?.ri]),
    };
  }
}
