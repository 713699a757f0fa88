/**
 * Per-ALG rearrangement metrics
 *
 * For each ALG present in a genome:
 *
 *   SCHR = largest share of the ALG's genes found on a single chromosome
 *   CCHR = share of that chromosome's genes belonging to the ALG
 *   RALG = 1 - SCHR x CCHR
 *
 * A chromosome carrying an intact ALG and nothing else scores RALG = 0;
 * splitting lowers SCHR and fusion lowers CCHR.
 */

import { EmptyGenomeWarning, ValidationError } from "../errors";
import type { AlgMetrics, GenomeIndex, GenomeTable, ReportingHooks } from "../types";
import { rearrangementIndex } from "./aggregator";
import { ChromosomeAlgTable } from "./core/cross-tabulation";

/**
 * Compute SCHR, CCHR and RALG for one ALG
 *
 * When several chromosomes share the largest count, the first in chromosome
 * order (numeric for all-numeric labels) is the home chromosome. SCHR is the same for all of them; CCHR may not be.
 *
 * @throws {ValidationError} If the ALG has no genes in the table
 */
export function computeAlgMetrics(table: ChromosomeAlgTable, alg: string): AlgMetrics {
  let homeChromosome: string | undefined;
  let homeCount = 0;
  for (const [chromosome, count] of table.distribution(alg)) {
    if (count > homeCount) {
      homeChromosome = chromosome;
      homeCount = count;
    }
  }

  if (homeChromosome === undefined) {
    throw new ValidationError(`ALG "${alg}" has no genes in this genome`);
  }

  const geneCount = table.algTotal(alg);
  const splitting = homeCount / geneCount;
  const combining = homeCount / table.chromosomeTotal(homeChromosome);

  return {
    alg,
    homeChromosome,
    geneCount,
    splitting,
    combining,
    rearrangement: 1 - splitting * combining,
  };
}

/**
 * Metrics for every ALG in the table, keyed and ordered by ALG label
 */
export function computeAllAlgMetrics(table: ChromosomeAlgTable): Map<string, AlgMetrics> {
  const metrics = new Map<string, AlgMetrics>();
  for (const alg of table.algs()) {
    metrics.set(alg, computeAlgMetrics(table, alg));
  }
  return metrics;
}

/**
 * Indexes genome tables
 *
 * @example
 * ```typescript
 * const indexer = new RearrangementIndexer();
 * const result = indexer.indexGenome(genome);
 * console.log(`${result.species}: Ri = ${result.ri}`);
 * ```
 */
export class RearrangementIndexer {
  private readonly onWarning: (warning: string) => void;

  constructor(options: Pick<ReportingHooks, "onWarning"> = {}) {
    this.onWarning = options.onWarning ?? ((warning: string): void => console.warn(warning));
  }

  /**
   * Per-ALG metrics and Ri for one genome
   *
   * A genome without genes yields no ALGs and a missing Ri; an
   * EmptyGenomeWarning is reported through the warning hook.
   */
  indexGenome(genome: GenomeTable): GenomeIndex {
    const table = ChromosomeAlgTable.fromGenes(genome.genes);
    const algs = computeAllAlgMetrics(table);

    if (table.geneCount === 0) {
      this.onWarning(new EmptyGenomeWarning(genome.species).message);
    }

    return {
      species: genome.species,
      geneCount: table.geneCount,
      algs,
      ri: rearrangementIndex(algs.values()),
    };
  }
}
