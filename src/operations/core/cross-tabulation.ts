/**
 * Chromosome x ALG cross-tabulation
 *
 * Sparse gene counts keyed by ALG then chromosome, with per-chromosome totals
 * kept alongside so the combining parameter needs no second pass. Built once
 * per genome and read-only afterwards.
 */

import type { GeneRecord } from '../../types';

/**
 * Total order on chromosome and ALG labels (UTF-16 code unit order)
 *
 * Every iteration over labels goes through this so results never depend on
 * the order genes appeared in the input.
 */
export function compareLabels(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Order for chromosome labels within one genome
 *
 * When every label is a number (assemblies named 1..N), chromosomes sort
 * numerically so "2" precedes "10"; otherwise they sort by code unit.
 */
export function chromosomeComparator(labels: Iterable<string>): (a: string, b: string) => number {
  for (const label of labels) {
    if (label.trim() === '' || !Number.isFinite(Number(label))) {
      return compareLabels;
    }
  }
  return (a, b) => Number(a) - Number(b) || compareLabels(a, b);
}

export class ChromosomeAlgTable {
  private readonly counts = new Map<string, Map<string, number>>();
  private readonly chromosomeTotals = new Map<string, number>();
  private genes = 0;
  private compareChromosomes: (a: string, b: string) => number = compareLabels;

  private constructor() {}

  /**
   * Count genes for every (chromosome, ALG) pair
   */
  static fromGenes(genes: Iterable<Pick<GeneRecord, 'chromosome' | 'alg'>>): ChromosomeAlgTable {
    const table = new ChromosomeAlgTable();
    for (const gene of genes) {
      table.increment(gene.chromosome, gene.alg);
    }
    table.compareChromosomes = chromosomeComparator(table.chromosomeTotals.keys());
    return table;
  }

  get geneCount(): number {
    return this.genes;
  }

  /**
   * ALG labels present, sorted
   */
  algs(): string[] {
    return Array.from(this.counts.keys()).sort(compareLabels);
  }

  /**
   * Chromosome labels present, in chromosome order
   */
  chromosomes(): string[] {
    return Array.from(this.chromosomeTotals.keys()).sort(this.compareChromosomes);
  }

  count(chromosome: string, alg: string): number {
    return this.counts.get(alg)?.get(chromosome) ?? 0;
  }

  /**
   * Genes of one ALG across all chromosomes
   */
  algTotal(alg: string): number {
    let total = 0;
    for (const count of this.counts.get(alg)?.values() ?? []) {
      total += count;
    }
    return total;
  }

  /**
   * Genes of every ALG on one chromosome
   */
  chromosomeTotal(chromosome: string): number {
    return this.chromosomeTotals.get(chromosome) ?? 0;
  }

  /**
   * Chromosomes carrying at least one gene of the ALG, with their counts,
   * in chromosome order
   */
  distribution(alg: string): Array<[chromosome: string, count: number]> {
    const byChromosome = this.counts.get(alg);
    if (byChromosome === undefined) return [];
    return Array.from(byChromosome.entries()).sort(([a], [b]) => this.compareChromosomes(a, b));
  }

  private increment(chromosome: string, alg: string): void {
    let byChromosome = this.counts.get(alg);
    if (byChromosome === undefined) {
      byChromosome = new Map();
      this.counts.set(alg, byChromosome);
    }
    byChromosome.set(chromosome, (byChromosome.get(chromosome) ?? 0) + 1);
    this.chromosomeTotals.set(chromosome, (this.chromosomeTotals.get(chromosome) ?? 0) + 1);
    this.genes++;
  }
}
