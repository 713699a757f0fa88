/**
 * Shared fixtures for rearrangement index tests
 */

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { GeneRecord, GenomeTable } from "../src/types";

/**
 * [chromosome, alg, gene count]
 */
export type Placement = readonly [chromosome: string, alg: string, count: number];

/**
 * Gene records placed on chromosomes, numbered g1, g2, ... in order
 */
export function genesFor(placements: readonly Placement[]): GeneRecord[] {
  const genes: GeneRecord[] = [];
  for (const [chromosome, alg, count] of placements) {
    for (let i = 0; i < count; i++) {
      const n = genes.length + 1;
      genes.push({
        geneId: `g${n}`,
        status: "Complete",
        chromosome,
        start: n * 1000,
        end: n * 1000 + 500,
        alg,
        lineNumber: n,
      });
    }
  }
  return genes;
}

export function genomeFor(species: string, placements: readonly Placement[]): GenomeTable {
  return { species, source: species, genes: genesFor(placements) };
}

/**
 * Coordinates file text for the given placements
 */
export function coordinatesText(placements: readonly Placement[]): string {
  return genesFor(placements)
    .map((g) => [g.geneId, g.status, g.chromosome, g.start, g.end, g.alg].join("\t") + "\n")
    .join("");
}

/** Four ALGs, each alone and intact on its own chromosome */
export const SCENARIO_A: readonly Placement[] = [
  ["chr1", "A1", 5],
  ["chr2", "B1", 5],
  ["chr3", "C1", 5],
  ["chr4", "D", 5],
];

/** A1 split 3/2 across two chromosomes; the rest intact */
export const SCENARIO_B: readonly Placement[] = [
  ["chr1", "A1", 3],
  ["chr5", "A1", 2],
  ["chr2", "B1", 5],
  ["chr3", "C1", 5],
  ["chr4", "D", 5],
];

/** A1 and B1 fused on one chromosome; the rest intact */
export const SCENARIO_D: readonly Placement[] = [
  ["chr1", "A1", 5],
  ["chr1", "B1", 5],
  ["chr3", "C1", 5],
  ["chr4", "D", 5],
];

/** Splits and fusions together */
export const SCENARIO_G: readonly Placement[] = [
  ["chr1", "blue", 3],
  ["chr1", "green", 1],
  ["chr2", "green", 2],
  ["chr2", "yellow", 2],
  ["chr3", "green", 2],
  ["chr3", "yellow", 2],
  ["chr4", "blue", 1],
  ["chr4", "yellow", 1],
  ["chr5", "red", 2],
  ["chr6", "red", 2],
  ["chr7", "blue", 1],
  ["chr7", "red", 1],
];

/**
 * Fresh temporary directory and its cleanup
 */
export function makeTempDir(prefix: string): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), `${prefix}-`));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}
