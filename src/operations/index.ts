/**
 * Rearrangement index operations
 */

export { rearrangementIndex, type ResultMatrix, ResultTables } from "./aggregator";
export {
  ChromosomeAlgTable,
  chromosomeComparator,
  compareLabels,
} from "./core/cross-tabulation";
export { computeAlgMetrics, computeAllAlgMetrics, RearrangementIndexer } from "./indexer";
export {
  findCoordinatesFiles,
  indexDirectory,
  OUTPUT_FILES,
  type PipelineResult,
  runPipeline,
  writeResultTables,
} from "./pipeline";
