/**
 * krakendb-build - staged builder for taxonomic k-mer classification databases
 *
 * Turns a library of sequence files and a taxonomy dump into a sorted,
 * taxonomy-annotated k-mer database. Every stage is idempotent, so an
 * interrupted build resumes from its first unfinished stage.
 */

// Configuration
export {
  DEFAULT_KMER_LEN,
  DEFAULT_LIBRARY_DIR,
  DEFAULT_MINIMIZER_LEN,
  DEFAULT_TAXONOMY_DIR,
  DEFAULT_THREADS,
  loadBuildParameters,
  taxidFlagsFor,
  toBuildParameters,
} from "./config";
// External engines
export {
  DEFAULT_COUNTER,
  DEFAULT_PROGRAMS,
  type EnginePrograms,
  ExternalEngineLive,
  externalEngineLayer,
  makeExternalEngine,
} from "./engines/commands";
export {
  type ClassifyRequest,
  type CountRequest,
  ExternalEngine,
  type ExternalEngineShape,
  type FetchTaxonomyRequest,
  type MergeRequest,
  type ReduceRequest,
  type SetLCAsRequest,
  type SortRequest,
  type TaxDBRequest,
} from "./engines/service";
// Error types
export {
  BudgetError,
  BuildError,
  ConfigurationError,
  EngineError,
  FileError,
  MissingInputError,
  type StageError,
} from "./errors";
// Library
export { discoverLibrary, findFiles, loadManifest, SEQUENCE_EXTENSIONS } from "./library/discovery";
export { type SequenceStream, sequenceStream, totalLibraryBytes } from "./library/sequence-stream";
export { collectTaxonMaps } from "./library/taxon-map";
// Planning
export { parseHashTableHeader, readHashTableHeader, recordGeometry } from "./planning/header";
export {
  budgetBytes,
  estimateHashSize,
  GIB,
  HASH_SIZE_FACTOR,
  indexSizeBytes,
  parseGiB,
  reductionNeeded,
  targetRecordCount,
} from "./planning/planner";
// Pipeline
export { ARTIFACTS, ArtifactPaths } from "./pipeline/artifacts";
export { buildLogLevel, runBuild } from "./pipeline/driver";
export { formatElapsed, Stopwatch } from "./pipeline/elapsed";
export { triggerReport } from "./pipeline/report";
export { STAGE_SEQUENCE, TAXDUMP_URL } from "./pipeline/stages";
export { clearArtifacts, probePipelineState } from "./pipeline/state";
// Taxonomy
export { compareTaxonomyRecords, sortTaxonomyRecords } from "./taxonomy/records";
// Types
export type {
  BuildParameters,
  BuildSummary,
  HashTableHeader,
  LibraryManifest,
  PipelineState,
  RecordGeometry,
  SizeBudget,
  StageName,
  TaxidFlag,
} from "./types";
export { STAGES } from "./types";
