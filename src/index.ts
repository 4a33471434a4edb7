/**
 * ionflow - Ion Torrent 16S amplicon pipeline driver
 *
 * Runs QIIME 2, SAMtools and the BIOM converter in a fixed sequence of
 * stages, from raw read archives to feature tables, taxonomy, a rooted
 * phylogeny, diversity metrics and flat exports.
 */

// Archive extraction
export { extractArchive, type ExtractionResult } from "./archive";
// Configuration
export {
  DEFAULT_CONFIG,
  loadConfigFile,
  type PipelineConfig,
  type PipelineConfigInput,
  PipelineConfigInputSchema,
  PipelineConfigSchema,
  resolveConfig,
} from "./config";
// Error types
export {
  ArchiveError,
  ArtifactMissingError,
  ConfigError,
  ERROR_SUGGESTIONS,
  FileError,
  getErrorSuggestion,
  ManifestError,
  PipelineError,
  type PipelineFailure,
  ToolExecutionError,
  ValidationError,
} from "./errors";
// Manifest and metadata tables
export {
  CASE_INSENSITIVE_ID_HEADERS,
  CASE_SENSITIVE_ID_HEADERS,
  checkSampleCoverage,
  isIdHeader,
  parseManifest,
  parseMetadata,
  parseTabular,
} from "./formats";
// Stages and driver
export {
  createLayout,
  formatReport,
  OUTPUT_SUBDIRECTORIES,
  type OutputLayout,
  type PipelineReport,
  runPipeline,
  STAGES,
  type StageContext,
  type StageDefinition,
} from "./pipeline";
// External tools
export {
  bam2fq,
  biomToTsv,
  formatCommandLine,
  qiime,
  ToolRunner,
  type ToolRunnerOptions,
  type ToolRunnerShape,
} from "./tools";
// Core types
export {
  type ArtifactRef,
  type ManifestEntry,
  type ReadDirection,
  ReadDirectionSchema,
  type SampleMetadata,
  STAGE_ORDER,
  type StageId,
  type StageResult,
  type ToolInvocation,
  type ToolName,
} from "./types";
