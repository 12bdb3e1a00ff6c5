// Model types
export type { PassScope, HeaderDescriptor, PassRecord, ArtifactHandle, PipelineSide } from './model/pass.js';
export type {
  NameMapping,
  ExclusionSets,
  AlignmentPair,
  AlignmentResult,
  UnmatchedPass,
  UnmatchedReason,
  AmbiguousTarget,
  DivergenceResult,
} from './model/alignment.js';
export { describeScope } from './model/pass.js';

// Errors
export {
  IrDivergeError,
  MissingInputError,
  MalformedMappingError,
  StorageFaultError,
  ConfigError,
} from './errors.js';
export type { ErrorCode } from './errors.js';

// Header scanning and extraction
export type { HeaderDialect, HeaderMatch } from './parser/plugin.js';
export { DialectRegistry } from './parser/registry.js';
export { createDefaultRegistry } from './parser/dialects/index.js';
export { LegacyDialect } from './parser/dialects/legacy/index.js';
export { NpmDialect } from './parser/dialects/npm/index.js';
export { scanHeaders } from './parser/scanner.js';
export { extract, artifactName } from './parser/extractor.js';

// Normalization
export { normalize } from './normalize/normalizer.js';
export { DEFAULT_NORMALIZE_OPTIONS } from './normalize/options.js';
export type { NormalizeOptions } from './normalize/options.js';

// Alignment and comparison
export { align, findAmbiguousTargets } from './align/aligner.js';
export { loadMapping, parseMapping } from './align/mapping.js';
export { findFirstDivergence } from './compare/divergence.js';
export type { ContentReader } from './compare/divergence.js';

// Storage
export type { ArtifactStore } from './storage/artifact-store.js';
export { FileArtifactStore } from './storage/artifact-store.js';
export { RunDatabase, SqliteArtifactStore } from './storage/database.js';

// Runs and reports
export { analyze } from './analysis/analyzer.js';
export type { AnalysisRun, AnalyzeInputs, StoreFactory } from './analysis/analyzer.js';
export type { RunContext } from './analysis/context.js';
export { loadConfig, parseConfig, defaultConfig } from './config/config.js';
export type { IrDivergeConfig } from './config/config.js';
export { createConsoleLogger, createFileLogger, combineLoggers, silentLogger } from './logging/logger.js';
export type { Logger } from './logging/logger.js';
export { buildReport } from './report/report.js';
export type { DivergenceReport } from './report/report.js';
export { formatDivergenceDiff } from './report/diff.js';
export { formatVisualization } from './report/visualization.js';
export { writeReports } from './report/writer.js';
