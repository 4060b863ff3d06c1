export { DEFAULT_CONFIG, loadConfig, resolveConfig } from './config.js';
export {
  ConfigError,
  ConflictingGeotagError,
  LedgerCorruptError,
  LedgerWriteFailure,
  MissingToolError,
  RecoverableParseError,
} from './errors.js';
export {
  dataPaths,
  disposeSidecars,
  openStageContext,
  runClusterStage,
  runMatchStage,
  runResolveStage,
} from './pipeline.js';
export type {
  DataPaths,
  MatchSummary,
  ResolveDependencies,
  ResolveSummary,
  StageContext,
} from './pipeline.js';
export { applyMatchPlan, matchSidecars, writeLeftoverReport } from './matcher.js';
export { Ledger, recordMatches, writeJsonAtomic } from './ledger.js';
export { LogBuffer, RunLog } from './logger.js';
export { runPool } from './pool.js';
export { resolveMediaFile, selectGeotag, selectTimestamp } from './resolver.js';
export { extractRelationships } from './clustering.js';
export { UnionFind } from './union-find.js';
export { standardizeTimestamp, isValidTimestamp, earliestTimestamp } from './timestamp.js';
export { standardizeGeotag, formatGeotag, haversineKm } from './geotag.js';
export { ChainedExtractor, ExifToolExtractor, FfprobeExtractor, verifyTools } from './extractor.js';
export type { MetadataExtractor, ToolRunner } from './extractor.js';
export { ChainedEmbedder, ExifToolEmbedder, FfmpegEmbedder } from './writer.js';
export type { MetadataEmbedder, Resolution } from './writer.js';
export type * from './types.js';
