export * from './core/types';
export { createLogger, parseLogThreshold, type Logger, type LoggerOptions, type LogLevel, type LogThreshold } from './core/log';
export {
  defaultAnalysisRuntimeConfig,
  mergeRuntimeConfig,
  type AnalysisConfigOverrides,
  type AnalysisRuntimeConfig,
  type ExtractionConfig,
  type ScanConfig,
  type UnterminatedProofPolicy,
} from './core/scan/config';
export { stripComments, stripCommentBytes } from './core/parser/comments';
export { splitSentences, type Sentence } from './core/parser/sentences';
export type { FrontEnd } from './core/parser/adapter';
export { HeuristicFrontEnd, scanVernacular, stepVernacular, initialVernacularState, type VernacularState } from './core/parser/vernacular';
export { MetadataFrontEnd } from './core/parser/metadata';
export { parseMetadata, type ParsedMetadata } from './core/parser/globFile';
export { SymbolTable, FIRST_REGISTERED_WINS, assignUniqueNames } from './core/graph/symbolTable';
export { resolveStructural, resolveTextual, type Resolution } from './core/graph/resolver';
export { buildAdjacency, type Adjacency } from './core/graph/dependencyGraph';
export { computeTaint, blastRadius, downstreamOf, findUnused, type TaintResult } from './core/graph/taint';
export { ProjectGraph, buildProjectGraph, type BuildGraphOptions } from './core/graph/projectGraph';
export {
  toRecords,
  fromRecords,
  exportGraph,
  importGraph,
  readGraphJson,
  writeGraphJson,
  type SymbolRecord,
  type GraphExport,
} from './core/graph/records';
export { discoverSources, discoverMetadataPairs } from './core/discovery';
export {
  AnalysisError,
  analyzeProject,
  analyzeSources,
  createFrontEnd,
  type AnalysisMode,
  type AnalyzeProjectOptions,
} from './core/analyzer';
