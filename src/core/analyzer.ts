import fs from 'fs-extra';
import path from 'path';
import type { FrontEndId, ScanDiagnostic, SourceInput } from './types';
import type { FrontEnd } from './parser/adapter';
import { HeuristicFrontEnd } from './parser/vernacular';
import { MetadataFrontEnd } from './parser/metadata';
import { buildProjectGraph, type ProjectGraph } from './graph/projectGraph';
import { discoverMetadataPairs, discoverSources } from './discovery';
import { mergeRuntimeConfig, type AnalysisConfigOverrides, type AnalysisRuntimeConfig } from './scan/config';
import { runParallelScan, type ScanTask } from './scan/parallel';
import { createLogger, type Logger } from './log';
import { toPosixPath } from './paths';

export type AnalysisMode = FrontEndId | 'auto';

export type AnalysisFailureReason = 'no_input' | 'analysis_failed';

/** The run produced no graph at all. */
export class AnalysisError extends Error {
  constructor(
    message: string,
    public readonly reason: AnalysisFailureReason,
    public readonly diagnostics: readonly ScanDiagnostic[] = [],
  ) {
    super(message);
    this.name = 'AnalysisError';
  }
}

export function createFrontEnd(id: FrontEndId): FrontEnd {
  return id === 'metadata' ? new MetadataFrontEnd() : new HeuristicFrontEnd();
}

export interface AnalyzeTasksOptions {
  frontEnd: FrontEndId;
  config?: AnalysisRuntimeConfig;
  log?: Logger;
  /** Diagnostics produced before scanning (e.g. sources without metadata). */
  diagnostics?: readonly ScanDiagnostic[];
  onProgress?: (p: { totalFiles: number; processedFiles: number; currentFile?: string }) => void;
}

/**
 * Scan every task concurrently, then run the whole-project phase once over
 * the successful scans. Throws when there is nothing to scan or nothing
 * scanned.
 */
export async function analyzeTasks(tasks: readonly ScanTask[], options: AnalyzeTasksOptions): Promise<ProjectGraph> {
  const log = options.log ?? createLogger({ component: 'analyzer' });
  const config = options.config ?? mergeRuntimeConfig();
  if (tasks.length === 0) {
    throw new AnalysisError('no source files to analyze', 'no_input', options.diagnostics);
  }

  const frontEnd = createFrontEnd(options.frontEnd);
  const { scans, failures } = await log.span(
    'scan',
    { frontEnd: frontEnd.id, files: tasks.length, workers: config.scan.workerCount },
    () => runParallelScan({ tasks, frontEnd, config, log, onProgress: options.onProgress }),
    (res) => ({ scanned: res.scans.length, skipped: res.failures.length }),
  );

  const diagnostics = [...(options.diagnostics ?? []), ...failures];
  if (scans.length === 0) {
    throw new AnalysisError(`none of the ${tasks.length} files could be scanned`, 'analysis_failed', diagnostics);
  }

  const graph = buildProjectGraph(scans, { frontEnd: frontEnd.id, diagnostics });
  log.info('graph_built', {
    frontEnd: frontEnd.id,
    files: graph.stats.files,
    skipped: failures.length,
    symbols: graph.stats.totalSymbols,
    tainted: graph.stats.tainted,
  });
  return graph;
}

export interface AnalyzeSourcesOptions {
  frontEnd: FrontEndId;
  config?: AnalysisConfigOverrides;
  log?: Logger;
}

/** In-memory entry point: the caller already holds the bytes. */
export async function analyzeSources(inputs: readonly SourceInput[], options: AnalyzeSourcesOptions): Promise<ProjectGraph> {
  const tasks: ScanTask[] = inputs.map((input) => ({ path: input.path, load: async () => input }));
  return analyzeTasks(tasks, { frontEnd: options.frontEnd, config: mergeRuntimeConfig(options.config), log: options.log });
}

export interface AnalyzeProjectOptions {
  root: string;
  mode?: AnalysisMode;
  /** Extra directory searched for metadata files. */
  globDir?: string;
  config?: AnalysisConfigOverrides;
  log?: Logger;
  onProgress?: (p: { totalFiles: number; processedFiles: number; currentFile?: string }) => void;
}

/**
 * Discover, scan and link a proof development on disk. `auto` picks the
 * metadata front-end when at least one source has metadata.
 */
export async function analyzeProject(options: AnalyzeProjectOptions): Promise<ProjectGraph> {
  const root = path.resolve(options.root);
  const log = options.log ?? createLogger({ component: 'analyzer', root: toPosixPath(root) });
  const config = mergeRuntimeConfig(options.config);
  const mode = options.mode ?? 'auto';

  if (!(await fs.pathExists(root))) {
    throw new AnalysisError(`project root does not exist: ${root}`, 'no_input');
  }

  if (mode !== 'heuristic') {
    const { pairs, missing } = await discoverMetadataPairs(root, { globDir: options.globDir });
    if (pairs.length > 0 || mode === 'metadata') {
      if (pairs.length === 0) {
        throw new AnalysisError(`no source file under ${root} has compiler metadata`, 'no_input');
      }
      const diagnostics: ScanDiagnostic[] = missing.map((file) => ({
        file,
        severity: 'warning',
        message: 'no compiler metadata found; file not analyzed',
      }));
      const tasks: ScanTask[] = pairs.map((pair) => ({
        path: pair.source,
        load: async () => ({
          path: pair.source,
          content: await fs.readFile(path.join(root, pair.source)),
          metadata: await fs.readFile(pair.metadata, 'utf-8'),
        }),
      }));
      return analyzeTasks(tasks, { frontEnd: 'metadata', config, log, diagnostics, onProgress: options.onProgress });
    }
    log.debug('metadata_not_found', { sources: missing.length });
  }

  const sources = await discoverSources(root);
  const tasks: ScanTask[] = sources.map((source) => ({
    path: source,
    load: async () => ({ path: source, content: await fs.readFile(path.join(root, source)) }),
  }));
  return analyzeTasks(tasks, { frontEnd: 'heuristic', config, log, onProgress: options.onProgress });
}
