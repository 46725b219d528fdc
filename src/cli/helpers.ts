import path from 'path';
import { AnalysisError, analyzeProject } from '../core/analyzer';
import type { ProjectGraph } from '../core/graph/projectGraph';
import { readGraphJson } from '../core/graph/records';
import type { AnalysisConfigOverrides } from '../core/scan/config';
import type { ProofSymbol } from '../core/types';
import type { Logger } from '../core/log';
import type { GraphSourceInput } from './schemas/analyzeSchemas';
import { error, ErrorHints, ErrorReasons, type CLIError } from './types';

export function configOverrides(input: GraphSourceInput): AnalysisConfigOverrides {
  return {
    scan: {
      ...(input.workers !== undefined ? { workerCount: input.workers } : {}),
      ...(input.batchSize !== undefined ? { batchSize: input.batchSize } : {}),
    },
    extraction: {
      ...(input.unterminated !== undefined ? { unterminatedProof: input.unterminated } : {}),
      ...(input.maxStatementLength !== undefined ? { maxStatementLength: input.maxStatementLength } : {}),
    },
  };
}

/**
 * Map analysis failures to error envelopes
 *
 * @returns an envelope for known failures, null for anything unexpected
 */
export function analysisErrorToCLI(e: unknown): CLIError | null {
  if (!(e instanceof AnalysisError)) return null;
  const hint = e.reason === 'no_input' ? ErrorHints.NO_INPUT : ErrorHints.ANALYSIS_FAILED;
  return error(e.reason, { message: e.message, hint, diagnostics: e.diagnostics });
}

/**
 * Obtain a graph for a query command
 *
 * Loads `--from` when given, otherwise analyzes `--path`.
 */
export async function loadGraph(input: GraphSourceInput, log: Logger): Promise<ProjectGraph | CLIError> {
  if (input.from) {
    const file = path.resolve(input.from);
    try {
      return await readGraphJson(file);
    } catch (e) {
      log.warn('load_graph_failed', { file, err: e instanceof Error ? e.message : String(e) });
      return error(ErrorReasons.LOAD_FAILED, {
        message: `Cannot load graph export ${file}: ${e instanceof Error ? e.message : String(e)}`,
        hint: ErrorHints.LOAD_FAILED,
      });
    }
  }

  try {
    return await analyzeProject({
      root: input.path,
      mode: input.mode,
      globDir: input.globDir,
      config: configOverrides(input),
      log,
    });
  } catch (e) {
    const mapped = analysisErrorToCLI(e);
    if (mapped) return mapped;
    throw e;
  }
}

export function findSymbol(graph: ProjectGraph, name: string): ProofSymbol | CLIError {
  const symbol = graph.lookup(name);
  if (symbol) return symbol;
  return error(ErrorReasons.SYMBOL_NOT_FOUND, {
    message: `No symbol named ${name}`,
    hint: ErrorHints.SYMBOL_NOT_FOUND,
  });
}

export function isCLIError(value: unknown): value is CLIError {
  return typeof value === 'object' && value !== null && 'ok' in value && value.ok === false;
}

/** Compact symbol view for listings. */
export function summarizeSymbol(s: ProofSymbol): Record<string, unknown> {
  return {
    qualifiedName: s.qualifiedName,
    kind: s.kind,
    keyword: s.keyword,
    status: s.status,
    file: s.file,
    line: s.line,
    tainted: s.tainted,
  };
}
