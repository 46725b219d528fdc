import path from 'path';
import { writeGraphJson } from '../../core/graph/records';
import { createLogger } from '../../core/log';
import type { AnalyzeInput } from '../schemas/analyzeSchemas';
import type { CLIResult, CLIError } from '../types';
import { success, error, ErrorReasons } from '../types';
import { isCLIError, loadGraph, summarizeSymbol } from '../helpers';

export async function handleAnalyze(input: AnalyzeInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'analyze' });
  const startedAt = Date.now();

  const graph = await loadGraph(input, log);
  if (isCLIError(graph)) return graph;

  let out: string | undefined;
  if (input.out) {
    out = path.resolve(input.out);
    try {
      await writeGraphJson(graph, out);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      log.error('analyze:export', { ok: false, out, err: message });
      return error(ErrorReasons.EXPORT_FAILED, { message });
    }
  }

  log.info('analyze', {
    ok: true,
    frontEnd: graph.frontEnd,
    symbols: graph.stats.totalSymbols,
    duration_ms: Date.now() - startedAt,
  });

  return success({
    ...(input.from ? { from: path.resolve(input.from) } : { root: path.resolve(input.path) }),
    frontEnd: graph.frontEnd,
    stats: graph.stats,
    diagnostics: graph.diagnostics,
    ...(out ? { out } : {}),
    ...(input.symbols ? { symbols: graph.symbols.map(summarizeSymbol) } : {}),
  });
}
