import { createLogger } from '../../core/log';
import type {
  GraphBlastInput,
  GraphDependentsInput,
  GraphListInput,
  GraphSymbolInput,
} from '../schemas/graphSchemas';
import type { CLIResult, CLIError } from '../types';
import { success } from '../types';
import { findSymbol, isCLIError, loadGraph, summarizeSymbol } from '../helpers';

export async function handleGraphShow(input: GraphSymbolInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'graph:show' });
  const graph = await loadGraph(input, log);
  if (isCLIError(graph)) return graph;
  const symbol = findSymbol(graph, input.name);
  if (isCLIError(symbol)) return symbol;

  return success({
    symbol,
    blastRadius: graph.blastRadius(symbol.qualifiedName),
    unused: symbol.dependents.length === 0,
  });
}

export async function handleGraphDeps(input: GraphSymbolInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'graph:deps' });
  const graph = await loadGraph(input, log);
  if (isCLIError(graph)) return graph;
  const symbol = findSymbol(graph, input.name);
  if (isCLIError(symbol)) return symbol;

  const internal = symbol.dependencies.filter((d) => graph.get(d) !== undefined);
  const unresolved = symbol.dependencies.filter((d) => graph.get(d) === undefined);
  return success({
    name: symbol.qualifiedName,
    dependencies: internal,
    unresolvedInternal: unresolved,
    external: symbol.externalDependencies,
  });
}

export async function handleGraphDependents(input: GraphDependentsInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'graph:dependents' });
  const graph = await loadGraph(input, log);
  if (isCLIError(graph)) return graph;
  const symbol = findSymbol(graph, input.name);
  if (isCLIError(symbol)) return symbol;

  const dependents = input.transitive ? graph.downstream(symbol.qualifiedName) : [...symbol.dependents];
  return success({
    name: symbol.qualifiedName,
    transitive: input.transitive,
    count: dependents.length,
    dependents,
  });
}

export async function handleGraphBlast(input: GraphBlastInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'graph:blast' });
  const graph = await loadGraph(input, log);
  if (isCLIError(graph)) return graph;

  if (input.name) {
    const symbol = findSymbol(graph, input.name);
    if (isCLIError(symbol)) return symbol;
    const downstream = graph.downstream(symbol.qualifiedName);
    return success({
      name: symbol.qualifiedName,
      status: symbol.status,
      blastRadius: downstream.length,
      affected: downstream.slice(0, input.limit),
    });
  }

  const ranking = graph.stats.admittedBlast;
  return success({
    count: ranking.length,
    ranking: ranking.slice(0, input.limit),
  });
}

export async function handleGraphUnused(input: GraphListInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'graph:unused' });
  const graph = await loadGraph(input, log);
  if (isCLIError(graph)) return graph;

  const unused = graph.unused();
  return success({
    count: unused.length,
    symbols: unused.slice(0, input.limit),
  });
}

export async function handleGraphTainted(input: GraphListInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'graph:tainted' });
  const graph = await loadGraph(input, log);
  if (isCLIError(graph)) return graph;

  const rows = graph.symbols
    .filter((s) => s.tainted)
    .sort((a, b) => a.qualifiedName.localeCompare(b.qualifiedName))
    .slice(0, input.limit)
    .map((s) => ({ ...summarizeSymbol(s), taintSources: s.taintSources }));
  return success({
    count: graph.stats.tainted,
    symbols: rows,
  });
}
