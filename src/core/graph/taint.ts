import type { AdjacencyIndex } from './dependencyGraph';

export interface TaintResult {
  tainted: ReadonlySet<string>;
  /** Sorted seed names per tainted symbol. */
  sources: ReadonlyMap<string, readonly string[]>;
}

/**
 * Everything reachable from `starts` along `dependents`, starts included.
 * Each node is visited at most once.
 */
function forwardClosure(starts: Iterable<string>, dependents: AdjacencyIndex): Set<string> {
  const visited = new Set<string>();
  const queue: string[] = [];
  for (const s of starts) {
    if (visited.has(s)) continue;
    visited.add(s);
    queue.push(s);
  }
  for (let head = 0; head < queue.length; head++) {
    for (const next of dependents.get(queue[head]) ?? []) {
      if (visited.has(next)) continue;
      visited.add(next);
      queue.push(next);
    }
  }
  return visited;
}

/**
 * Taint is the forward closure of the seeds under `dependents`. Sources are
 * computed per seed, so a symbol lists exactly the seeds that reach it.
 */
export function computeTaint(seeds: Iterable<string>, dependents: AdjacencyIndex): TaintResult {
  const seedList = [...new Set(seeds)].sort();
  const tainted = forwardClosure(seedList, dependents);

  const sources = new Map<string, string[]>();
  for (const seed of seedList) {
    for (const reached of forwardClosure([seed], dependents)) {
      const list = sources.get(reached);
      if (list) list.push(seed);
      else sources.set(reached, [seed]);
    }
  }
  return { tainted, sources };
}

/** Distinct symbols downstream of `start`, never counting `start` itself. */
export function downstreamOf(start: string, dependents: AdjacencyIndex): string[] {
  const reached = forwardClosure([start], dependents);
  reached.delete(start);
  return [...reached].sort();
}

export function blastRadius(start: string, dependents: AdjacencyIndex): number {
  return downstreamOf(start, dependents).length;
}

export function findUnused(symbols: Iterable<string>, dependents: AdjacencyIndex): string[] {
  const out: string[] = [];
  for (const name of symbols) {
    if ((dependents.get(name) ?? []).length === 0) out.push(name);
  }
  return out.sort();
}
