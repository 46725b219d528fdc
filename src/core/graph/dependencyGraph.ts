export type AdjacencyIndex = ReadonlyMap<string, readonly string[]>;

export interface Adjacency {
  dependencies: AdjacencyIndex;
  dependents: AdjacencyIndex;
}

/**
 * Forward edges as given (self edges dropped, sorted, unique) and their exact
 * inverse over `symbols`. A dependency on a name outside `symbols` stays a
 * forward edge but has no inverse entry. Cycles are fine.
 */
export function buildAdjacency(symbols: readonly string[], forward: ReadonlyMap<string, Iterable<string>>): Adjacency {
  const known = new Set(symbols);
  const dependencies = new Map<string, string[]>();
  const inverse = new Map<string, Set<string>>();
  for (const name of symbols) inverse.set(name, new Set());

  for (const name of symbols) {
    const deps = new Set<string>();
    for (const target of forward.get(name) ?? []) {
      if (target === name) continue;
      deps.add(target);
      if (known.has(target)) inverse.get(target)?.add(name);
    }
    dependencies.set(name, [...deps].sort());
  }

  const dependents = new Map<string, string[]>();
  for (const [name, set] of inverse) dependents.set(name, [...set].sort());
  return { dependencies, dependents };
}

/** Adjacency straight from symbols that already carry both directions. */
export function adjacencyOf(
  symbols: Iterable<{ qualifiedName: string; dependencies: readonly string[]; dependents: readonly string[] }>,
): Adjacency {
  const dependencies = new Map<string, readonly string[]>();
  const dependents = new Map<string, readonly string[]>();
  for (const s of symbols) {
    dependencies.set(s.qualifiedName, s.dependencies);
    dependents.set(s.qualifiedName, s.dependents);
  }
  return { dependencies, dependents };
}
