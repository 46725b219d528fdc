import type { ScannedSymbol } from '../types';
import { referenceTarget } from '../parser/globFile';
import type { NamedSymbol, SymbolTable } from './symbolTable';

const STRING_LITERAL_RE = /"[^"]*"/g;
const IDENT_TOKEN_RE = /(?<![\p{L}\p{N}_'])[\p{L}_][\p{L}\p{N}_']*(?:\.[\p{L}_][\p{L}\p{N}_']*)*/gu;

export interface Resolution {
  /** Sorted qualified names; may include in-project names that no scanned symbol declares. */
  dependencies: string[];
  /** Sorted targets outside the project. Never part of the graph. */
  external: string[];
  /** Subset of `dependencies` with no matching symbol. */
  unresolvedInternal: string[];
}

/** Identifier-shaped tokens, dotted paths kept whole, string literals skipped. */
export function referenceTokens(text: string): string[] {
  const cleaned = text.replace(STRING_LITERAL_RE, ' ');
  return [...cleaned.matchAll(IDENT_TOKEN_RE)].map((m) => m[0]);
}

function sorted(values: Iterable<string>): string[] {
  return [...values].sort();
}

/**
 * Over-approximating lookup of every token (and each component of a dotted
 * token) in the symbol text. Homonyms across scopes resolve through the
 * short-name fallback and may produce spurious edges.
 */
export function resolveTextual<T extends NamedSymbol>(symbol: ScannedSymbol, table: SymbolTable<T>): Resolution {
  const deps = new Set<string>();
  const text = symbol.referenceText ?? symbol.statement;

  for (const token of referenceTokens(text)) {
    const candidates = token.includes('.') ? [token, ...token.split('.')] : [token];
    for (const candidate of candidates) {
      if (candidate === symbol.name) continue;
      const hit = table.resolve(candidate);
      if (hit && hit.qualifiedName !== symbol.qualifiedName) deps.add(hit.qualifiedName);
    }
  }

  return { dependencies: sorted(deps), external: [], unresolvedInternal: [] };
}

/**
 * Exact qualified match, then short name, then an in-project module path
 * keeps the raw target as an unresolved internal dependency. Anything else is
 * external.
 */
export function resolveStructural<T extends NamedSymbol>(
  symbol: ScannedSymbol,
  table: SymbolTable<T>,
  projectModules: ReadonlySet<string>,
): Resolution {
  const deps = new Set<string>();
  const unresolved = new Set<string>();
  const external = new Set<string>();

  for (const ref of symbol.references ?? []) {
    const target = referenceTarget(ref);
    const hit = table.getQualified(target) ?? table.getShort(ref.name);
    if (hit) {
      if (hit.qualifiedName !== symbol.qualifiedName) deps.add(hit.qualifiedName);
      continue;
    }
    if (target === symbol.qualifiedName) continue;
    if (projectModules.has(ref.modulePath)) {
      deps.add(target);
      unresolved.add(target);
    } else {
      external.add(target);
    }
  }

  return { dependencies: sorted(deps), external: sorted(external), unresolvedInternal: sorted(unresolved) };
}
