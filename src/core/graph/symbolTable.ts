import type { ScanDiagnostic, ScannedSymbol } from '../types';
import { modulePathFromFile } from '../paths';

/**
 * Collision rule for the short-name index: when several symbols share a bare
 * name, the one registered first keeps it. Registration order is file input
 * order, then declaration order within a file.
 */
export const FIRST_REGISTERED_WINS = 'first-registered-wins' as const;

export type ShortNamePolicy = typeof FIRST_REGISTERED_WINS;

export interface NamedSymbol {
  readonly name: string;
  readonly qualifiedName: string;
}

export interface ShortNameCollision {
  name: string;
  kept: string;
  shadowed: string[];
}

/**
 * Two-level name index. The qualified map is authoritative; the short map is
 * only consulted when a qualified lookup misses.
 */
export class SymbolTable<T extends NamedSymbol> {
  readonly policy: ShortNamePolicy = FIRST_REGISTERED_WINS;
  private readonly byQualified = new Map<string, T>();
  private readonly byShort = new Map<string, T>();
  private readonly shadowed = new Map<string, string[]>();

  constructor(symbols: Iterable<T> = []) {
    for (const s of symbols) this.register(s);
  }

  register(symbol: T): void {
    if (this.byQualified.has(symbol.qualifiedName)) {
      throw new Error(`duplicate qualified name: ${symbol.qualifiedName}`);
    }
    this.byQualified.set(symbol.qualifiedName, symbol);
    const holder = this.byShort.get(symbol.name);
    if (!holder) {
      this.byShort.set(symbol.name, symbol);
      return;
    }
    const list = this.shadowed.get(symbol.name) ?? [];
    list.push(symbol.qualifiedName);
    this.shadowed.set(symbol.name, list);
  }

  get size(): number {
    return this.byQualified.size;
  }

  has(qualifiedName: string): boolean {
    return this.byQualified.has(qualifiedName);
  }

  getQualified(qualifiedName: string): T | undefined {
    return this.byQualified.get(qualifiedName);
  }

  getShort(name: string): T | undefined {
    return this.byShort.get(name);
  }

  /** Qualified match first, then the short-name fallback. */
  resolve(name: string): T | undefined {
    return this.byQualified.get(name) ?? this.byShort.get(name);
  }

  values(): IterableIterator<T> {
    return this.byQualified.values();
  }

  collisions(): ShortNameCollision[] {
    const out: ShortNameCollision[] = [];
    for (const [name, names] of this.shadowed) {
      const kept = this.byShort.get(name);
      if (kept) out.push({ name, kept: kept.qualifiedName, shadowed: [...names] });
    }
    return out.sort((a, b) => a.name.localeCompare(b.name));
  }
}

export interface UniqueNamesResult {
  symbols: ScannedSymbol[];
  diagnostics: ScanDiagnostic[];
}

/**
 * Give every symbol a project-unique qualified name. A later symbol whose
 * name is taken is prefixed with its file's module path, then suffixed with
 * `#line` (and a counter) until it is free.
 */
export function assignUniqueNames(symbols: readonly ScannedSymbol[]): UniqueNamesResult {
  const taken = new Set<string>();
  const out: ScannedSymbol[] = [];
  const diagnostics: ScanDiagnostic[] = [];

  for (const s of symbols) {
    if (!taken.has(s.qualifiedName)) {
      taken.add(s.qualifiedName);
      out.push(s);
      continue;
    }
    const modulePrefix = modulePathFromFile(s.file);
    let candidate = modulePrefix && !s.qualifiedName.startsWith(`${modulePrefix}.`) ? `${modulePrefix}.${s.qualifiedName}` : s.qualifiedName;
    if (taken.has(candidate)) candidate = `${candidate}#${s.line}`;
    let n = 2;
    const base = candidate;
    while (taken.has(candidate)) candidate = `${base}-${n++}`;

    taken.add(candidate);
    out.push({ ...s, qualifiedName: candidate });
    diagnostics.push({
      file: s.file,
      severity: 'warning',
      line: s.line,
      message: `${s.qualifiedName} is already declared; renamed to ${candidate}`,
    });
  }

  return { symbols: out, diagnostics };
}
