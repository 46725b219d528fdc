import type {
  BlastRadiusEntry,
  FileScanResult,
  FrontEndId,
  ProjectStats,
  ProofSymbol,
  ScanDiagnostic,
  ScannedSymbol,
  SourceFileInfo,
  SymbolStatus,
} from '../types';
import { UNPROVEN_STATUSES } from '../types';
import { modulePathFromFile } from '../paths';
import { adjacencyOf, buildAdjacency, type Adjacency } from './dependencyGraph';
import { resolveStructural, resolveTextual, type Resolution } from './resolver';
import { assignUniqueNames, SymbolTable, type ShortNameCollision } from './symbolTable';
import { blastRadius, computeTaint, downstreamOf, findUnused, type TaintResult } from './taint';

export interface ProjectGraphInit {
  frontEnd: FrontEndId;
  symbols: readonly ProofSymbol[];
  files: readonly SourceFileInfo[];
  diagnostics?: readonly ScanDiagnostic[];
}

function moduleKey(file: SourceFileInfo): string {
  return file.logicalModulePath ?? modulePathFromFile(file.path);
}

/**
 * File -> files it depends on: cross-file symbol edges, imports naming a
 * project module, and (metadata) referenced modules.
 */
export function computeFileDependencies(
  symbols: readonly ProofSymbol[],
  files: readonly SourceFileInfo[],
): Record<string, string[]> {
  const deps = new Map<string, Set<string>>();
  for (const f of files) deps.set(f.path, new Set());
  const link = (from: string, to: string): void => {
    if (from !== to) deps.get(from)?.add(to);
  };

  const fileOf = new Map<string, string>();
  for (const s of symbols) fileOf.set(s.qualifiedName, s.file);
  for (const s of symbols) {
    for (const d of s.dependencies) {
      const target = fileOf.get(d);
      if (target) link(s.file, target);
    }
  }

  const byModule = new Map<string, string>();
  for (const f of files) byModule.set(moduleKey(f), f.path);
  for (const f of files) {
    for (const imp of f.imports) {
      for (const [key, target] of byModule) {
        if (key === imp || key.endsWith(`.${imp}`)) link(f.path, target);
      }
    }
    for (const mod of f.referencedModules ?? []) {
      const target = byModule.get(mod);
      if (target) link(f.path, target);
    }
  }

  const out: Record<string, string[]> = {};
  for (const [file, set] of [...deps].sort(([a], [b]) => a.localeCompare(b))) out[file] = [...set].sort();
  return out;
}

function byBlastThenName(a: BlastRadiusEntry, b: BlastRadiusEntry): number {
  return b.blastRadius - a.blastRadius || a.qualifiedName.localeCompare(b.qualifiedName);
}

function countBy(values: Iterable<string>): Record<string, number> {
  const out: Record<string, number> = {};
  for (const v of values) out[v] = (out[v] ?? 0) + 1;
  return out;
}

export function computeStats(
  symbols: readonly ProofSymbol[],
  files: readonly SourceFileInfo[],
  adjacency: Adjacency,
): ProjectStats {
  const byStatus: Record<SymbolStatus, number> = {
    proved: 0,
    admitted: 0,
    defined: 0,
    assumed: 0,
    aborted: 0,
    unterminated: 0,
  };
  for (const s of symbols) byStatus[s.status]++;

  const moduleMap: Record<string, string> = {};
  const imports: Record<string, string[]> = {};
  for (const f of files) {
    if (f.logicalModulePath) moduleMap[f.logicalModulePath] = f.path;
    imports[f.path] = [...f.imports];
  }

  const admittedBlast = symbols
    .filter((s) => s.status === 'admitted')
    .map((s) => ({ qualifiedName: s.qualifiedName, blastRadius: blastRadius(s.qualifiedName, adjacency.dependents) }))
    .sort(byBlastThenName);

  return {
    totalSymbols: symbols.length,
    byStatus,
    byKind: countBy(symbols.map((s) => s.kind)),
    byKeyword: countBy(symbols.map((s) => s.keyword)),
    tainted: symbols.filter((s) => s.tainted).length,
    unused: findUnused(
      symbols.map((s) => s.qualifiedName),
      adjacency.dependents,
    ).length,
    files: files.length,
    fileDependencies: computeFileDependencies(symbols, files),
    moduleMap,
    imports,
    admittedBlast,
  };
}

/**
 * The finished, read-only analysis result. Every symbol, array and index is
 * frozen at construction; all queries are pure.
 */
export class ProjectGraph {
  readonly frontEnd: FrontEndId;
  readonly symbols: readonly ProofSymbol[];
  readonly files: readonly SourceFileInfo[];
  readonly diagnostics: readonly ScanDiagnostic[];
  readonly stats: ProjectStats;
  private readonly table: SymbolTable<ProofSymbol>;
  private readonly adjacency: Adjacency;

  constructor(init: ProjectGraphInit) {
    this.frontEnd = init.frontEnd;
    this.symbols = Object.freeze(init.symbols.map(freezeSymbol));
    this.files = Object.freeze(init.files.map(freezeFile));
    this.diagnostics = Object.freeze((init.diagnostics ?? []).map((d) => Object.freeze({ ...d })));
    this.table = new SymbolTable(this.symbols);
    this.adjacency = adjacencyOf(this.symbols);
    this.stats = computeStats(this.symbols, this.files, this.adjacency);
    Object.freeze(this);
  }

  get(qualifiedName: string): ProofSymbol | undefined {
    return this.table.getQualified(qualifiedName);
  }

  /** Qualified name first, then the first symbol registered under that bare name. */
  lookup(name: string): ProofSymbol | undefined {
    return this.table.resolve(name);
  }

  get size(): number {
    return this.symbols.length;
  }

  dependenciesOf(qualifiedName: string): readonly string[] {
    return this.adjacency.dependencies.get(qualifiedName) ?? [];
  }

  dependentsOf(qualifiedName: string): readonly string[] {
    return this.adjacency.dependents.get(qualifiedName) ?? [];
  }

  /** Every symbol transitively depending on `qualifiedName`. */
  downstream(qualifiedName: string): string[] {
    return downstreamOf(qualifiedName, this.adjacency.dependents);
  }

  blastRadius(qualifiedName: string): number {
    return blastRadius(qualifiedName, this.adjacency.dependents);
  }

  unused(): string[] {
    return findUnused(
      this.symbols.map((s) => s.qualifiedName),
      this.adjacency.dependents,
    );
  }

  tainted(): string[] {
    return this.symbols.filter((s) => s.tainted).map((s) => s.qualifiedName).sort();
  }

  /** Re-derive taint from statuses and edges; equal to what the symbols carry. */
  computeTaint(): TaintResult {
    return computeTaint(taintSeeds(this.symbols), this.adjacency.dependents);
  }

  shortNameCollisions(): ShortNameCollision[] {
    return this.table.collisions();
  }
}

// Every optional field is written out so that a loaded graph has the same shape as a built one.
function freezeSymbol(s: ProofSymbol): ProofSymbol {
  return Object.freeze({
    name: s.name,
    qualifiedName: s.qualifiedName,
    kind: s.kind,
    keyword: s.keyword,
    kindCode: s.kindCode,
    status: s.status,
    file: s.file,
    line: s.line,
    byteRange: s.byteRange ? Object.freeze({ start: s.byteRange.start, end: s.byteRange.end }) : undefined,
    statement: s.statement,
    dependencies: Object.freeze([...s.dependencies]),
    dependents: Object.freeze([...s.dependents]),
    externalDependencies: Object.freeze([...s.externalDependencies]),
    tainted: s.tainted,
    taintSources: Object.freeze([...s.taintSources]),
  });
}

function freezeFile(f: SourceFileInfo): SourceFileInfo {
  return Object.freeze({
    path: f.path,
    logicalModulePath: f.logicalModulePath,
    imports: Object.freeze([...f.imports]),
    symbols: Object.freeze([...f.symbols]),
    referencedModules: f.referencedModules ? Object.freeze([...f.referencedModules]) : undefined,
  });
}

function taintSeeds(symbols: Iterable<{ qualifiedName: string; status: SymbolStatus }>): string[] {
  const seeds: string[] = [];
  for (const s of symbols) if (UNPROVEN_STATUSES.has(s.status)) seeds.push(s.qualifiedName);
  return seeds;
}

export interface BuildGraphOptions {
  frontEnd?: FrontEndId;
  /** Diagnostics gathered before the join (failed files, etc.), carried into the graph. */
  diagnostics?: readonly ScanDiagnostic[];
}

/**
 * The whole-project phase: name, resolve, link, taint, freeze. Runs once,
 * after every file has been scanned.
 */
export function buildProjectGraph(scans: readonly FileScanResult[], options: BuildGraphOptions = {}): ProjectGraph {
  const frontEnd = options.frontEnd ?? scans[0]?.frontEnd ?? 'heuristic';
  const diagnostics: ScanDiagnostic[] = [...(options.diagnostics ?? []), ...scans.flatMap((s) => s.diagnostics)];

  const tagged = scans.flatMap((scan) => scan.symbols.map((symbol) => ({ symbol, frontEnd: scan.frontEnd })));
  const named = assignUniqueNames(tagged.map((t) => t.symbol));
  diagnostics.push(...named.diagnostics);

  const table = new SymbolTable<ScannedSymbol>(named.symbols);
  const projectModules = new Set<string>();
  for (const scan of scans) if (scan.file.logicalModulePath) projectModules.add(scan.file.logicalModulePath);

  const resolutions = new Map<string, Resolution>();
  named.symbols.forEach((symbol, i) => {
    const resolution =
      tagged[i].frontEnd === 'metadata'
        ? resolveStructural(symbol, table, projectModules)
        : resolveTextual(symbol, table);
    resolutions.set(symbol.qualifiedName, resolution);
  });

  const names = named.symbols.map((s) => s.qualifiedName);
  const forward = new Map<string, string[]>();
  for (const [name, r] of resolutions) forward.set(name, r.dependencies);
  const adjacency = buildAdjacency(names, forward);
  const taint = computeTaint(taintSeeds(named.symbols), adjacency.dependents);

  const symbols: ProofSymbol[] = named.symbols.map((s) => ({
    name: s.name,
    qualifiedName: s.qualifiedName,
    kind: s.kind,
    keyword: s.keyword,
    kindCode: s.kindCode,
    status: s.status,
    file: s.file,
    line: s.line,
    byteRange: s.byteRange,
    statement: s.statement,
    dependencies: adjacency.dependencies.get(s.qualifiedName) ?? [],
    dependents: adjacency.dependents.get(s.qualifiedName) ?? [],
    externalDependencies: resolutions.get(s.qualifiedName)?.external ?? [],
    tainted: taint.tainted.has(s.qualifiedName),
    taintSources: taint.sources.get(s.qualifiedName) ?? [],
  }));

  const declared = new Map<string, string[]>();
  for (const s of symbols) {
    const list = declared.get(s.file) ?? [];
    list.push(s.qualifiedName);
    declared.set(s.file, list);
  }
  const files = scans.map((scan) => ({ ...scan.file, symbols: declared.get(scan.file.path) ?? [] }));

  return new ProjectGraph({ frontEnd, symbols, files, diagnostics });
}
