export const SYMBOL_KINDS = [
  'provable', 'definition', 'type', 'constructor', 'projection', 'assumption',
  'instance', 'proof-step', 'tactic', 'notation', 'other',
] as const;

export type SymbolKind = (typeof SYMBOL_KINDS)[number];

export const SYMBOL_STATUSES = ['proved', 'admitted', 'defined', 'assumed', 'aborted', 'unterminated'] as const;

export type SymbolStatus = (typeof SYMBOL_STATUSES)[number];

/** Statuses that seed taint: the symbol itself is not backed by a checked proof. */
export const UNPROVEN_STATUSES: ReadonlySet<SymbolStatus> = new Set<SymbolStatus>(['admitted', 'assumed']);

export const FRONT_END_IDS = ['heuristic', 'metadata'] as const;

export type FrontEndId = (typeof FRONT_END_IDS)[number];

export interface ByteRange {
  start: number;
  end: number;
}

/** A reference recorded by the compiler against the definition that precedes it. */
export interface MetadataReference {
  /** Library (file-level module) the target lives in. */
  modulePath: string;
  /** Module/section path inside that library; empty when the target is at its top level. */
  sectionPath: string;
  name: string;
  rawName: string;
  kindCode: string;
  byteStart: number;
  byteEnd: number;
}

/** Per-file scan output, before any project-wide resolution. */
export interface ScannedSymbol {
  name: string;
  qualifiedName: string;
  kind: SymbolKind;
  keyword: string;
  kindCode?: string;
  status: SymbolStatus;
  file: string;
  line: number;
  byteRange?: ByteRange;
  statement: string;
  /** Text the heuristic resolver scans: statement plus proof body. */
  referenceText?: string;
  /** Structural references from compiler metadata. */
  references?: MetadataReference[];
}

export interface SourceFileInfo {
  path: string;
  logicalModulePath?: string;
  imports: readonly string[];
  symbols: readonly string[];
  /** Other modules referenced anywhere in the file (metadata only). */
  referencedModules?: readonly string[];
}

export type DiagnosticSeverity = 'warning' | 'error';

export interface ScanDiagnostic {
  file: string;
  severity: DiagnosticSeverity;
  message: string;
  line?: number;
}

export interface FileScanResult {
  frontEnd: FrontEndId;
  file: SourceFileInfo;
  symbols: ScannedSymbol[];
  diagnostics: ScanDiagnostic[];
}

/** A source file handed to a front-end. `metadata` is the compiler artefact text, when there is one. */
export interface SourceInput {
  path: string;
  content: Buffer;
  metadata?: string;
}

export interface ProofSymbol {
  readonly name: string;
  readonly qualifiedName: string;
  readonly kind: SymbolKind;
  readonly keyword: string;
  readonly kindCode?: string;
  readonly status: SymbolStatus;
  readonly file: string;
  readonly line: number;
  readonly byteRange?: Readonly<ByteRange>;
  readonly statement: string;
  readonly dependencies: readonly string[];
  readonly dependents: readonly string[];
  readonly externalDependencies: readonly string[];
  readonly tainted: boolean;
  readonly taintSources: readonly string[];
}

export interface BlastRadiusEntry {
  qualifiedName: string;
  blastRadius: number;
}

export interface ProjectStats {
  totalSymbols: number;
  byStatus: Record<SymbolStatus, number>;
  byKind: Record<string, number>;
  byKeyword: Record<string, number>;
  tainted: number;
  unused: number;
  files: number;
  fileDependencies: Record<string, string[]>;
  moduleMap: Record<string, string>;
  imports: Record<string, string[]>;
  admittedBlast: BlastRadiusEntry[];
}
