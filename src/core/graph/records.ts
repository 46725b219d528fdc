import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { FRONT_END_IDS, SYMBOL_KINDS, SYMBOL_STATUSES, type ProofSymbol, type SourceFileInfo } from '../types';
import { ProjectGraph } from './projectGraph';

export const RECORDS_FORMAT_VERSION = 1;

export const SymbolRecordSchema = z.object({
  name: z.string(),
  qualified_name: z.string().min(1),
  kind: z.enum(SYMBOL_KINDS),
  keyword: z.string(),
  kind_code: z.string().nullable(),
  status: z.enum(SYMBOL_STATUSES),
  declaring_file: z.string(),
  source_line: z.number().int().nonnegative(),
  byte_range: z.object({ start: z.number().int().nonnegative(), end: z.number().int().nonnegative() }).nullable(),
  statement_text: z.string(),
  dependencies: z.array(z.string()),
  dependents: z.array(z.string()),
  external_dependencies: z.array(z.string()),
  tainted: z.boolean(),
  taint_sources: z.array(z.string()),
});

export type SymbolRecord = z.infer<typeof SymbolRecordSchema>;

export const FileRecordSchema = z.object({
  path: z.string(),
  logical_module_path: z.string().nullable(),
  imports: z.array(z.string()),
  symbols: z.array(z.string()),
  referenced_modules: z.array(z.string()).nullable(),
});

export type FileRecord = z.infer<typeof FileRecordSchema>;

export const DiagnosticRecordSchema = z.object({
  file: z.string(),
  severity: z.enum(['warning', 'error']),
  message: z.string(),
  line: z.number().int().nullable(),
});

export const GraphExportSchema = z.object({
  format_version: z.literal(RECORDS_FORMAT_VERSION),
  front_end: z.enum(FRONT_END_IDS),
  symbols: z.array(SymbolRecordSchema),
  files: z.array(FileRecordSchema),
  diagnostics: z.array(DiagnosticRecordSchema).default([]),
});

export type GraphExport = z.infer<typeof GraphExportSchema>;

export function toSymbolRecord(s: ProofSymbol): SymbolRecord {
  return {
    name: s.name,
    qualified_name: s.qualifiedName,
    kind: s.kind,
    keyword: s.keyword,
    kind_code: s.kindCode ?? null,
    status: s.status,
    declaring_file: s.file,
    source_line: s.line,
    byte_range: s.byteRange ? { start: s.byteRange.start, end: s.byteRange.end } : null,
    statement_text: s.statement,
    dependencies: [...s.dependencies],
    dependents: [...s.dependents],
    external_dependencies: [...s.externalDependencies],
    tainted: s.tainted,
    taint_sources: [...s.taintSources],
  };
}

export function fromSymbolRecord(r: SymbolRecord): ProofSymbol {
  return {
    name: r.name,
    qualifiedName: r.qualified_name,
    kind: r.kind,
    keyword: r.keyword,
    kindCode: r.kind_code ?? undefined,
    status: r.status,
    file: r.declaring_file,
    line: r.source_line,
    byteRange: r.byte_range ?? undefined,
    statement: r.statement_text,
    dependencies: r.dependencies,
    dependents: r.dependents,
    externalDependencies: r.external_dependencies,
    tainted: r.tainted,
    taintSources: r.taint_sources,
  };
}

function toFileRecord(f: SourceFileInfo): FileRecord {
  return {
    path: f.path,
    logical_module_path: f.logicalModulePath ?? null,
    imports: [...f.imports],
    symbols: [...f.symbols],
    referenced_modules: f.referencedModules ? [...f.referencedModules] : null,
  };
}

function fromFileRecord(r: FileRecord): SourceFileInfo {
  return {
    path: r.path,
    logicalModulePath: r.logical_module_path ?? undefined,
    imports: r.imports,
    symbols: r.symbols,
    referencedModules: r.referenced_modules ?? undefined,
  };
}

/** Flat, field-for-field symbol records in graph order. */
export function toRecords(graph: ProjectGraph): SymbolRecord[] {
  return graph.symbols.map(toSymbolRecord);
}

/** Validates untrusted input; throws a ZodError on a malformed record. */
export function fromRecords(records: unknown): ProofSymbol[] {
  return z.array(SymbolRecordSchema).parse(records).map(fromSymbolRecord);
}

export function exportGraph(graph: ProjectGraph): GraphExport {
  return {
    format_version: RECORDS_FORMAT_VERSION,
    front_end: graph.frontEnd,
    symbols: toRecords(graph),
    files: graph.files.map(toFileRecord),
    diagnostics: graph.diagnostics.map((d) => ({
      file: d.file,
      severity: d.severity,
      message: d.message,
      line: d.line ?? null,
    })),
  };
}

export function importGraph(data: unknown): ProjectGraph {
  const parsed = GraphExportSchema.parse(data);
  return new ProjectGraph({
    frontEnd: parsed.front_end,
    symbols: parsed.symbols.map(fromSymbolRecord),
    files: parsed.files.map(fromFileRecord),
    diagnostics: parsed.diagnostics.map((d) => ({
      file: d.file,
      severity: d.severity,
      message: d.message,
      line: d.line ?? undefined,
    })),
  });
}

export async function writeGraphJson(graph: ProjectGraph, outFile: string): Promise<void> {
  await fs.ensureDir(path.dirname(outFile));
  await fs.writeJSON(outFile, exportGraph(graph), { spaces: 2 });
}

export async function readGraphJson(file: string): Promise<ProjectGraph> {
  const data: unknown = await fs.readJSON(file);
  return importGraph(data);
}
