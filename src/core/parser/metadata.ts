import type { FileScanResult, MetadataReference, ScannedSymbol, SourceInput, SymbolStatus } from '../types';
import type { ExtractionConfig } from '../scan/config';
import { toPosixPath } from '../paths';
import { assertTextContent, type FrontEnd } from './adapter';
import { stripCommentBytes } from './comments';
import { isNotationArtifact, parseMetadata, qualifyName, referenceTarget, type MetadataDefinition } from './globFile';
import {
  ASSUMED_KIND_CODES,
  NON_DEPENDENCY_REF_CODES,
  PROVABLE_KIND_CODES,
  TRACKED_KIND_CODES,
  metadataKindDisplay,
  symbolKindForCode,
} from './keywords';
import { buildLineIndex, extractStatementAt, lineAtByte, recoverProofStatus } from './statement';

function statusForDefinition(def: MetadataDefinition, stripped: Buffer, config: ExtractionConfig): SymbolStatus {
  if (ASSUMED_KIND_CODES.has(def.kindCode)) return 'assumed';
  if (PROVABLE_KIND_CODES.has(def.kindCode)) return recoverProofStatus(stripped, def.byteStart, config);
  return 'defined';
}

/** References that can become dependency edges, self references and repeats removed. */
function dependencyReferences(refs: readonly MetadataReference[], selfName: string): MetadataReference[] {
  const seen = new Set<string>();
  const out: MetadataReference[] = [];
  for (const ref of refs) {
    if (NON_DEPENDENCY_REF_CODES.has(ref.kindCode)) continue;
    const target = referenceTarget(ref);
    if (target === selfName || seen.has(target)) continue;
    seen.add(target);
    out.push(ref);
  }
  return out;
}

export class MetadataFrontEnd implements FrontEnd {
  readonly id = 'metadata' as const;

  scanFile(input: SourceInput, config: ExtractionConfig): FileScanResult {
    const file = toPosixPath(input.path);
    if (input.metadata === undefined) {
      throw new Error(`${file} has no compiler metadata`);
    }
    assertTextContent(input);

    const parsed = parseMetadata(input.metadata);
    const stripped = stripCommentBytes(input.content);
    const lineStarts = buildLineIndex(input.content);
    const symbols: ScannedSymbol[] = [];
    const referencedModules = new Set<string>();
    const imports = new Set<string>();

    const noteModules = (refs: readonly MetadataReference[]): void => {
      for (const ref of refs) {
        if (ref.kindCode === 'lib') {
          imports.add(ref.modulePath);
          continue;
        }
        if (NON_DEPENDENCY_REF_CODES.has(ref.kindCode)) continue;
        if (ref.modulePath && ref.modulePath !== parsed.modulePath) referencedModules.add(ref.modulePath);
      }
    };
    noteModules(parsed.fileReferences);

    for (const scope of parsed.scopes) {
      noteModules(scope.references);
      const def = scope.definition;
      if (!TRACKED_KIND_CODES.has(def.kindCode) || isNotationArtifact(def.rawName)) continue;
      if (def.byteStart > input.content.length || def.byteEnd > input.content.length || def.byteStart > def.byteEnd) {
        throw new Error(
          `metadata does not match ${file}: ${def.name} at ${def.byteStart}:${def.byteEnd} but the source has ${input.content.length} bytes`,
        );
      }

      const keyword = metadataKindDisplay(def.kindCode);
      const qualifiedName = qualifyName(parsed.modulePath, def.sectionPath, def.name);
      const statement = extractStatementAt(stripped, def.byteStart, config) || `${keyword} ${def.name}`;

      symbols.push({
        name: def.name,
        qualifiedName,
        kind: symbolKindForCode(def.kindCode),
        keyword,
        kindCode: def.kindCode,
        status: statusForDefinition(def, stripped, config),
        file,
        line: lineAtByte(lineStarts, def.byteStart),
        byteRange: { start: def.byteStart, end: def.byteEnd },
        statement,
        references: dependencyReferences(scope.references, qualifiedName),
      });
    }

    return {
      frontEnd: this.id,
      file: {
        path: file,
        logicalModulePath: parsed.modulePath || undefined,
        imports: [...imports].sort(),
        symbols: symbols.map((s) => s.qualifiedName),
        referencedModules: [...referencedModules].sort(),
      },
      symbols,
      diagnostics: [],
    };
  }
}
