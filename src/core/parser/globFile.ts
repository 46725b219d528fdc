import type { MetadataReference } from '../types';

// Observed line shapes:
//   DIGEST <hex>
//   F<module path>
//   <code> <start>:<end> <section path | <>> <name>                 definition
//   R<start>:<end> <module> <section path | <>> <name> <code>       reference
const DEF_RE = /^([a-z]\w*)\s+(\d+):(\d+)\s+(\S+)\s+(.+)$/;
const REF_RE = /^R(\d+):(\d+)\s+(\S+)\s+(\S+)\s+(.+)\s+(\w+)$/;
const BINDER_SUFFIX_RE = /^(.+):(\d+)$/;

const EMPTY_PATH = '<>';

export interface MetadataDefinition {
  kindCode: string;
  byteStart: number;
  byteEnd: number;
  sectionPath: string;
  name: string;
  rawName: string;
}

export interface MetadataScope {
  definition: MetadataDefinition;
  references: MetadataReference[];
}

export interface ParsedMetadata {
  modulePath: string;
  scopes: MetadataScope[];
  /** References seen before the first definition (e.g. `Require` lines). */
  fileReferences: MetadataReference[];
}

/** Strip the `:N` suffix the compiler appends to binder names. */
export function cleanName(name: string): string {
  const m = BINDER_SUFFIX_RE.exec(name);
  return m ? m[1] : name;
}

/** Notation keys and quoted tokens are not symbol names. */
export function isNotationArtifact(rawName: string): boolean {
  return rawName.startsWith('::') || rawName.startsWith("'");
}

function optionalPath(p: string): string {
  return p === EMPTY_PATH ? '' : p;
}

export function qualifyName(...parts: string[]): string {
  return parts.filter(Boolean).join('.');
}

export function referenceTarget(ref: MetadataReference): string {
  return qualifyName(ref.modulePath, ref.sectionPath, ref.name);
}

/**
 * Parse a compiler cross-reference file. Every reference is attached to the
 * closest preceding definition record; `binder` records do not open a new
 * scope, so the references in a statement's binders stay with it.
 */
export function parseMetadata(text: string): ParsedMetadata {
  let modulePath = '';
  let recognized = 0;
  let meaningful = 0;
  const scopes: MetadataScope[] = [];
  const fileReferences: MetadataReference[] = [];
  let current: MetadataScope | null = null;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trimEnd();
    if (!line) continue;
    meaningful++;

    if (line.startsWith('DIGEST')) {
      recognized++;
      continue;
    }

    if (line.startsWith('F')) {
      modulePath = line.slice(1).trim();
      recognized++;
      continue;
    }

    if (line.startsWith('R')) {
      const m = REF_RE.exec(line);
      if (!m) continue;
      recognized++;
      const rawName = m[5].trim();
      if (isNotationArtifact(rawName)) continue;
      const ref: MetadataReference = {
        modulePath: m[3],
        sectionPath: optionalPath(m[4]),
        name: cleanName(rawName),
        rawName,
        kindCode: m[6],
        byteStart: Number(m[1]),
        byteEnd: Number(m[2]),
      };
      if (current) current.references.push(ref);
      else fileReferences.push(ref);
      continue;
    }

    const d = DEF_RE.exec(line);
    if (!d) continue;
    recognized++;
    if (d[1] === 'binder') continue;
    const rawName = d[5].trim();
    current = {
      definition: {
        kindCode: d[1],
        byteStart: Number(d[2]),
        byteEnd: Number(d[3]),
        sectionPath: optionalPath(d[4]),
        name: cleanName(rawName),
        rawName,
      },
      references: [],
    };
    scopes.push(current);
  }

  if (meaningful > 0 && recognized === 0) {
    throw new Error('no recognizable cross-reference records');
  }

  return { modulePath, scopes, fileReferences };
}
