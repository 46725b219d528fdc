import type { SymbolKind, SymbolStatus } from '../types';

export const PROVABLE_KEYWORDS = [
  'Lemma', 'Theorem', 'Corollary', 'Proposition', 'Fact',
  'Remark', 'Example', 'Property', 'Program Lemma',
] as const;

export const DEFINITION_KEYWORDS = [
  'Definition', 'Fixpoint', 'CoFixpoint', 'Let', 'Function',
  'Program Definition', 'Program Fixpoint',
] as const;

export const TYPE_KEYWORDS = [
  'Inductive', 'CoInductive', 'Record', 'Structure', 'Class', 'Variant',
] as const;

export const ASSUMPTION_KEYWORDS = [
  'Axiom', 'Parameter', 'Hypothesis', 'Variable',
  'Conjecture', 'Context', 'Declare Assumption',
] as const;

export const INSTANCE_KEYWORDS = ['Instance', 'Program Instance'] as const;

export const OTHER_KEYWORDS = ['Ltac', 'Notation', 'Tactic Notation'] as const;

export type KeywordGroup = 'provable' | 'definitional' | 'type-former' | 'assumption' | 'instance' | 'other';

const groupByKeyword = new Map<string, KeywordGroup>();
for (const k of PROVABLE_KEYWORDS) groupByKeyword.set(k, 'provable');
for (const k of DEFINITION_KEYWORDS) groupByKeyword.set(k, 'definitional');
for (const k of TYPE_KEYWORDS) groupByKeyword.set(k, 'type-former');
for (const k of ASSUMPTION_KEYWORDS) groupByKeyword.set(k, 'assumption');
for (const k of INSTANCE_KEYWORDS) groupByKeyword.set(k, 'instance');
for (const k of OTHER_KEYWORDS) groupByKeyword.set(k, 'other');

export function keywordGroup(keyword: string): KeywordGroup | undefined {
  return groupByKeyword.get(keyword);
}

export function symbolKindForKeyword(keyword: string): SymbolKind {
  switch (keywordGroup(keyword)) {
    case 'provable':
      return 'provable';
    case 'definitional':
      return 'definition';
    case 'type-former':
      return 'type';
    case 'assumption':
      return 'assumption';
    case 'instance':
      return 'instance';
    default:
      if (keyword === 'Ltac') return 'tactic';
      if (keyword.endsWith('Notation')) return 'notation';
      return 'other';
  }
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Longest first, so `Program Definition` wins over `Definition` at the same position. */
export function keywordAlternation(keywords: readonly string[]): string {
  return [...keywords]
    .sort((a, b) => b.length - a.length)
    .map((k) => escapeRegExp(k).replace(/ /g, '\\s+'))
    .join('|');
}

export const DECLARATION_KEYWORDS: readonly string[] = [
  ...PROVABLE_KEYWORDS,
  ...DEFINITION_KEYWORDS,
  ...TYPE_KEYWORDS,
  ...ASSUMPTION_KEYWORDS,
  ...INSTANCE_KEYWORDS,
  ...OTHER_KEYWORDS,
];

export const PROOF_TERMINATORS: Readonly<Record<string, SymbolStatus>> = {
  Qed: 'proved',
  Admitted: 'admitted',
  Defined: 'defined',
  Abort: 'aborted',
};

export function terminatorStatus(sentence: string): SymbolStatus | undefined {
  const word = sentence.replace(/\.$/, '').trim();
  return Object.prototype.hasOwnProperty.call(PROOF_TERMINATORS, word) ? PROOF_TERMINATORS[word] : undefined;
}

/** A sentence opening with one of these is a new top-level command, never part of a proof. */
export const TOP_LEVEL_COMMAND_RE = new RegExp(
  '^(?:#\\[[^\\]]*\\]\\s*|(?:Local|Global)\\s+)*(?:' +
    [
      'Theorem', 'Lemma', 'Corollary', 'Definition', 'Fixpoint', 'Inductive',
      'CoInductive', 'Record', 'Structure', 'Class', 'Axiom', 'Parameter',
      'Hypothesis', 'Variable', 'Instance', 'Module', 'Section', 'End',
      'From', 'Require', 'Import', 'Export', 'Notation', 'Ltac', 'Set', 'Unset',
    ].join('|') +
    ')\\b',
);

// ── Compiler metadata kind codes ───────────────────────────────────────────

export const METADATA_KIND_DISPLAY: Readonly<Record<string, string>> = {
  thm: 'theorem', lem: 'lemma', def: 'definition',
  ax: 'axiom', ind: 'inductive', constr: 'constructor',
  rec: 'fixpoint', corec: 'cofixpoint', not: 'notation',
  sec: 'section', var: 'variable', inst: 'instance',
  class: 'class', proj: 'projection', meth: 'method',
  modtype: 'module type', mod: 'module', syndef: 'abbreviation',
  scheme: 'scheme', prf: 'proof', binder: 'binder',
  lib: 'library', prop: 'proposition', coe: 'coercion',
  ex: 'example', morph: 'morphism',
};

const METADATA_KIND: Readonly<Record<string, SymbolKind>> = {
  thm: 'provable', lem: 'provable', prop: 'provable', ex: 'provable', morph: 'provable',
  prf: 'proof-step',
  def: 'definition', rec: 'definition', corec: 'definition', syndef: 'definition', scheme: 'definition',
  ind: 'type', class: 'type',
  constr: 'constructor',
  proj: 'projection', meth: 'projection',
  ax: 'assumption',
  inst: 'instance',
};

/** Codes whose status comes from the proof terminator that follows them. */
export const PROVABLE_KIND_CODES: ReadonlySet<string> = new Set(['thm', 'lem', 'prf', 'prop', 'ex', 'morph']);

export const ASSUMED_KIND_CODES: ReadonlySet<string> = new Set(['ax']);

export const TRACKED_KIND_CODES: ReadonlySet<string> = new Set([
  'thm', 'lem', 'def', 'ax', 'ind', 'constr', 'rec', 'corec',
  'inst', 'class', 'proj', 'meth', 'prop', 'ex', 'morph',
  'scheme', 'syndef', 'prf',
]);

/** Reference codes that never become dependency edges. */
export const NON_DEPENDENCY_REF_CODES: ReadonlySet<string> = new Set(['not', 'var', 'binder', 'lib']);

export function metadataKindDisplay(code: string): string {
  return METADATA_KIND_DISPLAY[code] ?? code;
}

export function symbolKindForCode(code: string): SymbolKind {
  return METADATA_KIND[code] ?? 'other';
}
