import type { FileScanResult, ScanDiagnostic, ScannedSymbol, SourceInput, SymbolStatus } from '../types';
import type { ExtractionConfig } from '../scan/config';
import { toPosixPath } from '../paths';
import { assertTextContent, type FrontEnd } from './adapter';
import { stripComments } from './comments';
import { splitSentences, type Sentence } from './sentences';
import {
  DECLARATION_KEYWORDS,
  keywordAlternation,
  keywordGroup,
  symbolKindForKeyword,
  terminatorStatus,
} from './keywords';
import { truncateStatement } from './statement';

const IDENT = "[\\p{L}_][\\p{L}\\p{N}_']*";

const DECLARATION_RE = new RegExp(
  `^((?:#\\[[^\\]]*\\]\\s*|(?:Local|Global|Polymorphic|Monomorphic|Private)\\s+)*)` +
    `(${keywordAlternation(DECLARATION_KEYWORDS)})\\s+(${IDENT})([\\s\\S]*)$`,
  'u',
);
const SCOPE_OPEN_RE = new RegExp(`^(Module(?:\\s+Type)?|Section)\\s+(?:(?:Import|Export)\\s+)?(${IDENT})([\\s\\S]*)$`, 'u');
const SCOPE_CLOSE_RE = new RegExp(`^End\\s+(${IDENT})\\s*\\.?$`, 'u');
const REQUIRE_RE = /^(?:From\s+(\S+)\s+)?Require(?:\s+(?:Import|Export))?\s+([\s\S]*)$/;
const IMPORT_RE = /^(?:Import|Export)\s+([\s\S]*)$/;
const PROOF_START_RE = /^Proof\b/;

interface PendingDeclaration {
  readonly symbol: ScannedSymbol;
  /** True once an explicit `Proof` sentence has been seen. */
  readonly inProofBlock: boolean;
  readonly proofText: readonly string[];
}

/**
 * Everything the scanner knows after consuming a prefix of the file's
 * sentences. Each step returns a new value; nothing is shared across files.
 */
export interface VernacularState {
  readonly scopes: readonly string[];
  readonly pending: PendingDeclaration | null;
  /** Proof mode without a tracked declaration (e.g. after `Goal`). */
  readonly anonymousProof: boolean;
  readonly symbols: readonly ScannedSymbol[];
  readonly imports: readonly string[];
  readonly diagnostics: readonly ScanDiagnostic[];
}

export interface VernacularContext {
  file: string;
  config: ExtractionConfig;
}

export function initialVernacularState(): VernacularState {
  return { scopes: [], pending: null, anonymousProof: false, symbols: [], imports: [], diagnostics: [] };
}

function finalize(state: VernacularState, status: SymbolStatus): VernacularState {
  const pending = state.pending;
  if (!pending) return state;
  const referenceText = [pending.symbol.statement, ...pending.proofText].join('\n');
  return {
    ...state,
    pending: null,
    symbols: [...state.symbols, { ...pending.symbol, status, referenceText }],
  };
}

function finalizeUnterminated(state: VernacularState, ctx: VernacularContext, reason: string): VernacularState {
  const pending = state.pending;
  if (!pending) return state;
  const diagnostic: ScanDiagnostic = {
    file: ctx.file,
    severity: 'warning',
    line: pending.symbol.line,
    message: `proof of ${pending.symbol.qualifiedName} has no terminator (${reason})`,
  };
  const next = finalize(state, ctx.config.unterminatedProof);
  return { ...next, diagnostics: [...next.diagnostics, diagnostic] };
}

function closeScope(state: VernacularState, name: string, sentence: Sentence, ctx: VernacularContext): VernacularState {
  const idx = state.scopes.lastIndexOf(name);
  if (idx === state.scopes.length - 1) {
    return { ...state, scopes: state.scopes.slice(0, -1) };
  }
  if (idx >= 0) {
    const unwound = state.scopes.slice(idx + 1);
    return {
      ...state,
      scopes: state.scopes.slice(0, idx),
      diagnostics: [
        ...state.diagnostics,
        { file: ctx.file, severity: 'warning', line: sentence.line, message: `End ${name} also closes ${unwound.join(', ')}` },
      ],
    };
  }
  return {
    ...state,
    diagnostics: [
      ...state.diagnostics,
      { file: ctx.file, severity: 'warning', line: sentence.line, message: `End ${name} does not match any open scope` },
    ],
  };
}

function parseImports(text: string): string[] | null {
  const body = text.replace(/\.$/, '');
  const req = REQUIRE_RE.exec(body);
  const plain = req ? null : IMPORT_RE.exec(body);
  const list = req ? req[2] : plain?.[1];
  if (list === undefined) return null;
  const from = req?.[1];
  return list
    .split(/\s+/)
    .map((m) => m.trim().replace(/\.$/, ''))
    .filter(Boolean)
    .map((m) => (from ? `${from}.${m}` : m));
}

const IDENT_START_RE = /[\p{L}_]/u;
const IDENT_PART_RE = /[\p{L}\p{N}_']/u;

/**
 * True when `rest` carries a `:=` at top level: outside brackets, braces
 * (record literals included), string literals and `let ... in` bindings.
 */
export function hasInlineBody(rest: string): boolean {
  let nesting = 0;
  let openLets = 0;
  let inString = false;
  for (let i = 0; i < rest.length; i++) {
    const ch = rest[i];
    if (ch === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;
    if (ch === '(' || ch === '[' || ch === '{') {
      nesting++;
    } else if (ch === ')' || ch === ']' || ch === '}') {
      nesting = Math.max(0, nesting - 1);
    } else if (IDENT_START_RE.test(ch) && (i === 0 || !IDENT_PART_RE.test(rest[i - 1]))) {
      let end = i + 1;
      while (end < rest.length && IDENT_PART_RE.test(rest[end])) end++;
      const word = rest.slice(i, end);
      if (nesting === 0 && word === 'let') openLets++;
      else if (nesting === 0 && word === 'in' && openLets > 0) openLets--;
      i = end - 1;
    } else if (ch === ':' && rest[i + 1] === '=' && nesting === 0 && openLets === 0) {
      return true;
    }
  }
  return false;
}

function declare(state: VernacularState, sentence: Sentence, match: RegExpExecArray, ctx: VernacularContext): VernacularState {
  const keyword = match[2].replace(/\s+/g, ' ');
  const name = match[3];
  const rest = match[4];
  const group = keywordGroup(keyword);
  const qualifiedName = state.scopes.length > 0 ? `${state.scopes.join('.')}.${name}` : name;
  const hasBody = hasInlineBody(rest);

  let status: SymbolStatus = 'defined';
  if (group === 'assumption') status = 'assumed';

  const symbol: ScannedSymbol = {
    name,
    qualifiedName,
    kind: symbolKindForKeyword(keyword),
    keyword: keyword.toLowerCase(),
    status,
    file: ctx.file,
    line: sentence.line,
    statement: truncateStatement(`${keyword} ${name} ${rest.trim()}`.trim(), ctx.config.maxStatementLength),
  };

  const expectsProof = !hasBody && (group === 'provable' || group === 'instance' || group === 'definitional');
  if (expectsProof) {
    return { ...state, pending: { symbol, inProofBlock: false, proofText: [] } };
  }
  return { ...state, symbols: [...state.symbols, { ...symbol, referenceText: symbol.statement }] };
}

/** Consume one sentence. */
export function stepVernacular(state: VernacularState, sentence: Sentence, ctx: VernacularContext): VernacularState {
  const text = sentence.text.trim();
  if (!text) return state;

  const open = SCOPE_OPEN_RE.exec(text);
  if (open) {
    if (open[3].includes(':=')) return state;
    return { ...state, scopes: [...state.scopes, open[2]] };
  }

  const close = SCOPE_CLOSE_RE.exec(text);
  if (close) return closeScope(state, close[1], sentence, ctx);

  const imports = parseImports(text);
  if (imports) return { ...state, imports: [...state.imports, ...imports] };

  const terminated = terminatorStatus(text);
  if (terminated) {
    const next = finalize(state, terminated);
    return { ...next, anonymousProof: false };
  }

  const pending = state.pending;
  if (PROOF_START_RE.test(text)) {
    if (pending) return { ...state, pending: { ...pending, inProofBlock: true } };
    return { ...state, anonymousProof: true };
  }

  if (state.anonymousProof) return state;
  if (pending?.inProofBlock) {
    return { ...state, pending: { ...pending, proofText: [...pending.proofText, text] } };
  }

  const decl = DECLARATION_RE.exec(text);
  if (decl) {
    const settled = pending ? finalizeUnterminated(state, ctx, `superseded by line ${sentence.line}`) : state;
    return declare(settled, sentence, decl, ctx);
  }

  // Tactics may follow a statement without an explicit `Proof`.
  if (pending) {
    return { ...state, pending: { ...pending, proofText: [...pending.proofText, text] } };
  }
  return state;
}

export function finishVernacular(state: VernacularState, ctx: VernacularContext): VernacularState {
  return state.pending ? finalizeUnterminated(state, ctx, 'end of file') : state;
}

export function scanVernacular(text: string, ctx: VernacularContext): VernacularState {
  let state = initialVernacularState();
  for (const sentence of splitSentences(stripComments(text))) {
    state = stepVernacular(state, sentence, ctx);
  }
  return finishVernacular(state, ctx);
}

export class HeuristicFrontEnd implements FrontEnd {
  readonly id = 'heuristic' as const;

  scanFile(input: SourceInput, config: ExtractionConfig): FileScanResult {
    assertTextContent(input);
    const file = toPosixPath(input.path);
    const state = scanVernacular(input.content.toString('utf-8'), { file, config });
    return {
      frontEnd: this.id,
      file: {
        path: file,
        imports: [...state.imports],
        symbols: state.symbols.map((s) => s.qualifiedName),
      },
      symbols: [...state.symbols],
      diagnostics: [...state.diagnostics],
    };
  }
}
