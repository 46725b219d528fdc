import type { SymbolStatus } from '../types';
import type { ExtractionConfig } from '../scan/config';
import {
  ASSUMPTION_KEYWORDS,
  DEFINITION_KEYWORDS,
  INSTANCE_KEYWORDS,
  PROVABLE_KEYWORDS,
  TOP_LEVEL_COMMAND_RE,
  TYPE_KEYWORDS,
  keywordAlternation,
  terminatorStatus,
} from './keywords';

const DOT = 0x2e;
const QUOTE = 0x22;

const STATEMENT_KEYWORDS: readonly string[] = [
  ...PROVABLE_KEYWORDS,
  ...DEFINITION_KEYWORDS,
  ...TYPE_KEYWORDS,
  ...ASSUMPTION_KEYWORDS,
  ...INSTANCE_KEYWORDS,
  'Global Instance',
  'Local Instance',
];

// Matched against a latin1 view so that string indices are byte offsets.
const STATEMENT_KEYWORD_RE = new RegExp(`(?<![A-Za-z0-9_'])(?:${keywordAlternation(STATEMENT_KEYWORDS)})(?![A-Za-z0-9_'])`, 'g');

export const TRUNCATION_MARKER = ' ...';

export function truncateStatement(statement: string, maxLength: number): string {
  if (statement.length <= maxLength) return statement;
  return statement.slice(0, maxLength) + TRUNCATION_MARKER;
}

export function isSpaceByte(b: number | undefined): boolean {
  return b === 0x20 || b === 0x09 || b === 0x0a || b === 0x0d;
}

/** Byte offsets at which each line starts; index 0 is line 1. */
export function buildLineIndex(content: Buffer): number[] {
  const starts = [0];
  for (let i = 0; i < content.length; i++) {
    if (content[i] === 0x0a) starts.push(i + 1);
  }
  return starts;
}

/** 1-based line containing `offset`. */
export function lineAtByte(lineStarts: readonly number[], offset: number): number {
  let lo = 0;
  let hi = lineStarts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (lineStarts[mid] <= offset) lo = mid;
    else hi = mid - 1;
  }
  return lo + 1;
}

/**
 * Offset just past the sentence terminator at or after `from` (a `.`
 * followed by whitespace or end of input, outside strings), or `limit`
 * when there is none before it. Expects comments already blanked out.
 */
export function findSentenceEnd(content: Buffer, from: number, limit: number = content.length): number {
  let inString = false;
  for (let i = from; i < limit; i++) {
    const b = content[i];
    if (b === QUOTE) {
      inString = !inString;
      continue;
    }
    if (inString || b !== DOT) continue;
    if (i + 1 >= content.length || isSpaceByte(content[i + 1])) return i + 1;
  }
  return limit;
}

/** Start of the closest declaration keyword within the window before `byteStart`, if any. */
export function findKeywordBefore(content: Buffer, byteStart: number, windowBytes: number): number | null {
  const from = Math.max(0, byteStart - windowBytes);
  const view = content.toString('latin1', from, byteStart);
  let last: number | null = null;
  for (const m of view.matchAll(STATEMENT_KEYWORD_RE)) {
    if (m.index !== undefined) last = m.index;
  }
  return last === null ? null : from + last;
}

/**
 * Statement text for a definition reported at `byteStart`: from its keyword
 * to the end of its first sentence, whitespace collapsed. `content` must be
 * comment-stripped with offsets preserved.
 */
export function extractStatementAt(content: Buffer, byteStart: number, config: ExtractionConfig): string {
  const keywordAt = findKeywordBefore(content, byteStart, config.keywordWindowBytes);
  const start = keywordAt ?? byteStart;
  const end = findSentenceEnd(content, byteStart);
  const statement = content.toString('utf-8', start, end).replace(/\s+/g, ' ').trim();
  return truncateStatement(statement, config.maxStatementLength);
}

/**
 * Walk the sentences after the statement that starts at `byteStart` until a
 * proof terminator decides the status. Reaching another top-level command
 * first means the declaration had its body inline.
 */
export function recoverProofStatus(content: Buffer, byteStart: number, config: ExtractionConfig): SymbolStatus {
  let i = findSentenceEnd(content, byteStart);
  const limit = Math.min(content.length, i + config.proofScanLimitBytes);
  while (i < limit) {
    while (i < limit && isSpaceByte(content[i])) i++;
    if (i >= limit) break;
    const end = findSentenceEnd(content, i, limit);
    const sentence = content.toString('utf-8', i, end).trim();
    const status = terminatorStatus(sentence);
    if (status) return status;
    if (TOP_LEVEL_COMMAND_RE.test(sentence)) return 'defined';
    i = end;
  }
  return config.unterminatedProof;
}
