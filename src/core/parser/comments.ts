const OPEN_PAREN = 0x28;
const CLOSE_PAREN = 0x29;
const STAR = 0x2a;
const QUOTE = 0x22;
const NEWLINE = 0x0a;
const SPACE = 0x20;

/**
 * Half-open `[start, end)` ranges covered by nested `(* ... *)` comments,
 * delimiters included. Works on any code-unit sequence (string chars or bytes).
 * String literals are lexed at every depth, so delimiters quoted inside a
 * comment do not open or close it. An unterminated comment runs to the end
 * of input.
 */
export function findCommentSpans(length: number, codeAt: (i: number) => number): Array<[number, number]> {
  const spans: Array<[number, number]> = [];
  let depth = 0;
  let inString = false;
  let spanStart = 0;
  let i = 0;
  while (i < length) {
    const ch = codeAt(i);
    if (ch === QUOTE) {
      inString = !inString;
      i++;
      continue;
    }
    const next = i + 1 < length ? codeAt(i + 1) : -1;
    if (inString) {
      i++;
    } else if (ch === OPEN_PAREN && next === STAR) {
      if (depth === 0) spanStart = i;
      depth++;
      i += 2;
    } else if (depth > 0 && ch === STAR && next === CLOSE_PAREN) {
      depth--;
      i += 2;
      if (depth === 0) spans.push([spanStart, i]);
    } else {
      i++;
    }
  }
  if (depth > 0) spans.push([spanStart, length]);
  return spans;
}

/** Blank out comments, keeping newlines so line numbers and offsets survive. */
export function stripComments(text: string): string {
  const spans = findCommentSpans(text.length, (i) => text.charCodeAt(i));
  if (spans.length === 0) return text;
  let out = '';
  let cursor = 0;
  for (const [start, end] of spans) {
    out += text.slice(cursor, start);
    for (let i = start; i < end; i++) {
      out += text.charCodeAt(i) === NEWLINE ? '\n' : ' ';
    }
    cursor = end;
  }
  return out + text.slice(cursor);
}

/** Byte-exact variant: every commented byte except `\n` becomes a space. */
export function stripCommentBytes(content: Buffer): Buffer {
  const spans = findCommentSpans(content.length, (i) => content[i] ?? 0);
  if (spans.length === 0) return content;
  const out = Buffer.from(content);
  for (const [start, end] of spans) {
    for (let i = start; i < end; i++) {
      if (out[i] !== NEWLINE) out[i] = SPACE;
    }
  }
  return out;
}
