export interface Sentence {
  text: string;
  /** 1-based line of the sentence's first non-whitespace character. */
  line: number;
}

export function isSentenceSpace(ch: string | undefined): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
}

/**
 * Split comment-free vernacular into sentences. A sentence ends at a `.`
 * followed by whitespace or end of input, outside string literals, so
 * qualified names such as `Nat.add` stay in one piece.
 */
export function* splitSentences(text: string): Generator<Sentence> {
  let line = 1;
  let start = -1;
  let startLine = 1;
  let inString = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (start < 0 && !isSentenceSpace(ch)) {
      start = i;
      startLine = line;
    }
    if (ch === '\n') {
      line++;
      continue;
    }
    if (ch === '"') {
      inString = !inString;
      continue;
    }
    if (inString || ch !== '.') continue;
    if (i + 1 < text.length && !isSentenceSpace(text[i + 1])) continue;
    if (start >= 0) {
      yield { text: text.slice(start, i + 1).trim(), line: startLine };
    }
    start = -1;
  }

  if (start >= 0) {
    const rest = text.slice(start).trim();
    if (rest) yield { text: rest, line: startLine };
  }
}
