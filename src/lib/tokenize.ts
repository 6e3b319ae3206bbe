import type { Token } from "./types";

const URL_RE = /^(?:https?:\/\/|www\.)[^\s<>"']+[^\s<>"'.,;:!?)\]]/i;
const EMAIL_RE = /^[\p{L}\p{N}._%+-]+@[\p{L}\p{N}-]+(?:\.[\p{L}\p{N}-]+)*\.\p{L}{2,}/u;

/**
 * Deterministic tokenizer (manual scan) that yields WORD/NUMBER/PUNCT/URL/EMAIL tokens.
 * - Contractions/possessives stay as one WORD: don't, we're, Alex's, children’s
 * - Hyphenated words stay as one WORD: well-known, mother-in-law
 * - Digits (with internal . , : /) form a NUMBER; 3rd or 10am are NUMBER too
 * - Whitespace is skipped (no SPACE tokens); offsets index into `text`
 */
export function tokenize(text: string): Token[] {
  const out: Token[] = [];
  let idx = 0;
  const isLetter = (ch: string) => /\p{L}|\p{M}/u.test(ch);
  const isDigit = (ch: string) => /\p{Nd}/u.test(ch);
  const isWordJoiner = (ch: string) => ch === "'" || ch === "’" || ch === "-";
  const isNumberJoiner = (ch: string) => ch === "." || ch === "," || ch === ":" || ch === "/";
  // whole code point at k, so surrogate pairs are never split
  const at = (k: number) => {
    const cp = text.codePointAt(k);
    return cp === undefined ? "" : String.fromCodePoint(cp);
  };

  let i = 0;
  while (i < text.length) {
    const ch = at(i);

    if (/\s/.test(ch)) { i += 1; continue; }

    // Links and addresses stay whole so no detector picks them apart
    if (ch === "h" || ch === "H" || ch === "w" || ch === "W") {
      const m = URL_RE.exec(text.slice(i, i + 2048));
      if (m) {
        out.push({ idx: idx++, raw: m[0], type: "URL", start: i, end: i + m[0].length });
        i += m[0].length;
        continue;
      }
    }
    if (isLetter(ch) || isDigit(ch)) {
      const m = EMAIL_RE.exec(text.slice(i, i + 320));
      if (m) {
        out.push({ idx: idx++, raw: m[0], type: "EMAIL", start: i, end: i + m[0].length });
        i += m[0].length;
        continue;
      }
    }

    if (isDigit(ch)) {
      let j = i + ch.length;
      while (j < text.length) {
        const cj = at(j);
        if (isDigit(cj) || isLetter(cj)) { j += cj.length; continue; }
        if (isNumberJoiner(cj) && isDigit(at(j + 1))) { j += 1 + at(j + 1).length; continue; }
        break;
      }
      out.push({ idx: idx++, raw: text.slice(i, j), type: "NUMBER", start: i, end: j });
      i = j;
      continue;
    }

    // Word: letters, allowing internal - ' ’ between letters
    if (isLetter(ch)) {
      let j = i + ch.length;
      while (j < text.length) {
        const cj = at(j);
        if (isLetter(cj) || isDigit(cj)) { j += cj.length; continue; }
        // Permit joiner followed by a letter (handles don't, well-known)
        if (isWordJoiner(cj) && isLetter(at(j + 1))) { j += 1 + at(j + 1).length; continue; }
        break;
      }
      out.push({ idx: idx++, raw: text.slice(i, j), type: "WORD", start: i, end: j });
      i = j;
      continue;
    }

    // Single code point punctuation fallback
    out.push({ idx: idx++, raw: ch, type: "PUNCT", start: i, end: i + ch.length });
    i += ch.length;
  }

  return out;
}
