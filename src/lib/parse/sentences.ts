import type { Token } from "@/lib/types";
import type { ParsedSentence } from "./types";
import { ABBREVIATIONS } from "./lexicon";

const SENTENCE_TERMINATORS = new Set([".", "!", "?", "…"]);
const CLOSING_WRAPPERS = new Set(['"', "”", "'", "’", ")", "]", "}", "»"]);

function adjacent(left: Token, right: Token): boolean {
  return left.end === right.start;
}

// "e.g." / "Dr." / "U.S." : the run of glued word+dot tokens ending at `i`
function gluedRun(tokens: Token[], i: number): string {
  let j = i;
  while (j > 0 && adjacent(tokens[j - 1], tokens[j]) && (tokens[j - 1].type === "WORD" || tokens[j - 1].raw === ".")) {
    j -= 1;
  }
  return tokens.slice(j, i + 1).map(t => t.raw).join("").toLowerCase();
}

function isAbbreviationDot(tokens: Token[], i: number, abbreviations: Set<string>): boolean {
  if (tokens[i].raw !== ".") return false;
  const next = tokens[i + 1];
  // glued to the following word: part of an initialism, a filename, a decimal
  if (next && adjacent(tokens[i], next) && next.type === "WORD") return true;
  return abbreviations.has(gluedRun(tokens, i));
}

/**
 * Split a token stream into sentences. Every token belongs to exactly one
 * sentence. A sentence ends at a terminator (plus any glued closing quotes or
 * brackets), at a line break, or at the end of the text.
 */
export function segmentSentences(
  text: string,
  tokens: Token[],
  abbreviations: Set<string> = ABBREVIATIONS
): ParsedSentence[] {
  const sentences: ParsedSentence[] = [];
  let sentenceStart = 0;

  const pushSentence = (endToken: number, reason: ParsedSentence["reason"], hasTerminator: boolean) => {
    sentences.push({
      index: sentences.length,
      startToken: sentenceStart,
      endToken,
      startOffset: tokens[sentenceStart].start,
      endOffset: tokens[endToken].end,
      hasTerminalPunctuation: hasTerminator,
      reason,
    });
    sentenceStart = endToken + 1;
  };

  for (let i = 0; i < tokens.length; i += 1) {
    const token = tokens[i];

    if (SENTENCE_TERMINATORS.has(token.raw) && !isAbbreviationDot(tokens, i, abbreviations)) {
      let end = i;
      while (
        end + 1 < tokens.length &&
        adjacent(tokens[end], tokens[end + 1]) &&
        (SENTENCE_TERMINATORS.has(tokens[end + 1].raw) || CLOSING_WRAPPERS.has(tokens[end + 1].raw))
      ) {
        end += 1;
      }
      pushSentence(end, "terminator", true);
      i = end;
      continue;
    }

    const next = tokens[i + 1];
    if (!next) {
      pushSentence(i, "eof", false);
      continue;
    }
    if (/\n/.test(text.slice(token.end, next.start))) {
      pushSentence(i, "newline", false);
    }
  }

  return sentences;
}
