import { tokenize } from "@/lib/tokenize";
import { segmentSentences } from "./sentences";
import { ALPHA_RE, tagTokens } from "./tagger";
import type { LanguageProvider, ParsedForm, ParsedToken } from "./types";

function freezeForm(form: ParsedForm): ParsedForm {
  for (const t of form.tokens) Object.freeze(t.morph);
  return Object.freeze({
    ...form,
    tokens: Object.freeze(form.tokens.map(t => Object.freeze(t))),
    sentences: Object.freeze(form.sentences.map(s => Object.freeze(s))),
  });
}

/** Tokens, sentences, tags, morphology and shallow dependencies from the bundled lexicon. */
export class HeuristicLanguageProvider implements LanguageProvider {
  parse(normalizedText: string): ParsedForm {
    const tokens = tokenize(normalizedText);
    const sentences = segmentSentences(normalizedText, tokens);
    return freezeForm({
      text: normalizedText,
      model: "heuristic",
      tokens: tagTokens(tokens, sentences),
      sentences,
    });
  }
}

/**
 * Degraded provider: sentence bounds only. Tokens carry no tags ("X") and no
 * dependencies, so syntax-driven rules stay silent.
 */
export class SegmentingLanguageProvider implements LanguageProvider {
  parse(normalizedText: string): ParsedForm {
    const raw = tokenize(normalizedText);
    const sentences = segmentSentences(normalizedText, raw);
    const sentenceOf = new Array<number>(raw.length).fill(0);
    for (const s of sentences) {
      for (let k = s.startToken; k <= s.endToken; k += 1) sentenceOf[k] = s.index;
    }
    const tokens: ParsedToken[] = raw.map((t, i) => ({
      index: i,
      text: t.raw,
      start: t.start,
      end: t.end,
      lemma: t.raw.toLowerCase(),
      pos: "X",
      dep: "dep",
      head: i,
      morph: {},
      sentence: sentenceOf[i],
      isAlpha: t.type === "WORD" && ALPHA_RE.test(t.raw),
      isPunct: t.type === "PUNCT",
      likeUrl: t.type === "URL",
      likeEmail: t.type === "EMAIL",
    }));
    return freezeForm({ text: normalizedText, model: "segmentation", tokens, sentences });
  }
}
