import type { Token } from "@/lib/types";
import type {
  DependencyRelation,
  GrammaticalNumber,
  Morphology,
  ParsedSentence,
  ParsedToken,
  PartOfSpeech,
  VerbForm,
} from "./types";
import {
  ADJECTIVES,
  ADVERBS,
  AUXILIARIES,
  COORDINATORS,
  DETERMINERS,
  IRREGULAR_PLURALS,
  IRREGULAR_VERBS,
  PREPOSITIONS,
  PRONOUNS,
  SINGULAR_NOUNS,
  SUBORDINATORS,
  knownVerbLemma,
} from "./lexicon";

type Draft = {
  pos?: PartOfSpeech;
  lemma: string;
  morph: Morphology;
  pronounCase?: "subj" | "obj" | "poss";
  dep: DependencyRelation;
  head: number;
};

type Clause = {
  subject: number | null;   // nominal waiting for its verb
  compound: boolean;        // "the dog and the cat ..." : no single subject
  verb: number | null;      // head of the clause's verb group
  auxes: number[];
  modifiers: number[];      // DET/ADJ/NUM/possessives waiting for a noun
  adverbs: number[];
  adp: number | null;       // preposition waiting for its object
  lastNominal: number | null;
};

// letters with internal apostrophes or hyphens: don't, well-known
export const ALPHA_RE = /^[\p{L}\p{M}]+(?:['’-][\p{L}\p{M}]+)*$/u;
const ADJECTIVE_SUFFIX_RE = /(ous|ful|ive|able|ible|less|ish|ical)$/;
const CLAUSE_PUNCT = new Set([";", ":", "—", "–"]);

const openClause = (): Clause => ({
  subject: null,
  compound: false,
  verb: null,
  auxes: [],
  modifiers: [],
  adverbs: [],
  adp: null,
  lastNominal: null,
});

function isCapitalized(word: string): boolean {
  return /^\p{Lu}/u.test(word);
}

function nounMorph(lower: string): { number: GrammaticalNumber; lemma: string } {
  const irregular = IRREGULAR_PLURALS.get(lower);
  if (irregular) return { number: "Plur", lemma: irregular };
  if (SINGULAR_NOUNS.has(lower) || lower.length <= 3 || !lower.endsWith("s") || /(ss|us|is)$/.test(lower)) {
    return { number: "Sing", lemma: lower };
  }
  if (lower.endsWith("ies")) return { number: "Plur", lemma: `${lower.slice(0, -3)}y` };
  if (/(s|x|z|ch|sh)es$/.test(lower)) return { number: "Plur", lemma: lower.slice(0, -2) };
  return { number: "Plur", lemma: lower.slice(0, -1) };
}

function verbMorph(lower: string, hint?: VerbForm): { morph: Morphology; lemma: string } {
  let form: VerbForm;
  if (hint) form = hint;
  else if (lower.endsWith("ing")) form = "VBG";
  else if (lower.endsWith("ed")) form = "VBD";
  else if (lower.endsWith("s") && !lower.endsWith("ss")) form = "VBZ";
  else form = "VBP";

  const known = knownVerbLemma(lower);
  let lemma = known ?? lower;
  if (!known) {
    if (form === "VBZ") lemma = lower.replace(/e?s$/, "");
    else if (form === "VBD" || form === "VBN") lemma = lower.replace(/ed$/, "");
    else if (form === "VBG") lemma = lower.replace(/ing$/, "");
  }

  const morph: Morphology = form === "VBZ" ? { verbForm: form, number: "Sing", person: 3 } : { verbForm: form };
  return { morph, lemma };
}

function lexicalTag(token: Token, sentenceInitial: boolean): Draft {
  const lower = token.raw.toLowerCase();
  const draft: Draft = { lemma: lower, morph: {}, dep: "dep", head: token.idx };

  if (token.type === "PUNCT") {
    draft.pos = /\p{P}/u.test(token.raw) ? "PUNCT" : "SYM";
    return draft;
  }
  if (token.type === "NUMBER") {
    draft.pos = "NUM";
    return draft;
  }
  if (token.type !== "WORD") {
    draft.pos = "X";
    return draft;
  }

  const pronoun = PRONOUNS.get(lower);
  const aux = AUXILIARIES.get(lower);
  const irregular = IRREGULAR_VERBS.get(lower);
  const plural = IRREGULAR_PLURALS.get(lower);

  if (pronoun) {
    draft.pos = "PRON";
    draft.morph = { number: pronoun.number, person: pronoun.person };
    draft.pronounCase = pronoun.case;
  } else if (!sentenceInitial && isCapitalized(token.raw)) {
    draft.pos = "PROPN";
    draft.lemma = token.raw;
    draft.morph = { number: "Sing", person: 3 };
  } else if (aux) {
    draft.pos = "AUX";
    draft.lemma = aux.lemma;
    draft.morph = { number: aux.number, person: aux.person, verbForm: aux.verbForm };
  } else if (DETERMINERS.has(lower)) {
    draft.pos = "DET";
    draft.morph = { number: DETERMINERS.get(lower) ?? undefined };
  } else if (irregular) {
    draft.pos = "VERB";
    draft.lemma = irregular[0];
    draft.morph = { verbForm: irregular[1] };
  } else if (lower === "not") {
    draft.pos = "PART";
  } else if (PREPOSITIONS.has(lower)) {
    draft.pos = "ADP";
  } else if (COORDINATORS.has(lower)) {
    draft.pos = "CCONJ";
  } else if (SUBORDINATORS.has(lower)) {
    draft.pos = "SCONJ";
  } else if (ADVERBS.has(lower) || (lower.length > 4 && lower.endsWith("ly"))) {
    draft.pos = "ADV";
  } else if (ADJECTIVES.has(lower)) {
    draft.pos = "ADJ";
  } else if (plural) {
    draft.pos = "NOUN";
    draft.lemma = plural;
    draft.morph = { number: "Plur", person: 3 };
  }
  return draft;
}

function parseSentence(tokens: Token[], drafts: Draft[], sentence: ParsedSentence): void {
  const from = sentence.startToken;
  const to = sentence.endToken;
  const clauseVerbs: number[] = [];
  const punct: number[] = [];
  let clause = openClause();

  const makeNoun = (k: number) => {
    const { number, lemma } = nounMorph(tokens[k].raw.toLowerCase());
    drafts[k].pos = "NOUN";
    drafts[k].lemma = lemma;
    drafts[k].morph = { number, person: 3 };
  };

  const makeVerb = (k: number, hint?: VerbForm) => {
    const { morph, lemma } = verbMorph(tokens[k].raw.toLowerCase(), hint);
    drafts[k].pos = "VERB";
    drafts[k].lemma = lemma;
    drafts[k].morph = morph;
  };

  const resolveWord = (k: number) => {
    const lower = tokens[k].raw.toLowerCase();
    let back = k - 1;
    while (back >= from && (drafts[back].pos === "ADV" || drafts[back].pos === "PART")) back -= 1;
    const governor = back >= from ? drafts[back] : undefined;

    if (governor?.pos === "AUX" && clause.verb === null) {
      if (governor.morph.verbForm === "MD" || governor.lemma === "do") return makeVerb(k, "VB");
      if (governor.lemma === "be") {
        if (lower.endsWith("ing")) return makeVerb(k, "VBG");
        if (lower.endsWith("ed")) return makeVerb(k, "VBN");
        drafts[k].pos = "ADJ";
        return;
      }
      if (governor.lemma === "have" && lower.endsWith("ed")) return makeVerb(k, "VBN");
      return makeNoun(k);
    }

    if (k > from && tokens[k - 1].raw.toLowerCase() === "to" && knownVerbLemma(lower)) return makeVerb(k, "VB");

    if (clause.modifiers.length) {
      const next = k + 1 <= to ? tokens[k + 1] : undefined;
      if (ADJECTIVE_SUFFIX_RE.test(lower) && next?.type === "WORD" && !drafts[k + 1].pos) {
        drafts[k].pos = "ADJ";
        return;
      }
      return makeNoun(k);
    }

    // the slot right after a subject
    if (clause.subject !== null && clause.verb === null && !clause.auxes.length && clause.adp === null) {
      if (knownVerbLemma(lower) || lower.endsWith("ed")) return makeVerb(k);
    }
    return makeNoun(k);
  };

  const setVerb = (v: number) => {
    const verb = drafts[v];
    const auxLemmas = clause.auxes.map(a => drafts[a].lemma);
    if (verb.pos === "VERB" && verb.morph.verbForm === "VBD" && (auxLemmas.includes("be") || auxLemmas.includes("have"))) {
      verb.morph = { ...verb.morph, verbForm: "VBN" };
    }
    const passive = verb.pos === "VERB" && verb.morph.verbForm === "VBN" && auxLemmas.includes("be");

    for (const a of clause.auxes) {
      drafts[a].head = v;
      drafts[a].dep = passive && drafts[a].lemma === "be" ? "auxpass" : "aux";
    }
    clause.auxes = [];
    if (clause.subject !== null && !clause.compound) {
      drafts[clause.subject].dep = passive ? "nsubjpass" : "nsubj";
      drafts[clause.subject].head = v;
    }
    clause.verb = v;
    clauseVerbs.push(v);
  };

  const closeClause = () => {
    const copula = clause.verb === null ? clause.auxes.pop() : undefined;
    if (copula !== undefined) setVerb(copula);
    const verb = clause.verb;
    for (const m of clause.modifiers) drafts[m].head = verb ?? m;
    for (const a of clause.adverbs) drafts[a].head = verb ?? a;
    clause = openClause();
  };

  const attachNominal = (k: number) => {
    const d = drafts[k];
    for (const m of clause.modifiers) {
      const pos = drafts[m].pos;
      drafts[m].head = k;
      drafts[m].dep = pos === "ADJ" ? "amod" : pos === "NUM" ? "nummod" : "det";
    }
    clause.modifiers = [];

    if (clause.adp !== null) {
      d.dep = "pobj";
      d.head = clause.adp;
      clause.adp = null;
    } else if (clause.verb !== null) {
      d.dep = "dobj";
      d.head = clause.verb;
    } else if (clause.auxes.length) {
      // "She is a doctor": the auxiliary is the clause's verb
      const copula = clause.auxes.pop();
      if (copula !== undefined) setVerb(copula);
      d.head = clause.verb ?? k;
    } else if (clause.subject !== null && clause.compound) {
      d.head = clause.subject;
    } else {
      // "bus driver": an earlier bare noun modifies this one
      if (clause.subject !== null) drafts[clause.subject].head = k;
      clause.subject = k;
    }
    clause.lastNominal = k;
  };

  for (let k = from; k <= to; k += 1) {
    const d = drafts[k];
    if (!d.pos) resolveWord(k);

    switch (d.pos) {
      case "DET":
        // "a few": the outer determiner stays unattached
        if (clause.modifiers.some(m => drafts[m].pos === "DET")) clause.modifiers = [];
        clause.modifiers.push(k);
        break;
      case "NUM":
      case "ADJ":
        clause.modifiers.push(k);
        break;
      case "PRON":
        if (d.pronounCase === "poss") clause.modifiers.push(k);
        else attachNominal(k);
        break;
      case "NOUN":
      case "PROPN":
        attachNominal(k);
        break;
      case "AUX":
        if (clause.verb !== null) d.head = clause.verb;
        else clause.auxes.push(k);
        break;
      case "VERB":
        if (clause.verb !== null) d.head = clause.verb;
        else setVerb(k);
        break;
      case "ADP":
        d.dep = "prep";
        d.head = clause.verb ?? clause.lastNominal ?? k;
        clause.adp = k;
        break;
      case "ADV":
      case "PART":
        d.dep = "advmod";
        clause.adverbs.push(k);
        break;
      case "CCONJ":
        if (clause.verb !== null || clause.auxes.length) closeClause();
        else if (clause.subject !== null) clause.compound = true;
        break;
      case "SCONJ":
        closeClause();
        break;
      case "PUNCT":
      case "SYM": {
        punct.push(k);
        const raw = tokens[k].raw;
        if (CLAUSE_PUNCT.has(raw) || (raw === "," && clause.verb !== null)) closeClause();
        else if (raw === ",") {
          clause.modifiers = [];
          clause.adp = null;
        }
        break;
      }
      default:
        break;
    }
  }
  closeClause();

  const root = clauseVerbs[0];
  if (root !== undefined) {
    drafts[root].dep = "root";
    drafts[root].head = root;
    for (const v of clauseVerbs.slice(1)) {
      if (drafts[v].head === v) drafts[v].head = root;
    }
  }
  for (const p of punct) {
    drafts[p].dep = "punct";
    drafts[p].head = root ?? p;
  }
}

/**
 * Lexicon-driven tagging: part of speech, morphology (number, person, verb
 * form) and a shallow dependency tree, one clause at a time.
 */
export function tagTokens(tokens: Token[], sentences: readonly ParsedSentence[]): ParsedToken[] {
  const sentenceOf = new Array<number>(tokens.length).fill(0);
  const drafts: Draft[] = [];

  for (const sentence of sentences) {
    let seenWord = false;
    for (let k = sentence.startToken; k <= sentence.endToken; k += 1) {
      sentenceOf[k] = sentence.index;
      const initial = !seenWord && tokens[k].type === "WORD";
      if (tokens[k].type === "WORD") seenWord = true;
      drafts[k] = lexicalTag(tokens[k], initial);
    }
  }
  for (const sentence of sentences) parseSentence(tokens, drafts, sentence);

  return tokens.map((t, i) => {
    const d = drafts[i];
    return {
      index: i,
      text: t.raw,
      start: t.start,
      end: t.end,
      lemma: d.lemma,
      pos: d.pos ?? "X",
      dep: d.dep,
      head: d.head,
      morph: d.morph,
      sentence: sentenceOf[i],
      isAlpha: t.type === "WORD" && ALPHA_RE.test(t.raw),
      isPunct: t.type === "PUNCT",
      likeUrl: t.type === "URL",
      likeEmail: t.type === "EMAIL",
    };
  });
}
