export type PartOfSpeech =
  | "NOUN" | "PROPN" | "PRON" | "VERB" | "AUX" | "DET" | "ADJ" | "ADV"
  | "ADP" | "CCONJ" | "SCONJ" | "PART" | "NUM" | "PUNCT" | "SYM" | "X";

export type DependencyRelation =
  | "root" | "nsubj" | "nsubjpass" | "aux" | "auxpass" | "det" | "amod"
  | "nummod" | "advmod" | "prep" | "pobj" | "dobj" | "punct" | "dep";

export type GrammaticalNumber = "Sing" | "Plur";

/** Penn-style verb form tags the agreement rules care about. */
export type VerbForm = "VB" | "VBP" | "VBZ" | "VBD" | "VBN" | "VBG" | "MD";

export interface Morphology {
  number?: GrammaticalNumber;
  person?: 1 | 2 | 3;
  verbForm?: VerbForm;
}

export interface ParsedToken {
  index: number;
  text: string;
  start: number;
  end: number;
  lemma: string;
  pos: PartOfSpeech;
  dep: DependencyRelation;
  /** index of the syntactic head; a root points at itself */
  head: number;
  morph: Morphology;
  sentence: number;
  isAlpha: boolean;
  isPunct: boolean;
  likeUrl: boolean;
  likeEmail: boolean;
}

export interface ParsedSentence {
  index: number;
  startToken: number;
  endToken: number;        // inclusive
  startOffset: number;
  endOffset: number;       // exclusive
  hasTerminalPunctuation: boolean;
  reason: "terminator" | "newline" | "eof";
}

/**
 * Shared linguistic annotation, computed once per analysis and handed to
 * every detector. `model: "segmentation"` marks the degraded form where only
 * tokens and sentence bounds are trustworthy (pos is "X", dep is "dep").
 */
export interface ParsedForm {
  readonly text: string;
  readonly model: "heuristic" | "segmentation";
  readonly tokens: readonly ParsedToken[];
  readonly sentences: readonly ParsedSentence[];
}

export interface LanguageProvider {
  parse(normalizedText: string): ParsedForm | Promise<ParsedForm>;
}
