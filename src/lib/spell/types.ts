export interface SpellCandidate {
  term: string;
  /** edit distance from the looked-up word; 0 means the word itself is known */
  distance: number;
}

/**
 * Dictionary engine behind the spelling detector. `lookup` returns the word
 * itself first (distance 0) when it is correct, otherwise its suggestions in
 * relevance order. An empty result means the engine has nothing to say.
 */
export interface SpellingEngine {
  readonly name: string;
  lookup(word: string): SpellCandidate[];
}
