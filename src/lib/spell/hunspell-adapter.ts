import { readFile } from "node:fs/promises";
import { loadModule } from "hunspell-asm";
import type { SpellCandidate, SpellingEngine } from "./types";

/**
 * Hunspell engine on hunspell-asm (WASM). The flow:
 *   const factory = await loadModule();
 *   const affPath = factory.mountBuffer(affBuf, "en_US.aff");
 *   const dicPath = factory.mountBuffer(dicBuf, "en_US.dic");
 *   const engine  = factory.create(affPath, dicPath);
 *   engine.spell("word"), engine.suggest("wrod")
 */

export type HunspellDictionary = { aff: Uint8Array; dic: Uint8Array };

export type HunspellOptions = {
  affPath?: string;
  dicPath?: string;
  maxSuggestions?: number;
};

const DEFAULT_MAX_SUGGESTIONS = 5;

/** Plain Levenshtein distance, two rows. */
export function editDistance(a: string, b: string): number {
  if (a === b) return 0;
  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i += 1) {
    const row = [i];
    for (let j = 1; j <= b.length; j += 1) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      row[j] = Math.min(prev[j] + 1, row[j - 1] + 1, prev[j - 1] + cost);
    }
    prev = row;
  }
  return prev[b.length];
}

async function loadDictionary(options: HunspellOptions): Promise<HunspellDictionary> {
  if (options.affPath && options.dicPath) {
    const [aff, dic] = await Promise.all([readFile(options.affPath), readFile(options.dicPath)]);
    return { aff, dic };
  }
  const { default: dictionary } = await import("dictionary-en");
  return dictionary;
}

export function createHunspellEngine(
  check: (word: string) => boolean,
  suggest: (word: string) => string[],
  maxSuggestions = DEFAULT_MAX_SUGGESTIONS
): SpellingEngine {
  // curly apostrophes are not in the affix rules
  const normalize = (w: string) => w.replace(/’/g, "'");

  return {
    name: "hunspell",
    lookup(word: string): SpellCandidate[] {
      const w = normalize(word);
      // case handling depends on dictionary flags; try lower as well
      if (check(w) || check(w.toLowerCase())) return [{ term: word, distance: 0 }];
      return suggest(w)
        .slice(0, maxSuggestions)
        .map(term => ({ term, distance: editDistance(w.toLowerCase(), term.toLowerCase()) }));
    },
  };
}

export async function loadHunspellEngine(options: HunspellOptions = {}): Promise<SpellingEngine> {
  const factory = await loadModule();
  const { aff, dic } = await loadDictionary(options);
  const affMounted = factory.mountBuffer(aff, "en_US.aff");
  const dicMounted = factory.mountBuffer(dic, "en_US.dic");
  const engine = factory.create(affMounted, dicMounted);

  return createHunspellEngine(
    word => engine.spell(word),
    word => engine.suggest(word),
    options.maxSuggestions
  );
}
