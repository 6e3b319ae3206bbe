import { z } from "zod";
import lexiconJson from "@/data/lexicon.json";

const numberSchema = z.enum(["Sing", "Plur"]);
const personSchema = z.union([z.literal(1), z.literal(2), z.literal(3)]);

const lexiconSchema = z.object({
  abbreviations: z.array(z.string()),
  determiners: z.record(numberSchema.nullable()),
  pronouns: z.record(
    z.object({
      number: numberSchema.optional(),
      person: personSchema,
      case: z.enum(["subj", "obj", "poss"]),
    })
  ),
  auxiliaries: z.record(
    z.object({
      lemma: z.string(),
      verbForm: z.enum(["VB", "VBP", "VBZ", "VBD", "VBN", "VBG", "MD"]),
      number: numberSchema.optional(),
      person: personSchema.optional(),
    })
  ),
  irregularVerbs: z.record(z.tuple([z.string(), z.enum(["VBD", "VBN"])])),
  verbs: z.array(z.string()),
  irregularPlurals: z.record(z.string()),
  singularNouns: z.array(z.string()),
  prepositions: z.array(z.string()),
  coordinators: z.array(z.string()),
  subordinators: z.array(z.string()),
  adverbs: z.array(z.string()),
  adjectives: z.array(z.string()),
});

export type Lexicon = z.infer<typeof lexiconSchema>;

const data = lexiconSchema.parse(lexiconJson);

export const ABBREVIATIONS = new Set(data.abbreviations);
export const DETERMINERS = new Map(Object.entries(data.determiners));
export const PRONOUNS = new Map(Object.entries(data.pronouns));
export const AUXILIARIES = new Map(Object.entries(data.auxiliaries));
export const IRREGULAR_VERBS = new Map(Object.entries(data.irregularVerbs));
export const IRREGULAR_PLURALS = new Map(Object.entries(data.irregularPlurals));
export const VERBS = new Set(data.verbs);
export const SINGULAR_NOUNS = new Set(data.singularNouns);
export const PREPOSITIONS = new Set(data.prepositions);
export const COORDINATORS = new Set(data.coordinators);
export const SUBORDINATORS = new Set(data.subordinators);
export const ADVERBS = new Set(data.adverbs);
export const ADJECTIVES = new Set(data.adjectives);

/** Base form of `word` when it is an inflection of a listed verb. */
export function knownVerbLemma(word: string): string | null {
  const w = word.toLowerCase();
  const irregular = IRREGULAR_VERBS.get(w);
  if (irregular) return irregular[0];
  const candidates = [w];
  if (w.endsWith("ies") || w.endsWith("ied")) candidates.push(`${w.slice(0, -3)}y`);
  if (w.endsWith("es") || w.endsWith("ed")) candidates.push(w.slice(0, -2));
  if (w.endsWith("s") || w.endsWith("d")) candidates.push(w.slice(0, -1));
  if (w.endsWith("ing")) candidates.push(w.slice(0, -3), `${w.slice(0, -3)}e`);
  return candidates.find(c => VERBS.has(c)) ?? null;
}
