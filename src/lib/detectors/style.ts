import type { Detector } from "./types";
import type { Finding } from "@/lib/findings/types";
import type { ParsedForm } from "@/lib/parse/types";
import { createFinding, dedupeFindings } from "@/lib/findings/finding";

export const LONG_SENTENCE_TOKENS = 40;

// phrase -> plainer replacement
export const WORDY_PHRASES: ReadonlyArray<readonly [string, string]> = [
  ["in order to", "to"],
  ["due to the fact that", "because"],
  ["at this point in time", "now"],
  ["utilize", "use"],
  ["in the event that", "if"],
  ["for the purpose of", "for"],
  ["in spite of the fact that", "although"],
  ["a large number of", "many"],
];

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const WORDY_RES = WORDY_PHRASES.map(
  ([phrase, replacement]) => [phrase, replacement, new RegExp(`\\b${escapeRegExp(phrase).replace(/ /g, "\\s+")}\\b`, "gi")] as const
);

export function passiveFindings(parsed: ParsedForm): Finding[] {
  const findings: Finding[] = [];
  for (const token of parsed.tokens) {
    if (token.dep !== "auxpass") continue;
    const verb = parsed.tokens[token.head];
    if (!verb) continue;
    findings.push(
      createFinding({
        category: "style",
        start: Math.min(token.start, verb.start),
        end: Math.max(token.end, verb.end),
        message: "Passive voice detected. Consider active voice.",
        confidence: 0.6,
        provenance: "style:passive",
      })
    );
  }
  return findings;
}

export function longSentenceFindings(parsed: ParsedForm): Finding[] {
  return parsed.sentences
    .filter(s => s.endToken - s.startToken + 1 > LONG_SENTENCE_TOKENS)
    .map(s =>
      createFinding({
        category: "style",
        start: s.startOffset,
        end: s.endOffset,
        message: `Sentence is very long (${LONG_SENTENCE_TOKENS}+ tokens). Consider splitting.`,
        confidence: 0.5,
        provenance: "style:length",
      })
    );
}

export function wordyFindings(text: string): Finding[] {
  const findings: Finding[] = [];
  for (const [phrase, replacement, re] of WORDY_RES) {
    for (const m of text.matchAll(re)) {
      const start = m.index ?? 0;
      findings.push(
        createFinding({
          category: "style",
          start,
          end: start + m[0].length,
          message: `Wordy construction '${phrase}'.`,
          suggestions: [replacement],
          confidence: 0.8,
          provenance: "style:wordy",
        })
      );
    }
  }
  return findings;
}

/** Passive voice, overlong sentences and wordy stock phrases. */
export class StyleDetector implements Detector<"style"> {
  readonly kind = "style";

  detect(text: string, parsed?: ParsedForm): Finding[] {
    if (!parsed) return [];
    return dedupeFindings([...passiveFindings(parsed), ...longSentenceFindings(parsed), ...wordyFindings(text)]);
  }
}
