import type { Detector } from "./types";
import type { Finding } from "@/lib/findings/types";
import type { ParsedForm } from "@/lib/parse/types";
import type { SpellingEngine } from "@/lib/spell/types";
import { createFinding, dedupeFindings } from "@/lib/findings/finding";

/** Dictionary lookups for every plain word that is not a name, link or address. */
export class SpellingDetector implements Detector<"spelling"> {
  readonly kind = "spelling";

  constructor(private readonly engine: SpellingEngine | null) {}

  detect(_text: string, parsed?: ParsedForm): Finding[] {
    if (!parsed || !this.engine) return [];

    const findings: Finding[] = [];
    for (const token of parsed.tokens) {
      if (!token.isAlpha || token.likeUrl || token.likeEmail || token.isPunct || token.pos === "PROPN") continue;

      const word = token.text;
      const candidates = this.engine.lookup(word);
      // no opinion: an empty dictionary or a word it cannot place
      if (!candidates.length) continue;
      const lower = word.toLowerCase();
      if (candidates.some(c => c.term.toLowerCase() === lower)) continue;

      findings.push(
        createFinding({
          category: "spelling",
          start: token.start,
          end: token.end,
          message: `Possible spelling error: '${word}'`,
          suggestions: candidates.map(c => c.term),
          confidence: 0.9,
          provenance: this.engine.name,
        })
      );
    }
    return dedupeFindings(findings);
  }
}
