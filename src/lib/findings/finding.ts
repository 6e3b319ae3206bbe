import { MAX_SUGGESTIONS, type Category, type Finding, type Span } from "./types";

export type FindingInit = {
  category: Category;
  start: number;
  end: number;
  message: string;
  suggestions?: Iterable<string | null | undefined>;
  confidence: number;
  provenance: string;
};

/**
 * The only way detectors build findings: trims and de-duplicates suggestions,
 * caps them at {@link MAX_SUGGESTIONS} and freezes the result.
 */
export function createFinding(init: FindingInit): Finding {
  const suggestions: string[] = [];
  for (const s of init.suggestions ?? []) {
    if (typeof s !== "string" || !s.length) continue;
    if (suggestions.includes(s)) continue;
    suggestions.push(s);
    if (suggestions.length >= MAX_SUGGESTIONS) break;
  }

  return Object.freeze({
    category: init.category,
    span: Object.freeze({ start: init.start, end: init.end }),
    message: init.message,
    suggestions: Object.freeze(suggestions),
    confidence: init.confidence,
    provenance: init.provenance,
  });
}

export function spanLength(span: Span): number {
  return Math.max(0, span.end - span.start);
}

/** Positive-length intersection; touching or empty spans never overlap. */
export function overlaps(a: Span, b: Span): boolean {
  return Math.min(a.end, b.end) - Math.max(a.start, b.start) > 0;
}

// One finding per span/category pair; the first one seen wins.
export function dedupeFindings(findings: readonly Finding[]): Finding[] {
  const seen = new Set<string>();
  const out: Finding[] = [];
  for (const f of findings) {
    const k = `${f.category}:${f.span.start}:${f.span.end}`;
    if (!seen.has(k)) {
      seen.add(k);
      out.push(f);
    }
  }
  return out;
}
