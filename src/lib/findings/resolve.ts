import { categoryPriority, type Finding } from "./types";
import { overlaps } from "./finding";

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function compareSuggestions(a: readonly string[], b: readonly string[]): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const c = compareStrings(a[i], b[i]);
    if (c !== 0) return c;
  }
  return a.length - b.length;
}

/**
 * Canonical order: start asc, category priority desc, confidence desc.
 * The remaining keys only exist so that two findings compare equal iff they
 * are structurally equal, which makes the order independent of input order.
 */
export function compareFindings(a: Finding, b: Finding): number {
  return (
    a.span.start - b.span.start ||
    categoryPriority(b.category) - categoryPriority(a.category) ||
    b.confidence - a.confidence ||
    a.span.end - b.span.end ||
    compareStrings(a.category, b.category) ||
    compareStrings(a.provenance, b.provenance) ||
    compareStrings(a.message, b.message) ||
    compareSuggestions(a.suggestions, b.suggestions)
  );
}

type Ranked = { finding: Finding; order: number; defeated: boolean };

// true if `b` beats `a` when the two overlap
function beats(b: Ranked, a: Ranked): boolean {
  const pb = categoryPriority(b.finding.category);
  const pa = categoryPriority(a.finding.category);
  if (pb !== pa) return pb > pa;
  if (b.finding.confidence !== a.finding.confidence) return b.finding.confidence > a.finding.confidence;
  return b.order < a.order;
}

/**
 * Reduce findings from every detector to an overlap-free subset.
 *
 * A finding survives iff no other finding in the whole input overlaps it and
 * outranks it (priority, then confidence, then canonical position). Defeat is
 * judged against the full input, not only against survivors, so a finding
 * beaten by a finding that is itself beaten still drops out.
 *
 * After one canonical sort, each finding is only compared with the findings
 * whose start lies before its end.
 */
export function resolveConflicts(findings: readonly Finding[]): Finding[] {
  if (!findings.length) return [];

  const ranked: Ranked[] = [...findings]
    .sort(compareFindings)
    .map((finding, order) => ({ finding, order, defeated: false }));

  for (let i = 0; i < ranked.length; i++) {
    const a = ranked[i];
    if (a.finding.span.end <= a.finding.span.start) continue;
    for (let j = i + 1; j < ranked.length; j++) {
      const b = ranked[j];
      // sorted by start: nothing further can reach back into `a`
      if (b.finding.span.start >= a.finding.span.end) break;
      if (!overlaps(a.finding.span, b.finding.span)) continue;
      if (beats(b, a)) a.defeated = true;
      else b.defeated = true;
    }
  }

  return ranked.filter(r => !r.defeated).map(r => r.finding);
}
