import type { Category, Finding } from "./types";

export type FindingTab = "all" | "grammar" | "spelling" | "style";

export const TAB_CATEGORIES: Readonly<Record<Exclude<FindingTab, "all">, readonly Category[]>> = {
  grammar: ["grammar", "agreement", "punctuation"],
  spelling: ["spelling"],
  style: ["style"],
};

export function groupFindingsByTab(findings: readonly Finding[]): Record<FindingTab, Finding[]> {
  return {
    all: [...findings],
    grammar: findings.filter(f => TAB_CATEGORIES.grammar.includes(f.category)),
    spelling: findings.filter(f => TAB_CATEGORIES.spelling.includes(f.category)),
    style: findings.filter(f => TAB_CATEGORIES.style.includes(f.category)),
  };
}

export type TextSegment = {
  text: string;
  start: number;
  end: number;
  finding?: Finding;
};

/**
 * Cuts `text` into plain and highlighted runs for a renderer. Empty spans and
 * spans reaching back into an earlier highlight are left plain.
 */
export function highlightSegments(text: string, findings: readonly Finding[]): TextSegment[] {
  const sorted = [...findings].sort((a, b) => a.span.start - b.span.start || a.span.end - b.span.end);
  const segments: TextSegment[] = [];
  let cursor = 0;

  for (const finding of sorted) {
    const { start, end } = finding.span;
    if (end <= start || start < cursor || end > text.length) continue;
    if (start > cursor) segments.push({ text: text.slice(cursor, start), start: cursor, end: start });
    segments.push({ text: text.slice(start, end), start, end, finding });
    cursor = end;
  }
  if (cursor < text.length) segments.push({ text: text.slice(cursor), start: cursor, end: text.length });
  return segments;
}
