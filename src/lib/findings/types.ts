export const CATEGORIES = ["spelling", "grammar", "agreement", "punctuation", "style"] as const;

export type Category = (typeof CATEGORIES)[number];

/** Half-open `[start, end)` interval of string offsets into the normalized text. */
export type Span = {
  readonly start: number;
  readonly end: number;
};

export type Finding = {
  readonly category: Category;
  readonly span: Span;
  readonly message: string;
  readonly suggestions: readonly string[];
  readonly confidence: number;   // 0..1
  readonly provenance: string;   // e.g. "hunspell", "languagetool", "llm"
};

// Tie-break only; higher wins. Not a severity ranking.
export const CATEGORY_PRIORITY: Readonly<Record<Category, number>> = Object.freeze({
  spelling: 3,
  grammar: 2,
  agreement: 2,
  punctuation: 2,
  style: 1,
});

export const MAX_SUGGESTIONS = 3;

export function categoryPriority(category: Category): number {
  return CATEGORY_PRIORITY[category];
}

export function isCategory(value: unknown): value is Category {
  return typeof value === "string" && (CATEGORIES as readonly string[]).includes(value);
}
