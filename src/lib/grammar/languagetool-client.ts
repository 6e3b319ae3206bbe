import { z } from "zod";
import type { Category } from "@/lib/findings/types";
import type { GrammarLevel } from "@/lib/config";
import { DetectorUnavailableError, LanguageToolHttpError } from "@/lib/errors";
import { dtable, errorMessage, fetchWithTimeout, sleep } from "@/lib/utils";

export interface GrammarIssue {
  offset: number;     // 0-based char start
  length: number;
  message: string;
  replacements: string[];
  ruleId: string;       // e.g. "MORFOLOGIK_RULE_EN_US"
  categoryId: string;   // e.g. "TYPOS"
  issueType: string;    // e.g. "misspelling"
}

export type LanguageToolClientOptions = {
  baseUrl: string;
  language?: string;
  level?: GrammarLevel;
  apiKey?: string;
  timeoutMs?: number;
  /** first 429 backoff; doubles on each retry */
  retryDelayMs?: number;
  maxRetries?: number;
};

// Servers disagree on field names; accept all the shapes seen in the wild
const replacementSchema = z.union([
  z.string(),
  z.object({ value: z.string().optional(), val: z.string().optional(), text: z.string().optional() }),
]);

const matchSchema = z.object({
  message: z.string().optional(),
  msg: z.string().optional(),
  shortMessage: z.string().optional(),
  offset: z.number().optional(),
  fromPos: z.number().optional(),
  length: z.number().optional(),
  len: z.union([z.number(), z.string()]).optional(),
  context: z.object({ offset: z.number().optional(), length: z.number().optional() }).optional(),
  replacements: z.array(replacementSchema).optional(),
  ruleId: z.string().optional(),
  categoryId: z.string().optional(),
  rule: z
    .object({
      id: z.string().optional(),
      issueType: z.string().optional(),
      category: z.object({ id: z.string().optional(), name: z.string().optional() }).optional(),
    })
    .optional(),
});

const responseSchema = z.object({ matches: z.array(z.unknown()).default([]) });

type LtMatch = z.infer<typeof matchSchema>;

function toIssue(m: LtMatch): GrammarIssue {
  const offset = m.offset ?? m.fromPos ?? m.context?.offset ?? -1;
  const length = m.length ?? (typeof m.len === "number" ? m.len : undefined) ?? m.context?.length ?? 0;
  const replacements = (m.replacements ?? [])
    .map(r => (typeof r === "string" ? r : r.value ?? r.val ?? r.text))
    .filter((r): r is string => typeof r === "string" && r.length > 0);
  return {
    offset,
    length,
    message: m.message ?? m.msg ?? m.shortMessage ?? "",
    replacements,
    ruleId: m.ruleId ?? m.rule?.id ?? "",
    categoryId: m.categoryId ?? m.rule?.category?.id ?? "",
    issueType: m.rule?.issueType ?? "",
  };
}

// Exact de-duplication (no category filtering)
export function dedupeIssues(issues: GrammarIssue[]): GrammarIssue[] {
  const seen = new Set<string>();
  const out: GrammarIssue[] = [];
  for (const i of issues) {
    const k = `${i.ruleId}:${i.offset}:${i.length}:${i.message}`;
    if (!seen.has(k)) {
      seen.add(k);
      out.push(i);
    }
  }
  return out;
}

export function parseCheckResponse(payload: unknown): GrammarIssue[] {
  const parsed = responseSchema.safeParse(payload);
  if (!parsed.success) return [];
  const issues: GrammarIssue[] = [];
  for (const raw of parsed.data.matches) {
    const m = matchSchema.safeParse(raw);
    if (m.success) issues.push(toIssue(m.data));
  }
  return dedupeIssues(issues);
}

/** Map a LanguageTool rule onto a finding category. */
export function classifyIssue(issue: GrammarIssue): Category {
  const rid = issue.ruleId.toUpperCase();
  const cat = issue.categoryId.toUpperCase();
  const type = issue.issueType.toUpperCase();
  const is = (...parts: string[]) => parts.some(p => rid.includes(p) || cat.includes(p));

  if (rid === "UPPERCASE_SENTENCE_START") return "style";
  if (type === "MISSPELLING" || is("MORFOLOGIK", "SPELL", "TYPOS")) return "spelling";
  if (is("AGREEMENT", "SVA")) return "agreement";
  if (type === "GRAMMAR" || is("GRAMMAR", "CONJUGATION", "TENSE")) return "grammar";
  if (type === "TYPOGRAPHICAL" || is("PUNCT", "COMMA", "APOSTROPHE", "QUOTES", "DASH", "HYPHEN", "WHITESPACE")) {
    return "punctuation";
  }
  if (type === "STYLE" || is("STYLE", "REDUNDANCY", "CLARITY", "WORDINESS", "CASING")) return "style";
  return "grammar";
}

export class LanguageToolClient {
  private readonly endpoint: string;
  private readonly language: string;
  private readonly level: GrammarLevel;
  private readonly timeoutMs: number;
  private readonly retryDelayMs: number;
  private readonly maxRetries: number;

  constructor(private readonly options: LanguageToolClientOptions) {
    this.endpoint = `${options.baseUrl.replace(/\/$/, "")}/v2/check`;
    this.language = options.language ?? "en-US";
    this.level = options.level ?? "default";
    this.timeoutMs = options.timeoutMs ?? 20_000;
    this.retryDelayMs = options.retryDelayMs ?? 1_000;
    this.maxRetries = options.maxRetries ?? 3;
  }

  private body(text: string): URLSearchParams {
    const body = new URLSearchParams();
    body.set("text", text);
    // generic "en" turns spelling off on most servers
    body.set("language", this.language === "en" ? "en-US" : this.language);
    if (this.language === "auto") body.set("preferredVariants", "en-US");
    body.set("level", this.level);
    body.set("enabledOnly", "false");
    if (this.options.apiKey) body.set("apiKey", this.options.apiKey);
    return body;
  }

  private async post(text: string, signal?: AbortSignal): Promise<Response> {
    for (let attempt = 0; ; attempt += 1) {
      if (attempt > 0 && signal?.aborted) throw new DetectorUnavailableError("grammar", "aborted during 429 backoff");
      let response: Response;
      try {
        response = await fetchWithTimeout(
          this.endpoint,
          {
            method: "POST",
            headers: { "Content-Type": "application/x-www-form-urlencoded" },
            body: this.body(text),
          },
          this.timeoutMs,
          signal
        );
      } catch (err) {
        throw new DetectorUnavailableError("grammar", errorMessage(err));
      }

      // rate limited: 1s, 2s, 4s
      if (response.status === 429 && attempt < this.maxRetries) {
        await sleep(this.retryDelayMs * 2 ** attempt, signal);
        continue;
      }
      return response;
    }
  }

  async check(text: string, signal?: AbortSignal): Promise<GrammarIssue[]> {
    const response = await this.post(text, signal);
    if (!response.ok) throw new LanguageToolHttpError(response.status);

    const issues = parseCheckResponse(await response.json());
    dtable("[lt] issues", issues.map(i => ({ id: i.ruleId, category: i.categoryId, offset: i.offset, length: i.length, msg: i.message })));
    return issues;
  }
}
