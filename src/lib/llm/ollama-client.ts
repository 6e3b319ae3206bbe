import { z } from "zod";
import type { Finding } from "@/lib/findings/types";
import { ContextualReplyError, DetectorUnavailableError } from "@/lib/errors";
import { dlog, errorMessage, fetchWithTimeout } from "@/lib/utils";

export interface OllamaClientOptions {
  url: string;
  model: string;
  timeoutMs?: number;
  temperature?: number;
  maxTokens?: number;
}

export type ChatMessage = { role: "system" | "user" | "assistant"; content: string };

/** One reported problem, offsets already checked against the text. */
export type ContextualIssue = {
  message: string;
  start: number;
  end: number;
  suggestion?: string;
};

const DEFAULT_MAX_TOKENS = 512;
export const EXPLANATION_FALLBACK = "Explanation unavailable (language model not reachable).";

const CONTEXT_PROMPT = `Find subtle contextual errors in the text: confused words (affect/effect, their/there),
malapropisms ("for all intensive purposes") and phrasing that contradicts itself.
Do not report spelling, basic grammar or style; other checkers cover those.
Answer with JSON only: {"errors": [{"message": "...", "start_index": 0, "end_index": 5, "suggestion": "..."}]}.
Offsets are character positions in the text, end exclusive. With nothing to report answer {"errors": []}.`;

const chatReplySchema = z.object({
  message: z.object({ content: z.string() }).optional(),
  response: z.string().optional(),
});

const contextualReplySchema = z.object({ errors: z.array(z.unknown()) });

const contextualItemSchema = z.object({
  message: z.string().trim().min(1),
  start_index: z.number().int(),
  end_index: z.number().int(),
  suggestion: z.string().nullish(),
});

/**
 * Keeps every well-formed entry whose offsets fit `textLength`; the rest are
 * dropped one by one.
 */
export function parseContextualReply(content: string, textLength: number): ContextualIssue[] {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (err) {
    throw new ContextualReplyError(`not JSON (${errorMessage(err)})`);
  }
  const reply = contextualReplySchema.safeParse(json);
  if (!reply.success) throw new ContextualReplyError("no errors array");

  const issues: ContextualIssue[] = [];
  reply.data.errors.forEach((raw, i) => {
    const item = contextualItemSchema.safeParse(raw);
    if (!item.success) {
      dlog("[llama] dropped malformed entry", i);
      return;
    }
    const { message, start_index: start, end_index: end, suggestion } = item.data;
    if (start < 0 || end > textLength || start > end) {
      dlog("[llama] dropped out-of-range entry", i, start, end);
      return;
    }
    issues.push({ message, start, end, suggestion: suggestion ?? undefined });
  });
  return issues;
}

/** Chat client for an Ollama-compatible `/api/chat` endpoint. */
export class OllamaClient {
  private readonly url: string;

  constructor(private readonly options: OllamaClientOptions) {
    const url = new URL(options.url);
    if (!url.pathname || url.pathname === "/") url.pathname = "/api/chat";
    this.url = url.toString();
  }

  async chat(messages: ChatMessage[], opts: { json?: boolean; signal?: AbortSignal } = {}): Promise<string> {
    const payload = {
      model: this.options.model,
      messages,
      stream: false,
      options: {
        temperature: this.options.temperature ?? 0,
        num_predict: this.options.maxTokens ?? DEFAULT_MAX_TOKENS,
      },
      ...(opts.json ? { format: "json" } : {}),
    };

    let response: Response;
    try {
      response = await fetchWithTimeout(
        this.url,
        { method: "POST", headers: { "Content-Type": "application/json" }, body: JSON.stringify(payload) },
        this.options.timeoutMs ?? 20_000,
        opts.signal
      );
    } catch (err) {
      throw new DetectorUnavailableError("contextual", errorMessage(err));
    }

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw new DetectorUnavailableError("contextual", `http ${response.status}: ${body.slice(0, 200)}`);
    }

    const reply = chatReplySchema.safeParse(await response.json());
    const content = reply.success ? reply.data.message?.content ?? reply.data.response ?? "" : "";
    if (!content) throw new ContextualReplyError("empty reply");
    return content;
  }

  async checkContext(text: string, signal?: AbortSignal): Promise<ContextualIssue[]> {
    const content = await this.chat(
      [
        { role: "system", content: "You are a strict proofreader. Output valid JSON only." },
        { role: "user", content: `${CONTEXT_PROMPT}\n\nText: ${text}` },
      ],
      { json: true, signal }
    );
    return parseContextualReply(content, text.length);
  }

  /** One-sentence plain-language explanation; a fixed fallback when the model is unreachable. */
  async explainFinding(finding: Finding, text: string, signal?: AbortSignal): Promise<string> {
    const { start, end } = finding.span;
    const offending = end <= text.length ? text.slice(start, end) : "unknown";
    const prompt = [
      "Explain this proofreading finding to a writer in one short sentence.",
      `Finding: "${finding.message}"`,
      `Context: "${text}"`,
      `Offending text: "${offending}"`,
    ].join("\n");

    try {
      const content = await this.chat(
        [
          { role: "system", content: "You are a helpful proofreading assistant." },
          { role: "user", content: prompt },
        ],
        { signal }
      );
      return content.trim();
    } catch (err) {
      console.warn("[llama] explanation failed", errorMessage(err));
      return EXPLANATION_FALLBACK;
    }
  }
}
