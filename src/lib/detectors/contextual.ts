import type { Detector } from "./types";
import type { Finding } from "@/lib/findings/types";
import { createFinding, dedupeFindings } from "@/lib/findings/finding";
import type { ContextualIssue } from "@/lib/llm/ollama-client";
import { errorMessage } from "@/lib/utils";

export interface ContextualService {
  checkContext(text: string, signal?: AbortSignal): Promise<ContextualIssue[]>;
}

export class ContextualDetector implements Detector<"contextual"> {
  readonly kind = "contextual";

  constructor(private readonly service: ContextualService) {}

  async detect(text: string, _parsed?: unknown, signal?: AbortSignal): Promise<Finding[]> {
    let issues: ContextualIssue[];
    try {
      issues = await this.service.checkContext(text, signal);
    } catch (err) {
      console.warn("[llama] contextual check failed", errorMessage(err));
      return [];
    }

    return dedupeFindings(
      issues.map(issue =>
        createFinding({
          category: "grammar",
          start: issue.start,
          end: issue.end,
          message: issue.message,
          suggestions: [issue.suggestion],
          confidence: 0.7,
          provenance: "llm",
        })
      )
    );
  }
}
