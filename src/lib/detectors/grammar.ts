import type { Detector } from "./types";
import type { Finding } from "@/lib/findings/types";
import { createFinding, dedupeFindings } from "@/lib/findings/finding";
import { classifyIssue, type GrammarIssue } from "@/lib/grammar/languagetool-client";
import { errorMessage } from "@/lib/utils";

export interface GrammarService {
  check(text: string, signal?: AbortSignal): Promise<GrammarIssue[]>;
}

/** LanguageTool matches as findings. Fails open: an unreachable service yields nothing. */
export class GrammarDetector implements Detector<"grammar"> {
  readonly kind = "grammar";

  constructor(private readonly service: GrammarService | null) {}

  async detect(text: string, _parsed?: unknown, signal?: AbortSignal): Promise<Finding[]> {
    if (!this.service || !text.trim()) return [];

    let issues: GrammarIssue[];
    try {
      issues = await this.service.check(text, signal);
    } catch (err) {
      console.warn("[lt] check failed", errorMessage(err));
      return [];
    }

    const findings: Finding[] = [];
    for (const issue of issues) {
      const start = issue.offset;
      const end = issue.offset + issue.length;
      if (!Number.isInteger(start) || !Number.isInteger(end)) continue;
      if (start < 0 || end > text.length || issue.length < 0) continue;
      findings.push(
        createFinding({
          category: classifyIssue(issue),
          start,
          end,
          message: issue.message.trim() || issue.ruleId.trim() || "LanguageTool finding",
          suggestions: issue.replacements,
          confidence: 0.8,
          provenance: "languagetool",
        })
      );
    }
    return dedupeFindings(findings);
  }
}
