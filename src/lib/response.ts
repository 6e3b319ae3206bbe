import type { Finding } from "@/lib/findings/types";
import type { ReadabilitySnapshot } from "@/lib/readability";
import { compareFindings } from "@/lib/findings/resolve";
import { validateFindings } from "@/lib/findings/schema";

export type AnalysisResponse = Readonly<{
  text: string;
  findings: readonly Finding[];
  readability: Readonly<ReadabilitySnapshot>;
  llmUsed: boolean;
}>;

/**
 * Final, immutable result of one analysis. Every finding is checked against
 * `text`; the first violation throws `FindingValidationError`.
 */
export function buildAnalysisResponse(input: {
  text: string;
  findings: readonly Finding[];
  readability: ReadabilitySnapshot;
  llmUsed: boolean;
}): AnalysisResponse {
  validateFindings(input.findings, input.text.length);
  return Object.freeze({
    text: input.text,
    findings: Object.freeze([...input.findings].sort(compareFindings)),
    readability: Object.freeze({ ...input.readability }),
    llmUsed: input.llmUsed,
  });
}
