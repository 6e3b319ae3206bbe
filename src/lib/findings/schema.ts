import { z } from "zod";
import { FindingValidationError } from "@/lib/errors";
import { CATEGORIES, MAX_SUGGESTIONS, type Finding } from "./types";

export function findingSchema(textLength: number) {
  return z
    .object({
      category: z.enum(CATEGORIES),
      span: z.object({
        start: z.number().int().min(0),
        end: z.number().int().max(textLength, { message: `span end exceeds text length ${textLength}` }),
      }),
      message: z.string().trim().min(1),
      suggestions: z.array(z.string()).max(MAX_SUGGESTIONS),
      confidence: z.number().min(0).max(1),
      provenance: z.string().min(1),
    })
    .refine(f => f.span.start <= f.span.end, { message: "span start is after span end", path: ["span"] });
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(i => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message));
}

export function validateFinding(finding: Finding, textLength: number, index = 0): void {
  const result = findingSchema(textLength).safeParse(finding);
  if (!result.success) throw new FindingValidationError(index, describeIssues(result.error));
}

/** Throws {@link FindingValidationError} on the first finding that breaks an invariant. */
export function validateFindings(findings: readonly Finding[], textLength: number): void {
  findings.forEach((finding, index) => validateFinding(finding, textLength, index));
}
