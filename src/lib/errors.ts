import type { DetectorKind } from "@/lib/detectors/types";

export class FindingValidationError extends Error {
  index: number;
  issues: string[];

  constructor(index: number, issues: string[]) {
    super(`Invalid finding at index ${index}: ${issues.join("; ")}`);
    this.name = "FindingValidationError";
    this.index = index;
    this.issues = issues;
  }
}

export class DetectorUnavailableError extends Error {
  detector: DetectorKind;

  constructor(detector: DetectorKind, reason: string) {
    super(`${detector} detector unavailable: ${reason}`);
    this.name = "DetectorUnavailableError";
    this.detector = detector;
  }
}

export class DetectorTimeoutError extends Error {
  detector: DetectorKind;
  timeoutMs: number;

  constructor(detector: DetectorKind, timeoutMs: number) {
    super(`${detector} detector timed out after ${timeoutMs}ms`);
    this.name = "DetectorTimeoutError";
    this.detector = detector;
    this.timeoutMs = timeoutMs;
  }
}

export class LanguageToolHttpError extends Error {
  status: number;

  constructor(status: number) {
    super(`LanguageTool failed: ${status}`);
    this.name = "LanguageToolHttpError";
    this.status = status;
  }
}

export class ContextualReplyError extends Error {
  constructor(reason: string) {
    super(`Unusable language model reply: ${reason}`);
    this.name = "ContextualReplyError";
  }
}
