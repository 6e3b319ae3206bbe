export type { Category, Finding, Span } from "@/lib/findings/types";
export { CATEGORIES, CATEGORY_PRIORITY, MAX_SUGGESTIONS, categoryPriority, isCategory } from "@/lib/findings/types";
export { createFinding, dedupeFindings, overlaps, spanLength, type FindingInit } from "@/lib/findings/finding";
export { compareFindings, resolveConflicts } from "@/lib/findings/resolve";
export { findingSchema, validateFinding, validateFindings } from "@/lib/findings/schema";
export { groupFindingsByTab, highlightSegments, TAB_CATEGORIES, type FindingTab, type TextSegment } from "@/lib/findings/group";

export type { AnyDetector, Detector, DetectorKind } from "@/lib/detectors/types";
export { DETECTOR_KINDS } from "@/lib/detectors/types";
export { SpellingDetector } from "@/lib/detectors/spelling";
export { GrammarDetector, type GrammarService } from "@/lib/detectors/grammar";
export { HeuristicDetector, agreementFindings, mechanicsFindings } from "@/lib/detectors/heuristic";
export { StyleDetector, WORDY_PHRASES } from "@/lib/detectors/style";
export { ContextualDetector, type ContextualService } from "@/lib/detectors/contextual";

export type { LanguageProvider, ParsedForm, ParsedSentence, ParsedToken } from "@/lib/parse/types";
export { HeuristicLanguageProvider, SegmentingLanguageProvider } from "@/lib/parse/heuristic-provider";

export type { SpellCandidate, SpellingEngine } from "@/lib/spell/types";
export { createHunspellEngine, loadHunspellEngine } from "@/lib/spell/hunspell-adapter";
export { LanguageToolClient, classifyIssue, type GrammarIssue } from "@/lib/grammar/languagetool-client";
export { OllamaClient, type ContextualIssue } from "@/lib/llm/ollama-client";

export { computeReadability, emptyReadability, type ReadabilitySnapshot } from "@/lib/readability";
export { buildAnalysisResponse, type AnalysisResponse } from "@/lib/response";
export { createPipeline, createDefaultPipeline, type DetectorSet, type Pipeline, type PipelineOptions } from "@/lib/pipeline";
export { loadConfig, type ProofConfig } from "@/lib/config";
export * from "@/lib/errors";
