import type { AnyDetector, Detector, DetectorKind } from "@/lib/detectors/types";
import type { Finding } from "@/lib/findings/types";
import type { LanguageProvider, ParsedForm } from "@/lib/parse/types";
import type { SpellingEngine } from "@/lib/spell/types";
import { loadConfig, type ProofConfig } from "@/lib/config";
import { ContextualDetector } from "@/lib/detectors/contextual";
import { GrammarDetector } from "@/lib/detectors/grammar";
import { HeuristicDetector } from "@/lib/detectors/heuristic";
import { SpellingDetector } from "@/lib/detectors/spelling";
import { StyleDetector } from "@/lib/detectors/style";
import { DetectorTimeoutError } from "@/lib/errors";
import { resolveConflicts } from "@/lib/findings/resolve";
import { LanguageToolClient } from "@/lib/grammar/languagetool-client";
import { OllamaClient } from "@/lib/llm/ollama-client";
import { HeuristicLanguageProvider } from "@/lib/parse/heuristic-provider";
import { computeReadability, emptyReadability, type ReadabilitySnapshot } from "@/lib/readability";
import { buildAnalysisResponse, type AnalysisResponse } from "@/lib/response";
import { loadHunspellEngine } from "@/lib/spell/hunspell-adapter";
import { dgroup, dlog, dtable, errorMessage } from "@/lib/utils";

export type DetectorSet = {
  spelling: Detector<"spelling">;
  grammar: Detector<"grammar">;
  heuristic: Detector<"heuristic">;
  style: Detector<"style">;
  contextual?: Detector<"contextual">;
};

export type PipelineOptions = {
  provider: LanguageProvider;
  detectors: DetectorSet;
  readability?: (text: string) => ReadabilitySnapshot;
  /** per-detector budget in ms */
  timeouts?: Partial<Record<DetectorKind, number>>;
};

export interface Pipeline {
  analyze(rawText: string, enableContextualDetector?: boolean): Promise<AnalysisResponse>;
}

export const DEFAULT_TIMEOUT_MS = 2_000;

/**
 * Runs one detector under a deadline. A timeout aborts the detector's signal;
 * a failure or timeout contributes no findings.
 */
export async function runDetector(
  detector: AnyDetector,
  text: string,
  parsed: ParsedForm | undefined,
  timeoutMs: number
): Promise<Finding[]> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const started = Date.now();

  const work = Promise.resolve().then(() => detector.detect(text, parsed, controller.signal));
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new DetectorTimeoutError(detector.kind, timeoutMs));
    }, timeoutMs);
  });

  try {
    const findings = await Promise.race([work, deadline]);
    dlog(`[pipeline] ${detector.kind}: ${findings.length} findings in ${Date.now() - started}ms`);
    return findings;
  } catch (err) {
    console.warn(`[pipeline] ${detector.kind} detector dropped`, errorMessage(err));
    return [];
  } finally {
    clearTimeout(timer);
  }
}

export function createPipeline(options: PipelineOptions): Pipeline {
  const { provider, detectors } = options;
  const readabilityOf = options.readability ?? computeReadability;
  const timeoutFor = (kind: DetectorKind) => options.timeouts?.[kind] ?? DEFAULT_TIMEOUT_MS;

  async function parse(text: string): Promise<ParsedForm | undefined> {
    try {
      return await provider.parse(text);
    } catch (err) {
      console.warn("[pipeline] language provider failed; detectors run without a parse", errorMessage(err));
      return undefined;
    }
  }

  function readability(text: string): ReadabilitySnapshot {
    try {
      return readabilityOf(text);
    } catch (err) {
      console.warn("[pipeline] readability failed", errorMessage(err));
      return emptyReadability();
    }
  }

  return {
    async analyze(rawText: string, enableContextualDetector = false): Promise<AnalysisResponse> {
      const text = rawText.normalize("NFC");
      if (!text.trim()) {
        return buildAnalysisResponse({ text, findings: [], readability: emptyReadability(), llmUsed: false });
      }

      const parsed = await parse(text);

      const active: AnyDetector[] = [detectors.spelling, detectors.grammar, detectors.heuristic, detectors.style];
      const llmUsed = enableContextualDetector && detectors.contextual !== undefined;
      if (enableContextualDetector && detectors.contextual) active.push(detectors.contextual);

      const perDetector = await Promise.all(active.map(d => runDetector(d, text, parsed, timeoutFor(d.kind))));
      const findings = resolveConflicts(perDetector.flat());

      dgroup("[pipeline] analysis", () => {
        dlog("detectors", active.map(d => d.kind).join(", "));
        dtable("findings", findings.map(f => ({ category: f.category, start: f.span.start, end: f.span.end, provenance: f.provenance })));
      });

      return buildAnalysisResponse({ text, findings, readability: readability(text), llmUsed });
    },
  };
}

/** Pipeline wired to Hunspell, LanguageTool and Ollama as configured by the environment. */
export async function createDefaultPipeline(config: ProofConfig = loadConfig()): Promise<Pipeline> {
  let engine: SpellingEngine | null = null;
  try {
    engine = await loadHunspellEngine({ affPath: config.spellAffPath, dicPath: config.spellDicPath });
  } catch (err) {
    console.warn("[spell] Hunspell unavailable; spelling checks disabled", errorMessage(err));
  }

  const languageTool = new LanguageToolClient({
    baseUrl: config.languageToolBaseUrl,
    language: config.language,
    level: config.grammarLevel,
    apiKey: config.languageToolApiKey,
    timeoutMs: config.networkTimeoutMs,
  });
  const llama = new OllamaClient({ url: config.ollamaUrl, model: config.llamaModel, timeoutMs: config.networkTimeoutMs });

  return createPipeline({
    provider: new HeuristicLanguageProvider(),
    detectors: {
      spelling: new SpellingDetector(engine),
      grammar: new GrammarDetector(languageTool),
      heuristic: new HeuristicDetector(),
      style: new StyleDetector(),
      contextual: new ContextualDetector(llama),
    },
    timeouts: {
      spelling: config.detectorTimeoutMs,
      heuristic: config.detectorTimeoutMs,
      style: config.detectorTimeoutMs,
      grammar: config.networkTimeoutMs,
      contextual: config.networkTimeoutMs,
    },
  });
}
