import { afterEach, beforeEach, describe, it, expect, vi, type MockInstance } from "vitest";
import { createPipeline, type DetectorSet } from "@/lib/pipeline";
import type { DetectorKind } from "@/lib/detectors/types";
import type { Finding } from "@/lib/findings/types";
import type { LanguageProvider, ParsedForm } from "@/lib/parse/types";
import { createFinding } from "@/lib/findings/finding";
import { emptyReadability } from "@/lib/readability";
import { FindingValidationError } from "@/lib/errors";
import { HeuristicLanguageProvider } from "@/lib/parse/heuristic-provider";
import { SpellingDetector } from "@/lib/detectors/spelling";
import { GrammarDetector } from "@/lib/detectors/grammar";
import { parseCheckResponse } from "@/lib/grammar/languagetool-client";
import { HeuristicDetector } from "@/lib/detectors/heuristic";
import { StyleDetector } from "@/lib/detectors/style";

const fixed = <K extends DetectorKind>(kind: K, findings: Finding[] = []) => ({
  kind,
  detect: vi.fn((_text: string, _parsed?: ParsedForm, _signal?: AbortSignal): Finding[] | Promise<Finding[]> => findings),
});

const parsedStub: ParsedForm = { text: "", model: "segmentation", tokens: [], sentences: [] };

function setup(overrides: Partial<DetectorSet> = {}) {
  const detectors = {
    spelling: fixed("spelling"),
    grammar: fixed("grammar"),
    heuristic: fixed("heuristic"),
    style: fixed("style"),
    contextual: fixed("contextual"),
    ...overrides,
  };
  const provider = { parse: vi.fn((text: string): ParsedForm => ({ ...parsedStub, text })) };
  return { detectors, provider };
}

let warn: MockInstance<typeof console.warn>;

beforeEach(() => {
  warn = vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createPipeline().analyze()", () => {
  it("short-circuits blank input", async () => {
    const { detectors, provider } = setup();
    const response = await createPipeline({ provider, detectors }).analyze("  \n ", true);

    expect(response).toEqual({ text: "  \n ", findings: [], readability: emptyReadability(), llmUsed: false });
    expect(provider.parse).not.toHaveBeenCalled();
    expect(detectors.spelling.detect).not.toHaveBeenCalled();
    expect(detectors.contextual.detect).not.toHaveBeenCalled();
  });

  it("parses once and hands the same form to every detector", async () => {
    const { detectors, provider } = setup();
    await createPipeline({ provider, detectors }).analyze("Some text.");

    expect(provider.parse).toHaveBeenCalledTimes(1);
    const parsed = provider.parse.mock.results[0].value;
    for (const d of [detectors.spelling, detectors.grammar, detectors.heuristic, detectors.style]) {
      expect(d.detect).toHaveBeenCalledWith("Some text.", parsed, expect.any(AbortSignal));
    }
  });

  it("merges findings from all detectors without overlaps", async () => {
    const typo = createFinding({ category: "spelling", start: 0, end: 4, message: "typo", confidence: 0.9, provenance: "hunspell" });
    const rule = createFinding({ category: "grammar", start: 0, end: 10, message: "rule", confidence: 0.8, provenance: "languagetool" });
    const wordy = createFinding({ category: "style", start: 12, end: 14, message: "wordy", confidence: 0.5, provenance: "style:wordy" });
    const { detectors, provider } = setup({ grammar: fixed("grammar", [rule]), spelling: fixed("spelling", [typo]), style: fixed("style", [wordy]) });

    const response = await createPipeline({ provider, detectors }).analyze("Helo world, it is fine.");
    expect(response.findings).toEqual([typo, wordy]);
    expect(response.readability.textStandard).not.toBe("N/A");
  });

  it("drops a failing detector and keeps the rest", async () => {
    const typo = createFinding({ category: "spelling", start: 0, end: 4, message: "typo", confidence: 0.9, provenance: "hunspell" });
    const grammar = { kind: "grammar" as const, detect: vi.fn((): Finding[] => { throw new Error("boom"); }) };
    const { detectors, provider } = setup({ grammar, spelling: fixed("spelling", [typo]) });

    const response = await createPipeline({ provider, detectors }).analyze("Helo world");
    expect(response.findings).toEqual([typo]);
    expect(warn).toHaveBeenCalledWith("[pipeline] grammar detector dropped", "boom");
  });

  it("stops waiting for a slow detector and aborts its signal", async () => {
    let seen: AbortSignal | undefined;
    const grammar = {
      kind: "grammar" as const,
      detect: vi.fn((_text: string, _parsed?: ParsedForm, signal?: AbortSignal) => {
        seen = signal;
        return new Promise<Finding[]>(() => {});
      }),
    };
    const { detectors, provider } = setup({ grammar });

    const response = await createPipeline({ provider, detectors, timeouts: { grammar: 5 } }).analyze("Slow text");
    expect(response.findings).toEqual([]);
    expect(seen?.aborted).toBe(true);
    expect(warn).toHaveBeenCalledWith("[pipeline] grammar detector dropped", "grammar detector timed out after 5ms");
  });

  it("runs the contextual detector only when asked and configured", async () => {
    const { detectors, provider } = setup();
    const pipeline = createPipeline({ provider, detectors });

    expect((await pipeline.analyze("Some text.", false)).llmUsed).toBe(false);
    expect(detectors.contextual.detect).not.toHaveBeenCalled();

    expect((await pipeline.analyze("Some text.", true)).llmUsed).toBe(true);
    expect(detectors.contextual.detect).toHaveBeenCalledTimes(1);

    const bare = createPipeline({ provider, detectors: { ...detectors, contextual: undefined } });
    expect((await bare.analyze("Some text.", true)).llmUsed).toBe(false);
  });

  it("runs detectors without a parse when the provider fails", async () => {
    const { detectors } = setup();
    const provider: LanguageProvider = { parse: () => { throw new Error("no model"); } };

    await createPipeline({ provider, detectors }).analyze("Some text.");
    expect(detectors.spelling.detect).toHaveBeenCalledWith("Some text.", undefined, expect.any(AbortSignal));
    expect(warn).toHaveBeenCalledWith("[pipeline] language provider failed; detectors run without a parse", "no model");
  });

  it("normalizes to NFC before anything else", async () => {
    const { detectors, provider } = setup();
    const response = await createPipeline({ provider, detectors }).analyze("cafe\u0301");
    expect(response.text).toBe("caf\u00e9");
    expect(response.text).toHaveLength(4);
    expect(provider.parse).toHaveBeenCalledWith("caf\u00e9");
  });

  it("rejects findings that break the response invariants", async () => {
    const bad = createFinding({ category: "style", start: 0, end: 50, message: "too long", confidence: 0.5, provenance: "test" });
    const { detectors, provider } = setup({ style: fixed("style", [bad]) });
    await expect(createPipeline({ provider, detectors }).analyze("short")).rejects.toBeInstanceOf(FindingValidationError);
  });

  it("keeps one of two equally ranked findings on the same span", async () => {
    const rule = createFinding({ category: "grammar", start: 10, end: 15, message: "rule", confidence: 0.8, provenance: "languagetool" });
    const agree = createFinding({ category: "agreement", start: 10, end: 15, message: "agree", confidence: 0.8, provenance: "heuristic:agreement" });
    const text = "They said he go there.";

    const forward = setup({ grammar: fixed("grammar", [rule]), heuristic: fixed("heuristic", [agree]) });
    const swapped = setup({ grammar: fixed("grammar", [agree]), heuristic: fixed("heuristic", [rule]) });
    const first = await createPipeline(forward).analyze(text);
    const second = await createPipeline(swapped).analyze(text);

    expect(first.findings).toEqual([agree]);
    expect(second.findings).toEqual([agree]);
  });

  it("returns a response when the grammar service sends malformed matches", async () => {
    const service = {
      check: vi.fn(async () =>
        parseCheckResponse({
          matches: [
            { message: "x", offset: 1.5, length: 2 },
            { message: "   ", offset: 0, length: 4 },
            { message: "ok", offset: 12, length: 4 },
          ],
        })
      ),
    };
    const { detectors, provider } = setup({ grammar: new GrammarDetector(service) });
    const response = await createPipeline({ provider, detectors }).analyze("Helo world, fine.");
    expect(response.findings.map(f => [f.span.start, f.span.end, f.message])).toEqual([
      [0, 4, "LanguageTool finding"],
      [12, 16, "ok"],
    ]);
  });

  it("falls back to empty readability when scoring fails", async () => {
    const { detectors, provider } = setup();
    const readability = () => { throw new Error("bad formula"); };
    const response = await createPipeline({ provider, detectors, readability }).analyze("Some text.");
    expect(response.readability).toEqual(emptyReadability());
  });
});

describe("pipeline with the bundled provider", () => {
  it("reports a misspelled first word once", async () => {
    const engine = {
      name: "hunspell",
      lookup: (word: string) => (word === "Helo" ? [{ term: "Hello", distance: 1 }] : [{ term: word, distance: 0 }]),
    };
    const pipeline = createPipeline({
      provider: new HeuristicLanguageProvider(),
      detectors: {
        spelling: new SpellingDetector(engine),
        grammar: new GrammarDetector(null),
        heuristic: new HeuristicDetector(),
        style: new StyleDetector(),
      },
    });

    const response = await pipeline.analyze("Helo world");
    expect(response.findings).toEqual([
      {
        category: "spelling",
        span: { start: 0, end: 4 },
        message: "Possible spelling error: 'Helo'",
        suggestions: ["Hello"],
        confidence: 0.9,
        provenance: "hunspell",
      },
    ]);
    expect(response.llmUsed).toBe(false);
  });

  it("keeps the agreement finding over an overlapping style finding", async () => {
    const pipeline = createPipeline({
      provider: new HeuristicLanguageProvider(),
      detectors: {
        spelling: new SpellingDetector(null),
        grammar: new GrammarDetector(null),
        heuristic: new HeuristicDetector(),
        style: new StyleDetector(),
      },
    });
    const response = await pipeline.analyze("The cakes was eaten.");
    expect(response.findings.map(f => [f.category, f.span.start, f.span.end])).toEqual([["agreement", 4, 13]]);
  });
});
