import { describe, it, expect } from "vitest";
import { StyleDetector, longSentenceFindings, passiveFindings, wordyFindings } from "@/lib/detectors/style";
import { HeuristicLanguageProvider, SegmentingLanguageProvider } from "@/lib/parse/heuristic-provider";

describe("style rules", () => {
  it("spans a passive construction from auxiliary to participle", () => {
    const parsed = new HeuristicLanguageProvider().parse("The cake was eaten by the children.");
    const findings = passiveFindings(parsed);
    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({
      category: "style",
      span: { start: 9, end: 18 },
      message: "Passive voice detected. Consider active voice.",
      confidence: 0.6,
      provenance: "style:passive",
    });
  });

  it("flags sentences of more than 40 tokens", () => {
    const text = `${Array(41).fill("word").join(" ")}.`;
    const findings = longSentenceFindings(new SegmentingLanguageProvider().parse(text));
    expect(findings).toHaveLength(1);
    expect(findings[0].span).toEqual({ start: 0, end: text.length });
    expect(findings[0].message).toBe("Sentence is very long (40+ tokens). Consider splitting.");

    const short = `${Array(39).fill("word").join(" ")}.`;
    expect(longSentenceFindings(new SegmentingLanguageProvider().parse(short))).toEqual([]);
  });

  it("suggests plainer wording for stock phrases", () => {
    const findings = wordyFindings("We use it in order to win.");
    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({
      span: { start: 10, end: 21 },
      message: "Wordy construction 'in order to'.",
      suggestions: ["to"],
      confidence: 0.8,
    });
  });

  it("matches wordy phrases case-insensitively on word boundaries", () => {
    expect(wordyFindings("Utilize tools.").map(f => f.span)).toEqual([{ start: 0, end: 7 }]);
    expect(wordyFindings("The utilizer works.")).toEqual([]);
  });
});

describe("StyleDetector", () => {
  it("returns nothing without a parse", () => {
    expect(new StyleDetector().detect("We use it in order to win.")).toEqual([]);
  });
});
