import { describe, it, expect } from "vitest";
import { HeuristicLanguageProvider, SegmentingLanguageProvider } from "@/lib/parse/heuristic-provider";

const provider = new HeuristicLanguageProvider();
const byText = (text: string) => {
  const parsed = provider.parse(text);
  return { parsed, tok: (word: string) => parsed.tokens.find(t => t.text === word) };
};

describe("HeuristicLanguageProvider", () => {
  it("tags a simple clause and links subject, verb and modifiers", () => {
    const { parsed, tok } = byText("The dogs barks loudly.");
    expect(parsed.model).toBe("heuristic");
    expect(parsed.tokens.map(t => t.pos)).toEqual(["DET", "NOUN", "VERB", "ADV", "PUNCT"]);

    expect(tok("dogs")).toMatchObject({ dep: "nsubj", head: 2, lemma: "dog", morph: { number: "Plur", person: 3 } });
    expect(tok("barks")).toMatchObject({ dep: "root", head: 2, lemma: "bark", morph: { verbForm: "VBZ", number: "Sing" } });
    expect(tok("The")).toMatchObject({ dep: "det", head: 1 });
    expect(tok("loudly")).toMatchObject({ dep: "advmod", head: 2 });
    expect(tok(".")).toMatchObject({ dep: "punct", head: 2 });
  });

  it("marks passive auxiliaries and their subject", () => {
    const { tok } = byText("The cake was eaten by the children.");
    expect(tok("cake")).toMatchObject({ dep: "nsubjpass", head: 3 });
    expect(tok("was")).toMatchObject({ pos: "AUX", dep: "auxpass", head: 3 });
    expect(tok("eaten")).toMatchObject({ pos: "VERB", lemma: "eat", morph: { verbForm: "VBN" } });
    expect(tok("by")).toMatchObject({ dep: "prep", head: 3 });
    expect(tok("children")).toMatchObject({ dep: "pobj", head: 4, lemma: "child", morph: { number: "Plur" } });
  });

  it("uses the auxiliary as the verb of a copular clause", () => {
    const { tok } = byText("These apple is red.");
    expect(tok("is")).toMatchObject({ dep: "root", head: 2 });
    expect(tok("apple")).toMatchObject({ dep: "nsubj", head: 2, morph: { number: "Sing" } });
    expect(tok("These")).toMatchObject({ dep: "det", head: 1, morph: { number: "Plur" } });
  });

  it("treats an unknown word after a subject as a noun, not a verb", () => {
    const { parsed } = byText("Helo world");
    expect(parsed.tokens.map(t => t.pos)).toEqual(["NOUN", "NOUN"]);
    expect(parsed.tokens.some(t => t.dep === "nsubj")).toBe(false);
  });

  it("tags capitalized words inside a sentence as proper nouns", () => {
    const { tok } = byText("We met Zorbax today.");
    expect(tok("Zorbax")?.pos).toBe("PROPN");
    expect(tok("We")?.pos).toBe("PRON");
  });

  it("flags links, addresses and non-alphabetic tokens", () => {
    const { tok } = byText("Write to test@example.org or see www.example.com now 42");
    expect(tok("test@example.org")).toMatchObject({ likeEmail: true, isAlpha: false });
    expect(tok("www.example.com")).toMatchObject({ likeUrl: true, isAlpha: false });
    expect(tok("42")).toMatchObject({ pos: "NUM", isAlpha: false });
    expect(tok("now")?.isAlpha).toBe(true);
  });

  it("returns a frozen form", () => {
    const { parsed } = byText("It works.");
    expect(Object.isFrozen(parsed)).toBe(true);
    expect(Object.isFrozen(parsed.tokens[0])).toBe(true);
  });
});

describe("SegmentingLanguageProvider", () => {
  it("keeps tokens and sentences but no tags", () => {
    const parsed = new SegmentingLanguageProvider().parse("One two. Three four.");
    expect(parsed.model).toBe("segmentation");
    expect(parsed.sentences).toHaveLength(2);
    expect(parsed.tokens.every(t => t.pos === "X" && t.dep === "dep")).toBe(true);
    expect(parsed.tokens.map(t => t.sentence)).toEqual([0, 0, 0, 1, 1, 1]);
  });
});
