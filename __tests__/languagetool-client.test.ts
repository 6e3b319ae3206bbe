import { afterEach, describe, it, expect, vi } from "vitest";
import { LanguageToolClient, classifyIssue, parseCheckResponse, type GrammarIssue } from "@/lib/grammar/languagetool-client";
import { DetectorUnavailableError, LanguageToolHttpError } from "@/lib/errors";

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

const issue = (over: Partial<GrammarIssue>): GrammarIssue => ({
  offset: 0,
  length: 1,
  message: "m",
  replacements: [],
  ruleId: "",
  categoryId: "",
  issueType: "",
  ...over,
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("parseCheckResponse()", () => {
  it("reads the standard match shape", () => {
    const issues = parseCheckResponse({
      matches: [
        {
          message: "Possible typo",
          offset: 4,
          length: 3,
          replacements: [{ value: "the" }, { value: "then" }],
          rule: { id: "MORFOLOGIK_RULE_EN_US", issueType: "misspelling", category: { id: "TYPOS", name: "Typos" } },
        },
      ],
    });
    expect(issues).toEqual([
      {
        offset: 4,
        length: 3,
        message: "Possible typo",
        replacements: ["the", "then"],
        ruleId: "MORFOLOGIK_RULE_EN_US",
        categoryId: "TYPOS",
        issueType: "misspelling",
      },
    ]);
  });

  it("accepts alternative field names and drops exact duplicates", () => {
    const alt = { msg: "Comma", fromPos: 2, len: 1, ruleId: "COMMA_RULE", categoryId: "PUNCTUATION", replacements: [", "] };
    const issues = parseCheckResponse({ matches: [alt, alt] });
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({ offset: 2, length: 1, message: "Comma", replacements: [", "] });
  });

  it("ignores payloads without matches", () => {
    expect(parseCheckResponse("nope")).toEqual([]);
    expect(parseCheckResponse({})).toEqual([]);
  });
});

describe("classifyIssue()", () => {
  it("maps rules onto finding categories", () => {
    expect(classifyIssue(issue({ ruleId: "UPPERCASE_SENTENCE_START", categoryId: "CASING" }))).toBe("style");
    expect(classifyIssue(issue({ ruleId: "MORFOLOGIK_RULE_EN_US" }))).toBe("spelling");
    expect(classifyIssue(issue({ ruleId: "HE_VERB_AGR", categoryId: "GRAMMAR", issueType: "grammar" }))).toBe("grammar");
    expect(classifyIssue(issue({ ruleId: "SVA_RULE" }))).toBe("agreement");
    expect(classifyIssue(issue({ ruleId: "COMMA_PARENTHESIS_WHITESPACE", categoryId: "TYPOGRAPHY" }))).toBe("punctuation");
    expect(classifyIssue(issue({ ruleId: "EN_WORDINESS", categoryId: "REDUNDANCY" }))).toBe("style");
    expect(classifyIssue(issue({ ruleId: "SOMETHING_ELSE" }))).toBe("grammar");
  });
});

describe("LanguageToolClient", () => {
  it("posts a form body to /v2/check", async () => {
    const fetchMock = vi.fn(async (_url: string | URL, _init?: RequestInit) => json({ matches: [] }));
    vi.stubGlobal("fetch", fetchMock);

    const client = new LanguageToolClient({ baseUrl: "http://lt.test/", language: "en", level: "picky", apiKey: "test-key" });
    await expect(client.check("Hello world")).resolves.toEqual([]);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://lt.test/v2/check");
    expect(init?.method).toBe("POST");
    const body = init?.body;
    expect(body).toBeInstanceOf(URLSearchParams);
    if (body instanceof URLSearchParams) {
      expect(body.get("text")).toBe("Hello world");
      expect(body.get("language")).toBe("en-US");
      expect(body.get("level")).toBe("picky");
      expect(body.get("apiKey")).toBe("test-key");
    }
  });

  it("backs off and retries when rate limited", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(new Response("slow down", { status: 429 }))
      .mockResolvedValueOnce(new Response("slow down", { status: 429 }))
      .mockResolvedValueOnce(json({ matches: [{ message: "x", offset: 0, length: 1 }] }));
    vi.stubGlobal("fetch", fetchMock);

    const client = new LanguageToolClient({ baseUrl: "http://lt.test", retryDelayMs: 1 });
    const issues = await client.check("a");
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(issues).toHaveLength(1);
  });

  it("gives up after the last retry with an HTTP error", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("slow down", { status: 429 })));
    const client = new LanguageToolClient({ baseUrl: "http://lt.test", retryDelayMs: 1, maxRetries: 1 });
    await expect(client.check("a")).rejects.toBeInstanceOf(LanguageToolHttpError);
  });

  it("stops retrying once the caller aborts during backoff", async () => {
    const controller = new AbortController();
    const fetchMock = vi.fn(async () => {
      controller.abort();
      return new Response("slow down", { status: 429 });
    });
    vi.stubGlobal("fetch", fetchMock);

    const client = new LanguageToolClient({ baseUrl: "http://lt.test", retryDelayMs: 60_000 });
    await expect(client.check("a", controller.signal)).rejects.toThrow(DetectorUnavailableError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("reports an unreachable server as unavailable", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => { throw new TypeError("fetch failed"); }));
    const client = new LanguageToolClient({ baseUrl: "http://lt.test" });
    await expect(client.check("a")).rejects.toThrow(DetectorUnavailableError);
  });
});
