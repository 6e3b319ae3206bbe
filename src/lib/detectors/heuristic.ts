import type { Detector } from "./types";
import type { Finding } from "@/lib/findings/types";
import type { ParsedForm, ParsedToken } from "@/lib/parse/types";
import { createFinding, dedupeFindings } from "@/lib/findings/finding";

const AGREEMENT = "heuristic:agreement";
const MECHANICS = "heuristic:mechanics";

const CLAUSE_MARKS = new Set([",", ";", ":"]);
const TERMINATORS = new Set([".", "!", "?"]);
const SUBJUNCTIVE_CUES = new Set(["if", "wish", "wishes", "wished"]);

function numberLabel(token: ParsedToken): string {
  return token.morph.number ?? `person ${token.morph.person ?? 3}`;
}

function verbLabel(verb: ParsedToken): string {
  return verb.morph.number ?? (verb.morph.verbForm === "VBZ" ? "Sing" : "Plur");
}

// "If he were", "I wish it were"
function subjunctiveContext(tokens: readonly ParsedToken[], subject: ParsedToken): boolean {
  for (let k = subject.index - 1; k >= 0 && tokens[k].sentence === subject.sentence; k -= 1) {
    if (SUBJUNCTIVE_CUES.has(tokens[k].text.toLowerCase())) return true;
  }
  return false;
}

function disagrees(tokens: readonly ParsedToken[], subject: ParsedToken, verb: ParsedToken): boolean {
  const number = subject.morph.number;
  const person = subject.morph.person ?? 3;
  const form = verb.morph.verbForm;
  const word = verb.text.toLowerCase();

  switch (form) {
    case "VBZ":
      return number === "Plur" || person === 1 || person === 2;
    case "VBP":
      if (word === "am") return !(person === 1 && number === "Sing");
      if (verb.lemma === "be") return number === "Sing" && person !== 2;
      return number === "Sing" && person === 3;
    case "VBD":
      if (word === "was") return number === "Plur" || person === 2;
      if (word === "were") return number === "Sing" && person === 3 && !subjunctiveContext(tokens, subject);
      return false;
    default:
      // infinitives, participles and modals carry no agreement
      return false;
  }
}

/** The verb that carries tense for `head`: its first auxiliary, else itself. */
function finiteVerb(tokens: readonly ParsedToken[], head: ParsedToken): ParsedToken {
  return tokens.find(t => t.head === head.index && t.index !== head.index && (t.dep === "aux" || t.dep === "auxpass")) ?? head;
}

export function agreementFindings(parsed: ParsedForm): Finding[] {
  const { tokens } = parsed;
  const findings: Finding[] = [];

  for (const token of tokens) {
    if (token.dep === "nsubj" || token.dep === "nsubjpass") {
      const head = tokens[token.head];
      if (head && head.index !== token.index && (head.pos === "VERB" || head.pos === "AUX")) {
        const verb = finiteVerb(tokens, head);
        if (disagrees(tokens, token, verb)) {
          findings.push(
            createFinding({
              category: "agreement",
              start: Math.min(token.start, verb.start),
              end: Math.max(token.end, verb.end),
              message: `Possible subject-verb agreement error: '${token.text}' (${numberLabel(token)}) vs '${verb.text}' (${verbLabel(verb)})`,
              confidence: 0.6,
              provenance: AGREEMENT,
            })
          );
        }
      }
    }

    if (token.pos === "DET" && token.dep === "det") {
      const noun = tokens[token.head];
      const detNumber = token.morph.number;
      const nounNumber = noun?.morph.number;
      if (noun && noun.pos === "NOUN" && detNumber && nounNumber && detNumber !== nounNumber) {
        findings.push(
          createFinding({
            category: "agreement",
            start: token.start,
            end: noun.end,
            message: `Determiner agreement error: '${token.text}' (${detNumber}) vs '${noun.text}' (${nounNumber})`,
            confidence: 0.7,
            provenance: AGREEMENT,
          })
        );
      }
    }
  }
  return findings;
}

export function mechanicsFindings(parsed: ParsedForm): Finding[] {
  const { text, tokens, sentences } = parsed;
  const findings: Finding[] = [];

  for (const m of text.matchAll(/(?<=\S)[ \t]{2,}(?=\S)/g)) {
    const start = m.index ?? 0;
    findings.push(
      createFinding({
        category: "punctuation",
        start,
        end: start + m[0].length,
        message: "Use a single space between words",
        suggestions: [" "],
        confidence: 0.5,
        provenance: MECHANICS,
      })
    );
  }

  for (let i = 1; i < tokens.length; i += 1) {
    const left = tokens[i - 1];
    const mark = tokens[i];
    const next = tokens[i + 1];
    const gap = text.slice(left.end, mark.start);

    if (CLAUSE_MARKS.has(mark.text) && gap.length > 0 && /^[ \t]+$/.test(gap)) {
      findings.push(
        createFinding({
          category: "punctuation",
          start: left.end,
          end: mark.end,
          message: `Remove the space before '${mark.text}'`,
          suggestions: [mark.text],
          confidence: 0.7,
          provenance: MECHANICS,
        })
      );
    }

    if (!next || next.start !== mark.end || !next.isAlpha) continue;

    if (CLAUSE_MARKS.has(mark.text)) {
      findings.push(
        createFinding({
          category: "punctuation",
          start: mark.start,
          end: mark.end,
          message: `Add a space after '${mark.text}'`,
          suggestions: [`${mark.text} `],
          confidence: 0.7,
          provenance: MECHANICS,
        })
      );
    } else if (TERMINATORS.has(mark.text) && /^\p{Lu}/u.test(next.text) && left.isAlpha && left.text.length > 1) {
      findings.push(
        createFinding({
          category: "punctuation",
          start: mark.start,
          end: mark.end,
          message: "Add a space after sentence punctuation",
          suggestions: [`${mark.text} `],
          confidence: 0.7,
          provenance: MECHANICS,
        })
      );
    }
  }

  for (const sentence of sentences) {
    const first = tokens[sentence.startToken];
    // "iPhone", "eBay"
    if (!first?.isAlpha || !/^\p{Ll}/u.test(first.text) || /^\p{Ll}\p{Lu}/u.test(first.text)) continue;
    const [initial = "", ...rest] = first.text;
    findings.push(
      createFinding({
        category: "style",
        start: first.start,
        end: first.end,
        message: "Sentence should begin with a capital letter",
        suggestions: [initial.toUpperCase() + rest.join("")],
        confidence: 0.6,
        provenance: MECHANICS,
      })
    );
  }

  return findings;
}

/** Agreement rules over the parse plus spacing and capitalization checks. */
export class HeuristicDetector implements Detector<"heuristic"> {
  readonly kind = "heuristic";

  detect(_text: string, parsed?: ParsedForm): Finding[] {
    if (!parsed) return [];
    return dedupeFindings([...agreementFindings(parsed), ...mechanicsFindings(parsed)]);
  }
}
