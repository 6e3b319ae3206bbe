export type ReadabilitySnapshot = {
  fleschReadingEase: number;
  fleschKincaidGrade: number;
  smogIndex: number;
  colemanLiauIndex: number;
  automatedReadabilityIndex: number;
  daleChallScore: number;
  difficultWords: number;
  linsearWrite: number;
  gunningFog: number;
  textStandard: string;
};

const WORD_RE = /\p{L}+(?:['’-]\p{L}+)*/gu;
const SENTENCE_END_RE = /[.!?…]+/g;

export function emptyReadability(): ReadabilitySnapshot {
  return {
    fleschReadingEase: 0,
    fleschKincaidGrade: 0,
    smogIndex: 0,
    colemanLiauIndex: 0,
    automatedReadabilityIndex: 0,
    daleChallScore: 0,
    difficultWords: 0,
    linsearWrite: 0,
    gunningFog: 0,
    textStandard: "N/A",
  };
}

const round2 = (n: number) => Math.round(n * 100) / 100;

/** Vowel-group count with a silent final "e"; never below 1. */
export function countSyllables(word: string): number {
  const w = word.toLowerCase().replace(/[^a-z]/g, "");
  if (!w) return 1;
  let count = (w.match(/[aeiouy]+/g) ?? []).length;
  if (w.endsWith("e") && !w.endsWith("le") && count > 1) count -= 1;
  return Math.max(1, count);
}

export function ordinal(n: number): string {
  const mod100 = n % 100;
  if (mod100 >= 11 && mod100 <= 13) return `${n}th`;
  switch (n % 10) {
    case 1: return `${n}st`;
    case 2: return `${n}nd`;
    case 3: return `${n}rd`;
    default: return `${n}th`;
  }
}

// most frequent rounded grade; ties go to the lower one
function consensusGrade(grades: number[]): number {
  const counts = new Map<number, number>();
  for (const g of grades) {
    const r = Math.max(0, Math.round(g));
    counts.set(r, (counts.get(r) ?? 0) + 1);
  }
  let best = 0;
  let bestCount = -1;
  for (const [grade, count] of [...counts.entries()].sort((a, b) => a[0] - b[0])) {
    if (count > bestCount) {
      best = grade;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Syllable-based readability formulas. "Difficult" words are the distinct
 * words of three or more syllables.
 */
export function computeReadability(text: string): ReadabilitySnapshot {
  const words = text.match(WORD_RE) ?? [];
  if (!words.length) return emptyReadability();

  const W = words.length;
  const S = Math.max(1, (text.match(SENTENCE_END_RE) ?? []).length);
  const syllables = words.map(countSyllables);
  const totalSyllables = syllables.reduce((a, b) => a + b, 0);
  const polysyllables = syllables.filter(n => n >= 3).length;
  const letters = words.reduce((a, w) => a + w.replace(/['’-]/g, "").length, 0);
  const difficult = new Set(words.filter((_, i) => syllables[i] >= 3).map(w => w.toLowerCase())).size;

  const wps = W / S;
  const spw = totalSyllables / W;

  const fleschReadingEase = 206.835 - 1.015 * wps - 84.6 * spw;
  const fleschKincaidGrade = 0.39 * wps + 11.8 * spw - 15.59;
  const smogIndex = S < 3 ? 0 : 1.043 * Math.sqrt((polysyllables * 30) / S) + 3.1291;
  const colemanLiauIndex = 0.0588 * ((letters / W) * 100) - 0.296 * ((S / W) * 100) - 15.8;
  const automatedReadabilityIndex = 4.71 * (letters / W) + 0.5 * wps - 21.43;

  const pctDifficult = (difficult / W) * 100;
  const daleChallScore = 0.1579 * pctDifficult + 0.0496 * wps + (pctDifficult > 5 ? 3.6365 : 0);

  const sample = syllables.slice(0, 100);
  const easy = sample.filter(n => n < 3).length;
  const hard = sample.length - easy;
  const linsearRaw = (easy + 3 * hard) / S;
  const linsearWrite = linsearRaw > 20 ? linsearRaw / 2 : (linsearRaw - 2) / 2;

  const gunningFog = 0.4 * (wps + 100 * (polysyllables / W));

  const grade = consensusGrade([fleschKincaidGrade, colemanLiauIndex, automatedReadabilityIndex, gunningFog, linsearWrite]);

  return {
    fleschReadingEase: round2(fleschReadingEase),
    fleschKincaidGrade: round2(fleschKincaidGrade),
    smogIndex: round2(smogIndex),
    colemanLiauIndex: round2(colemanLiauIndex),
    automatedReadabilityIndex: round2(automatedReadabilityIndex),
    daleChallScore: round2(daleChallScore),
    difficultWords: difficult,
    linsearWrite: round2(linsearWrite),
    gunningFog: round2(gunningFog),
    textStandard: `${ordinal(grade)} and ${ordinal(grade + 1)} grade`,
  };
}
