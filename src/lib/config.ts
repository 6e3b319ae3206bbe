export type GrammarLevel = "default" | "picky";

export interface ProofConfig {
  languageToolBaseUrl: string;
  languageToolApiKey?: string;
  language: string;
  grammarLevel: GrammarLevel;
  ollamaUrl: string;
  llamaModel: string;
  /** budget for in-process detectors */
  detectorTimeoutMs: number;
  /** budget for detectors that call out (LanguageTool, language model) */
  networkTimeoutMs: number;
  spellAffPath?: string;
  spellDicPath?: string;
}

const DEFAULT_LT_BASE = "http://127.0.0.1:8010";
const DEFAULT_OLLAMA_URL = "http://127.0.0.1:11434";
const DEFAULT_MODEL = "llama3.1:8b";
const DEFAULT_DETECTOR_TIMEOUT_MS = 2_000;
const DEFAULT_NETWORK_TIMEOUT_MS = 20_000;

function normalizeBase(base: string): string {
  return base.endsWith("/") ? base.slice(0, -1) : base;
}

function positiveInt(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

function nonEmpty(raw: string | undefined): string | undefined {
  return raw && raw.trim() ? raw.trim() : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ProofConfig {
  return {
    languageToolBaseUrl: normalizeBase(nonEmpty(env.LT_BASE_URL) ?? DEFAULT_LT_BASE),
    languageToolApiKey: nonEmpty(env.LANGUAGETOOL_API_KEY),
    language: nonEmpty(env.LT_LANGUAGE) ?? "en-US",
    grammarLevel: env.LT_LEVEL === "picky" ? "picky" : "default",
    ollamaUrl: nonEmpty(env.OLLAMA_URL) ?? nonEmpty(env.LLAMA_URL) ?? DEFAULT_OLLAMA_URL,
    llamaModel: nonEmpty(env.LLAMA_MODEL) ?? DEFAULT_MODEL,
    detectorTimeoutMs: positiveInt(env.DETECTOR_TIMEOUT_MS, DEFAULT_DETECTOR_TIMEOUT_MS),
    networkTimeoutMs: positiveInt(env.NETWORK_TIMEOUT_MS, DEFAULT_NETWORK_TIMEOUT_MS),
    spellAffPath: nonEmpty(env.SPELL_AFF_PATH),
    spellDicPath: nonEmpty(env.SPELL_DIC_PATH),
  };
}
