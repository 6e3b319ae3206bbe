import type { Finding } from "@/lib/findings/types";
import type { ParsedForm } from "@/lib/parse/types";

export const DETECTOR_KINDS = ["spelling", "grammar", "heuristic", "style", "contextual"] as const;

export type DetectorKind = (typeof DETECTOR_KINDS)[number];

/**
 * One source of findings. `parsed` is shared by every detector of a run and
 * must not be mutated; detectors that need it return `[]` without it. The
 * `signal` fires when the pipeline stops waiting (timeout).
 */
export interface Detector<K extends DetectorKind = DetectorKind> {
  readonly kind: K;
  detect(text: string, parsed?: ParsedForm, signal?: AbortSignal): Finding[] | Promise<Finding[]>;
}

export type AnyDetector = { [K in DetectorKind]: Detector<K> }[DetectorKind];
