export const DEBUG = process.env.PROOF_DEBUG === "1";

export function dlog(...args: unknown[]) {
  if (DEBUG) console.log(...args);
}

export function dgroup(label: string, fn: () => void) {
  if (!DEBUG) return;
  console.group(label);
  try { fn(); } finally { console.groupEnd(); }
}

export function dtable(label: string, rows: readonly object[]) {
  if (!DEBUG) return;
  console.log(label);
  console.table(rows);
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error && err.message) return err.message;
  return typeof err === "string" && err ? err : "Unexpected error";
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}

/**
 * `fetch` with a hard deadline. An outer `signal` (e.g. the pipeline's
 * per-detector timeout) aborts the request as well.
 */
export async function fetchWithTimeout(
  input: string | URL,
  init: RequestInit,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<Response> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  const onAbort = () => controller.abort();
  if (signal?.aborted) controller.abort();
  else signal?.addEventListener("abort", onAbort, { once: true });

  try {
    return await fetch(input, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onAbort);
  }
}
