export function roundTo(value: number, digits = 2): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}

export function singleLine(s: string | undefined): string {
  return (s ?? "").replace(/\r?\n/g, " ");
}

/** Resolves after `ms`, or straight away once `signal` aborts. */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return;
  return new Promise((r) => {
    const onAbort = () => {
      clearTimeout(timer);
      r();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      r();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
