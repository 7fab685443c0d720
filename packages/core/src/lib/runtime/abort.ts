export function createAbortError(message = "The operation was aborted"): Error {
  const error = new Error(message);
  error.name = "AbortError";
  return error;
}

export function isAbortError(error: unknown, signal?: AbortSignal): boolean {
  if (error && typeof error === "object" && "name" in error && error.name === "AbortError") return true;

  return Boolean(signal?.aborted);
}

export function throwIfAborted(signal: AbortSignal | undefined, what: string): void {
  if (signal?.aborted) throw createAbortError(`${what} aborted`);
}

/**
 * Resolves after `ms`, or early (with `false`) when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, Math.max(0, Math.trunc(ms)));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
