/**
 * Utility functions for the simulation lab SDK
 */

/**
 * Resolves after `ms` milliseconds, or rejects early when `signal` aborts.
 * @param ms - Time to wait
 * @param signal - Optional AbortSignal that cancels the wait
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
