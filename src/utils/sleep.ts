/**
 * Abortable delay.
 *
 * @module utils/sleep
 */

/**
 * Wait `ms` milliseconds. Resolves true when the full delay elapsed and
 * false when `signal` aborted first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted === true) {
    return Promise.resolve(false);
  }

  return new Promise((resolve) => {
    function onAbort(): void {
      clearTimeout(timeoutId);
      resolve(false);
    }

    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
