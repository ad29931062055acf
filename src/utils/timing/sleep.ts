/**
 * Abortable Sleep
 */

/**
 * Sleep for the given number of milliseconds
 *
 * When `signal` aborts, the timer is cleared and the promise rejects with
 * the signal's reason. An already aborted signal rejects immediately.
 *
 * @example
 * ```typescript
 * const controller = new AbortController();
 * const pause = sleep(5000, controller.signal);
 * controller.abort(new Error('deadline'));
 * await pause; // rejects with Error('deadline')
 * ```
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
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
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
