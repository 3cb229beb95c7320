/**
 * Time utility functions
 */

/**
 * Get current timestamp in milliseconds
 * @returns Current time in milliseconds since epoch
 */
export function nowMs(): number {
  return Date.now();
}

/**
 * Wait for the given duration
 *
 * Resolves early (without rejecting) when the signal aborts, so callers can
 * check `signal.aborted` afterwards and wind down.
 *
 * @param ms - Duration in milliseconds
 * @param signal - Optional abort signal
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(function(resolve) {
    if (signal && signal.aborted) {
      resolve();
      return;
    }

    const timer = setTimeout(function() {
      if (signal) {
        signal.removeEventListener('abort', onAbort);
      }
      resolve();
    }, ms);

    function onAbort(): void {
      clearTimeout(timer);
      resolve();
    }

    if (signal) {
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });
}

/**
 * Sleep function signature, injected where tests need to control time
 */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;
