/**
 * Backoff Timer
 *
 * Waits between retry attempts. Waits end early, with a rejection, when the
 * run is cancelled or aborted.
 *
 * @module automation/runtime
 */

export class BackoffTimer {
  /**
   * Resolve after `delayMs`, or reject with the signal's reason once it aborts
   */
  static wait(delayMs: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }
    if (delayMs <= 0) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        clearTimeout(timer);
        reject(signal?.reason);
      };

      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, delayMs);

      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Format delay for logging
   */
  static formatDelay(delayMs: number): string {
    if (delayMs < 1000) {
      return `${delayMs}ms`;
    }
    if (delayMs < 60000) {
      return `${(delayMs / 1000).toFixed(1)}s`;
    }
    return `${(delayMs / 60000).toFixed(1)}m`;
  }
}
