/**
 * Timeout Manager
 *
 * Runs cancellable operations under a time budget. The operation receives an
 * AbortSignal that fires on timeout or when the parent signal aborts, so the
 * work is asked to stop rather than left running in the background.
 *
 * @module automation
 */

import { ConfigError } from '../errors/ConfigErrors.js';

/**
 * Longest delay a Node.js timer honours; larger values fire after ~1ms
 */
export const MAX_TIMEOUT_MS = 2_147_483_647;

const UNIT_MS: Readonly<Record<string, number>> = { ms: 1, s: 1000, m: 60_000, h: 3_600_000 };

export interface TimeoutConfig {
  timeoutMs: number;

  /** Parent cancellation (run cancel / abort) */
  signal?: AbortSignal;

  /** Error to reject with when the budget expires */
  onTimeout: () => Error;

  /** Error to reject with when the parent signal aborts */
  onAbort: (reason: unknown) => Error;
}

export class TimeoutManager {
  /**
   * Execute `operation` with a timeout and linked cancellation.
   *
   * Rejects with `onTimeout()` / `onAbort()` as soon as either fires, even if
   * the operation ignores its signal.
   */
  static execute<T>(operation: (signal: AbortSignal) => Promise<T>, config: TimeoutConfig): Promise<T> {
    const controller = new AbortController();
    const parent = config.signal;

    if (!Number.isFinite(config.timeoutMs) || config.timeoutMs <= 0 || config.timeoutMs > MAX_TIMEOUT_MS) {
      return Promise.reject(
        new ConfigError('timeout', [
          { path: 'timeoutMs', message: `${config.timeoutMs} is outside 1..${MAX_TIMEOUT_MS} milliseconds` },
        ]),
      );
    }

    if (parent?.aborted) {
      return Promise.reject(config.onAbort(parent.reason));
    }

    return new Promise<T>((resolve, reject) => {
      let settled = false;

      const finish = (): boolean => {
        if (settled) return false;
        settled = true;
        clearTimeout(timer);
        parent?.removeEventListener('abort', onParentAbort);
        return true;
      };

      const onParentAbort = (): void => {
        if (finish()) {
          const error = config.onAbort(parent?.reason);
          controller.abort(error);
          reject(error);
        }
      };

      const timer = setTimeout(() => {
        if (finish()) {
          const error = config.onTimeout();
          controller.abort(error);
          reject(error);
        }
      }, config.timeoutMs);

      parent?.addEventListener('abort', onParentAbort, { once: true });

      let pending: Promise<T>;
      try {
        pending = operation(controller.signal);
      } catch (error) {
        if (finish()) reject(error);
        return;
      }

      pending.then(
        value => {
          if (finish()) resolve(value);
        },
        (error: unknown) => {
          if (finish()) reject(error);
        },
      );
    });
  }

  /**
   * Parse a timeout string: "500ms", "30s", "5m", "2h" or raw milliseconds,
   * rounded to whole milliseconds
   */
  static parseTimeout(value: string | number): number {
    if (typeof value === 'number') {
      return value;
    }

    const trimmed = value.trim();
    if (/^\d+$/.test(trimmed)) {
      return parseInt(trimmed, 10);
    }

    const match = /^(\d+(?:\.\d+)?)(ms|s|m|h)$/.exec(trimmed);
    if (!match) {
      throw new ConfigError('timeout', [
        { path: '', message: `"${value}" is not a duration; expected e.g. "30s", "5m", "2h" or milliseconds` },
      ]);
    }

    const amount = parseFloat(match[1]);
    return Math.round(amount * (UNIT_MS[match[2]] ?? 1));
  }

  /**
   * Milliseconds as a short human-readable string
   */
  static formatTimeout(ms: number): string {
    if (ms < 1000) return `${ms}ms`;
    if (ms < 60_000) return `${(ms / 1000).toFixed(ms % 1000 === 0 ? 0 : 1)}s`;
    if (ms < 3_600_000) return `${(ms / 60_000).toFixed(ms % 60_000 === 0 ? 0 : 1)}m`;
    return `${(ms / 3_600_000).toFixed(1)}h`;
  }
}
