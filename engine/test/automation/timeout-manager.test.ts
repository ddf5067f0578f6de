import { describe, it, expect, vi } from 'vitest';
import { MAX_TIMEOUT_MS, TimeoutManager } from '../../src/automation/TimeoutManager.js';
import { ConfigError } from '../../src/errors/ConfigErrors.js';

const config = {
  onTimeout: () => new Error('timed out'),
  onAbort: (reason: unknown) => new Error(`aborted: ${String(reason)}`),
};

function never(signal: AbortSignal): Promise<string> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(new Error('operation saw abort')), { once: true });
  });
}

describe('TimeoutManager', () => {
  describe('execute', () => {
    it('should resolve with the operation result inside the budget', async () => {
      await expect(TimeoutManager.execute(async () => 'done', { ...config, timeoutMs: 1000 })).resolves.toBe('done');
    });

    it('should reject with the timeout error and abort the operation signal', async () => {
      let seen: AbortSignal | undefined;
      const running = TimeoutManager.execute(
        signal => {
          seen = signal;
          return never(signal);
        },
        { ...config, timeoutMs: 10 },
      );

      await expect(running).rejects.toThrow('timed out');
      expect(seen?.aborted).toBe(true);
    });

    it('should reject with the abort error when the parent signal fires', async () => {
      const parent = new AbortController();
      const running = TimeoutManager.execute(never, { ...config, timeoutMs: 60_000, signal: parent.signal });

      parent.abort('user request');

      await expect(running).rejects.toThrow('aborted: user request');
    });

    it('should not start the operation when the parent is already aborted', async () => {
      const parent = new AbortController();
      parent.abort('early');
      let started = false;

      const running = TimeoutManager.execute(
        async () => {
          started = true;
          return 'late';
        },
        { ...config, timeoutMs: 1000, signal: parent.signal },
      );

      await expect(running).rejects.toThrow('aborted: early');
      expect(started).toBe(false);
    });

    it('should pass through operation failures', async () => {
      const running = TimeoutManager.execute(
        async () => {
          throw new Error('tool exploded');
        },
        { ...config, timeoutMs: 1000 },
      );

      await expect(running).rejects.toThrow('tool exploded');
    });

    it('should clear its timer when the operation throws before returning a promise', async () => {
      vi.useFakeTimers();
      try {
        const running = TimeoutManager.execute(
          () => {
            throw new Error('bad arguments');
          },
          { ...config, timeoutMs: 60_000 },
        );

        await expect(running).rejects.toThrow('bad arguments');
        expect(vi.getTimerCount()).toBe(0);
      } finally {
        vi.useRealTimers();
      }
    });

    it('should reject budgets a timer cannot hold', async () => {
      const operation = vi.fn(async () => 'never run');

      const running = TimeoutManager.execute(operation, { ...config, timeoutMs: MAX_TIMEOUT_MS + 1 });

      await expect(running).rejects.toThrow(ConfigError);
      await expect(running).rejects.toThrow('Invalid timeout: timeoutMs: 2147483648 is outside 1..2147483647 milliseconds');
      expect(operation).not.toHaveBeenCalled();
    });
  });

  describe('parseTimeout', () => {
    it('should parse unit suffixes and raw milliseconds', () => {
      expect(TimeoutManager.parseTimeout('500ms')).toBe(500);
      expect(TimeoutManager.parseTimeout('30s')).toBe(30_000);
      expect(TimeoutManager.parseTimeout('1.5s')).toBe(1500);
      expect(TimeoutManager.parseTimeout('5m')).toBe(300_000);
      expect(TimeoutManager.parseTimeout('2h')).toBe(7_200_000);
      expect(TimeoutManager.parseTimeout(' 250 ')).toBe(250);
      expect(TimeoutManager.parseTimeout(42)).toBe(42);
    });

    it('should round fractional durations to whole milliseconds', () => {
      expect(TimeoutManager.parseTimeout('1.1s')).toBe(1100);
      expect(TimeoutManager.parseTimeout('2.6ms')).toBe(3);
    });

    it('should reject text that is not a duration', () => {
      expect(() => TimeoutManager.parseTimeout('soon')).toThrow(ConfigError);
    });
  });

  describe('formatTimeout', () => {
    it('should pick the largest fitting unit', () => {
      expect(TimeoutManager.formatTimeout(500)).toBe('500ms');
      expect(TimeoutManager.formatTimeout(30_000)).toBe('30s');
      expect(TimeoutManager.formatTimeout(1500)).toBe('1.5s');
      expect(TimeoutManager.formatTimeout(300_000)).toBe('5m');
      expect(TimeoutManager.formatTimeout(7_200_000)).toBe('2.0h');
    });
  });
});
