/**
 * Backoff Strategy
 *
 * Calculates delays between retry attempts: fixed, linear or exponential,
 * capped, with optional jitter.
 *
 * @module automation
 */

import { ConfigError } from '../errors/ConfigErrors.js';
import { MAX_TIMEOUT_MS } from './TimeoutManager.js';

export type BackoffType = 'fixed' | 'linear' | 'exponential';

export interface BackoffConfig {
  type: BackoffType;

  /** Delay before the first retry */
  baseDelayMs: number;

  /** Upper bound on any single delay (default: 30000) */
  maxDelayMs?: number;

  /** Growth factor for exponential backoff (default: 2) */
  multiplier?: number;

  /** Random spread as a fraction of the delay, 0-1 (default: 0.1) */
  jitter?: number;

  /** Random source in [0, 1); injectable for deterministic tests */
  random?: () => number;
}

export class BackoffStrategy {
  private readonly config: Required<BackoffConfig>;

  constructor(config: BackoffConfig) {
    this.config = {
      type: config.type,
      baseDelayMs: config.baseDelayMs,
      maxDelayMs: config.maxDelayMs ?? 30000,
      multiplier: config.multiplier ?? 2,
      jitter: Math.max(0, Math.min(1, config.jitter ?? 0.1)),
      random: config.random ?? Math.random,
    };

    this.validateConfig();
  }

  /**
   * Delay to wait after a failed attempt
   *
   * @param attempt - The attempt that just failed (1-indexed)
   */
  calculateDelay(attempt: number): number {
    const n = Math.max(1, Math.floor(attempt));
    const { type, baseDelayMs, multiplier, maxDelayMs, jitter, random } = this.config;

    let delayMs: number;
    switch (type) {
      case 'fixed':
        delayMs = baseDelayMs;
        break;
      case 'linear':
        delayMs = baseDelayMs * n;
        break;
      case 'exponential':
        delayMs = baseDelayMs * Math.pow(multiplier, n - 1);
        break;
    }

    delayMs = Math.min(delayMs, maxDelayMs);

    if (jitter > 0) {
      const spread = delayMs * jitter;
      delayMs = Math.max(0, delayMs + (random() * 2 - 1) * spread);
    }

    return Math.min(Math.round(delayMs), MAX_TIMEOUT_MS);
  }

  /**
   * Worst-case total delay across `retries` retries, ignoring jitter
   */
  getTotalDelay(retries: number): number {
    const unjittered = new BackoffStrategy({ ...this.config, jitter: 0 });
    let total = 0;
    for (let attempt = 1; attempt <= retries; attempt++) {
      total += unjittered.calculateDelay(attempt);
    }
    return total;
  }

  getConfig(): Readonly<Omit<Required<BackoffConfig>, 'random'>> {
    const { random: _random, ...rest } = this.config;
    return rest;
  }

  private validateConfig(): void {
    const issues: { path: string; message: string }[] = [];
    if (this.config.baseDelayMs < 0) {
      issues.push({ path: 'baseDelayMs', message: `must be >= 0, got ${this.config.baseDelayMs}` });
    }
    if (this.config.maxDelayMs < this.config.baseDelayMs) {
      issues.push({
        path: 'maxDelayMs',
        message: `must be >= baseDelayMs (${this.config.baseDelayMs}), got ${this.config.maxDelayMs}`,
      });
    }
    if (this.config.maxDelayMs > MAX_TIMEOUT_MS) {
      issues.push({ path: 'maxDelayMs', message: `must be <= ${MAX_TIMEOUT_MS}, got ${this.config.maxDelayMs}` });
    }
    if (this.config.multiplier <= 0) {
      issues.push({ path: 'multiplier', message: `must be > 0, got ${this.config.multiplier}` });
    }
    if (issues.length > 0) {
      throw new ConfigError('backoff configuration', issues);
    }
  }
}

