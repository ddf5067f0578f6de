/**
 * Retry Policy
 *
 * Attempt budget plus backoff schedule for one node. Only transient
 * failures (TransientError, Timeout) are retried.
 *
 * @module automation
 */

import type { NodeExecutionError } from '../errors/NodeErrors.js';
import { BackoffStrategy } from './BackoffStrategy.js';
import type { ToolFailureRule } from './FailurePolicy.js';

export class RetryPolicy {
  private readonly maxAttempts: number;
  private readonly backoff: BackoffStrategy;

  constructor(maxAttempts: number, backoff: BackoffStrategy) {
    this.maxAttempts = Math.max(1, Math.floor(maxAttempts));
    this.backoff = backoff;
  }

  static fromRule(rule: ToolFailureRule, random?: () => number): RetryPolicy {
    return new RetryPolicy(rule.maxAttempts, new BackoffStrategy({ ...rule.backoff, random }));
  }

  /**
   * Whether the error class is worth another attempt
   */
  static isTransient(error: NodeExecutionError): boolean {
    return error.kind === 'TransientError' || error.kind === 'Timeout';
  }

  /**
   * @param attempt - The attempt that just failed (1-indexed)
   */
  shouldRetry(error: NodeExecutionError, attempt: number): boolean {
    return attempt < this.maxAttempts && RetryPolicy.isTransient(error);
  }

  getDelay(attempt: number): number {
    return this.backoff.calculateDelay(attempt);
  }

  getMaxAttempts(): number {
    return this.maxAttempts;
  }

  /**
   * Worst-case total backoff if every attempt fails
   */
  getEstimatedRetryTime(): number {
    return this.backoff.getTotalDelay(this.maxAttempts - 1);
  }
}
