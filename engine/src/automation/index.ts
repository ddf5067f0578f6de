/**
 * Automation: backoff, retries, timeouts and failure policy
 *
 * @module automation
 */

export * from './BackoffStrategy.js';
export * from './RetryPolicy.js';
export * from './FailurePolicy.js';
export * from './TimeoutManager.js';
export * from './runtime/index.js';
