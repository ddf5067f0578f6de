/**
 * Automation runtime: failure decisions and retry waits
 *
 * @module automation/runtime
 */

export * from './FailureHandler.js';
export * from './BackoffTimer.js';
